import pino from 'pino';
import { getErrorMessage, isOperationalError } from '../../utils/errors.js';
import type { SnapshotStore } from '../snapshot/types.js';
import { evaluateItem, tallyExclusions } from './eligibility.js';
import { safeNotify } from './notify.js';
import { prioritizeItems } from './prioritizer.js';
import { acquireItem, type PurchaseContext } from './purchase-orchestrator.js';
import type { AcquisitionRules, CycleStage, ExclusionTally, Item, PositionedItem } from './types.js';

const log = pino({ name: 'detector' });

export type LoopState = 'idle' | 'processing';

export interface DetectionContext extends PurchaseContext {
  store: SnapshotStore;
  rules: AcquisitionRules;
  /** Called once per new item, in priority order, before it is evaluated. */
  onNewItem?: (item: PositionedItem) => void | Promise<void>;
}

export interface CycleOptions {
  signal?: AbortSignal;
  onStateChange?: (state: LoopState) => void;
}

export interface CycleResult {
  status: 'completed' | 'failed';
  failedStage?: CycleStage;
  catalogSize: number;
  newItems: number;
  excluded: number;
  /** New items left unprocessed because the cycle was cancelled. */
  skipped: number;
  unitsPurchased: number;
  tally: ExclusionTally;
}

export interface Catalog {
  items: Map<string, Item>;
  /** Ids in the order the platform listed them. */
  order: string[];
}

export function buildCatalog(items: readonly Item[]): Catalog {
  const map = new Map<string, Item>();
  for (const item of items) {
    if (!map.has(item.id)) map.set(item.id, item);
  }
  return { items: map, order: [...map.keys()] };
}

/**
 * Items present in `current` but absent from `known`. Compared by id only:
 * attribute changes on a known id are not a new listing.
 */
export function diffNewItems(
  current: ReadonlyMap<string, Item>,
  known: ReadonlyMap<string, Item>,
): Map<string, Item> {
  const fresh = new Map<string, Item>();
  for (const [id, item] of current) {
    if (!known.has(id)) fresh.set(id, item);
  }
  return fresh;
}

function emptyResult(): CycleResult {
  return {
    status: 'completed',
    catalogSize: 0,
    newItems: 0,
    excluded: 0,
    skipped: 0,
    unitsPurchased: 0,
    tally: { soldOut: 0, nonLimited: 0, nonUpgradable: 0 },
  };
}

/**
 * Run a single detection cycle.
 *
 * 1. Reconnect the platform client if needed
 * 2. Load the last snapshot (missing = first run)
 * 3. Fetch the catalog and diff it against the snapshot by id
 * 4. For each new item in priority order: callback → evaluate → purchase
 * 5. Save the fetched catalog as the new snapshot, new items or not. New
 *    items skipped by a cancellation are left out so they stay new.
 *
 * A catalog fetch failure always ends the cycle with status 'failed'.
 * Connect and snapshot failures do so only when operational; other errors,
 * and anything thrown while processing items, propagate to the caller.
 */
export async function runDetectionCycle(
  ctx: DetectionContext,
  options: CycleOptions = {},
): Promise<CycleResult> {
  const result = emptyResult();

  const fail = async (stage: CycleStage, err: unknown): Promise<CycleResult> => {
    if (stage !== 'fetch_catalog' && !isOperationalError(err)) throw err;
    log.error({ err, stage }, 'Detection cycle failed');
    result.status = 'failed';
    result.failedStage = stage;
    await safeNotify(ctx.notifier, { type: 'cycle_failed', stage, message: getErrorMessage(err) });
    return result;
  };

  // Step 1: Connection
  if (!ctx.platform.isConnected()) {
    try {
      log.info('Platform disconnected, reconnecting');
      await ctx.platform.connect();
    } catch (err) {
      return fail('connect', err);
    }
  }

  // Step 2: Previous snapshot
  let known: Map<string, Item>;
  try {
    known = await ctx.store.load();
  } catch (err) {
    return fail('load_snapshot', err);
  }

  // Step 3: Current catalog
  let catalog: Catalog;
  try {
    catalog = buildCatalog(await ctx.platform.listAvailableItems());
  } catch (err) {
    return fail('fetch_catalog', err);
  }
  result.catalogSize = catalog.items.size;

  const fresh = diffNewItems(catalog.items, known);
  result.newItems = fresh.size;

  // Step 4: New items
  let unprocessed = new Set<string>();
  if (fresh.size > 0) {
    options.onStateChange?.('processing');
    try {
      unprocessed = await processNewItems(ctx, fresh, catalog.order, result, options.signal);
    } finally {
      options.onStateChange?.('idle');
    }
  }

  // Step 5: Replace the snapshot
  try {
    await ctx.store.save([...catalog.items.values()].filter((item) => !unprocessed.has(item.id)));
  } catch (err) {
    return fail('save_snapshot', err);
  }

  return result;
}

/** Returns the ids of new items that were never reached. */
async function processNewItems(
  ctx: DetectionContext,
  fresh: Map<string, Item>,
  order: readonly string[],
  result: CycleResult,
  signal?: AbortSignal,
): Promise<Set<string>> {
  log.info({ count: fresh.size }, 'New gifts detected');

  result.tally = tallyExclusions(fresh.values(), ctx.rules);
  const prioritized = prioritizeItems(fresh, order, ctx.rules);
  let unprocessed: string[] = [];

  for (const [index, item] of prioritized.entries()) {
    if (signal?.aborted) {
      unprocessed = prioritized.slice(index).map((i) => i.id);
      log.warn({ remaining: unprocessed.length }, 'Cancelled, leaving remaining new gifts for the next run');
      break;
    }

    await ctx.onNewItem?.(item);

    const verdict = evaluateItem(item, ctx.rules);
    if (!verdict.eligible) {
      result.excluded++;
      log.info({ itemId: item.id, reason: verdict.exclusionReason }, 'Gift excluded');
      await safeNotify(ctx.notifier, { type: 'item_excluded', item, verdict });
      continue;
    }

    log.info(
      { itemId: item.id, quantity: verdict.quantity, recipients: verdict.recipients.length },
      'Processing gift',
    );
    const report = await acquireItem(
      ctx,
      { item, quantity: verdict.quantity, recipients: verdict.recipients },
      signal,
    );
    result.unitsPurchased += report.purchasedUnits;
  }

  result.skipped = unprocessed.length;
  await safeNotify(ctx.notifier, { type: 'cycle_summary', newItems: fresh.size, tally: result.tally });

  const { soldOut, nonLimited, nonUpgradable } = result.tally;
  if (soldOut + nonLimited + nonUpgradable > 0) {
    log.info({ soldOut, nonLimited, nonUpgradable }, 'Skip summary');
  }

  return new Set(unprocessed);
}
