import type Bottleneck from 'bottleneck';
import pino from 'pino';
import { classifyPurchaseError } from './error-classifier.js';
import { safeNotify } from './notify.js';
import type {
  AcquisitionReport,
  GiftPlatform,
  Item,
  Notifier,
  Recipient,
  RecipientBudget,
  RecipientInfo,
} from './types.js';

const log = pino({ name: 'purchase-orchestrator' });

export interface PurchaseContext {
  platform: GiftPlatform;
  notifier: Notifier;
  /** Serializes purchase calls and enforces the minimum spacing between them. */
  limiter: Bottleneck;
}

export interface AcquisitionRequest {
  item: Item;
  /** Units to buy for each recipient. */
  quantity: number;
  recipients: readonly Recipient[];
}

/**
 * Live balance. A failed lookup reads as 0 so nothing is bought on an
 * unknown budget.
 */
export async function readBalance(platform: GiftPlatform): Promise<number> {
  try {
    return await platform.getBalance();
  } catch (err) {
    log.warn({ err }, 'Balance lookup failed, treating balance as 0');
    return 0;
  }
}

/**
 * Current catalog price for one item. 0 when the lookup fails or the item is
 * gone from the catalog; callers treat 0 as "no price limit".
 */
export async function readLivePrice(platform: GiftPlatform, itemId: string): Promise<number> {
  try {
    const items = await platform.listAvailableItems();
    return items.find((i) => i.id === itemId)?.price ?? 0;
  } catch (err) {
    log.warn({ err, itemId }, 'Price lookup failed, treating price as unknown');
    return 0;
  }
}

export async function describeRecipient(
  platform: GiftPlatform,
  recipient: Recipient,
): Promise<RecipientInfo> {
  try {
    return await platform.resolveRecipient(recipient);
  } catch (err) {
    log.debug({ err, recipient }, 'Recipient lookup failed, using raw id');
    return { displayReference: String(recipient), handle: '' };
  }
}

export function affordableQuantity(requested: number, balance: number, price: number): number {
  if (price <= 0) return requested;
  return Math.min(requested, Math.floor(balance / price));
}

/**
 * Buy `request.quantity` units of one item for each recipient, as far as the
 * live balance allows.
 *
 * Recipients are served in order. Each one gets a fresh balance and price
 * read, so its budget reflects what earlier recipients spent. Units go out
 * one call at a time; a failed call ends that recipient's sequence only.
 * Cancellation is checked between units.
 */
export async function acquireItem(
  ctx: PurchaseContext,
  request: AcquisitionRequest,
  signal?: AbortSignal,
): Promise<AcquisitionReport> {
  const report: AcquisitionReport = {
    itemId: request.item.id,
    requestedQuantity: request.quantity,
    purchasedUnits: 0,
    budgets: [],
    outcomes: [],
  };

  log.info(
    { itemId: report.itemId, quantity: request.quantity, recipients: request.recipients.length },
    'Purchasing item',
  );

  for (const recipient of request.recipients) {
    if (signal?.aborted) {
      report.outcomes.push({ kind: 'aborted', reason: 'cancelled', recipient });
      break;
    }
    await serveRecipient(ctx, report, recipient, signal);
  }

  return report;
}

async function serveRecipient(
  ctx: PurchaseContext,
  report: AcquisitionReport,
  recipient: Recipient,
  signal?: AbortSignal,
): Promise<void> {
  const { itemId, requestedQuantity: requested } = report;

  const info = await describeRecipient(ctx.platform, recipient);
  const price = await readLivePrice(ctx.platform, itemId);
  const balance = await readBalance(ctx.platform);
  const affordable = affordableQuantity(requested, balance, price);
  const budget: RecipientBudget = { recipient, price, balance, affordableQuantity: affordable };
  report.budgets.push(budget);

  if (affordable <= 0) {
    log.warn({ itemId, recipient, requested, price, balance }, 'Insufficient balance for any unit');
    report.outcomes.push({ kind: 'aborted', reason: 'insufficient_balance', recipient });
    await safeNotify(ctx.notifier, {
      type: 'insufficient_balance',
      itemId,
      recipient: info,
      price,
      balance,
      requestedQuantity: requested,
    });
    return;
  }

  const purchased = await purchaseUnits(ctx, report, budget, info, signal);

  if (affordable < requested) {
    const shortfall = (requested - affordable) * price;
    const remainingBalance = balance - purchased * price;
    log.warn(
      { itemId, recipient, purchased: affordable, requested, shortfall, remainingBalance },
      'Partial purchase, balance too low for full quantity',
    );
    await safeNotify(ctx.notifier, {
      type: 'partial_purchase',
      itemId,
      recipient: info,
      purchased: affordable,
      requested,
      shortfall,
      remainingBalance,
    });
  }
}

/** Returns the number of units bought. */
async function purchaseUnits(
  ctx: PurchaseContext,
  report: AcquisitionReport,
  budget: RecipientBudget,
  info: RecipientInfo,
  signal?: AbortSignal,
): Promise<number> {
  const { itemId } = report;
  const { recipient, affordableQuantity: total } = budget;
  let purchased = 0;

  for (let unit = 1; unit <= total; unit++) {
    if (signal?.aborted) {
      report.outcomes.push({ kind: 'aborted', reason: 'cancelled', recipient });
      return purchased;
    }

    try {
      await ctx.limiter.schedule(() => ctx.platform.purchase(recipient, itemId, 1));
    } catch (err) {
      const classified = classifyPurchaseError(err);
      const balance = await readBalance(ctx.platform);

      log.error(
        { err, itemId, recipient, category: classified.category, purchased },
        'Purchase failed, skipping remaining units for recipient',
      );
      report.outcomes.push({ kind: 'partial_failure', recipient, reason: classified, purchasedSoFar: purchased });
      await safeNotify(ctx.notifier, {
        type: 'purchase_failed',
        itemId,
        recipient: info,
        error: classified,
        price: budget.price,
        balance,
      });
      return purchased;
    }

    purchased++;
    report.purchasedUnits++;
    report.outcomes.push({ kind: 'success', recipient, currentIndex: unit, totalRequested: total });
    log.info({ itemId, recipient: info.displayReference, current: unit, total }, 'Gift sent');
    await safeNotify(ctx.notifier, {
      type: 'unit_purchased',
      itemId,
      recipient: info,
      currentIndex: unit,
      totalRequested: total,
    });
  }

  return purchased;
}
