/**
 * Processing order for a batch of newly detected items.
 * Pure function, no I/O.
 */

import type { Item, PositionedItem } from './types.js';

export interface PrioritizeOptions {
  prioritizeLowSupply: boolean;
}

function supplyKey(item: Item): number {
  if (!item.isLimited || item.totalAmount === undefined) return Number.POSITIVE_INFINITY;
  return item.totalAmount;
}

/**
 * Order items for purchase.
 *
 * position = discoveryOrder.length - index, i.e. distance from the end of the
 * catalog. The position sort always runs; low-supply mode re-sorts its output
 * by supply (limited items only) and keeps position as the tie-break.
 *
 * Ids missing from `discoveryOrder` get position length + 1.
 */
export function prioritizeItems(
  items: ReadonlyMap<string, Item>,
  discoveryOrder: readonly string[],
  options: PrioritizeOptions,
): PositionedItem[] {
  const total = discoveryOrder.length;

  const positioned: PositionedItem[] = [...items.entries()].map(([id, item]) => ({
    ...item,
    id,
    position: total - discoveryOrder.indexOf(id),
  }));

  const byPosition = positioned.sort((a, b) => a.position - b.position);
  if (!options.prioritizeLowSupply) return byPosition;

  return [...byPosition].sort((a, b) => {
    const supplyDiff = supplyKey(a) - supplyKey(b);
    if (supplyDiff !== 0 && !Number.isNaN(supplyDiff)) return supplyDiff;
    return a.position - b.position;
  });
}
