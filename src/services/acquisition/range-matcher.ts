/**
 * Acquisition range lookup.
 * Pure function, no I/O.
 */

import type { AcquisitionRange, Recipient } from './types.js';

export interface RangeMatch {
  matched: boolean;
  quantity: number;
  recipients: Recipient[];
}

/**
 * Find the first configured range whose price band contains `price` and
 * whose supply ceiling is at least `totalAmount`.
 *
 * Ranges are scanned in declared order, so overlapping configuration always
 * resolves to the earlier entry.
 */
export function matchRange(
  price: number,
  totalAmount: number,
  ranges: readonly AcquisitionRange[],
): RangeMatch {
  const range = ranges.find(
    (r) => r.minPrice <= price && price <= r.maxPrice && totalAmount <= r.supplyLimit,
  );
  if (!range) return { matched: false, quantity: 0, recipients: [] };

  return { matched: true, quantity: range.quantity, recipients: [...range.recipients] };
}
