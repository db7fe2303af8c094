import { z } from 'zod';
import type { Item } from '../acquisition/types.js';

/** Persisted shape of one catalog entry. `position` is derived per cycle and never stored. */
export const itemRecordSchema = z.object({
  id: z.string().min(1),
  price: z.number().int().nonnegative(),
  isLimited: z.boolean(),
  isSoldOut: z.boolean(),
  totalAmount: z.number().int().nonnegative().optional(),
  remainingAmount: z.number().int().nonnegative().optional(),
  upgradePrice: z.number().int().nonnegative().optional(),
});

export const snapshotFileSchema = z.array(itemRecordSchema);

export interface SnapshotStore {
  /** Last saved catalog keyed by id. Empty when nothing was saved yet. */
  load(): Promise<Map<string, Item>>;
  /** Replace the stored catalog with `items`. */
  save(items: readonly Item[]): Promise<void>;
}

export function toItemRecord(item: Item): Item {
  const record: Item = {
    id: item.id,
    price: item.price,
    isLimited: item.isLimited,
    isSoldOut: item.isSoldOut,
  };
  if (item.totalAmount !== undefined) record.totalAmount = item.totalAmount;
  if (item.remainingAmount !== undefined) record.remainingAmount = item.remainingAmount;
  if (item.upgradePrice !== undefined) record.upgradePrice = item.upgradePrice;
  return record;
}

export function indexById(items: readonly Item[]): Map<string, Item> {
  return new Map(items.map((item) => [item.id, item]));
}
