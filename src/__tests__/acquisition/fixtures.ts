import { vi } from 'vitest';
import { PlatformError } from '../../utils/errors.js';
import type { GiftPlatform, Item, Notifier, AcquisitionEvent, RecipientInfo } from '../../services/acquisition/types.js';
import type { SnapshotStore } from '../../services/snapshot/types.js';

export function makeItem(overrides: Partial<Item> = {}): Item {
  return {
    id: '1001',
    price: 30,
    isLimited: true,
    isSoldOut: false,
    totalAmount: 40,
    remainingAmount: 40,
    ...overrides,
  };
}

/**
 * In-memory platform; tests adjust the public fields between calls.
 * Each purchase spends the item's catalog price from `balance`.
 */
export class FakePlatform implements GiftPlatform {
  connected = true;
  catalog: Item[] = [];
  balance = 0;
  purchases: Array<{ recipient: number | string; itemId: string; at: number }> = [];
  failPurchase: ((recipient: number | string, itemId: string) => Error | null) | null = null;

  isConnected = vi.fn(() => this.connected);
  connect = vi.fn(async () => {
    this.connected = true;
  });
  listAvailableItems = vi.fn(async () => this.catalog.map((item) => ({ ...item })));
  getBalance = vi.fn(async () => this.balance);
  resolveRecipient = vi.fn(
    async (recipient: number | string): Promise<RecipientInfo> => ({
      displayReference: typeof recipient === 'number' ? String(recipient) : `@${recipient}`,
      handle: typeof recipient === 'number' ? '' : recipient,
    }),
  );
  purchase = vi.fn(async (recipient: number | string, itemId: string) => {
    const failure = this.failPurchase?.(recipient, itemId) ?? null;
    if (failure) throw failure;

    const price = this.catalog.find((item) => item.id === itemId)?.price ?? 0;
    if (price > this.balance) {
      throw new PlatformError('sendGift', 'Bad Request: BALANCE_TOO_LOW', { code: 'BALANCE_TOO_LOW' });
    }
    this.balance -= price;
    this.purchases.push({ recipient, itemId, at: Date.now() });
  });
}

export class RecordingNotifier implements Notifier {
  events: AcquisitionEvent[] = [];

  async notify(event: AcquisitionEvent): Promise<void> {
    this.events.push(event);
  }

  ofType<T extends AcquisitionEvent['type']>(type: T): Extract<AcquisitionEvent, { type: T }>[] {
    return this.events.filter((e): e is Extract<AcquisitionEvent, { type: T }> => e.type === type);
  }
}

export class MemoryStore implements SnapshotStore {
  saved: Item[][] = [];

  constructor(private items: Item[] | null = null) {}

  load = vi.fn(async () => new Map((this.items ?? []).map((item) => [item.id, item])));

  save = vi.fn(async (items: readonly Item[]) => {
    this.items = [...items];
    this.saved.push([...items]);
  });
}
