import { describe, it, expect, vi, beforeEach } from 'vitest';

// Suppress pino log noise in tests
vi.mock('pino', () => ({
  default: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn().mockReturnThis(),
  }),
}));

import { acquireItem, affordableQuantity, type PurchaseContext } from '../../services/acquisition/purchase-orchestrator.js';
import { createPurchaseLimiter } from '../../services/acquisition/purchase-limiter.js';
import { PlatformError } from '../../utils/errors.js';
import { FakePlatform, RecordingNotifier, makeItem } from './fixtures.js';

let platform: FakePlatform;
let notifier: RecordingNotifier;
let ctx: PurchaseContext;

beforeEach(() => {
  platform = new FakePlatform();
  notifier = new RecordingNotifier();
  ctx = { platform, notifier, limiter: createPurchaseLimiter(0) };
});

describe('affordableQuantity', () => {
  it('caps the request by whole units the balance covers', () => {
    expect(affordableQuantity(5, 25, 10)).toBe(2);
    expect(affordableQuantity(3, 5, 10)).toBe(0);
    expect(affordableQuantity(2, 100, 10)).toBe(2);
  });

  it('treats a zero price as no limit', () => {
    expect(affordableQuantity(4, 0, 0)).toBe(4);
  });
});

describe('acquireItem', () => {
  it('buys only what the balance covers and reports the shortfall', async () => {
    const item = makeItem({ id: 'g1', price: 10 });
    platform.catalog = [item];
    platform.balance = 25;

    const report = await acquireItem(ctx, { item, quantity: 5, recipients: ['alice'] });

    expect(platform.purchase).toHaveBeenCalledTimes(2);
    expect(platform.purchase).toHaveBeenCalledWith('alice', 'g1', 1);
    expect(report.budgets).toEqual([{ recipient: 'alice', price: 10, balance: 25, affordableQuantity: 2 }]);
    expect(report.purchasedUnits).toBe(2);
    expect(notifier.ofType('partial_purchase')).toEqual([
      {
        type: 'partial_purchase',
        itemId: 'g1',
        recipient: { displayReference: '@alice', handle: 'alice' },
        purchased: 2,
        requested: 5,
        shortfall: 30,
        remainingBalance: 5,
      },
    ]);
  });

  it('makes no purchase call when no unit is affordable', async () => {
    const item = makeItem({ id: 'g2', price: 10 });
    platform.catalog = [item];
    platform.balance = 5;

    const report = await acquireItem(ctx, { item, quantity: 3, recipients: ['alice'] });

    expect(platform.purchase).not.toHaveBeenCalled();
    expect(report.outcomes).toEqual([{ kind: 'aborted', reason: 'insufficient_balance', recipient: 'alice' }]);
    expect(notifier.events).toEqual([
      {
        type: 'insufficient_balance',
        itemId: 'g2',
        recipient: { displayReference: '@alice', handle: 'alice' },
        price: 10,
        balance: 5,
        requestedQuantity: 3,
      },
    ]);
  });

  it('serves every recipient the full affordable quantity in order', async () => {
    const item = makeItem({ id: 'g3', price: 10 });
    platform.catalog = [item];
    platform.balance = 100;

    const report = await acquireItem(ctx, { item, quantity: 2, recipients: ['alice', 42] });

    expect(platform.purchases.map((p) => p.recipient)).toEqual(['alice', 'alice', 42, 42]);
    expect(report.purchasedUnits).toBe(4);
    expect(
      notifier.ofType('unit_purchased').map((e) => [e.recipient.displayReference, e.currentIndex, e.totalRequested]),
    ).toEqual([
      ['@alice', 1, 2],
      ['@alice', 2, 2],
      ['42', 1, 2],
      ['42', 2, 2],
    ]);
    expect(notifier.ofType('partial_purchase')).toEqual([]);
  });

  it('re-reads the balance for each recipient', async () => {
    const item = makeItem({ id: 'g10', price: 10 });
    platform.catalog = [item];
    platform.balance = 25;

    const report = await acquireItem(ctx, { item, quantity: 2, recipients: ['alice', 'bob'] });

    expect(platform.purchase.mock.calls.map(([recipient]) => recipient)).toEqual(['alice', 'alice']);
    expect(report.budgets).toEqual([
      { recipient: 'alice', price: 10, balance: 25, affordableQuantity: 2 },
      { recipient: 'bob', price: 10, balance: 5, affordableQuantity: 0 },
    ]);
    expect(notifier.events.map((e) => e.type)).toEqual(['unit_purchased', 'unit_purchased', 'insufficient_balance']);
    expect(notifier.ofType('insufficient_balance')).toEqual([
      {
        type: 'insufficient_balance',
        itemId: 'g10',
        recipient: { displayReference: '@bob', handle: 'bob' },
        price: 10,
        balance: 5,
        requestedQuantity: 2,
      },
    ]);
  });

  it('reports a partial purchase for the recipient the remaining balance cannot fully cover', async () => {
    const item = makeItem({ id: 'g11', price: 10 });
    platform.catalog = [item];
    platform.balance = 35;

    const report = await acquireItem(ctx, { item, quantity: 2, recipients: ['alice', 'bob'] });

    expect(platform.purchases.map((p) => p.recipient)).toEqual(['alice', 'alice', 'bob']);
    expect(report.purchasedUnits).toBe(3);
    expect(platform.balance).toBe(5);
    expect(notifier.ofType('partial_purchase')).toEqual([
      {
        type: 'partial_purchase',
        itemId: 'g11',
        recipient: { displayReference: '@bob', handle: 'bob' },
        purchased: 1,
        requested: 2,
        shortfall: 10,
        remainingBalance: 5,
      },
    ]);
  });

  it('stops a failing recipient and moves on to the next', async () => {
    const item = makeItem({ id: 'g4', price: 10 });
    platform.catalog = [item];
    platform.balance = 100;
    platform.failPurchase = (recipient) =>
      recipient === 'alice'
        ? new PlatformError('sendGift', 'Bad Request: USER_ID_INVALID', { code: 'USER_ID_INVALID' })
        : null;

    const report = await acquireItem(ctx, { item, quantity: 2, recipients: ['alice', 'bob'] });

    expect(platform.purchase).toHaveBeenCalledTimes(3);
    expect(platform.purchases.map((p) => p.recipient)).toEqual(['bob', 'bob']);
    expect(report.outcomes[0]).toMatchObject({
      kind: 'partial_failure',
      recipient: 'alice',
      purchasedSoFar: 0,
      reason: { category: 'invalid_recipient', code: 'USER_ID_INVALID' },
    });
    expect(notifier.ofType('purchase_failed')).toEqual([
      {
        type: 'purchase_failed',
        itemId: 'g4',
        recipient: { displayReference: '@alice', handle: 'alice' },
        error: {
          category: 'invalid_recipient',
          message: 'sendGift failed: Bad Request: USER_ID_INVALID',
          code: 'USER_ID_INVALID',
        },
        price: 10,
        balance: 100,
      },
    ]);
  });

  it('treats an item missing from the live catalog as free', async () => {
    const item = makeItem({ id: 'gone', price: 10 });
    platform.catalog = [];
    platform.balance = 0;

    const report = await acquireItem(ctx, { item, quantity: 2, recipients: ['alice'] });

    expect(report.budgets[0].price).toBe(0);
    expect(platform.purchase).toHaveBeenCalledTimes(2);
  });

  it('reads a failed balance lookup as 0', async () => {
    const item = makeItem({ id: 'g5', price: 10 });
    platform.catalog = [item];
    platform.getBalance.mockRejectedValueOnce(new Error('timeout'));

    const report = await acquireItem(ctx, { item, quantity: 1, recipients: ['alice'] });

    expect(report.budgets[0].balance).toBe(0);
    expect(platform.purchase).not.toHaveBeenCalled();
  });

  it('falls back to the raw recipient when it cannot be resolved', async () => {
    const item = makeItem({ id: 'g6', price: 10 });
    platform.catalog = [item];
    platform.balance = 10;
    platform.resolveRecipient.mockRejectedValueOnce(new Error('chat not found'));

    await acquireItem(ctx, { item, quantity: 1, recipients: [777] });

    expect(notifier.ofType('unit_purchased')[0].recipient).toEqual({ displayReference: '777', handle: '' });
  });

  it('stops between units once cancelled', async () => {
    const item = makeItem({ id: 'g7', price: 10 });
    platform.catalog = [item];
    platform.balance = 100;
    const controller = new AbortController();
    platform.failPurchase = () => {
      controller.abort();
      return null;
    };

    const report = await acquireItem(ctx, { item, quantity: 3, recipients: ['alice', 'bob'] }, controller.signal);

    expect(platform.purchase).toHaveBeenCalledTimes(1);
    expect(report.outcomes).toEqual([
      { kind: 'success', recipient: 'alice', currentIndex: 1, totalRequested: 3 },
      { kind: 'aborted', reason: 'cancelled', recipient: 'alice' },
      { kind: 'aborted', reason: 'cancelled', recipient: 'bob' },
    ]);
  });

  it('keeps purchasing when the notifier fails', async () => {
    const item = makeItem({ id: 'g8', price: 10 });
    platform.catalog = [item];
    platform.balance = 100;
    ctx.notifier = { notify: vi.fn().mockRejectedValue(new Error('telegram down')) };

    const report = await acquireItem(ctx, { item, quantity: 2, recipients: ['alice'] });

    expect(report.purchasedUnits).toBe(2);
  });

  it('spaces consecutive purchase calls by the limiter interval', async () => {
    const item = makeItem({ id: 'g9', price: 1 });
    platform.catalog = [item];
    platform.balance = 100;
    ctx.limiter = createPurchaseLimiter(40);

    await acquireItem(ctx, { item, quantity: 3, recipients: ['alice'] });

    const times = platform.purchases.map((p) => p.at);
    expect(times).toHaveLength(3);
    for (let i = 1; i < times.length; i++) {
      expect(times[i] - times[i - 1]).toBeGreaterThanOrEqual(35);
    }
  });
});
