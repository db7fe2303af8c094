import pino from 'pino';
import type { AcquisitionEvent, Notifier } from '../acquisition/types.js';
import { escapeHtml, sendMessage, type ChatId } from './telegram.js';

const log = pino({ name: 'gift-alerts' });

const gift = (id: string): string => `gift <code>${escapeHtml(id)}</code>`;

/**
 * Render one engine event as a Telegram HTML message.
 */
export function formatEvent(event: AcquisitionEvent): string {
  switch (event.type) {
    case 'engine_started':
      return [
        '🟢 <b>Gift sniper started</b>',
        `Ranges: ${event.rangeCount} · Poll interval: ${event.pollIntervalMs / 1000}s`,
      ].join('\n');

    case 'item_excluded': {
      const { item, verdict } = event;
      switch (verdict.exclusionReason) {
        case 'sold_out':
          return `⛔ Skipped ${gift(item.id)}: sold out`;
        case 'non_limited_blocked':
          return `ℹ️ Skipped ${gift(item.id)}: not limited`;
        case 'non_upgradable_blocked':
          return `ℹ️ Skipped ${gift(item.id)}: not upgradable`;
        case 'range_error':
          return [
            `⚠️ No range matches ${gift(item.id)}`,
            `Price: ${verdict.price} ⭐ · Supply: ${verdict.totalAmount}`,
          ].join('\n');
      }
    }

    case 'unit_purchased':
      return `✅ Sent ${gift(event.itemId)} to ${escapeHtml(event.recipient.displayReference)} (${event.currentIndex}/${event.totalRequested})`;

    case 'purchase_failed': {
      const to = escapeHtml(event.recipient.displayReference);
      switch (event.error.category) {
        case 'balance_too_low':
          return [
            `💸 Not enough stars for ${gift(event.itemId)}`,
            `Price: ${event.price} ⭐ · Balance: ${event.balance} ⭐`,
          ].join('\n');
        case 'usage_limited':
          return `⛔ Sold out before ${gift(event.itemId)} reached ${to}`;
        case 'invalid_recipient':
          return `❌ Cannot send ${gift(event.itemId)} to ${to}: recipient not found`;
        case 'unclassified':
          return [
            `❌ Failed to send ${gift(event.itemId)} to ${to}`,
            `<pre>${escapeHtml(event.error.message)}</pre>`,
          ].join('\n');
      }
    }

    case 'insufficient_balance':
      return [
        `💸 Not enough stars to send ${gift(event.itemId)} to ${escapeHtml(event.recipient.displayReference)}`,
        `Needed: ${event.price * event.requestedQuantity} ⭐ (${event.requestedQuantity} × ${event.price}) · Balance: ${event.balance} ⭐`,
      ].join('\n');

    case 'partial_purchase':
      return [
        `⚠️ Partial purchase of ${gift(event.itemId)} for ${escapeHtml(event.recipient.displayReference)}: ${event.purchased}/${event.requested}`,
        `Short by ${event.shortfall} ⭐ · Balance left: ${event.remainingBalance} ⭐`,
      ].join('\n');

    case 'cycle_summary': {
      const { soldOut, nonLimited, nonUpgradable } = event.tally;
      return [
        `🎁 <b>New gifts: ${event.newItems}</b>`,
        `Sold out: ${soldOut} · Not limited: ${nonLimited} · Not upgradable: ${nonUpgradable}`,
      ].join('\n');
    }

    case 'cycle_failed':
      return [
        `🚨 <b>Detection cycle failed</b> (${event.stage})`,
        `<pre>${escapeHtml(event.message)}</pre>`,
      ].join('\n');
  }
}

/**
 * Notifier that posts every event to one Telegram chat. Without a chat it
 * only logs.
 */
export class TelegramNotifier implements Notifier {
  constructor(
    private readonly botToken: string,
    private readonly chatId: ChatId | null,
  ) {}

  async notify(event: AcquisitionEvent): Promise<void> {
    if (this.chatId === null) {
      log.debug({ event: event.type }, 'No notification chat configured');
      return;
    }

    const sent = await sendMessage(this.botToken, this.chatId, formatEvent(event));
    if (sent) {
      log.debug({ event: event.type }, 'Notification sent');
    }
  }
}
