import pino from 'pino';
import { PlatformError } from '../../utils/errors.js';
import type { GiftPlatform, Item, Recipient, RecipientInfo } from '../acquisition/types.js';
import { callBotApi } from './client.js';
import type { BotChat, BotGift, BotGifts, BotStarAmount, BotUser } from './types.js';

const logger = pino({ name: 'telegram-gift-platform' });

export function mapGift(gift: BotGift): Item {
  const isLimited = gift.total_count !== undefined;
  return {
    id: gift.id,
    price: gift.star_count,
    isLimited,
    isSoldOut: isLimited && gift.remaining_count === 0,
    ...(gift.total_count !== undefined ? { totalAmount: gift.total_count } : {}),
    ...(gift.remaining_count !== undefined ? { remainingAmount: gift.remaining_count } : {}),
    ...(gift.upgrade_star_count !== undefined ? { upgradePrice: gift.upgrade_star_count } : {}),
  };
}

/** Numeric ids go out as user_id, handles as chat_id "@handle". */
export function recipientParams(recipient: Recipient): Record<string, number | string> {
  if (typeof recipient === 'number' && recipient > 0) return { user_id: recipient };
  if (typeof recipient === 'number') return { chat_id: recipient };
  return { chat_id: `@${recipient}` };
}

/**
 * GiftPlatform backed by the Telegram Bot API. The bot pays from its own
 * star balance.
 */
export class TelegramGiftPlatform implements GiftPlatform {
  private connected = false;
  private botUsername: string | null = null;

  constructor(private readonly token: string) {}

  isConnected(): boolean {
    return this.connected;
  }

  async connect(): Promise<void> {
    const me = await this.call<BotUser>('getMe');
    this.connected = true;
    this.botUsername = me.username ?? null;
    logger.info({ bot: this.botUsername }, 'Connected to Telegram');
  }

  async listAvailableItems(): Promise<Item[]> {
    const { gifts } = await this.call<BotGifts>('getAvailableGifts');
    return gifts.map(mapGift);
  }

  async getBalance(): Promise<number> {
    const balance = await this.call<BotStarAmount>('getMyStarBalance');
    return balance.amount;
  }

  async resolveRecipient(recipient: Recipient): Promise<RecipientInfo> {
    const chat = await this.call<BotChat>('getChat', {
      chat_id: typeof recipient === 'number' ? recipient : `@${recipient}`,
    });
    const handle = chat.username ?? '';
    return {
      displayReference: handle ? `@${handle}` : String(chat.id),
      handle,
    };
  }

  async purchase(recipient: Recipient, itemId: string, quantity = 1): Promise<void> {
    for (let i = 0; i < quantity; i++) {
      await this.call<boolean>('sendGift', { ...recipientParams(recipient), gift_id: itemId });
    }
  }

  /** Transport failures mark the client disconnected so the next cycle reconnects. */
  private async call<T>(method: string, params: Record<string, unknown> = {}): Promise<T> {
    try {
      return await callBotApi<T>(this.token, method, params);
    } catch (err) {
      if (err instanceof PlatformError && (err.code === 'NETWORK_ERROR' || err.status === 401)) {
        this.connected = false;
      }
      throw err;
    }
  }
}
