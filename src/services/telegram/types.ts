/**
 * Subset of the Telegram Bot API types used here.
 * https://core.telegram.org/bots/api
 */

export interface BotUser {
  id: number;
  is_bot: boolean;
  first_name: string;
  username?: string;
}

export interface BotSticker {
  file_id: string;
  emoji?: string;
}

export interface BotGift {
  id: string;
  sticker?: BotSticker;
  star_count: number;
  upgrade_star_count?: number;
  /** Present only for limited gifts. */
  total_count?: number;
  remaining_count?: number;
}

export interface BotGifts {
  gifts: BotGift[];
}

export interface BotStarAmount {
  amount: number;
  nanostar_amount?: number;
}

export interface BotChat {
  id: number;
  type: 'private' | 'group' | 'supergroup' | 'channel';
  title?: string;
  username?: string;
  first_name?: string;
  last_name?: string;
}
