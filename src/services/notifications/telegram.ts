import pino from 'pino';
import { callBotApi } from '../telegram/client.js';

const log = pino({ name: 'telegram' });

export type ChatId = number | string;

/**
 * Send an HTML message via the Telegram Bot API.
 * Never throws; returns whether the message was accepted.
 */
export async function sendMessage(botToken: string, chatId: ChatId, text: string): Promise<boolean> {
  try {
    await callBotApi<unknown>(botToken, 'sendMessage', {
      chat_id: chatId,
      text,
      parse_mode: 'HTML',
      disable_web_page_preview: true,
    });
    return true;
  } catch (err) {
    log.warn({ err, chatId }, 'Telegram send failed');
    return false;
  }
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}
