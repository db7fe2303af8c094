export { callBotApi, parseErrorCode } from './client.js';
export { TelegramGiftPlatform, mapGift, recipientParams } from './gift-platform.js';
export type * from './types.js';
