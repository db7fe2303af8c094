export { TelegramNotifier, formatEvent } from './gift-alerts.js';
export { sendMessage, escapeHtml } from './telegram.js';
