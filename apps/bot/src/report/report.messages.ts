import { escapeHtml } from '@libs/telegram';

export const CONFIG_MISSING_WARNING = [
  '⚠️ Coinglass API is not connected!',
  '',
  'Please set `COINGLASS_API_KEY` in the `.env` file so the bot can fetch derivatives data automatically. Dashboard publication cancelled.',
].join('\n');

export const API_ERROR_WARNING = [
  '❌ Coinglass API error!',
  '',
  'Fetching data from the Coinglass API failed. Please check the bot logs for details. Dashboard publication cancelled.',
].join('\n');

export const deliveryFailedNotice = (chatId: string): string =>
  `⚠️ Failed to deliver the dashboard to ${escapeHtml(chatId)}.`;
