/**
 * Telegram notifier model exports
 */
export type {
  ParseMode,
  NotificationSettings,
  TelegramResponse,
  TelegramUser,
  TelegramMessage,
  SendMessageParams,
  SendPhotoParams,
} from './types';
