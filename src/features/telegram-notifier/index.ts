/**
 * Telegram Notifier feature - public API
 *
 * Announces new videos in a Telegram chat through the Bot API
 */

// API client
export { createTelegramClient, type TelegramClient, type TelegramClientOptions } from './api';

// Types
export type { ParseMode, NotificationSettings } from './model';

// Formatting and sending
export {
  createTelegramNotifier,
  formatNotification,
  formatTimeAgo,
  isVideoUrlPlacementValid,
  DEFAULT_NOTIFICATION_TEMPLATE,
  type TelegramNotifier,
} from './lib';
