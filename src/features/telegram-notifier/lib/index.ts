/**
 * Telegram notifier logic
 */
export {
  formatNotification,
  formatTimeAgo,
  isVideoUrlPlacementValid,
  DEFAULT_NOTIFICATION_TEMPLATE,
} from './message-formatter';

export { createTelegramNotifier, type TelegramNotifier, type TelegramNotifierOptions } from './notifier';
