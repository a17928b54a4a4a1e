/**
 * Telegram API exports
 */
export { createTelegramClient, type TelegramClient, type TelegramClientOptions } from './telegram-client';
