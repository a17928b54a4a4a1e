/**
 * Telegram Bot API client
 *
 * Thin wrapper over the three Bot API methods the notifier uses.
 */

import { createHttpClient } from '../../../shared/api';
import type {
  SendMessageParams,
  SendPhotoParams,
  TelegramMessage,
  TelegramResponse,
  TelegramUser,
} from '../model';

const TELEGRAM_API_BASE = 'https://api.telegram.org';

export interface TelegramClientOptions {
  botToken: string;

  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
}

/**
 * Unwrap a Bot API envelope, throwing when Telegram reports a failure
 */
function unwrap<T>(method: string, response: TelegramResponse<T>): T {
  if (!response.ok || response.result === undefined) {
    throw new Error(`Telegram ${method} failed: ${response.description ?? 'no description'}`);
  }
  return response.result;
}

/**
 * Create a Telegram Bot API client
 */
export function createTelegramClient(options: TelegramClientOptions) {
  const http = createHttpClient({
    baseUrl: `${TELEGRAM_API_BASE}/bot${options.botToken}/`,
    timeout: options.timeoutMs,
  });

  return {
    /**
     * Identify the bot behind the token
     */
    async getMe(): Promise<TelegramUser> {
      const response = await http.get<TelegramResponse<TelegramUser>>('getMe');
      return unwrap('getMe', response);
    },

    /**
     * Send a text message
     */
    async sendMessage(params: SendMessageParams): Promise<TelegramMessage> {
      const response = await http.post<TelegramResponse<TelegramMessage>>('sendMessage', params);
      return unwrap('sendMessage', response);
    },

    /**
     * Send a photo by URL with an optional caption
     */
    async sendPhoto(params: SendPhotoParams): Promise<TelegramMessage> {
      const response = await http.post<TelegramResponse<TelegramMessage>>('sendPhoto', params);
      return unwrap('sendPhoto', response);
    },
  };
}

/**
 * Type for the Telegram client
 */
export type TelegramClient = ReturnType<typeof createTelegramClient>;
