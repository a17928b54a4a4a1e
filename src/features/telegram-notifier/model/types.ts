/**
 * Telegram notifier types
 */

export type ParseMode = 'HTML' | 'Markdown' | 'MarkdownV2';

/**
 * How notifications are rendered and sent
 */
export interface NotificationSettings {
  /** Target chat (user, group or channel ID, or @channelusername) */
  chatId: string;

  /** Template with {channel_name}, {video_title}, {video_url} and {time_ago} placeholders */
  notificationTemplate: string;

  parseMode: ParseMode;

  disableWebPagePreview: boolean;
}

/**
 * Envelope of every Bot API response
 * @see https://core.telegram.org/bots/api#making-requests
 */
export interface TelegramResponse<T> {
  ok: boolean;
  result?: T;
  description?: string;
  error_code?: number;
}

/**
 * @see https://core.telegram.org/bots/api#user
 */
export interface TelegramUser {
  id: number;
  is_bot: boolean;
  first_name: string;
  username?: string;
}

/**
 * Only the fields the notifier reads
 * @see https://core.telegram.org/bots/api#message
 */
export interface TelegramMessage {
  message_id: number;
  date: number;
}

export interface SendMessageParams {
  chat_id: string;
  text: string;
  parse_mode?: ParseMode;
  link_preview_options?: { is_disabled: boolean };
}

export interface SendPhotoParams {
  chat_id: string;
  /** HTTP URL Telegram downloads the photo from */
  photo: string;
  caption?: string;
  parse_mode?: ParseMode;
}
