/**
 * Telegram notifier
 *
 * Sends one message per new video: a photo with caption when the video has a
 * thumbnail, plain text otherwise. Failures are reported as `false` so the
 * caller can leave its state untouched.
 */

import type { VideoNotification } from '../../../entities/content-item';
import { HttpError } from '../../../shared/api';
import { createLogger, describeError, type ConnectionResult } from '../../../shared/lib';
import type { TelegramClient } from '../api';
import type { NotificationSettings } from '../model';
import { MAX_CAPTION_LENGTH, formatNotification } from './message-formatter';

const logger = createLogger('telegram-notifier');

const TEST_MESSAGE = '✅ YouTube Subscription Monitor connected successfully!';

export interface TelegramNotifierOptions {
  /** Clock used for the "time ago" text */
  now?: () => Date;
}

/**
 * A 400 from sendPhoto usually means Telegram could not fetch the thumbnail,
 * and nothing was delivered
 */
function isRejectedPhoto(error: unknown): boolean {
  return error instanceof HttpError && error.status === 400;
}

/**
 * Create a notifier that announces videos in one Telegram chat
 */
export function createTelegramNotifier(
  client: TelegramClient,
  settings: NotificationSettings,
  options: TelegramNotifierOptions = {}
) {
  const now = options.now ?? (() => new Date());

  async function sendText(text: string): Promise<void> {
    await client.sendMessage({
      chat_id: settings.chatId,
      text,
      parse_mode: settings.parseMode,
      link_preview_options: { is_disabled: settings.disableWebPagePreview },
    });
  }

  return {
    /**
     * Announce a video
     *
     * @returns true when Telegram accepted the message
     */
    async dispatch(notification: VideoNotification): Promise<boolean> {
      const text = formatNotification(notification, settings.notificationTemplate, settings.parseMode, now());

      try {
        if (notification.thumbnailUrl && text.length <= MAX_CAPTION_LENGTH) {
          try {
            await client.sendPhoto({
              chat_id: settings.chatId,
              photo: notification.thumbnailUrl,
              caption: text,
              parse_mode: settings.parseMode,
            });
          } catch (error) {
            if (!isRejectedPhoto(error)) {
              throw error;
            }
            logger.warn(
              `Telegram rejected thumbnail for ${notification.videoId}, sending text only: ${describeError(error)}`
            );
            await sendText(text);
          }
        } else {
          await sendText(text);
        }

        logger.info(`Notification sent for video: ${notification.videoTitle} by ${notification.channelName}`);
        return true;
      } catch (error) {
        const retryable = error instanceof HttpError && error.isRetryable();
        logger.error(
          `Error sending Telegram notification for ${notification.videoId}${retryable ? ' (retryable)' : ''}: ${describeError(error)}`
        );
        return false;
      }
    },

    /**
     * Check the bot token and chat by identifying the bot and posting a test message
     */
    async testConnection(): Promise<ConnectionResult> {
      try {
        const me = await client.getMe();
        logger.info(`Telegram bot connected: @${me.username ?? me.first_name}`);

        await client.sendMessage({ chat_id: settings.chatId, text: TEST_MESSAGE });
        return { connected: true, detail: `Bot @${me.username ?? me.first_name}` };
      } catch (error) {
        const message = `Telegram connection test failed: ${describeError(error)}`;
        logger.error(message);
        return { connected: false, error: message };
      }
    },
  };
}

/**
 * Type for the Telegram notifier
 */
export type TelegramNotifier = ReturnType<typeof createTelegramNotifier>;
