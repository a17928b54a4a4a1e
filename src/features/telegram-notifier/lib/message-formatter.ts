/**
 * Message formatting utilities
 *
 * Renders a video notification into Telegram message text
 */

import type { VideoNotification } from '../../../entities/content-item';
import type { ParseMode } from '../model';

/** Bot API limit for message text */
export const MAX_MESSAGE_LENGTH = 4096;

/** Bot API limit for photo captions */
export const MAX_CAPTION_LENGTH = 1024;

export const DEFAULT_NOTIFICATION_TEMPLATE =
  '🎬 <b>{channel_name}</b> uploaded a new video\n\n<a href="{video_url}">{video_title}</a>\n\n⏰ {time_ago}';

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * Truncate text to fit within a maximum length
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength - 3) + '...';
}

function plural(count: number, unit: string): string {
  return count === 1 ? `1 ${unit} ago` : `${count} ${unit}s ago`;
}

/**
 * Human-readable age of a video, e.g. "3 hours ago"
 */
export function formatTimeAgo(publishedAt: string, now: Date = new Date()): string {
  const publishedMs = Date.parse(publishedAt);
  if (Number.isNaN(publishedMs)) {
    return 'Recently';
  }

  const diff = now.getTime() - publishedMs;

  const days = Math.floor(diff / DAY_MS);
  if (days > 0) {
    return plural(days, 'day');
  }

  const hours = Math.floor(diff / HOUR_MS);
  if (hours > 0) {
    return plural(hours, 'hour');
  }

  const minutes = Math.floor(diff / MINUTE_MS);
  if (minutes > 0) {
    return plural(minutes, 'minute');
  }

  return 'Just now';
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

/**
 * Escape user text for the given parse mode
 * @see https://core.telegram.org/bots/api#formatting-options
 */
export function escapeForParseMode(text: string, parseMode: ParseMode): string {
  switch (parseMode) {
    case 'HTML':
      return escapeHtml(text);
    case 'MarkdownV2':
      return text.replace(/[_*[\]()~`>#+\-=|{}.!\\]/g, '\\$&');
    case 'Markdown':
      return text.replace(/[_*`[]/g, '\\$&');
  }
}

/**
 * Escape a URL used as a MarkdownV2 inline link target, where only `)` and `\` are reserved
 */
export function escapeMarkdownV2LinkTarget(url: string): string {
  return url.replace(/[)\\]/g, '\\$&');
}

/**
 * Whether every `{video_url}` in a MarkdownV2 template sits in a link target, as in
 * `[{video_title}]({video_url})`. A bare URL would need every `.`, `=` and `_`
 * escaped, which is not done.
 */
export function isVideoUrlPlacementValid(template: string, parseMode: ParseMode): boolean {
  if (parseMode !== 'MarkdownV2') {
    return true;
  }
  const before = template.split('{video_url}');
  return before.slice(0, -1).every((segment) => segment.endsWith(']('));
}

function escapeUrl(url: string, parseMode: ParseMode): string {
  switch (parseMode) {
    case 'HTML':
      return escapeHtml(url);
    case 'MarkdownV2':
      return escapeMarkdownV2LinkTarget(url);
    case 'Markdown':
      return url;
  }
}

/**
 * Replace `{name}` placeholders. Unknown placeholders are left untouched.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder: string, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : placeholder
  );
}

/**
 * Format a video notification with the configured template
 *
 * Channel name and title are escaped for the parse mode; the URL is escaped for
 * where it sits (an href attribute in HTML, a link target in MarkdownV2). When
 * the result is longer than `maxLength`, the raw title is shortened and
 * re-escaped, so no tag or escape sequence is ever cut in half.
 */
export function formatNotification(
  notification: VideoNotification,
  template: string,
  parseMode: ParseMode,
  now: Date = new Date(),
  maxLength: number = MAX_MESSAGE_LENGTH
): string {
  const render = (title: string): string =>
    renderTemplate(template, {
      channel_name: escapeForParseMode(notification.channelName, parseMode),
      video_title: escapeForParseMode(title, parseMode),
      video_url: escapeUrl(notification.videoUrl, parseMode),
      time_ago: formatTimeAgo(notification.publishedAt, now),
    });

  let title = notification.videoTitle;
  let text = render(title);
  while (text.length > maxLength && title.length > 0) {
    const target = title.length - (text.length - maxLength);
    title = target > 3 ? truncateText(title, target) : '';
    text = render(title);
  }
  return text;
}
