/**
 * Recency window for notifications
 */

/** Videos older than this are recorded but never announced */
export const DEFAULT_MAX_VIDEO_AGE_DAYS = 7;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface RecencyCheck {
  /** Whether the video may be announced */
  recent: boolean;

  /** `now - publishedAt` in milliseconds, negative for future timestamps; null when unparseable */
  ageMs: number | null;

  /** True when the timestamp could not be parsed and the check failed open */
  unparseable: boolean;
}

/**
 * Decide whether a video is young enough to announce
 *
 * The window is inclusive: a video exactly `maxAgeDays` old is still recent.
 * A timestamp that cannot be parsed fails open and counts as recent, so a
 * malformed date never silently drops a possibly new video. Callers should log
 * when `unparseable` is set.
 */
export function checkRecency(
  publishedAt: string,
  maxAgeDays: number = DEFAULT_MAX_VIDEO_AGE_DAYS,
  now: Date = new Date()
): RecencyCheck {
  const publishedMs = Date.parse(publishedAt);
  if (Number.isNaN(publishedMs)) {
    return { recent: true, ageMs: null, unparseable: true };
  }

  const ageMs = now.getTime() - publishedMs;
  return { recent: ageMs <= maxAgeDays * MS_PER_DAY, ageMs, unparseable: false };
}

/**
 * Boolean shorthand for {@link checkRecency}
 */
export function isWithinWindow(
  publishedAt: string,
  maxAgeDays: number = DEFAULT_MAX_VIDEO_AGE_DAYS,
  now: Date = new Date()
): boolean {
  return checkRecency(publishedAt, maxAgeDays, now).recent;
}

/**
 * Render an age in whole days for log lines
 */
export function formatAgeDays(ageMs: number): string {
  return `${Math.floor(ageMs / MS_PER_DAY)} days`;
}
