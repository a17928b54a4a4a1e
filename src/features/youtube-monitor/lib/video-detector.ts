/**
 * New-video detection
 *
 * Only the latest video per channel is remembered. If a channel publishes two
 * videos between runs, only the newer one is ever seen as new; the older one
 * is never announced.
 */

import type { ChannelTrackingRecord } from '../../../entities/tracking-state';

/**
 * Whether a channel's current latest video has not been announced (or skipped) yet
 */
export function isNewVideo(record: ChannelTrackingRecord | undefined, candidateVideoId: string): boolean {
  if (!record) {
    // First time seeing this channel
    return true;
  }

  return record.latest_video_id !== candidateVideoId;
}
