/**
 * Tracking state types for the JSON state file
 */

import { z } from 'zod';

/** Schema version written into new state files */
export const STATE_VERSION = '1.0.0';

/**
 * What is remembered about one channel
 */
export interface ChannelTrackingRecord {
  /** YouTube channel ID, same as the key in `channels` */
  channel_id: string;

  /** Channel display name at the time of the last update */
  name: string;

  /** Fingerprint of the last video notified or skipped as too old */
  latest_video_id: string;

  /** Publish timestamp of that video */
  latest_video_timestamp: string;

  /** When this record was last written */
  last_checked: string;
}

export interface StateMetadata {
  /** Timestamp of the most recent successful save */
  last_run: string | null;

  total_notifications_sent: number;

  version: string;
}

/**
 * Complete state stored on disk
 */
export interface GlobalState {
  channels: Record<string, ChannelTrackingRecord>;
  metadata: StateMetadata;
}

/**
 * Shape accepted when reading a state file. Older files omit `channel_id` on records.
 */
export const storedStateSchema = z.object({
  channels: z.record(
    z.string(),
    z.object({
      channel_id: z.string().optional(),
      name: z.string(),
      latest_video_id: z.string(),
      latest_video_timestamp: z.string(),
      last_checked: z.string(),
    })
  ),
  metadata: z.object({
    last_run: z.string().nullable(),
    total_notifications_sent: z.number().int().nonnegative(),
    version: z.string(),
  }),
});

export type StoredState = z.infer<typeof storedStateSchema>;

/**
 * Fresh state for a first run
 */
export function createDefaultState(): GlobalState {
  return {
    channels: {},
    metadata: {
      last_run: null,
      total_notifications_sent: 0,
      version: STATE_VERSION,
    },
  };
}
