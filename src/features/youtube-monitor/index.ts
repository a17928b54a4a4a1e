/**
 * YouTube Monitor feature - public API
 *
 * Finds the latest upload of every subscribed channel and decides whether it is worth announcing
 */

// API client
export { createYouTubeApi, createYouTubeClient, YOUTUBE_SCOPES, type YouTubeClient } from './api';

// Types
export type { YouTubeCredentials, YouTubeDataApi, ConnectionResult } from './model';

// Detection logic
export {
  checkRecency,
  isWithinWindow,
  formatAgeDays,
  isNewVideo,
  DEFAULT_MAX_VIDEO_AGE_DAYS,
  type RecencyCheck,
} from './lib';
