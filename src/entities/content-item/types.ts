/**
 * Content item types - channels being followed and the videos they publish
 */

/**
 * A channel the monitored account is subscribed to
 */
export interface Subscription {
  /** YouTube channel ID (unique key) */
  channelId: string;

  /** Channel display name, informational only */
  channelTitle: string;
}

/**
 * The most recent video found for a channel
 */
export interface VideoItem {
  /** YouTube video ID, used as the dedup fingerprint */
  videoId: string;

  /** Title of the video */
  title: string;

  /** Publication timestamp exactly as returned by the API (ISO-8601) */
  publishedAt: string;

  /** Full URL to the video */
  url: string;

  /** URL to thumbnail image */
  thumbnailUrl?: string;
}

/**
 * Everything a notifier needs to announce one video
 */
export interface VideoNotification {
  channelName: string;
  videoTitle: string;
  videoId: string;
  videoUrl: string;
  publishedAt: string;
  thumbnailUrl?: string;
}

/**
 * Build a YouTube video URL from a video ID
 */
export function buildVideoUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

/**
 * Combine a channel and its latest video into a notification payload
 */
export function toVideoNotification(subscription: Subscription, video: VideoItem): VideoNotification {
  return {
    channelName: subscription.channelTitle,
    videoTitle: video.title,
    videoId: video.videoId,
    videoUrl: video.url,
    publishedAt: video.publishedAt,
    thumbnailUrl: video.thumbnailUrl,
  };
}
