/**
 * YouTube Data API v3 client
 *
 * Authenticates as the monitored account with an OAuth refresh token, lists its
 * subscriptions, and looks up each channel's newest upload through the uploads
 * playlist (1 quota unit per call, against 100 for search.list).
 */

import { google, type youtube_v3 } from 'googleapis';
import { buildVideoUrl, type Subscription, type VideoItem } from '../../../entities/content-item';
import { ContentSourceError, EnumerationError, createLogger, describeError } from '../../../shared/lib';
import type { ConnectionResult, YouTubeCredentials, YouTubeDataApi } from '../model';

/** Read-only access is all the monitor needs */
export const YOUTUBE_SCOPES = ['https://www.googleapis.com/auth/youtube.readonly'];

/** Largest page size subscriptions.list accepts */
const SUBSCRIPTIONS_PAGE_SIZE = 50;

const logger = createLogger('youtube-client');

/**
 * Build an authorized googleapis YouTube service
 *
 * @param timeoutMs - Per-request timeout passed to the underlying HTTP client
 */
export function createYouTubeApi(credentials: YouTubeCredentials, timeoutMs?: number): youtube_v3.Youtube {
  const auth = new google.auth.OAuth2(credentials.clientId, credentials.clientSecret);
  auth.setCredentials({ refresh_token: credentials.refreshToken });

  return google.youtube({ version: 'v3', auth, timeout: timeoutMs });
}

type Thumbnails = youtube_v3.Schema$ThumbnailDetails | undefined;

/**
 * Get the best available thumbnail URL
 */
function getBestThumbnailUrl(thumbnails: Thumbnails): string | undefined {
  return (
    thumbnails?.maxres?.url ||
    thumbnails?.standard?.url ||
    thumbnails?.high?.url ||
    thumbnails?.medium?.url ||
    thumbnails?.default?.url ||
    undefined
  );
}

/**
 * Convert a subscription resource, skipping entries without a channel ID
 */
function toSubscription(item: youtube_v3.Schema$Subscription): Subscription | null {
  const channelId = item.snippet?.resourceId?.channelId;
  if (!channelId) {
    return null;
  }

  return {
    channelId,
    channelTitle: item.snippet?.title ?? channelId,
  };
}

/**
 * Convert a playlist item into a video, or null when it has no usable ID
 */
function toVideoItem(item: youtube_v3.Schema$PlaylistItem): VideoItem | null {
  const videoId = item.contentDetails?.videoId ?? item.snippet?.resourceId?.videoId;
  if (!videoId) {
    return null;
  }

  return {
    videoId,
    title: item.snippet?.title ?? '',
    publishedAt: item.contentDetails?.videoPublishedAt ?? item.snippet?.publishedAt ?? '',
    url: buildVideoUrl(videoId),
    thumbnailUrl: getBestThumbnailUrl(item.snippet?.thumbnails),
  };
}

/**
 * Google answers 404 for the uploads playlist of a channel that has never published
 */
function isNotFound(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  if ('status' in error && error.status === 404) {
    return true;
  }
  return 'code' in error && (error.code === 404 || error.code === '404');
}

/**
 * Create a YouTube client over an authorized API service
 */
export function createYouTubeClient(api: YouTubeDataApi) {
  /**
   * Fetch the uploads playlist ID for a channel, or null if the channel does not exist
   */
  async function fetchUploadsPlaylistId(channelId: string): Promise<string | null> {
    const response = await api.channels.list({
      part: ['contentDetails'],
      id: [channelId],
    });

    const channel = response.data.items?.[0];
    return channel?.contentDetails?.relatedPlaylists?.uploads ?? null;
  }

  /**
   * Fetch the newest upload of a channel
   *
   * @returns null when the channel is unknown or has no uploads
   * @throws ContentSourceError when an API call fails
   */
  async function getLatestVideo(channelId: string): Promise<VideoItem | null> {
    let uploadsPlaylistId: string | null = null;
    try {
      uploadsPlaylistId = await fetchUploadsPlaylistId(channelId);
      if (!uploadsPlaylistId) {
        logger.warn(`Channel not found: ${channelId}`);
        return null;
      }

      const response = await api.playlistItems.list({
        part: ['snippet', 'contentDetails'],
        playlistId: uploadsPlaylistId,
        maxResults: 1,
      });

      const first = response.data.items?.[0];
      return first ? toVideoItem(first) : null;
    } catch (error) {
      if (uploadsPlaylistId && isNotFound(error)) {
        logger.debug(`Uploads playlist ${uploadsPlaylistId} not found, channel ${channelId} has no public videos`);
        return null;
      }
      throw new ContentSourceError(
        channelId,
        `Error fetching videos for channel ${channelId}: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  return {
    /**
     * Fetch every channel the account is subscribed to, following pagination
     *
     * @throws EnumerationError when any page fails
     */
    async listSubscriptions(): Promise<Subscription[]> {
      const subscriptions: Subscription[] = [];
      let pageToken: string | undefined;

      try {
        do {
          const response = await api.subscriptions.list({
            part: ['snippet'],
            mine: true,
            maxResults: SUBSCRIPTIONS_PAGE_SIZE,
            pageToken,
          });

          for (const item of response.data.items ?? []) {
            const subscription = toSubscription(item);
            if (subscription) {
              subscriptions.push(subscription);
            }
          }

          pageToken = response.data.nextPageToken ?? undefined;
        } while (pageToken);
      } catch (error) {
        throw new EnumerationError(`Error fetching subscriptions: ${describeError(error)}`, { cause: error });
      }

      logger.info(`Fetched ${subscriptions.length} subscriptions`);
      return subscriptions;
    },

    fetchUploadsPlaylistId,
    getLatestVideo,

    /**
     * Check that the credentials work by reading the authenticated user's channel
     */
    async testConnection(): Promise<ConnectionResult> {
      try {
        const response = await api.channels.list({ part: ['snippet'], mine: true });
        const channelName = response.data.items?.[0]?.snippet?.title;

        if (channelName) {
          logger.info(`YouTube API connected successfully. Authenticated as: ${channelName}`);
          return { connected: true, detail: `Authenticated as ${channelName}` };
        }
        return { connected: true, detail: 'Connected but no channel found for user' };
      } catch (error) {
        const message = `YouTube API connection failed: ${describeError(error)}`;
        logger.error(message);
        return { connected: false, error: message };
      }
    },
  };
}

/**
 * Type for the YouTube client
 */
export type YouTubeClient = ReturnType<typeof createYouTubeClient>;
