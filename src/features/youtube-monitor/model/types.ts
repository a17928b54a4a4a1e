/**
 * YouTube monitor types
 */

import type { youtube_v3 } from 'googleapis';

/**
 * OAuth client credentials plus the long-lived refresh token for the monitored account
 */
export interface YouTubeCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

/**
 * The slice of the YouTube Data API v3 the monitor calls.
 * `youtube_v3.Youtube` from googleapis satisfies it.
 */
export interface YouTubeDataApi {
  subscriptions: {
    list(
      params: youtube_v3.Params$Resource$Subscriptions$List
    ): Promise<{ data: youtube_v3.Schema$SubscriptionListResponse }>;
  };
  channels: {
    list(params: youtube_v3.Params$Resource$Channels$List): Promise<{ data: youtube_v3.Schema$ChannelListResponse }>;
  };
  playlistItems: {
    list(
      params: youtube_v3.Params$Resource$Playlistitems$List
    ): Promise<{ data: youtube_v3.Schema$PlaylistItemListResponse }>;
  };
}

export type { ConnectionResult } from '../../../shared/lib';
