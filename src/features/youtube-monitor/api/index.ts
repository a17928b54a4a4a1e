/**
 * YouTube API exports
 */
export { createYouTubeApi, createYouTubeClient, YOUTUBE_SCOPES, type YouTubeClient } from './youtube-client';
