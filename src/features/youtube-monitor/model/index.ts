/**
 * YouTube monitor model exports
 */
export type { YouTubeCredentials, YouTubeDataApi, ConnectionResult } from './types';
