/**
 * Content item entity - public API
 */
export {
  type Subscription,
  type VideoItem,
  type VideoNotification,
  buildVideoUrl,
  toVideoNotification,
} from './types';
