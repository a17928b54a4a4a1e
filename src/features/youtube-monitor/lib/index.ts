/**
 * YouTube monitor decision logic
 */
export {
  checkRecency,
  isWithinWindow,
  formatAgeDays,
  DEFAULT_MAX_VIDEO_AGE_DAYS,
  type RecencyCheck,
} from './recency-policy';

export { isNewVideo } from './video-detector';
