/**
 * Tracking state entity - public API
 */
export {
  type ChannelTrackingRecord,
  type GlobalState,
  type StateMetadata,
  STATE_VERSION,
  createDefaultState,
} from './types';

export {
  createStateStore,
  DEFAULT_STATE_FILE,
  type StateStore,
  type StateStoreOptions,
  type ChannelUpdate,
  type StateStats,
} from './state-store';
