/**
 * Shared library utilities
 */
export { createLogger, setLogLevel, type Logger, type LogLevel } from './logger';

export {
  NotifierError,
  ConfigurationError,
  EnumerationError,
  ContentSourceError,
  StateIOError,
  describeError,
} from './errors';

export type { ConnectionResult } from './connection';
