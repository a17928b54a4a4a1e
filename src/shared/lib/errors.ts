/**
 * Error types shared across the notifier
 */

/**
 * Base class for every error the notifier raises on purpose
 */
export class NotifierError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotifierError';
  }
}

/**
 * Missing or invalid configuration file or credentials. Fatal before any state is touched.
 */
export class ConfigurationError extends NotifierError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * The list of tracked channels could not be fetched. Ends the run without saving.
 */
export class EnumerationError extends NotifierError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EnumerationError';
  }
}

/**
 * Looking up a single channel's content failed. Counted and isolated to that channel.
 */
export class ContentSourceError extends NotifierError {
  constructor(
    public readonly channelId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ContentSourceError';
  }
}

/**
 * Reading or writing the state file failed
 */
export class StateIOError extends NotifierError {
  constructor(
    public readonly filePath: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StateIOError';
  }
}

/**
 * Render any thrown value as a single-line message
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
