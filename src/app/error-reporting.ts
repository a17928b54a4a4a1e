/**
 * Sentry setup
 *
 * Capturing is a no-op until `initErrorReporting` is called with a DSN, so
 * modules can call `Sentry.capture*` unconditionally.
 */

import * as Sentry from '@sentry/node';

/** How long to wait for queued events before the process exits */
const FLUSH_TIMEOUT_MS = 2000;

let enabled = false;

/**
 * Initialise Sentry if a DSN is configured
 *
 * @returns whether reporting is active
 */
export function initErrorReporting(dsn: string | undefined): boolean {
  if (!dsn) {
    return false;
  }

  Sentry.init({
    dsn,
    tracesSampleRate: 1.0,
  });
  enabled = true;
  return true;
}

/**
 * Send any queued events
 */
export async function flushErrorReporting(): Promise<void> {
  if (enabled) {
    await Sentry.flush(FLUSH_TIMEOUT_MS);
  }
}
