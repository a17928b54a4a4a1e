/**
 * Outcome of a connectivity check against an external service
 */
export interface ConnectionResult {
  connected: boolean;

  /** Human-readable detail, e.g. the authenticated account name */
  detail?: string;

  /** Error message when the check failed */
  error?: string;
}
