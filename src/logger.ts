/**
 * Logger interface for search execution logging.
 * Implement this interface to receive engine logs.
 */
export interface SearchLogger {
  /** Log informational messages (run start, completion, failure) */
  info(message: string, data?: Record<string, unknown>): void;
  /** Log debug messages (skipped files, per-file failures) */
  debug(message: string, data?: Record<string, unknown>): void;
}
