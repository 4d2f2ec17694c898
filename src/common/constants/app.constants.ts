/**
 * Global application constants
 */

/**
 * Graceful shutdown timeout in milliseconds.
 * In-flight requests are cancelled after this duration during shutdown.
 */
export const SHUTDOWN_TIMEOUT_MS = 25_000;

/**
 * Upper bound accepted for a configured shutdown timeout (10 minutes).
 */
export const MAX_SHUTDOWN_TIMEOUT_MS = 600_000;

/**
 * Reason used when the application shuts down without a named signal.
 */
export const DEFAULT_SHUTDOWN_REASON = 'unknown';
