/**
 * Graceful shutdown configuration
 */
export interface ShutdownConfig {
  /**
   * How long to wait for in-flight work after a shutdown signal, in milliseconds.
   * Remaining requests are aborted once it expires.
   */
  timeoutMs: number;

  /**
   * Reason recorded when the application shuts down without a named signal
   */
  defaultReason: string;
}
