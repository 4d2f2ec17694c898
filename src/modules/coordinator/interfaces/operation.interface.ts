/**
 * A suspendable unit of work.
 *
 * Either a promise that is already running, or a function that starts the work and
 * receives a signal that is aborted when the work is abandoned.
 */
export type Operation<R> = PromiseLike<R> | ((signal: AbortSignal) => PromiseLike<R>);

/**
 * Lifecycle of a wrapped operation:
 * - pending: the inner operation has not produced a result
 * - inner-done: the inner operation settled and its result was taken
 * - cancelled: the inner operation was abandoned, by shutdown or by the caller
 */
export type WrappedOperationStatus = 'pending' | 'inner-done' | 'cancelled';
