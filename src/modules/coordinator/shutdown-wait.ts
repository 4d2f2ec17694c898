import { OperationAbandonedError } from '../../common/errors/shutdown.errors.js';
import type { ShutdownState } from './shutdown-state.js';
import type { WaiterHandle } from './waiter-list.js';
import type { WaitOptions, WaitTarget } from './interfaces/shutdown.interface.js';

/**
 * Awaitable that resolves with the shutdown reason once the shutdown is triggered or completed.
 *
 * Registration is lazy and happens once: awaiting the same wait any number of times keeps
 * a single slot in the shared waiter registry. Abandoning the wait releases that slot and
 * rejects pending consumers with OperationAbandonedError.
 *
 * The slot keeps the wait and its consumers alive until the shutdown resolves it or it is
 * abandoned. When racing it against other work, abandon it afterwards, pass a `signal`
 * that is aborted once the race is over, or use `wrapCancel()` instead.
 */
export class ShutdownWait<T> implements PromiseLike<T> {
  private handle: WaiterHandle | null = null;
  private promise: Promise<T> | null = null;
  private rejectPending: ((error: OperationAbandonedError) => void) | null = null;
  private abandoned: OperationAbandonedError | null = null;
  private settled = false;
  private readonly signal: AbortSignal | undefined;

  constructor(
    private readonly shutdown: ShutdownState<T>,
    private readonly target: WaitTarget,
    options: WaitOptions = {},
  ) {
    this.signal = options.signal;
  }

  /**
   * Whether this wait currently holds a slot in the waiter registry
   */
  public get registered(): boolean {
    return this.handle !== null;
  }

  public then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
  ): Promise<TResult1 | TResult2> {
    return this.toPromise().then(onfulfilled, onrejected);
  }

  /**
   * Stop waiting. No-op once the wait has resolved.
   */
  public abandon(cause?: unknown): void {
    if (this.settled || this.abandoned) {
      return;
    }

    this.abandoned = new OperationAbandonedError(cause);
    this.detach();
    this.rejectPending?.(this.abandoned);
    this.rejectPending = null;
  }

  private toPromise(): Promise<T> {
    if (this.promise) {
      return this.promise;
    }

    if (this.signal?.aborted) {
      this.abandon(this.signal.reason);
    }

    const abandoned = this.abandoned;
    if (abandoned) {
      this.promise = Promise.reject(abandoned);
      return this.promise;
    }

    this.promise = new Promise<T>((resolve, reject) => {
      this.rejectPending = reject;
      this.signal?.addEventListener('abort', this.onAbort, { once: true });
      this.handle = this.shutdown.watch(
        this.target,
        reason => {
          this.settled = true;
          this.handle = null;
          this.rejectPending = null;
          this.signal?.removeEventListener('abort', this.onAbort);
          resolve(reason);
        },
        this.handle,
      );
    });
    return this.promise;
  }

  private detach(): void {
    if (this.handle) {
      this.shutdown.unwatch(this.target, this.handle);
      this.handle = null;
    }
    this.signal?.removeEventListener('abort', this.onAbort);
  }

  private readonly onAbort = (): void => {
    this.abandon(this.signal?.reason);
  };
}
