import { OperationAbandonedError } from '../../../common/errors/shutdown.errors.js';
import type { Operation, WrappedOperationStatus } from '../interfaces/operation.interface.js';

type Settlement<O> = { fulfilled: true; value: O } | { fulfilled: false; error: unknown };

/**
 * Base for operations composed with a shutdown coordinator.
 *
 * The inner operation starts when the subclass calls `start()`. Its result is taken at most
 * once: after the wrapper leaves `pending`, late results of the inner operation are dropped.
 * `release()` runs exactly once on the way out of `pending`, whichever way it leaves.
 */
export abstract class WrappedOperation<R, O> implements PromiseLike<O> {
  private readonly controller = new AbortController();
  private current: WrappedOperationStatus = 'pending';
  private settlement: Settlement<O> | null = null;
  private promise: Promise<O> | null = null;
  private resolvePending: ((value: O) => void) | null = null;
  private rejectPending: ((error: unknown) => void) | null = null;

  public get status(): WrappedOperationStatus {
    return this.current;
  }

  public then<TResult1 = O, TResult2 = never>(
    onfulfilled?: ((value: O) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
  ): Promise<TResult1 | TResult2> {
    return this.toPromise().then(onfulfilled, onrejected);
  }

  /**
   * Give up on the inner operation. Its signal is aborted with `cause` and consumers
   * awaiting this wrapper are rejected with OperationAbandonedError.
   */
  public abandon(cause?: unknown): void {
    this.stop({ fulfilled: false, error: new OperationAbandonedError(cause) }, cause);
  }

  /**
   * Hook run once when the wrapper stops being pending
   */
  protected abstract release(): void;

  /**
   * Map a successful inner result to the wrapper's output
   */
  protected abstract mapValue(value: R): O;

  protected start(operation: Operation<R>): void {
    let inner: PromiseLike<R>;
    try {
      inner = typeof operation === 'function' ? operation(this.controller.signal) : operation;
    } catch (error) {
      inner = Promise.reject(error);
    }

    void Promise.resolve(inner).then(
      value => this.onInnerSettled({ fulfilled: true, value }),
      (error: unknown) => this.onInnerSettled({ fulfilled: false, error }),
    );
  }

  /**
   * Stop the inner operation and resolve with `output` instead of its result
   */
  protected cancel(output: O, cause: unknown): void {
    this.stop({ fulfilled: true, value: output }, cause);
  }

  private stop(settlement: Settlement<O>, cause: unknown): void {
    if (this.current !== 'pending') {
      return;
    }
    this.current = 'cancelled';
    this.controller.abort(cause);
    this.release();
    this.settle(settlement);
  }

  private onInnerSettled(result: Settlement<R>): void {
    if (this.current !== 'pending') {
      return;
    }
    this.current = 'inner-done';
    this.release();

    if (result.fulfilled) {
      this.settle({ fulfilled: true, value: this.mapValue(result.value) });
    } else {
      this.settle(result);
    }
  }

  private settle(settlement: Settlement<O>): void {
    this.settlement = settlement;
    if (settlement.fulfilled) {
      this.resolvePending?.(settlement.value);
    } else {
      this.rejectPending?.(settlement.error);
    }
    this.resolvePending = null;
    this.rejectPending = null;
  }

  private toPromise(): Promise<O> {
    if (this.promise) {
      return this.promise;
    }

    const settlement = this.settlement;
    if (settlement) {
      this.promise = settlement.fulfilled
        ? Promise.resolve(settlement.value)
        : Promise.reject(settlement.error);
      return this.promise;
    }

    this.promise = new Promise<O>((resolve, reject) => {
      this.resolvePending = resolve;
      this.rejectPending = reject;
    });
    return this.promise;
  }
}
