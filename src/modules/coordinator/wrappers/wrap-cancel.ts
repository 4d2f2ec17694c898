import { OperationCancelledError } from '../../../common/errors/shutdown.errors.js';
import { err, ok, type Result } from '../../../common/result.js';
import type { ShutdownState } from '../shutdown-state.js';
import type { WaiterHandle } from '../waiter-list.js';
import type { Operation } from '../interfaces/operation.interface.js';
import { WrappedOperation } from './wrapped-operation.js';

/**
 * Operation that is cancelled when the shutdown is triggered.
 *
 * Resolves with `ok(value)` when the inner operation finishes first, or with
 * `err(OperationCancelledError)` carrying the shutdown reason when the trigger comes first.
 * The cancellation lands one microtask after the trigger wakes the adapter, so an inner
 * result that is already available at that point still wins. This also holds when the
 * shutdown was triggered before wrapping: the operation is started and only cancelled
 * if it has not produced a result by then.
 */
export class WrapCancel<R, T> extends WrappedOperation<R, Result<R, OperationCancelledError<T>>> {
  private handle: WaiterHandle | null = null;

  constructor(
    private readonly shutdown: ShutdownState<T>,
    operation: Operation<R>,
  ) {
    super();

    this.start(operation);
    this.handle = shutdown.watch('triggered', reason => {
      this.handle = null;
      queueMicrotask(() => {
        const cancelled = new OperationCancelledError(reason);
        this.cancel(err(cancelled), cancelled);
      });
    });
  }

  protected release(): void {
    if (this.handle) {
      this.shutdown.unwatch('triggered', this.handle);
      this.handle = null;
    }
  }

  protected mapValue(value: R): Result<R, OperationCancelledError<T>> {
    return ok(value);
  }
}
