import type { TriggerShutdownToken } from '../tokens/trigger-shutdown.token.js';
import type { Operation } from '../interfaces/operation.interface.js';
import { WrappedOperation } from './wrapped-operation.js';

/**
 * Operation that triggers the shutdown when it settles, fails or is abandoned.
 * The inner result passes through unchanged.
 */
export class WrapTriggerShutdown<R, T> extends WrappedOperation<R, R> {
  constructor(
    private readonly triggerToken: TriggerShutdownToken<T>,
    operation: Operation<R>,
  ) {
    super();
    this.start(operation);
  }

  public get reason(): T {
    return this.triggerToken.reason;
  }

  protected release(): void {
    this.triggerToken.release();
  }

  protected mapValue(value: R): R {
    return value;
  }
}
