import type { DelayShutdownToken } from '../tokens/delay-shutdown.token.js';
import type { Operation } from '../interfaces/operation.interface.js';
import { WrappedOperation } from './wrapped-operation.js';

/**
 * Operation that keeps the shutdown from completing until it settles or is abandoned.
 * The inner result passes through unchanged.
 */
export class WrapDelayShutdown<R, T> extends WrappedOperation<R, R> {
  constructor(
    private readonly delayToken: DelayShutdownToken<T>,
    operation: Operation<R>,
  ) {
    super();
    this.start(operation);
  }

  protected release(): void {
    this.delayToken.release();
  }

  protected mapValue(value: R): R {
    return value;
  }
}
