import { Logger } from '@nestjs/common';
import { ok, type Result } from '../../common/result.js';
import type {
  ShutdownAlreadyCompletedError,
  ShutdownAlreadyTriggeredError,
} from '../../common/errors/shutdown.errors.js';
import { ShutdownState } from './shutdown-state.js';
import { ShutdownWait } from './shutdown-wait.js';
import { DelayShutdownToken } from './tokens/delay-shutdown.token.js';
import { TriggerShutdownToken } from './tokens/trigger-shutdown.token.js';
import { WrapCancel } from './wrappers/wrap-cancel.js';
import type { WrapDelayShutdown } from './wrappers/wrap-delay-shutdown.js';
import type { WrapTriggerShutdown } from './wrappers/wrap-trigger-shutdown.js';
import type { Operation } from './interfaces/operation.interface.js';
import type {
  ShutdownCoordinatorOptions,
  ShutdownSnapshot,
  WaitOptions,
} from './interfaces/shutdown.interface.js';

/**
 * Graceful shutdown coordinator.
 *
 * Serves two related purposes:
 * - broadcast a shutdown so running operations can stop, either by awaiting
 *   `waitShutdownTriggered()` or by being wrapped with `wrapCancel()`
 * - wait for operations to finish their clean-up, tracked through delay tokens,
 *   before `waitShutdownComplete()` resolves
 *
 * The shutdown is complete once it has been triggered and every delay token has been
 * released. Hand a `clone()` to each unit of work; all clones share one state.
 *
 * @typeParam T Shutdown reason, returned to every waiter
 */
export class ShutdownCoordinator<T = string> {
  private readonly shutdown: ShutdownState<T>;

  constructor(options: ShutdownCoordinatorOptions | ShutdownState<T> = {}) {
    this.shutdown =
      options instanceof ShutdownState
        ? options
        : new ShutdownState<T>(options.logger ?? new Logger(ShutdownCoordinator.name));
  }

  /**
   * Create another handle to the same shutdown
   */
  public clone(): ShutdownCoordinator<T> {
    return new ShutdownCoordinator<T>(this.shutdown);
  }

  /**
   * Trigger the shutdown.
   *
   * Wakes every waiter for the trigger, and completes the shutdown right away when no
   * delay token is outstanding. Only the first call succeeds; later calls get an error
   * carrying the reason that was recorded.
   */
  public triggerShutdown(reason: T): Result<void, ShutdownAlreadyTriggeredError<T>> {
    return this.shutdown.trigger(reason);
  }

  public isTriggered(): boolean {
    return this.shutdown.isTriggered();
  }

  public isCompleted(): boolean {
    return this.shutdown.isCompleted();
  }

  /**
   * Reason the shutdown was triggered with, undefined before the trigger
   */
  public shutdownReason(): T | undefined {
    return this.shutdown.getReason();
  }

  public snapshot(): ShutdownSnapshot<T> {
    return this.shutdown.snapshot();
  }

  /**
   * Wait for the shutdown to be triggered.
   * Resolves immediately when it already was.
   */
  public waitShutdownTriggered(options?: WaitOptions): ShutdownWait<T> {
    return new ShutdownWait(this.shutdown, 'triggered', options);
  }

  /**
   * Wait for the shutdown to complete.
   *
   * Without a trigger this never resolves, even with no delay token outstanding.
   */
  public waitShutdownComplete(options?: WaitOptions): ShutdownWait<T> {
    return new ShutdownWait(this.shutdown, 'completed', options);
  }

  /**
   * Get a token that prevents the shutdown from completing until it is released.
   * Fails only once the shutdown has completed; a triggered shutdown can still be delayed.
   */
  public delayShutdownToken(): Result<DelayShutdownToken<T>, ShutdownAlreadyCompletedError<T>> {
    const reserved = this.shutdown.increaseDelayCount();
    if (!reserved.ok) {
      return reserved;
    }
    return ok(new DelayShutdownToken(this.shutdown));
  }

  /**
   * Get a token that triggers the shutdown with `reason` when released or dropped
   */
  public triggerShutdownToken(reason: T): TriggerShutdownToken<T> {
    return new TriggerShutdownToken(this.shutdown, reason);
  }

  /**
   * Wrap an operation so that it is abandoned when the shutdown is triggered
   */
  public wrapCancel<R>(operation: Operation<R>): WrapCancel<R, T> {
    return new WrapCancel(this.shutdown, operation);
  }

  /**
   * Wrap an operation so that the shutdown does not complete before it settles.
   * A function operation is not started when this fails.
   */
  public wrapDelayShutdown<R>(
    operation: Operation<R>,
  ): Result<WrapDelayShutdown<R, T>, ShutdownAlreadyCompletedError<T>> {
    const token = this.delayShutdownToken();
    if (!token.ok) {
      return token;
    }
    return ok(token.value.wrapOperation(operation));
  }

  /**
   * Wrap an operation so that the shutdown is triggered with `reason` when it settles
   */
  public wrapTriggerShutdown<R>(operation: Operation<R>, reason: T): WrapTriggerShutdown<R, T> {
    return this.triggerShutdownToken(reason).wrapOperation(operation);
  }
}
