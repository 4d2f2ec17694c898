import type { LoggerService } from '@nestjs/common';
import { err, ok, type Result } from '../../common/result.js';
import {
  ShutdownAlreadyCompletedError,
  ShutdownAlreadyTriggeredError,
} from '../../common/errors/shutdown.errors.js';
import { WaiterList, type Wake, type WaiterHandle } from './waiter-list.js';
import type { ShutdownSnapshot, WaitTarget } from './interfaces/shutdown.interface.js';

/**
 * State shared by every coordinator handle, token and adapter of one shutdown.
 *
 * Transitions:
 * - triggered: false -> true, exactly once, together with the reason
 * - completed: false -> true, exactly once, only while triggered with no outstanding delays
 *
 * Every method runs to completion synchronously. Flags are updated before any waiter is
 * woken, so a callback that re-enters this object always observes the new state.
 */
export class ShutdownState<T> {
  private triggered = false;
  private completed = false;
  private reason: { value: T } | null = null;
  private delayCount = 0;
  private readonly triggerWaiters = new WaiterList<T>();
  private readonly completeWaiters = new WaiterList<T>();

  constructor(private readonly logger: LoggerService) {}

  public isTriggered(): boolean {
    return this.triggered;
  }

  public isCompleted(): boolean {
    return this.completed;
  }

  public getReason(): T | undefined {
    return this.reason?.value;
  }

  public snapshot(): ShutdownSnapshot<T> {
    return {
      triggered: this.triggered,
      completed: this.completed,
      reason: this.reason?.value,
      delayCount: this.delayCount,
      triggerWaiters: this.triggerWaiters.size,
      completeWaiters: this.completeWaiters.size,
    };
  }

  /**
   * Trigger the shutdown. The first caller wins; later callers get the recorded reason back.
   */
  public trigger(reason: T): Result<void, ShutdownAlreadyTriggeredError<T>> {
    if (this.reason) {
      this.logger.debug?.('Shutdown already triggered, ignoring new reason');
      return err(new ShutdownAlreadyTriggeredError(this.reason.value));
    }

    this.triggered = true;
    this.reason = { value: reason };
    this.logger.log(`Shutdown triggered (${this.delayCount} delay token(s) outstanding)`);

    // Completion must be settled before anyone is woken
    const completedNow = this.tryComplete();

    this.triggerWaiters.wakeAll(reason);
    if (completedNow) {
      this.completeWaiters.wakeAll(reason);
    }

    return ok(undefined);
  }

  /**
   * Reserve one unit of delay. Refused only once the shutdown has completed.
   */
  public increaseDelayCount(): Result<void, ShutdownAlreadyCompletedError<T>> {
    if (this.completed && this.reason) {
      this.logger.debug?.('Shutdown already completed, refusing to delay it');
      return err(new ShutdownAlreadyCompletedError(this.reason.value));
    }

    this.delayCount++;
    return ok(undefined);
  }

  /**
   * Release one unit of delay and complete the shutdown if it was the last one.
   */
  public decreaseDelayCount(): void {
    if (this.delayCount === 0) {
      throw new Error('Shutdown delay count underflow');
    }

    this.delayCount--;

    if (this.tryComplete() && this.reason) {
      this.completeWaiters.wakeAll(this.reason.value);
    }
  }

  /**
   * Resume `wake` once `target` holds.
   *
   * The predicate is checked before registering: when it already holds, `wake` runs
   * immediately and no slot is taken. Otherwise the waiter is stored, reusing the slot
   * of `previous` when that registration is still pending.
   */
  public watch(target: WaitTarget, wake: Wake<T>, previous?: WaiterHandle | null): WaiterHandle | null {
    const ready = target === 'triggered' ? this.triggered : this.completed;
    if (ready && this.reason) {
      wake(this.reason.value);
      return null;
    }

    return this.waiters(target).register(wake, previous);
  }

  public unwatch(target: WaitTarget, handle: WaiterHandle): boolean {
    return this.waiters(target).deregister(handle);
  }

  private waiters(target: WaitTarget): WaiterList<T> {
    return target === 'triggered' ? this.triggerWaiters : this.completeWaiters;
  }

  /**
   * Flip `completed` when triggered with no outstanding delays.
   * Evaluated both when triggering and when the last delay is released.
   */
  private tryComplete(): boolean {
    if (this.completed || !this.triggered || this.delayCount > 0) {
      return false;
    }

    this.completed = true;
    this.logger.log('Shutdown completed');
    return true;
  }
}
