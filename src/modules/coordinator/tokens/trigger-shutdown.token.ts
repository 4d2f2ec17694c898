import { TokenReleasedError } from '../../../common/errors/shutdown.errors.js';
import type { ShutdownState } from '../shutdown-state.js';
import type { Operation } from '../interfaces/operation.interface.js';
import { WrapTriggerShutdown } from '../wrappers/wrap-trigger-shutdown.js';
import { abandonedTokens } from './abandoned-tokens.js';

/**
 * Triggers the shutdown with a fixed reason when released or dropped.
 *
 * Use it for vital work: once the holder goes away, the rest of the program shuts down.
 * Releasing after the shutdown was already triggered does nothing.
 */
export class TriggerShutdownToken<T> {
  private owned = true;

  constructor(
    private readonly shutdown: ShutdownState<T>,
    private readonly triggerReason: T,
  ) {
    abandonedTokens.register(this, () => shutdown.trigger(triggerReason), this);
  }

  public get reason(): T {
    return this.triggerReason;
  }

  public get released(): boolean {
    return !this.owned;
  }

  public release(): void {
    if (this.disown()) {
      this.shutdown.trigger(this.triggerReason);
    }
  }

  /**
   * Trigger the shutdown when `operation` settles or is abandoned.
   * Ownership moves into the returned operation and this token becomes released.
   */
  public wrapOperation<R>(operation: Operation<R>): WrapTriggerShutdown<R, T> {
    if (!this.disown()) {
      throw new TokenReleasedError('TriggerShutdownToken');
    }
    return new WrapTriggerShutdown(
      new TriggerShutdownToken(this.shutdown, this.triggerReason),
      operation,
    );
  }

  private disown(): boolean {
    if (!this.owned) {
      return false;
    }
    this.owned = false;
    abandonedTokens.unregister(this);
    return true;
  }
}
