import { TokenReleasedError } from '../../../common/errors/shutdown.errors.js';
import type { ShutdownState } from '../shutdown-state.js';
import type { Operation } from '../interfaces/operation.interface.js';
import { WrapDelayShutdown } from '../wrappers/wrap-delay-shutdown.js';
import { abandonedTokens } from './abandoned-tokens.js';

/**
 * Keeps the shutdown from completing for as long as it is held.
 *
 * Obtained from `ShutdownCoordinator.delayShutdownToken()`, which has already reserved
 * the delay unit this token owns. Releasing the token (or dropping it) gives that unit back.
 */
export class DelayShutdownToken<T> {
  private owned = true;

  constructor(private readonly shutdown: ShutdownState<T>) {
    abandonedTokens.register(this, () => shutdown.decreaseDelayCount(), this);
  }

  public get released(): boolean {
    return !this.owned;
  }

  /**
   * Allow the shutdown to complete. Repeated calls are ignored.
   */
  public release(): void {
    if (this.disown()) {
      this.shutdown.decreaseDelayCount();
    }
  }

  /**
   * Delay shutdown completion until `operation` settles or is abandoned.
   *
   * Cannot fail: holding the token proves the shutdown has not completed yet.
   * Ownership moves into the returned operation and this token becomes released.
   */
  public wrapOperation<R>(operation: Operation<R>): WrapDelayShutdown<R, T> {
    if (!this.disown()) {
      throw new TokenReleasedError('DelayShutdownToken');
    }
    return new WrapDelayShutdown(new DelayShutdownToken(this.shutdown), operation);
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
