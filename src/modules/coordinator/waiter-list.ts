/**
 * Callback that resumes a suspended waiter with the shutdown reason.
 */
export type Wake<T> = (reason: T) => void;

/**
 * Handle to a registered waiter slot.
 * Only valid within the epoch it was issued in.
 */
export interface WaiterHandle {
  readonly epoch: number;
  readonly slot: number;
}

/**
 * Registry of suspended waiters.
 *
 * Each logical waiter owns at most one slot: registering again with its previous
 * handle replaces the callback in place instead of appending a new entry.
 * `wakeAll` empties the registry and starts a new epoch, so handles from an
 * earlier epoch can never remove a slot that was issued later.
 */
export class WaiterList<T> {
  private readonly waiters = new Map<number, Wake<T>>();
  private nextSlot = 0;
  private epoch = 0;

  public get size(): number {
    return this.waiters.size;
  }

  /**
   * Register a wake callback, reusing the slot of `previous` when it is still live.
   */
  public register(wake: Wake<T>, previous?: WaiterHandle | null): WaiterHandle {
    if (previous && this.isLive(previous)) {
      this.waiters.set(previous.slot, wake);
      return previous;
    }

    const slot = this.nextSlot++;
    this.waiters.set(slot, wake);
    return { epoch: this.epoch, slot };
  }

  /**
   * Remove a registration. Returns false for a handle that was already woken or removed.
   */
  public deregister(handle: WaiterHandle): boolean {
    if (!this.isLive(handle)) {
      return false;
    }
    return this.waiters.delete(handle.slot);
  }

  /**
   * Wake every registered waiter and clear the registry.
   * The registry is emptied before any callback runs, so callbacks may register again.
   */
  public wakeAll(reason: T): void {
    const waiters = [...this.waiters.values()];
    this.waiters.clear();
    this.epoch++;

    for (const wake of waiters) {
      wake(reason);
    }
  }

  private isLive(handle: WaiterHandle): boolean {
    return handle.epoch === this.epoch && this.waiters.has(handle.slot);
  }
}
