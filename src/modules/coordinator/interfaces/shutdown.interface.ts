import type { LoggerService } from '@nestjs/common';

/**
 * Condition a shutdown waiter can suspend on
 */
export type WaitTarget = 'triggered' | 'completed';

/**
 * Point-in-time view of a shutdown coordinator
 */
export interface ShutdownSnapshot<T> {
  triggered: boolean;
  completed: boolean;

  /**
   * Recorded reason, undefined until triggered
   */
  reason: T | undefined;

  /**
   * Delay tokens (including delay-wrapped operations) still outstanding
   */
  delayCount: number;

  /**
   * Registered waiters for the trigger and for completion
   */
  triggerWaiters: number;
  completeWaiters: number;
}

export interface ShutdownCoordinatorOptions {
  /**
   * Logger for state transitions. Defaults to a NestJS Logger named after the coordinator.
   */
  logger?: LoggerService;
}

export interface WaitOptions {
  /**
   * Abandons the wait when aborted
   */
  signal?: AbortSignal;
}
