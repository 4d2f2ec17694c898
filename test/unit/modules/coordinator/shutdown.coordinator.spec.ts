import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import type { LoggerService } from '@nestjs/common';
import { ShutdownCoordinator } from '../../../../src/modules/coordinator/shutdown.coordinator.js';
import {
  ShutdownAlreadyCompletedError,
  ShutdownAlreadyTriggeredError,
} from '../../../../src/common/errors/shutdown.errors.js';
import { flushPromises, isSettled } from '../../../helpers/controlled-operation.js';

describe('ShutdownCoordinator', () => {
  let shutdown: ShutdownCoordinator<string>;

  beforeEach(() => {
    shutdown = new ShutdownCoordinator<string>();
  });

  describe('initial state', () => {
    it('should be neither triggered nor completed', () => {
      expect(shutdown.isTriggered()).toBe(false);
      expect(shutdown.isCompleted()).toBe(false);
      expect(shutdown.shutdownReason()).toBeUndefined();
    });

    it('should report an empty snapshot', () => {
      expect(shutdown.snapshot()).toEqual({
        triggered: false,
        completed: false,
        reason: undefined,
        delayCount: 0,
        triggerWaiters: 0,
        completeWaiters: 0,
      });
    });
  });

  describe('triggerShutdown', () => {
    it('should record the first reason and complete without delay tokens', () => {
      const result = shutdown.triggerShutdown('SIGTERM');

      expect(result).toEqual({ ok: true, value: undefined });
      expect(shutdown.isTriggered()).toBe(true);
      expect(shutdown.isCompleted()).toBe(true);
      expect(shutdown.shutdownReason()).toBe('SIGTERM');
    });

    it('should reject later triggers with the recorded reason', () => {
      shutdown.triggerShutdown('first');

      const result = shutdown.triggerShutdown('second');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ShutdownAlreadyTriggeredError);
        expect(result.error.reason).toBe('first');
      }
      expect(shutdown.shutdownReason()).toBe('first');
    });

    it('should share state between clones', () => {
      const clone = shutdown.clone();

      clone.triggerShutdown('from clone');

      expect(shutdown.isTriggered()).toBe(true);
      expect(shutdown.shutdownReason()).toBe('from clone');
    });

    it('should not change state when cloning', () => {
      shutdown.clone();
      expect(shutdown.isTriggered()).toBe(false);
    });

    it('should log transitions through the configured logger', () => {
      const logger: LoggerService = {
        log: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
      };
      const logged = new ShutdownCoordinator<string>({ logger });

      logged.triggerShutdown('SIGINT');
      logged.triggerShutdown('again');

      expect(logger.log).toHaveBeenCalledWith('Shutdown triggered (0 delay token(s) outstanding)');
      expect(logger.log).toHaveBeenCalledWith('Shutdown completed');
      expect(logger.debug).toHaveBeenCalledWith('Shutdown already triggered, ignoring new reason');
    });
  });

  describe('delayShutdownToken', () => {
    it('should hold completion until every token is released', () => {
      const first = shutdown.delayShutdownToken();
      const second = shutdown.delayShutdownToken();
      if (!first.ok || !second.ok) {
        throw new Error('expected delay tokens');
      }

      shutdown.triggerShutdown('boom');
      expect(shutdown.isTriggered()).toBe(true);
      expect(shutdown.isCompleted()).toBe(false);
      expect(shutdown.snapshot().delayCount).toBe(2);

      first.value.release();
      expect(shutdown.isCompleted()).toBe(false);

      second.value.release();
      expect(shutdown.isCompleted()).toBe(true);
      expect(shutdown.snapshot().delayCount).toBe(0);
    });

    it('should still be available after trigger while not completed', () => {
      const held = shutdown.delayShutdownToken();
      shutdown.triggerShutdown('boom');

      const late = shutdown.delayShutdownToken();

      expect(late.ok).toBe(true);
      expect(shutdown.snapshot().delayCount).toBe(2);
      if (held.ok && late.ok) {
        held.value.release();
        late.value.release();
      }
      expect(shutdown.isCompleted()).toBe(true);
    });

    it('should fail once shutdown has completed', () => {
      shutdown.triggerShutdown('done');

      const result = shutdown.delayShutdownToken();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ShutdownAlreadyCompletedError);
        expect(result.error.reason).toBe('done');
      }
      expect(shutdown.snapshot().delayCount).toBe(0);
    });

    it('should not complete when tokens are released before any trigger', () => {
      const token = shutdown.delayShutdownToken();
      if (token.ok) {
        token.value.release();
      }

      expect(shutdown.isCompleted()).toBe(false);
    });
  });

  describe('waitShutdownTriggered', () => {
    it('should resolve immediately when already triggered', async () => {
      shutdown.triggerShutdown('SIGTERM');

      await expect(shutdown.waitShutdownTriggered()).resolves.toBe('SIGTERM');
    });

    it('should resolve every concurrent waiter with the same reason', async () => {
      const waits = Array.from({ length: 5 }, () => shutdown.clone().waitShutdownTriggered());
      const all = Promise.all(waits);
      await flushPromises();
      expect(shutdown.snapshot().triggerWaiters).toBe(5);

      shutdown.triggerShutdown('SIGTERM');

      await expect(all).resolves.toEqual(['SIGTERM', 'SIGTERM', 'SIGTERM', 'SIGTERM', 'SIGTERM']);
      expect(shutdown.snapshot().triggerWaiters).toBe(0);
    });

    it('should resolve when triggered from another task', async () => {
      setTimeout(() => shutdown.clone().triggerShutdown('timer'), 5);

      await expect(shutdown.waitShutdownTriggered()).resolves.toBe('timer');
      await expect(shutdown.waitShutdownComplete()).resolves.toBe('timer');
    });
  });

  describe('waitShutdownComplete', () => {
    it('should not resolve without a trigger even with no delay tokens', async () => {
      const wait = shutdown.waitShutdownComplete();

      expect(await isSettled(wait)).toBe(false);

      shutdown.triggerShutdown('late');
      await expect(wait).resolves.toBe('late');
    });

    it('should resolve after the last delay token is released', async () => {
      const token = shutdown.delayShutdownToken();
      if (!token.ok) {
        throw new Error('expected a delay token');
      }
      shutdown.triggerShutdown('boom');
      const wait = shutdown.waitShutdownComplete();

      expect(await isSettled(wait)).toBe(false);

      setTimeout(() => token.value.release(), 5);

      await expect(wait).resolves.toBe('boom');
      expect(shutdown.isCompleted()).toBe(true);
    });

    it('should run the delay scenario end to end', async () => {
      const unitA = shutdown.clone();
      const token = unitA.delayShutdownToken();
      if (!token.ok) {
        throw new Error('expected a delay token');
      }

      shutdown.triggerShutdown('boom');
      expect(shutdown.isTriggered()).toBe(true);
      expect(shutdown.isCompleted()).toBe(false);

      token.value.release();

      expect(shutdown.isCompleted()).toBe(true);
      await expect(shutdown.waitShutdownComplete()).resolves.toBe('boom');
    });
  });

  describe('triggerShutdownToken', () => {
    it('should trigger with its reason when released', () => {
      const numeric = new ShutdownCoordinator<number>();
      const token = numeric.triggerShutdownToken(1);

      token.release();

      expect(numeric.shutdownReason()).toBe(1);
      expect(numeric.isCompleted()).toBe(true);
    });
  });

  describe('wrapDelayShutdown', () => {
    it('should fail without starting the operation once completed', () => {
      shutdown.triggerShutdown('done');
      const operation = jest.fn((_signal: AbortSignal) => Promise.resolve(1));

      const result = shutdown.wrapDelayShutdown(operation);

      expect(result.ok).toBe(false);
      expect(operation).not.toHaveBeenCalled();
    });

    it('should delay completion until the operation settles', async () => {
      let finish: (value: number) => void = () => undefined;
      const result = shutdown.wrapDelayShutdown(
        new Promise<number>(resolve => {
          finish = resolve;
        }),
      );
      if (!result.ok) {
        throw new Error('expected a wrapped operation');
      }

      shutdown.triggerShutdown('stop');
      expect(shutdown.isCompleted()).toBe(false);

      finish(7);

      await expect(result.value).resolves.toBe(7);
      expect(shutdown.isCompleted()).toBe(true);
    });
  });

  describe('wrapTriggerShutdown', () => {
    it('should trigger when the wrapped operation completes', async () => {
      const wrapped = shutdown.wrapTriggerShutdown(Promise.resolve('result'), 'vital task ended');

      await expect(wrapped).resolves.toBe('result');
      expect(shutdown.shutdownReason()).toBe('vital task ended');
      await expect(shutdown.waitShutdownComplete()).resolves.toBe('vital task ended');
    });
  });
});
