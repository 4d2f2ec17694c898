import { HttpException, HttpStatus } from '@nestjs/common';

export class ShutdownAlreadyTriggeredError<T> extends Error {
  constructor(public readonly reason: T) {
    super('Shutdown has already been triggered');
    this.name = 'ShutdownAlreadyTriggeredError';
  }
}

export class ShutdownAlreadyCompletedError<T> extends Error {
  constructor(public readonly reason: T) {
    super('Shutdown has already completed, cannot delay completion');
    this.name = 'ShutdownAlreadyCompletedError';
  }
}

/**
 * Failure value of a cancel-on-shutdown operation that lost the race against the trigger.
 */
export class OperationCancelledError<T> extends Error {
  constructor(public readonly reason: T) {
    super('Operation cancelled: shutdown was triggered');
    this.name = 'OperationCancelledError';
  }
}

export class OperationAbandonedError extends Error {
  constructor(cause?: unknown) {
    super('Operation was abandoned before it completed', { cause });
    this.name = 'OperationAbandonedError';
  }
}

export class TokenReleasedError extends Error {
  constructor(tokenType: string) {
    super(`${tokenType} has already been released`);
    this.name = 'TokenReleasedError';
  }
}

export class RequestCancelledError extends HttpException {
  constructor(public readonly timeoutMs: number) {
    super(
      `Request cancelled: server shutdown timed out after ${timeoutMs}ms`,
      HttpStatus.SERVICE_UNAVAILABLE,
    );
    this.name = 'RequestCancelledError';
  }
}
