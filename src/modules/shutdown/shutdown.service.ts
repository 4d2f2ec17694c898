import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
  ServiceUnavailableException,
} from '@nestjs/common';
import { SHUTDOWN_CONFIG } from '../../config/shutdown-config.provider.js';
import type { ShutdownConfig } from '../../config/shutdown-config.interface.js';
import { RequestCancelledError } from '../../common/errors/shutdown.errors.js';
import { ShutdownCoordinator } from '../coordinator/shutdown.coordinator.js';
import type { DelayShutdownToken } from '../coordinator/tokens/delay-shutdown.token.js';

/**
 * Service tying the application lifecycle to a shutdown coordinator.
 *
 * In-flight requests hold delay tokens. On application shutdown the coordinator is
 * triggered and the service waits for the requests to finish; once the configured
 * timeout expires, their signals are aborted.
 */
@Injectable()
export class ShutdownService implements OnApplicationShutdown {
  private readonly logger = new Logger(ShutdownService.name);
  private readonly shutdown: ShutdownCoordinator<string>;
  private readonly abortController = new AbortController();

  constructor(@Inject(SHUTDOWN_CONFIG) private readonly config: ShutdownConfig) {
    this.shutdown = new ShutdownCoordinator<string>({ logger: this.logger });
  }

  /**
   * New coordinator handle for code that needs direct access (waits, trigger tokens, wrappers)
   */
  public getCoordinator(): ShutdownCoordinator<string> {
    return this.shutdown.clone();
  }

  public get shuttingDown(): boolean {
    return this.shutdown.isTriggered();
  }

  /**
   * Register a new in-flight request. Release the token when the request is done.
   * @throws ServiceUnavailableException if shutdown is in progress
   */
  public registerRequest(): DelayShutdownToken<string> {
    if (this.shutdown.isTriggered()) {
      throw new ServiceUnavailableException('Server is shutting down, not accepting new requests');
    }

    const token = this.shutdown.delayShutdownToken();
    if (!token.ok) {
      throw new ServiceUnavailableException('Server has shut down');
    }
    return token.value;
  }

  /**
   * Signal for request cancellation.
   * Aborted with RequestCancelledError when the shutdown timeout expires.
   */
  public createRequestSignal(): AbortSignal {
    return this.abortController.signal;
  }

  /**
   * Run a request handler as in-flight work
   * @throws ServiceUnavailableException if shutdown is in progress
   */
  public async runRequest<R>(handler: (signal: AbortSignal) => Promise<R>): Promise<R> {
    const token = this.registerRequest();
    return token.wrapOperation(() => handler(this.abortController.signal));
  }

  /**
   * Called by NestJS when application is shutting down
   */
  public async onApplicationShutdown(signal?: string): Promise<void> {
    const reason = signal ?? this.config.defaultReason;
    this.logger.log(`Shutdown signal received: ${reason}`);

    const triggered = this.shutdown.triggerShutdown(reason);
    if (!triggered.ok) {
      this.logger.warn(`Shutdown was already triggered with reason: ${triggered.error.reason}`);
    }

    if (this.shutdown.isCompleted()) {
      this.logger.log('No active requests, shutting down immediately');
      return;
    }

    const { delayCount } = this.shutdown.snapshot();
    this.logger.log(
      `Waiting for ${delayCount} active request(s) to complete (timeout: ${this.config.timeoutMs}ms)`,
    );

    const completion = this.shutdown.waitShutdownComplete();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => resolve('timeout'), this.config.timeoutMs);
    });

    const outcome = await Promise.race([completion.then(() => 'completed' as const), timeout]);
    clearTimeout(timer);

    if (outcome === 'timeout') {
      this.logger.warn(
        `Shutdown timeout reached, aborting ${this.shutdown.snapshot().delayCount} active request(s)`,
      );
      completion.abandon();
      this.abortController.abort(new RequestCancelledError(this.config.timeoutMs));
      return;
    }

    this.logger.log('Graceful shutdown complete');
  }
}
