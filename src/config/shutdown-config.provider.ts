import { loadShutdownConfig } from './shutdown.config.js';
import type { ShutdownConfig } from './shutdown-config.interface.js';

/**
 * Token for shutdown configuration injection
 */
export const SHUTDOWN_CONFIG = 'SHUTDOWN_CONFIG';

/**
 * Provider factory for shutdown configuration
 */
export const shutdownConfigProvider = {
  provide: SHUTDOWN_CONFIG,
  useFactory: (): ShutdownConfig => loadShutdownConfig(),
};
