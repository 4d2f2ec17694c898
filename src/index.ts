import 'reflect-metadata';
export { ShutdownCoordinator } from './modules/coordinator/shutdown.coordinator.js';
export { ShutdownWait } from './modules/coordinator/shutdown-wait.js';
export { DelayShutdownToken } from './modules/coordinator/tokens/delay-shutdown.token.js';
export { TriggerShutdownToken } from './modules/coordinator/tokens/trigger-shutdown.token.js';
export { WrappedOperation } from './modules/coordinator/wrappers/wrapped-operation.js';
export { WrapCancel } from './modules/coordinator/wrappers/wrap-cancel.js';
export { WrapDelayShutdown } from './modules/coordinator/wrappers/wrap-delay-shutdown.js';
export { WrapTriggerShutdown } from './modules/coordinator/wrappers/wrap-trigger-shutdown.js';
export type { Operation, WrappedOperationStatus } from './modules/coordinator/interfaces/operation.interface.js';
export type {
  ShutdownCoordinatorOptions,
  ShutdownSnapshot,
  WaitOptions,
  WaitTarget,
} from './modules/coordinator/interfaces/shutdown.interface.js';
export {
  OperationAbandonedError,
  OperationCancelledError,
  RequestCancelledError,
  ShutdownAlreadyCompletedError,
  ShutdownAlreadyTriggeredError,
  TokenReleasedError,
} from './common/errors/shutdown.errors.js';
export { ok, err, type Result } from './common/result.js';
export { ShutdownModule } from './modules/shutdown/shutdown.module.js';
export { ShutdownService } from './modules/shutdown/shutdown.service.js';
export { SHUTDOWN_CONFIG, shutdownConfigProvider } from './config/shutdown-config.provider.js';
export { loadShutdownConfig } from './config/shutdown.config.js';
export type { ShutdownConfig } from './config/shutdown-config.interface.js';
export { ConfigValidationError } from './config/validators/config-validator.js';
