import { BaseValidator } from './config-validator.js';
import type { ShutdownConfig } from '../shutdown-config.interface.js';
import { MAX_SHUTDOWN_TIMEOUT_MS } from '../../common/constants/app.constants.js';

export class ShutdownConfigValidator extends BaseValidator<ShutdownConfig> {
  public validate(value: unknown, path = 'ShutdownConfig'): asserts value is ShutdownConfig {
    this.assertObject(value, path);

    this.assertInteger(value.timeoutMs, `${path}.timeoutMs`, 0, MAX_SHUTDOWN_TIMEOUT_MS);
    this.assertString(value.defaultReason, `${path}.defaultReason`, { nonEmpty: true });
  }
}
