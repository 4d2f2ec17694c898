import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import type { ShutdownConfig } from './shutdown-config.interface.js';
import { ShutdownConfigValidator } from './validators/shutdown-config-validator.js';
import {
  DEFAULT_SHUTDOWN_REASON,
  SHUTDOWN_TIMEOUT_MS,
} from '../common/constants/app.constants.js';

/**
 * Load graceful shutdown configuration from environment variables.
 *
 * When no environment is passed, `.env.<NODE_ENV>` and `.env` are loaded into
 * `process.env` first.
 */
export function loadShutdownConfig(env: NodeJS.ProcessEnv = loadEnvironmentVariables()): ShutdownConfig {
  const config: ShutdownConfig = {
    timeoutMs: parseNumber(env['SHUTDOWN_TIMEOUT_MS'], SHUTDOWN_TIMEOUT_MS),
    defaultReason: env['SHUTDOWN_DEFAULT_REASON'] ?? DEFAULT_SHUTDOWN_REASON,
  };

  const validator: ShutdownConfigValidator = new ShutdownConfigValidator();
  validator.validate(config);

  return config;
}

function loadEnvironmentVariables(): NodeJS.ProcessEnv {
  const nodeEnv = process.env['NODE_ENV'] ?? 'development';
  const envFiles = [`.env.${nodeEnv}`, '.env'];

  for (const envFile of envFiles) {
    const envPath = resolve(envFile);
    if (existsSync(envPath)) {
      loadDotenv({ path: envPath });
    }
  }

  return process.env;
}

// Unparseable values become NaN and are rejected by the validator
function parseNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return Number(raw);
}
