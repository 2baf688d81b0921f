/**
 * Configuration from environment variables.
 *
 * @module config/env
 */

import { ConfigError } from '../errors.js';
import { isLogLevel } from '../utils/logger.js';
import { expandPath } from '../utils/platform.js';
import { type ClientConfig, MAX_TIMEOUT, isValidTimeout } from './defaults.js';

/** Environment variable names */
export const ENV = {
  connectTimeout: 'CONTENT_TRACKER_CONNECT_TIMEOUT',
  requestTimeout: 'CONTENT_TRACKER_REQUEST_TIMEOUT',
  logLevel: 'CONTENT_TRACKER_LOG_LEVEL',
  logFile: 'CONTENT_TRACKER_LOG_FILE',
} as const;

function parseMilliseconds(value: string, key: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed === '' || !isValidTimeout(parsed)) {
    throw new ConfigError(`${key} must be an integer from 0 to ${MAX_TIMEOUT}, got "${value}"`, key);
  }
  return parsed;
}

/**
 * Read configuration overrides from the environment.
 *
 * Unset or empty variables are left out of the result.
 *
 * @throws {ConfigError} If a variable holds an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ClientConfig> {
  const config: Partial<ClientConfig> = {};

  const connectTimeout = env[ENV.connectTimeout];
  if (connectTimeout) {
    config.connectTimeout = parseMilliseconds(connectTimeout, ENV.connectTimeout);
  }

  const requestTimeout = env[ENV.requestTimeout];
  if (requestTimeout) {
    config.requestTimeout = parseMilliseconds(requestTimeout, ENV.requestTimeout);
  }

  const logLevel = env[ENV.logLevel];
  if (logLevel) {
    const level = logLevel.trim().toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigError(`${ENV.logLevel} must be one of debug, info, warn, error, silent`, ENV.logLevel);
    }
    config.logLevel = level;
  }

  const logFile = env[ENV.logFile];
  if (logFile) {
    config.logFile = expandPath(logFile);
  }

  return config;
}
