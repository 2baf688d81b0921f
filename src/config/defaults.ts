/**
 * Default configuration values for the tracker client.
 *
 * @module config/defaults
 */

import { RESPONSE_SIZE_LIMIT, TRACKER_ALPN } from '../protocol/constants.js';
import type { LogLevel } from '../utils/logger.js';

/** Longest delay a Node timer honours, in milliseconds */
export const MAX_TIMEOUT = 2147483647;

/**
 * Whether `value` is a timeout a timer can wait for: an integer from 0 to
 * MAX_TIMEOUT.
 */
export function isValidTimeout(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_TIMEOUT;
}

/**
 * Tracker client configuration.
 */
export interface ClientConfig {
  /** Protocol identifier presented to the tracker */
  alpn: string;

  /** Maximum response size in bytes */
  responseSizeLimit: number;

  /** Timeout for establishing a transport connection in milliseconds */
  connectTimeout: number;

  /** Timeout for a whole exchange in milliseconds (0 = none) */
  requestTimeout: number;

  /** Minimum log level */
  logLevel: LogLevel;

  /** Append log lines to this file */
  logFile: string | null;
}

/**
 * Default client configuration.
 *
 * The protocol identifier and the response cap are fixed by the tracker
 * protocol; the remaining values are local policy.
 */
export const DEFAULT_CONFIG: ClientConfig = {
  alpn: TRACKER_ALPN,

  responseSizeLimit: RESPONSE_SIZE_LIMIT,

  connectTimeout: 5000,

  requestTimeout: 30000,

  /** Warnings and errors only unless --verbose is given */
  logLevel: 'warn',

  logFile: null,
};

/**
 * Merges a partial configuration with the default configuration.
 *
 * Keys whose value is undefined keep their default.
 *
 * @param partialConfig - Partial configuration to merge
 * @returns Complete configuration with defaults applied
 */
export function mergeWithDefaults(partialConfig?: Partial<ClientConfig>): ClientConfig {
  if (!partialConfig) {
    return { ...DEFAULT_CONFIG };
  }

  return {
    alpn: partialConfig.alpn ?? DEFAULT_CONFIG.alpn,
    responseSizeLimit: partialConfig.responseSizeLimit ?? DEFAULT_CONFIG.responseSizeLimit,
    connectTimeout: partialConfig.connectTimeout ?? DEFAULT_CONFIG.connectTimeout,
    requestTimeout: partialConfig.requestTimeout ?? DEFAULT_CONFIG.requestTimeout,
    logLevel: partialConfig.logLevel ?? DEFAULT_CONFIG.logLevel,
    logFile: partialConfig.logFile !== undefined ? partialConfig.logFile : DEFAULT_CONFIG.logFile,
  };
}
