/**
 * Client configuration module.
 *
 * @module config
 */

export {
  type ClientConfig,
  DEFAULT_CONFIG,
  MAX_TIMEOUT,
  isValidTimeout,
  mergeWithDefaults,
} from './defaults.js';
export { ENV, configFromEnv } from './env.js';
