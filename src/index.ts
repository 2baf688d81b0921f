/**
 * Content tracker client
 *
 * Announce content to trackers and ask them which hosts have it.
 *
 * @module content-tracker
 */

export { VERSION } from './shared/constants.js';

export * from './errors.js';
export * from './content/index.js';
export * from './protocol/index.js';
export * from './transport/index.js';
export * from './tracker/index.js';
export * from './config/index.js';
export {
  createLogger,
  formatTimestamp,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LoggerOptions,
  type LogLevel,
} from './utils/logger.js';
