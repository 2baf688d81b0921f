/**
 * Builds the tracker client used by CLI commands.
 *
 * @module cli/utils/client
 */

import type { PeerId } from '../../content/peer-id.js';
import { type ClientConfig, MAX_TIMEOUT, isValidTimeout, mergeWithDefaults } from '../../config/defaults.js';
import { configFromEnv } from '../../config/env.js';
import { ConfigError } from '../../errors.js';
import { TrackerClient } from '../../tracker/client.js';
import { TcpEndpoint } from '../../transport/tcp.js';
import { type Logger, createLogger } from '../../utils/logger.js';

export interface CliFlags {
  verbose?: boolean;
  timeout?: number;
}

export interface CliClient {
  client: TrackerClient;
  logger: Logger;
}

/**
 * Resolve configuration: defaults, then environment, then flags.
 *
 * @throws {ConfigError} If an environment variable or the timeout flag is invalid
 */
export function resolveCliConfig(flags: CliFlags, env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const config = mergeWithDefaults(configFromEnv(env));

  if (flags.verbose) {
    config.logLevel = 'debug';
  }
  if (flags.timeout !== undefined) {
    if (!isValidTimeout(flags.timeout)) {
      throw new ConfigError(
        `--timeout must be an integer from 0 to ${MAX_TIMEOUT}, got ${flags.timeout}`,
        'timeout'
      );
    }
    config.requestTimeout = flags.timeout;
  }

  return config;
}

/**
 * Create a TCP-backed tracker client that knows where to find the tracker.
 *
 * @throws {Error} If no tracker address was given
 * @throws {ConnectionError} If a tracker address is malformed
 */
export function createCliClient(
  config: ClientConfig,
  tracker: PeerId,
  trackerAddrs: readonly string[]
): CliClient {
  if (trackerAddrs.length === 0) {
    throw new Error('Missing --tracker-addr: the host:port the tracker listens on');
  }

  const logger = createLogger({ scope: 'cli', level: config.logLevel, logFile: config.logFile });

  const endpoint = new TcpEndpoint({
    connectTimeout: config.connectTimeout,
    peers: [{ peerId: tracker, addresses: [...trackerAddrs] }],
    logger: logger.child('tcp'),
  });

  const client = new TrackerClient(endpoint, {
    alpn: config.alpn,
    responseSizeLimit: config.responseSizeLimit,
    requestTimeout: config.requestTimeout,
    logger: logger.child('tracker'),
  });

  return { client, logger };
}

/**
 * Where a command gets its tracker client from
 */
export interface ClientSource {
  /** Addresses the tracker listens on */
  trackerAddrs: readonly string[];

  /** Resolved configuration (default: from the environment) */
  config?: ClientConfig;

  /** Use this client instead of dialing over TCP */
  client?: TrackerClient;
}

/**
 * Use the injected client when there is one, otherwise build one over TCP.
 */
export function obtainClient(source: ClientSource, tracker: PeerId): CliClient {
  if (source.client) {
    return { client: source.client, logger: createLogger({ level: 'silent' }) };
  }
  return createCliClient(source.config ?? resolveCliConfig({}), tracker, source.trackerAddrs);
}
