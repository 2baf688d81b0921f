/**
 * Announce command.
 *
 * Tells a tracker that a host has some content. The content is given as
 * hashes, hash-and-format strings or tickets; when every argument is a
 * ticket for the same node, that node is the announced host. With no
 * content at all an empty announce is sent for the given host.
 *
 * @module cli/commands/announce
 */

import React, { useEffect, useState } from 'react';
import { render, Text, Box, useApp } from 'ink';
import { contentAddressSet, formatContentAddress } from '../../content/address.js';
import { PeerId } from '../../content/peer-id.js';
import {
  type ContentSpecifier,
  parseContentSpecifier,
  resolveAddress,
  resolveHost,
} from '../../content/specifier.js';
import { type Announce, announceKindFromComplete } from '../../protocol/types.js';
import type { Logger } from '../../utils/logger.js';
import { type ClientSource, obtainClient } from '../utils/client.js';
import {
  announceToJson,
  describeKind,
  errorMessage,
  errorToJson,
  formatKeyValue,
  pluralize,
  successMessage,
} from '../utils/output.js';

// =============================================================================
// Types
// =============================================================================

export interface AnnounceCommandOptions extends ClientSource {
  /** Tracker peer id */
  tracker: string;

  /** Host peer id; may be omitted when all content arguments are tickets */
  host?: string;

  /** Hashes, hash-and-format strings or tickets; may be empty */
  content: string[];

  /** Announce partial rather than complete content */
  partial: boolean;

  /** Print JSON instead of formatted text */
  json?: boolean;
}

export interface PreparedAnnounce {
  tracker: PeerId;
  announce: Announce;
}

interface AnnounceResultProps {
  prepared: PreparedAnnounce | null;
  error: string | null;
  loading: boolean;
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * The host named by the tickets, when all arguments are tickets for one host
 */
function hostFromTickets(specifiers: readonly ContentSpecifier[]): PeerId {
  let host: PeerId | undefined;

  for (const specifier of specifiers) {
    const candidate = resolveHost(specifier);
    if (!candidate) {
      throw new Error('Missing --host: required unless every content argument is a ticket');
    }
    if (host && !host.equals(candidate)) {
      throw new Error('Tickets name different hosts; pass --host to choose one');
    }
    host = candidate;
  }

  if (!host) {
    throw new Error('Missing --host: required unless every content argument is a ticket');
  }
  return host;
}

/**
 * Parse command arguments into the announce to send.
 *
 * @throws {SpecifierParseError} If a peer id or content argument is invalid
 * @throws {Error} If the host cannot be determined
 */
export function prepareAnnounce(
  options: Pick<AnnounceCommandOptions, 'tracker' | 'host' | 'content' | 'partial'>
): PreparedAnnounce {
  const tracker = PeerId.parse(options.tracker);
  const specifiers = options.content.map((input) => parseContentSpecifier(input));
  const host = options.host !== undefined ? PeerId.parse(options.host) : hostFromTickets(specifiers);

  return {
    tracker,
    announce: {
      host,
      content: contentAddressSet(specifiers.map(resolveAddress)),
      kind: announceKindFromComplete(!options.partial),
    },
  };
}

// =============================================================================
// Components
// =============================================================================

/**
 * Component to display the result of an announce
 */
export const AnnounceResult: React.FC<AnnounceResultProps> = ({ prepared, error, loading }) => {
  if (loading) {
    return (
      <Box>
        <Text color="cyan">Announcing to tracker...</Text>
      </Box>
    );
  }

  if (error) {
    return (
      <Box>
        <Text color="red">[ERROR] {error}</Text>
      </Box>
    );
  }

  if (prepared) {
    const { tracker, announce } = prepared;
    return (
      <Box flexDirection="column">
        <Text color="green">
          [OK] Announced {pluralize(announce.content.length, 'item')} as {describeKind(announce.kind)}
        </Text>
        <Box marginTop={1}>
          <Text dimColor>Tracker: </Text>
          <Text>{tracker.toString()}</Text>
        </Box>
        <Box>
          <Text dimColor>Host: </Text>
          <Text>{announce.host.toString()}</Text>
        </Box>
        <Box flexDirection="column" marginTop={1}>
          {announce.content.map((address) => {
            const text = formatContentAddress(address);
            return <Text key={text}>{text}</Text>;
          })}
        </Box>
      </Box>
    );
  }

  return null;
};

// =============================================================================
// Main Announce Function
// =============================================================================

/**
 * Execute the announce command (non-interactive).
 *
 * @returns Process exit code
 */
export async function executeAnnounce(options: AnnounceCommandOptions): Promise<number> {
  let logger: Logger | undefined;

  try {
    const prepared = prepareAnnounce(options);
    const { tracker, announce } = prepared;
    const cli = obtainClient(options, tracker);
    logger = cli.logger;

    await cli.client.announce(tracker, announce);

    if (options.json) {
      console.log(JSON.stringify(announceToJson(tracker, announce.host, announce.kind, announce.content)));
    } else {
      console.log(
        successMessage(
          `Announced ${pluralize(announce.content.length, 'item')} as ${describeKind(announce.kind)}`
        )
      );
      console.log(formatKeyValue('Tracker', tracker.toString()));
      console.log(formatKeyValue('Host', announce.host.toString()));
      for (const address of announce.content) {
        console.log(`  ${formatContentAddress(address)}`);
      }
    }
    return 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(options.json ? JSON.stringify(errorToJson(message)) : errorMessage(message));
    return 1;
  } finally {
    await logger?.flush();
  }
}

/**
 * Announce command component using Ink for rendering
 */
export function AnnounceCommand(options: AnnounceCommandOptions): React.ReactElement {
  const { exit } = useApp();
  const [prepared, setPrepared] = useState<PreparedAnnounce | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [loading, setLoading] = useState(true);

  useEffect(() => {
    const doAnnounce = async () => {
      let logger: Logger | undefined;

      try {
        const next = prepareAnnounce(options);
        const cli = obtainClient(options, next.tracker);
        logger = cli.logger;

        await cli.client.announce(next.tracker, next.announce);
        setPrepared(next);
      } catch (err) {
        setError(err instanceof Error ? err.message : String(err));
      } finally {
        await logger?.flush();
        setLoading(false);
      }
    };

    void doAnnounce();
  }, []);

  useEffect(() => {
    if (!loading) {
      exit(error ? new Error(error) : undefined);
    }
  }, [loading, error, exit]);

  return <AnnounceResult prepared={prepared} error={error} loading={loading} />;
}

/**
 * Run the announce command with Ink rendering
 */
export function runAnnounce(options: AnnounceCommandOptions): void {
  const { waitUntilExit } = render(<AnnounceCommand {...options} />);
  void waitUntilExit().then(
    () => process.exit(0),
    () => process.exit(1)
  );
}

export default executeAnnounce;
