/**
 * Query command.
 *
 * Asks a tracker which hosts claim to have some content.
 *
 * @module cli/commands/query
 */

import React, { useEffect, useState } from 'react';
import { render, Text, Box, useApp } from 'ink';
import { formatContentAddress } from '../../content/address.js';
import { PeerId } from '../../content/peer-id.js';
import { parseContentSpecifier, resolveAddress } from '../../content/specifier.js';
import type { Query, QueryResponse } from '../../protocol/types.js';
import type { Logger } from '../../utils/logger.js';
import { type ClientSource, obtainClient } from '../utils/client.js';
import {
  errorMessage,
  errorToJson,
  formatKeyValue,
  pluralize,
  queryToJson,
  successMessage,
  warnMessage,
} from '../utils/output.js';

// =============================================================================
// Types
// =============================================================================

export interface QueryCommandOptions extends ClientSource {
  /** Tracker peer id */
  tracker: string;

  /** Hash, hash-and-format string or ticket */
  content: string;

  /** Also accept hosts with partial content */
  partial: boolean;

  /** Only hosts whose announces the tracker has verified */
  verified: boolean;

  /** Print JSON instead of formatted text */
  json?: boolean;
}

export interface PreparedQuery {
  tracker: PeerId;
  query: Query;
}

interface QueryResultProps {
  prepared: PreparedQuery | null;
  response: QueryResponse | null;
  error: string | null;
  loading: boolean;
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Parse command arguments into the query to send.
 *
 * @throws {SpecifierParseError} If the tracker id or content is invalid
 */
export function prepareQuery(
  options: Pick<QueryCommandOptions, 'tracker' | 'content' | 'partial' | 'verified'>
): PreparedQuery {
  const tracker = PeerId.parse(options.tracker);
  const specifier = parseContentSpecifier(options.content);

  return {
    tracker,
    query: {
      content: resolveAddress(specifier),
      flags: {
        complete: !options.partial,
        verified: options.verified,
      },
    },
  };
}

// =============================================================================
// Components
// =============================================================================

/**
 * Component to display the hosts returned by a query
 */
export const QueryResult: React.FC<QueryResultProps> = ({ prepared, response, error, loading }) => {
  if (loading) {
    return (
      <Box>
        <Text color="cyan">Querying tracker...</Text>
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

  if (prepared && response) {
    return (
      <Box flexDirection="column">
        {response.hosts.length === 0 ? (
          <Text color="yellow">[WARN] No hosts found</Text>
        ) : (
          <Text color="green">[OK] Found {pluralize(response.hosts.length, 'host')}</Text>
        )}
        <Box marginTop={1}>
          <Text dimColor>Content: </Text>
          <Text>{formatContentAddress(response.content)}</Text>
        </Box>
        <Box>
          <Text dimColor>Tracker: </Text>
          <Text>{prepared.tracker.toString()}</Text>
        </Box>
        {response.hosts.length > 0 && (
          <Box flexDirection="column" marginTop={1}>
            {response.hosts.map((host, index) => (
              <Text key={`${index}-${host.toString()}`}>{host.toString()}</Text>
            ))}
          </Box>
        )}
      </Box>
    );
  }

  return null;
};

// =============================================================================
// Main Query Function
// =============================================================================

/**
 * Execute the query command (non-interactive).
 *
 * @returns Process exit code
 */
export async function executeQuery(options: QueryCommandOptions): Promise<number> {
  let logger: Logger | undefined;

  try {
    const { tracker, query } = prepareQuery(options);
    const cli = obtainClient(options, tracker);
    logger = cli.logger;

    const response = await cli.client.query(tracker, query);

    if (options.json) {
      console.log(JSON.stringify(queryToJson(tracker, response.content, response.hosts)));
    } else {
      console.log(
        response.hosts.length === 0
          ? warnMessage('No hosts found')
          : successMessage(`Found ${pluralize(response.hosts.length, 'host')}`)
      );
      console.log(formatKeyValue('Content', formatContentAddress(response.content)));
      console.log(formatKeyValue('Tracker', tracker.toString()));
      for (const host of response.hosts) {
        console.log(`  ${host.toString()}`);
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
 * Query command component using Ink for rendering
 */
export function QueryCommand(options: QueryCommandOptions): React.ReactElement {
  const { exit } = useApp();
  const [prepared, setPrepared] = useState<PreparedQuery | null>(null);
  const [response, setResponse] = useState<QueryResponse | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [loading, setLoading] = useState(true);

  useEffect(() => {
    const doQuery = async () => {
      let logger: Logger | undefined;

      try {
        const next = prepareQuery(options);
        const cli = obtainClient(options, next.tracker);
        logger = cli.logger;

        const result = await cli.client.query(next.tracker, next.query);
        setPrepared(next);
        setResponse(result);
      } catch (err) {
        setError(err instanceof Error ? err.message : String(err));
      } finally {
        await logger?.flush();
        setLoading(false);
      }
    };

    void doQuery();
  }, []);

  useEffect(() => {
    if (!loading) {
      exit(error ? new Error(error) : undefined);
    }
  }, [loading, error, exit]);

  return <QueryResult prepared={prepared} response={response} error={error} loading={loading} />;
}

/**
 * Run the query command with Ink rendering
 */
export function runQuery(options: QueryCommandOptions): void {
  const { waitUntilExit } = render(<QueryCommand {...options} />);
  void waitUntilExit().then(
    () => process.exit(0),
    () => process.exit(1)
  );
}

export default executeQuery;
