#!/usr/bin/env node
/**
 * Content Tracker CLI Entry Point
 *
 * This module handles command-line argument parsing and routes
 * to the appropriate command implementations.
 *
 * @module cli
 */

import React from 'react';
import { render, Text, Box } from 'ink';
import meow from 'meow';
import type { ClientConfig } from '../config/defaults.js';
import { BIN_NAME, VERSION } from '../shared/constants.js';
import { resolveCliConfig } from './utils/client.js';
import { executeAnnounce, runAnnounce } from './commands/announce.js';
import { executeQuery, runQuery } from './commands/query.js';

// =============================================================================
// CLI Configuration
// =============================================================================

const cli = meow(
  `
  Usage
    $ ${BIN_NAME} <command> [options]

  Commands
    announce [content...]   Tell a tracker that a host has some content
    query <content>         Ask a tracker which hosts have some content

  Content
    A blake3 hash (hex or base32), a hash and format (hex, prefixed with
    "s" for a hash sequence) or a blob ticket.

  Options
    --tracker <peer-id>         Tracker to talk to (required)
    --tracker-addr <host:port>  Address of the tracker; may be repeated (required)
    --host <peer-id>            Host to announce (default: the node in the tickets)
    --partial                   Announce or accept partial content
    --verified                  Only hosts the tracker has verified (query)
    --timeout <ms>              Abort an exchange after this long
    --json                      Print JSON
    --verbose                   Log exchange progress to stderr
    --version, -v               Show version
    --help, -h                  Show help

  Examples
    $ ${BIN_NAME} announce --tracker <peer-id> --tracker-addr 127.0.0.1:4919 <ticket>
    $ ${BIN_NAME} announce --tracker <peer-id> --tracker-addr 127.0.0.1:4919 --host <peer-id> --partial <hash>
    $ ${BIN_NAME} query --tracker <peer-id> --tracker-addr 127.0.0.1:4919 --json <hash>
`,
  {
    importMeta: import.meta,
    version: VERSION,
    flags: {
      version: {
        type: 'boolean',
        shortFlag: 'v',
      },
      tracker: {
        type: 'string',
      },
      trackerAddr: {
        type: 'string',
        isMultiple: true,
      },
      host: {
        type: 'string',
      },
      partial: {
        type: 'boolean',
        default: false,
      },
      verified: {
        type: 'boolean',
        default: false,
      },
      timeout: {
        type: 'number',
      },
      json: {
        type: 'boolean',
        default: false,
      },
      verbose: {
        type: 'boolean',
        default: false,
      },
    },
  }
);

// =============================================================================
// Error Display Component
// =============================================================================

interface ErrorProps {
  message: string;
}

/**
 * Error display component
 */
function ErrorDisplay({ message }: ErrorProps) {
  return (
    <Box flexDirection="column" padding={1}>
      <Text color="red" bold>
        Error: {message}
      </Text>
      <Box marginTop={1}>
        <Text>Run </Text>
        <Text color="yellow">{BIN_NAME} --help</Text>
        <Text> for usage information</Text>
      </Box>
    </Box>
  );
}

function fail(message: string): never {
  render(<ErrorDisplay message={message} />);
  process.exit(1);
}

// =============================================================================
// Command Routing
// =============================================================================

/**
 * Route the command to the appropriate handler
 */
function routeCommand(): void {
  const [command, ...args] = cli.input;
  const flags = cli.flags;

  // Handle version flag
  if (flags.version) {
    console.log(VERSION);
    process.exit(0);
  }

  if (!command) {
    cli.showHelp(0);
  }

  let config: ClientConfig;
  try {
    config = resolveCliConfig({ verbose: flags.verbose, timeout: flags.timeout });
  } catch (err) {
    fail(err instanceof Error ? err.message : String(err));
  }

  const tracker = flags.tracker;
  if (!tracker) {
    fail('Missing --tracker <peer-id>');
  }

  const trackerAddrs = flags.trackerAddr ?? [];

  // Route to command handlers
  switch (command.toLowerCase()) {
    case 'announce': {
      const options = {
        tracker,
        trackerAddrs,
        host: flags.host,
        content: args,
        partial: flags.partial,
        json: flags.json,
        config,
      };
      if (flags.json) {
        void executeAnnounce(options).then((code) => process.exit(code));
      } else {
        runAnnounce(options);
      }
      break;
    }

    case 'query': {
      const content = args[0];
      if (!content) {
        fail('Missing content to query');
      }
      if (args.length > 1) {
        fail('Query takes exactly one content argument');
      }
      const options = {
        tracker,
        trackerAddrs,
        content,
        partial: flags.partial,
        verified: flags.verified,
        json: flags.json,
        config,
      };
      if (flags.json) {
        void executeQuery(options).then((code) => process.exit(code));
      } else {
        runQuery(options);
      }
      break;
    }

    default: {
      fail(`Unknown command: ${command}`);
    }
  }
}

// =============================================================================
// Main Entry Point
// =============================================================================

routeCommand();
