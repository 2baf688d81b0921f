/**
 * CLI Commands Index
 *
 * Exports all CLI command implementations.
 *
 * @module cli/commands
 */

// Announce command
export {
  executeAnnounce,
  prepareAnnounce,
  AnnounceCommand,
  AnnounceResult,
  runAnnounce,
  type AnnounceCommandOptions,
  type PreparedAnnounce,
} from './announce.js';

// Query command
export {
  executeQuery,
  prepareQuery,
  QueryCommand,
  QueryResult,
  runQuery,
  type QueryCommandOptions,
  type PreparedQuery,
} from './query.js';
