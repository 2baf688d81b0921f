/**
 * Tracker exchange client.
 *
 * @module tracker
 */

export {
  TrackerClient,
  ExchangeState,
  announce,
  query,
  type TrackerClientOptions,
  type ExchangeOptions,
} from './client.js';
