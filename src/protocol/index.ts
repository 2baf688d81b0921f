/**
 * Tracker protocol: message model, wire codec and constants.
 *
 * @module protocol
 */

export {
  AnnounceKind,
  announceKindFromComplete,
  type Announce,
  type QueryFlags,
  type Query,
  type QueryResponse,
  type Request,
  type Response,
} from './types.js';

export { encodeRequest, decodeRequest, encodeResponse, decodeResponse } from './codec.js';

export { BinaryReader, BinaryWriter, MAX_VARINT } from './binary.js';

export { TRACKER_ALPN, RESPONSE_SIZE_LIMIT } from './constants.js';
