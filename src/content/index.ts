/**
 * Content identity: hashes, peer ids, content addresses, tickets and the
 * specifiers users type to name content.
 *
 * @module content
 */

export { HASH_LENGTH, Hash } from './hash.js';
export { PEER_ID_LENGTH, PeerId } from './peer-id.js';
export {
  BlobFormat,
  type ContentAddress,
  rawAddress,
  hashSeqAddress,
  compareContentAddress,
  contentAddressEquals,
  contentAddressSet,
  formatContentAddress,
  parseContentAddress,
  tryParseContentAddress,
} from './address.js';
export { TICKET_PREFIX, BlobTicket, type NodeAddr } from './ticket.js';
export {
  type ContentSpecifier,
  parseContentSpecifier,
  resolveAddress,
  resolveHost,
  formatContentSpecifier,
} from './specifier.js';
export { base32Encode, base32Decode } from './encoding.js';
