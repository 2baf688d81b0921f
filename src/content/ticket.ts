/**
 * Blob tickets
 *
 * A ticket bundles everything needed to fetch some content: the content
 * address plus the identity and known addresses of a peer hosting it.
 * Its text form is `blob` followed by the base32 of its binary encoding.
 *
 * @module content/ticket
 */

import { DecodingError, SpecifierParseError } from '../errors.js';
import { BinaryReader, BinaryWriter } from '../protocol/binary.js';
import { BLOB_FORMATS, BLOB_FORMAT_INDEX } from '../protocol/constants.js';
import type { BlobFormat, ContentAddress } from './address.js';
import { base32Decode, base32Encode } from './encoding.js';
import { HASH_LENGTH, Hash } from './hash.js';
import { PEER_ID_LENGTH, PeerId } from './peer-id.js';

/** Prefix of the text form */
export const TICKET_PREFIX = 'blob';

// =============================================================================
// Types
// =============================================================================

/**
 * A peer together with the ways to reach it.
 */
export interface NodeAddr {
  /** Identity of the peer */
  peerId: PeerId;

  /** Relay server the peer is reachable through, if any */
  relayUrl?: string;

  /** Direct `host:port` addresses */
  directAddresses: string[];
}

// =============================================================================
// BlobTicket Class
// =============================================================================

/**
 * Self-contained content specifier carrying a hosting peer.
 *
 * @example
 * ```typescript
 * const ticket = new BlobTicket(
 *   { peerId, directAddresses: ['192.0.2.10:4433'] },
 *   BlobFormat.Raw,
 *   hash
 * );
 * const text = ticket.toString(); // "blob..."
 * BlobTicket.parse(text).hash.equals(hash); // true
 * ```
 */
export class BlobTicket {
  readonly node: NodeAddr;
  readonly format: BlobFormat;
  readonly hash: Hash;

  constructor(node: NodeAddr, format: BlobFormat, hash: Hash) {
    this.node = {
      peerId: node.peerId,
      relayUrl: node.relayUrl,
      directAddresses: [...node.directAddresses],
    };
    this.format = format;
    this.hash = hash;
  }

  /**
   * Parse the text form, or return undefined if it is not a ticket
   */
  static tryParse(input: string): BlobTicket | undefined {
    const trimmed = input.trim();
    if (!trimmed.toLowerCase().startsWith(TICKET_PREFIX)) {
      return undefined;
    }

    const bytes = base32Decode(trimmed.slice(TICKET_PREFIX.length));
    if (!bytes) {
      return undefined;
    }

    try {
      return BlobTicket.fromBytes(bytes);
    } catch (err) {
      if (err instanceof DecodingError) {
        return undefined;
      }
      throw err;
    }
  }

  /**
   * @throws {SpecifierParseError} If the input is not a valid ticket
   */
  static parse(input: string): BlobTicket {
    const ticket = BlobTicket.tryParse(input);
    if (!ticket) {
      throw new SpecifierParseError(`Invalid ticket: ${input}`, input);
    }
    return ticket;
  }

  /**
   * Decode the binary form.
   *
   * @throws {DecodingError} If the bytes are not a ticket
   */
  static fromBytes(bytes: Uint8Array): BlobTicket {
    const reader = new BinaryReader(bytes);

    const peerId = PeerId.fromBytes(reader.readFixed(PEER_ID_LENGTH));
    const relayUrl = reader.readOption((r) => r.readString());
    const directAddresses = reader.readSeq((r) => r.readString());

    const formatIndex = reader.readVarint();
    const format = BLOB_FORMATS[formatIndex];
    if (format === undefined) {
      throw new DecodingError(`Unknown blob format ${formatIndex}`);
    }

    const hash = Hash.fromBytes(reader.readFixed(HASH_LENGTH));
    reader.finish();

    return new BlobTicket({ peerId, relayUrl, directAddresses }, format, hash);
  }

  toBytes(): Buffer {
    return new BinaryWriter()
      .writeFixed(this.node.peerId.bytes, PEER_ID_LENGTH)
      .writeOption(this.node.relayUrl, (w, url) => w.writeString(url))
      .writeSeq(this.node.directAddresses, (w, addr) => w.writeString(addr))
      .writeVarint(BLOB_FORMAT_INDEX[this.format])
      .writeFixed(this.hash.bytes, HASH_LENGTH)
      .finish();
  }

  /**
   * The content this ticket points at
   */
  address(): ContentAddress {
    return { hash: this.hash, format: this.format };
  }

  toString(): string {
    return TICKET_PREFIX + base32Encode(this.toBytes());
  }
}

