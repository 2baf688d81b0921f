/**
 * Peer identity
 *
 * @module content/peer-id
 */

import { SpecifierParseError } from '../errors.js';
import { base32Encode, decodeIdentifier } from './encoding.js';

/** Size of a peer identifier in bytes */
export const PEER_ID_LENGTH = 32;

/**
 * Opaque identifier of a network participant: a tracker, an announcing
 * host or a queried host. Only equality is meaningful.
 */
export class PeerId {
  private readonly data: Buffer;

  private constructor(data: Buffer) {
    this.data = data;
  }

  /**
   * A copy of the raw bytes
   */
  get bytes(): Buffer {
    return Buffer.from(this.data);
  }

  /**
   * @throws {RangeError} If `bytes` is not exactly 32 bytes long
   */
  static fromBytes(bytes: Uint8Array): PeerId {
    if (bytes.length !== PEER_ID_LENGTH) {
      throw new RangeError(`Peer id must be ${PEER_ID_LENGTH} bytes, got ${bytes.length}`);
    }
    return new PeerId(Buffer.from(bytes));
  }

  static tryParse(input: string): PeerId | undefined {
    const bytes = decodeIdentifier(input.trim(), PEER_ID_LENGTH);
    return bytes ? new PeerId(bytes) : undefined;
  }

  /**
   * Parse a base32 (52 characters) or hex (64 characters) peer id.
   *
   * @throws {SpecifierParseError} If the input is neither form
   */
  static parse(input: string): PeerId {
    const peerId = PeerId.tryParse(input);
    if (!peerId) {
      throw new SpecifierParseError(`Invalid peer id: ${input}`, input);
    }
    return peerId;
  }

  equals(other: PeerId): boolean {
    return this.data.equals(other.data);
  }

  /**
   * Short form for log lines
   */
  fmtShort(): string {
    return this.toString().slice(0, 10);
  }

  toString(): string {
    return base32Encode(this.data);
  }
}
