/**
 * Content hash
 *
 * A 32-byte digest identifying the bytes of a blob. Hashes are produced
 * elsewhere; this module only carries, compares and prints them.
 *
 * @module content/hash
 */

import { SpecifierParseError } from '../errors.js';
import { decodeIdentifier } from './encoding.js';

/** Size of a content hash in bytes */
export const HASH_LENGTH = 32;

/**
 * Immutable 32-byte content hash.
 *
 * @example
 * ```typescript
 * const hash = Hash.parse('deadbeef'.repeat(8));
 * console.log(hash.toString()); // 64 lowercase hex characters
 * ```
 */
export class Hash {
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
   * Wrap raw digest bytes.
   *
   * @throws {RangeError} If `bytes` is not exactly 32 bytes long
   */
  static fromBytes(bytes: Uint8Array): Hash {
    if (bytes.length !== HASH_LENGTH) {
      throw new RangeError(`Hash must be ${HASH_LENGTH} bytes, got ${bytes.length}`);
    }
    return new Hash(Buffer.from(bytes));
  }

  /**
   * Parse 64 hex characters or 52 base32 characters, or return undefined
   */
  static tryParse(input: string): Hash | undefined {
    const bytes = decodeIdentifier(input.trim(), HASH_LENGTH);
    return bytes ? new Hash(bytes) : undefined;
  }

  /**
   * Parse 64 hex characters or 52 base32 characters.
   *
   * @throws {SpecifierParseError} If the input is neither form
   */
  static parse(input: string): Hash {
    const hash = Hash.tryParse(input);
    if (!hash) {
      throw new SpecifierParseError(`Invalid hash: ${input}`, input);
    }
    return hash;
  }

  equals(other: Hash): boolean {
    return this.data.equals(other.data);
  }

  compare(other: Hash): number {
    return Buffer.compare(this.data, other.data);
  }

  toHex(): string {
    return this.data.toString('hex');
  }

  toString(): string {
    return this.toHex();
  }
}
