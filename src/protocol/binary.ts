/**
 * Binary primitives for the tracker wire format
 *
 * The format is compact and schema-less: nothing in the bytes says which
 * field comes next, so both sides must agree on field order exactly.
 *
 * - unsigned integers and variant indices: LEB128 varint (u32 range)
 * - bool: a single 0 or 1 byte
 * - fixed-size byte arrays: raw bytes, no length
 * - byte strings, text and sequences: varint length, then the contents
 * - options: a 0 byte for none, or a 1 byte followed by the value
 *
 * @module protocol/binary
 */

import { DecodingError, EncodingError } from '../errors.js';

/** Largest value a varint may carry */
export const MAX_VARINT = 0xffffffff;

/** A u32 varint never needs more than five bytes */
const MAX_VARINT_BYTES = 5;

const textDecoder = new TextDecoder('utf-8', { fatal: true });

// =============================================================================
// Writer
// =============================================================================

/**
 * Append-only encoder.
 *
 * @example
 * ```typescript
 * const bytes = new BinaryWriter().writeVarint(300).writeBool(true).finish();
 * // <Buffer ac 02 01>
 * ```
 */
export class BinaryWriter {
  private chunks: Buffer[] = [];
  private length = 0;

  /**
   * @throws {EncodingError} If the value is not an integer in u32 range
   */
  writeVarint(value: number): this {
    if (!Number.isInteger(value) || value < 0 || value > MAX_VARINT) {
      throw new EncodingError(`Cannot encode ${value} as an unsigned varint`);
    }

    const bytes: number[] = [];
    let remaining = value;
    while (remaining >= 0x80) {
      bytes.push((remaining % 0x80) | 0x80);
      remaining = Math.floor(remaining / 0x80);
    }
    bytes.push(remaining);

    return this.push(Buffer.from(bytes));
  }

  writeBool(value: boolean): this {
    return this.push(Buffer.from([value ? 1 : 0]));
  }

  /**
   * Write a fixed-size array without a length prefix.
   *
   * @throws {EncodingError} If `bytes` is not `length` bytes long
   */
  writeFixed(bytes: Uint8Array, length: number): this {
    if (bytes.length !== length) {
      throw new EncodingError(`Expected ${length} bytes, got ${bytes.length}`);
    }
    return this.push(Buffer.from(bytes));
  }

  writeBytes(bytes: Uint8Array): this {
    this.writeVarint(bytes.length);
    return this.push(Buffer.from(bytes));
  }

  writeString(value: string): this {
    return this.writeBytes(Buffer.from(value, 'utf8'));
  }

  writeOption<T>(value: T | undefined, write: (writer: this, value: T) => void): this {
    if (value === undefined) {
      return this.push(Buffer.from([0]));
    }
    this.push(Buffer.from([1]));
    write(this, value);
    return this;
  }

  writeSeq<T>(items: readonly T[], write: (writer: this, item: T) => void): this {
    this.writeVarint(items.length);
    for (const item of items) {
      write(this, item);
    }
    return this;
  }

  /**
   * Concatenate everything written so far
   */
  finish(): Buffer {
    return Buffer.concat(this.chunks, this.length);
  }

  private push(chunk: Buffer): this {
    this.chunks.push(chunk);
    this.length += chunk.length;
    return this;
  }
}

// =============================================================================
// Reader
// =============================================================================

/**
 * Cursor over a received message. Every read throws DecodingError on
 * malformed or truncated input.
 */
export class BinaryReader {
  private readonly bytes: Buffer;
  private offset = 0;

  constructor(bytes: Uint8Array) {
    this.bytes = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  /** Bytes not yet consumed */
  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  readVarint(): number {
    let value = 0;
    let multiplier = 1;

    for (let i = 0; i < MAX_VARINT_BYTES; i++) {
      const byte = this.readByte();
      value += (byte & 0x7f) * multiplier;

      if ((byte & 0x80) === 0) {
        if (value > MAX_VARINT) {
          throw new DecodingError('Varint exceeds u32 range');
        }
        return value;
      }
      multiplier *= 0x80;
    }

    throw new DecodingError(`Varint longer than ${MAX_VARINT_BYTES} bytes`);
  }

  readBool(): boolean {
    const byte = this.readByte();
    if (byte > 1) {
      throw new DecodingError(`Invalid bool byte ${byte}`);
    }
    return byte === 1;
  }

  readFixed(length: number): Buffer {
    if (this.remaining < length) {
      throw new DecodingError(
        `Unexpected end of input: needed ${length} bytes, ${this.remaining} left`
      );
    }
    const slice = this.bytes.subarray(this.offset, this.offset + length);
    this.offset += length;
    return Buffer.from(slice);
  }

  readBytes(): Buffer {
    return this.readFixed(this.readVarint());
  }

  readString(): string {
    const bytes = this.readBytes();
    try {
      return textDecoder.decode(bytes);
    } catch (err) {
      throw new DecodingError('Invalid UTF-8 in string', { cause: err });
    }
  }

  readOption<T>(read: (reader: this) => T): T | undefined {
    const tag = this.readByte();
    if (tag === 0) {
      return undefined;
    }
    if (tag !== 1) {
      throw new DecodingError(`Invalid option tag ${tag}`);
    }
    return read(this);
  }

  readSeq<T>(read: (reader: this) => T): T[] {
    const count = this.readVarint();
    // Every element takes at least one byte
    if (count > this.remaining) {
      throw new DecodingError(
        `Sequence of ${count} elements cannot fit in ${this.remaining} bytes`
      );
    }

    const items: T[] = [];
    for (let i = 0; i < count; i++) {
      items.push(read(this));
    }
    return items;
  }

  /**
   * Assert the whole input was consumed
   */
  finish(): void {
    if (this.remaining > 0) {
      throw new DecodingError(`${this.remaining} trailing bytes after message`);
    }
  }

  private readByte(): number {
    if (this.offset >= this.bytes.length) {
      throw new DecodingError('Unexpected end of input');
    }
    return this.bytes[this.offset++];
  }
}
