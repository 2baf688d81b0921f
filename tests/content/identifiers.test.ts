import { describe, it, expect } from 'vitest';
import { Hash } from '../../src/content/hash.js';
import { PeerId } from '../../src/content/peer-id.js';
import { base32Decode, base32Encode } from '../../src/content/encoding.js';
import { SpecifierParseError } from '../../src/errors.js';
import { catchError, hashOf, peerOf } from '../helpers/fixtures.js';

describe('base32', () => {
  it('should encode zero bytes as "a"', () => {
    expect(base32Encode(Buffer.alloc(32))).toBe('a'.repeat(52));
  });

  it('should encode all-ones with a zero-padded final character', () => {
    expect(base32Encode(Buffer.alloc(32, 0xff))).toBe('7'.repeat(51) + 'q');
  });

  it('should decode any case', () => {
    expect(base32Decode('MZXW6')).toEqual(Buffer.from('foo'));
    expect(base32Decode('mzxw6')).toEqual(Buffer.from('foo'));
  });

  it('should reject characters outside the alphabet', () => {
    expect(base32Decode('mzxw1')).toBeUndefined();
  });

  it('should reject non-zero trailing bits', () => {
    // "mzxw7" differs from "mzxw6" only in bits past the last byte
    expect(base32Decode('mzxw7')).toBeUndefined();
  });
});

describe('Hash', () => {
  const hex = 'deadbeef'.repeat(8);

  it('should parse hex and print lowercase hex', () => {
    expect(Hash.parse(hex).toString()).toBe(hex);
    expect(Hash.parse(hex.toUpperCase()).toString()).toBe(hex);
  });

  it('should parse base32', () => {
    expect(Hash.parse('a'.repeat(52)).toHex()).toBe('0'.repeat(64));
    expect(Hash.parse(base32Encode(hashOf(7).bytes)).equals(hashOf(7))).toBe(true);
  });

  it('should ignore surrounding whitespace', () => {
    expect(Hash.parse(`  ${hex}\n`).toString()).toBe(hex);
  });

  it('should reject other lengths and characters', () => {
    expect(Hash.tryParse('deadbeef')).toBeUndefined();
    expect(Hash.tryParse('g'.repeat(64))).toBeUndefined();
    expect(Hash.tryParse('')).toBeUndefined();
  });

  it('should throw SpecifierParseError with the input', () => {
    const err = catchError(() => Hash.parse('nope'));
    expect(err).toBeInstanceOf(SpecifierParseError);
    expect(err instanceof SpecifierParseError && err.input).toBe('nope');
    expect(err instanceof SpecifierParseError && err.code).toBe('SPECIFIER_PARSE');
    expect(() => Hash.parse('nope')).toThrow('Invalid hash: nope');
  });

  it('should require exactly 32 bytes', () => {
    expect(() => Hash.fromBytes(Buffer.alloc(31))).toThrow(RangeError);
  });

  it('should copy the bytes it wraps', () => {
    const bytes = Buffer.alloc(32, 1);
    const hash = Hash.fromBytes(bytes);
    bytes[0] = 9;
    expect(hash.bytes[0]).toBe(1);
  });

  it('should not be changed through its bytes', () => {
    const hash = hashOf(1);
    hash.bytes[0] = 9;
    expect(hash.toHex()).toBe('01'.repeat(32));
    expect(hash.compare(hashOf(1))).toBe(0);
  });

  it('should order by bytes', () => {
    expect(hashOf(1).compare(hashOf(2))).toBeLessThan(0);
    expect(hashOf(2).compare(hashOf(1))).toBeGreaterThan(0);
    expect(hashOf(3).compare(hashOf(3))).toBe(0);
  });
});

describe('PeerId', () => {
  it('should print base32', () => {
    expect(peerOf(0).toString()).toBe('a'.repeat(52));
    expect(peerOf(0xff).toString()).toBe('7'.repeat(51) + 'q');
  });

  it('should parse base32 in any case', () => {
    expect(PeerId.parse('A'.repeat(52)).equals(peerOf(0))).toBe(true);
  });

  it('should parse hex', () => {
    expect(PeerId.parse('01'.repeat(32)).equals(peerOf(1))).toBe(true);
  });

  it('should have a single text form', () => {
    expect(PeerId.tryParse('7'.repeat(52))).toBeUndefined();
  });

  it('should shorten for log lines', () => {
    expect(peerOf(0).fmtShort()).toBe('aaaaaaaaaa');
  });

  it('should not be changed through its bytes', () => {
    const peerId = peerOf(0);
    peerId.bytes.fill(0xff);
    expect(peerId.equals(peerOf(0))).toBe(true);
    expect(peerId.toString()).toBe('a'.repeat(52));
  });

  it('should throw SpecifierParseError on invalid input', () => {
    expect(() => PeerId.parse('tracker')).toThrow(SpecifierParseError);
    expect(() => PeerId.parse('tracker')).toThrow('Invalid peer id: tracker');
  });
});
