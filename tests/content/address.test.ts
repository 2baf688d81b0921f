import { describe, it, expect } from 'vitest';
import {
  BlobFormat,
  compareContentAddress,
  contentAddressEquals,
  contentAddressSet,
  formatContentAddress,
  hashSeqAddress,
  parseContentAddress,
  rawAddress,
  tryParseContentAddress,
} from '../../src/content/address.js';
import { SpecifierParseError } from '../../src/errors.js';
import { hashOf } from '../helpers/fixtures.js';

describe('ContentAddress', () => {
  const hex = 'ab'.repeat(32);

  describe('text form', () => {
    it('should print raw addresses as hex', () => {
      expect(formatContentAddress(rawAddress(hashOf(0xab)))).toBe(hex);
    });

    it('should print hash sequences with an "s" prefix', () => {
      expect(formatContentAddress(hashSeqAddress(hashOf(0xab)))).toBe(`s${hex}`);
    });

    it('should parse both forms', () => {
      expect(parseContentAddress(hex)).toEqual(rawAddress(hashOf(0xab)));
      expect(parseContentAddress(`s${hex}`)).toEqual(hashSeqAddress(hashOf(0xab)));
      expect(parseContentAddress(`S${hex.toUpperCase()}`)).toEqual(hashSeqAddress(hashOf(0xab)));
    });

    it('should reject other prefixes and lengths', () => {
      expect(tryParseContentAddress(`x${hex}`)).toBeUndefined();
      expect(tryParseContentAddress(`s${hex}0`)).toBeUndefined();
      expect(tryParseContentAddress('deadbeef')).toBeUndefined();
    });

    it('should throw SpecifierParseError on invalid input', () => {
      expect(() => parseContentAddress('deadbeef')).toThrow(SpecifierParseError);
      expect(() => parseContentAddress('deadbeef')).toThrow('Invalid hash and format: deadbeef');
    });
  });

  describe('ordering', () => {
    it('should order by hash, then raw before hash sequence', () => {
      expect(compareContentAddress(rawAddress(hashOf(1)), rawAddress(hashOf(2)))).toBeLessThan(0);
      expect(compareContentAddress(hashSeqAddress(hashOf(1)), rawAddress(hashOf(2)))).toBeLessThan(0);
      expect(compareContentAddress(rawAddress(hashOf(1)), hashSeqAddress(hashOf(1)))).toBeLessThan(0);
    });

    it('should compare by value', () => {
      expect(contentAddressEquals(rawAddress(hashOf(1)), rawAddress(hashOf(1)))).toBe(true);
      expect(contentAddressEquals(rawAddress(hashOf(1)), hashSeqAddress(hashOf(1)))).toBe(false);
    });
  });

  describe('contentAddressSet', () => {
    it('should sort and remove duplicates', () => {
      const set = contentAddressSet([
        rawAddress(hashOf(2)),
        hashSeqAddress(hashOf(1)),
        rawAddress(hashOf(1)),
        rawAddress(hashOf(2)),
      ]);

      expect(set.map(formatContentAddress)).toEqual([
        '01'.repeat(32),
        `s${'01'.repeat(32)}`,
        '02'.repeat(32),
      ]);
    });

    it('should keep an empty set empty', () => {
      expect(contentAddressSet([])).toEqual([]);
    });

    it('should keep the format of each entry', () => {
      const [address] = contentAddressSet([hashSeqAddress(hashOf(5))]);
      expect(address.format).toBe(BlobFormat.HashSeq);
    });
  });
});
