import { describe, it, expect } from 'vitest';
import { BlobFormat, formatContentAddress, hashSeqAddress } from '../../src/content/address.js';
import { base32Encode } from '../../src/content/encoding.js';
import {
  formatContentSpecifier,
  parseContentSpecifier,
  resolveAddress,
  resolveHost,
} from '../../src/content/specifier.js';
import { BlobTicket } from '../../src/content/ticket.js';
import { SpecifierParseError } from '../../src/errors.js';
import { catchError, hashOf, peerOf } from '../helpers/fixtures.js';

describe('ContentSpecifier', () => {
  const hex = 'deadbeef'.repeat(8);

  describe('parseContentSpecifier', () => {
    it('should read 64 hex characters as a bare hash', () => {
      const specifier = parseContentSpecifier(hex);
      expect(specifier.kind).toBe('hash');
      expect(formatContentSpecifier(specifier)).toBe(hex);
    });

    it('should read 52 base32 characters as a bare hash', () => {
      const specifier = parseContentSpecifier(base32Encode(hashOf(9).bytes));
      expect(specifier.kind).toBe('hash');
      expect(resolveAddress(specifier).hash.equals(hashOf(9))).toBe(true);
    });

    it('should read an "s"-prefixed hash as a hash sequence address', () => {
      const specifier = parseContentSpecifier(`s${hex}`);
      expect(specifier.kind).toBe('address');
      expect(resolveAddress(specifier).format).toBe(BlobFormat.HashSeq);
    });

    it('should read tickets', () => {
      const ticket = new BlobTicket({ peerId: peerOf(4), directAddresses: [] }, BlobFormat.Raw, hashOf(5));
      const specifier = parseContentSpecifier(ticket.toString());

      expect(specifier.kind).toBe('ticket');
      expect(formatContentSpecifier(specifier)).toBe(ticket.toString());
    });

    it('should report the input when nothing matches', () => {
      const err = catchError(() => parseContentSpecifier('deadbeef'));

      expect(err).toBeInstanceOf(SpecifierParseError);
      expect(err instanceof SpecifierParseError && err.input).toBe('deadbeef');
      expect(() => parseContentSpecifier('deadbeef')).toThrow('Invalid hash and format: deadbeef');
    });

    it('should reject the empty string', () => {
      expect(() => parseContentSpecifier('')).toThrow(SpecifierParseError);
    });
  });

  describe('resolveAddress', () => {
    it('should treat a bare hash as raw', () => {
      const address = resolveAddress(parseContentSpecifier(hex));
      expect(address.format).toBe(BlobFormat.Raw);
      expect(formatContentAddress(address)).toBe(hex);
    });

    it('should take the address of a ticket', () => {
      const ticket = new BlobTicket({ peerId: peerOf(4), directAddresses: [] }, BlobFormat.HashSeq, hashOf(5));
      expect(resolveAddress(parseContentSpecifier(ticket.toString()))).toEqual(hashSeqAddress(hashOf(5)));
    });

    it('should resolve every form of the same content to the same address', () => {
      const fromHex = resolveAddress(parseContentSpecifier('05'.repeat(32)));
      const fromBase32 = resolveAddress(parseContentSpecifier(base32Encode(hashOf(5).bytes)));
      const fromUpper = resolveAddress(parseContentSpecifier('05'.repeat(32).toUpperCase()));

      expect(fromHex).toEqual(fromBase32);
      expect(fromHex).toEqual(fromUpper);
    });
  });

  describe('resolveHost', () => {
    it('should take the host of a ticket', () => {
      const ticket = new BlobTicket({ peerId: peerOf(4), directAddresses: [] }, BlobFormat.Raw, hashOf(5));
      expect(resolveHost(parseContentSpecifier(ticket.toString()))?.equals(peerOf(4))).toBe(true);
    });

    it('should have no host for hashes and addresses', () => {
      expect(resolveHost(parseContentSpecifier(hex))).toBeUndefined();
      expect(resolveHost(parseContentSpecifier(`s${hex}`))).toBeUndefined();
    });
  });
});
