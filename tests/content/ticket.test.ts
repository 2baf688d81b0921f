import { describe, it, expect } from 'vitest';
import { BlobFormat } from '../../src/content/address.js';
import { base32Encode } from '../../src/content/encoding.js';
import { BlobTicket } from '../../src/content/ticket.js';
import { SpecifierParseError } from '../../src/errors.js';
import { hashOf, peerOf } from '../helpers/fixtures.js';

describe('BlobTicket', () => {
  const ticket = new BlobTicket(
    { peerId: peerOf(1), directAddresses: ['127.0.0.1:4919'] },
    BlobFormat.HashSeq,
    hashOf(0xab)
  );

  describe('binary form', () => {
    it('should lay out node, format and hash', () => {
      const bytes = ticket.toBytes();

      expect(bytes.length).toBe(82);
      expect(bytes.subarray(0, 32)).toEqual(Buffer.alloc(32, 1));
      expect(bytes[32]).toBe(0); // no relay
      expect(bytes[33]).toBe(1); // one address
      expect(bytes[34]).toBe(14);
      expect(bytes.subarray(35, 49).toString('utf8')).toBe('127.0.0.1:4919');
      expect(bytes[49]).toBe(1); // hash sequence
      expect(bytes.subarray(50)).toEqual(Buffer.alloc(32, 0xab));
    });

    it('should reject trailing bytes', () => {
      const bytes = Buffer.concat([ticket.toBytes(), Buffer.from([0])]);
      expect(() => BlobTicket.fromBytes(bytes)).toThrow('1 trailing bytes after message');
    });

    it('should reject an unknown format', () => {
      const bytes = ticket.toBytes();
      bytes[49] = 7;
      expect(() => BlobTicket.fromBytes(bytes)).toThrow('Unknown blob format 7');
    });
  });

  describe('text form', () => {
    it('should start with "blob" followed by base32', () => {
      const text = ticket.toString();
      expect(text).toBe(`blob${base32Encode(ticket.toBytes())}`);
    });

    it('should parse what it prints', () => {
      const parsed = BlobTicket.parse(ticket.toString());

      expect(parsed.node.peerId.equals(peerOf(1))).toBe(true);
      expect(parsed.node.relayUrl).toBeUndefined();
      expect(parsed.node.directAddresses).toEqual(['127.0.0.1:4919']);
      expect(parsed.format).toBe(BlobFormat.HashSeq);
      expect(parsed.hash.equals(hashOf(0xab))).toBe(true);
    });

    it('should keep a relay url', () => {
      const relayed = new BlobTicket(
        { peerId: peerOf(2), relayUrl: 'https://relay.test/', directAddresses: [] },
        BlobFormat.Raw,
        hashOf(3)
      );

      const parsed = BlobTicket.parse(relayed.toString());
      expect(parsed.node.relayUrl).toBe('https://relay.test/');
      expect(parsed.node.directAddresses).toEqual([]);
      expect(parsed.format).toBe(BlobFormat.Raw);
    });

    it('should parse upper case', () => {
      expect(BlobTicket.parse(ticket.toString().toUpperCase()).hash.equals(hashOf(0xab))).toBe(true);
    });

    it('should not treat other strings as tickets', () => {
      expect(BlobTicket.tryParse('deadbeef')).toBeUndefined();
      expect(BlobTicket.tryParse('blob')).toBeUndefined();
      expect(BlobTicket.tryParse('blobaaaa')).toBeUndefined();
      expect(BlobTicket.tryParse('blob!!!!')).toBeUndefined();
    });

    it('should throw SpecifierParseError on invalid tickets', () => {
      expect(() => BlobTicket.parse('blobaaaa')).toThrow(SpecifierParseError);
      expect(() => BlobTicket.parse('blobaaaa')).toThrow('Invalid ticket: blobaaaa');
    });
  });

  it('should point at its content', () => {
    const address = ticket.address();
    expect(address.format).toBe(BlobFormat.HashSeq);
    expect(address.hash.equals(hashOf(0xab))).toBe(true);
  });

  it('should not share the address list it was given', () => {
    const addresses = ['10.0.0.1:1'];
    const copy = new BlobTicket({ peerId: peerOf(1), directAddresses: addresses }, BlobFormat.Raw, hashOf(1));
    addresses.push('10.0.0.2:2');
    expect(copy.node.directAddresses).toEqual(['10.0.0.1:1']);
  });
});
