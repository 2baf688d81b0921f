/**
 * Content Address Model
 *
 * A content address is a (hash, format) pair. The format tells whether
 * the hash names a single blob or a hash sequence whose children are
 * blobs reachable from it.
 *
 * @module content/address
 */

import { SpecifierParseError } from '../errors.js';
import { HASH_LENGTH, Hash } from './hash.js';
import { hexDecode } from './encoding.js';

// =============================================================================
// Types
// =============================================================================

/**
 * How the bytes behind a hash are interpreted.
 */
export enum BlobFormat {
  /** A single blob */
  Raw = 'raw',

  /** A sequence of hashes; the content is every blob it references */
  HashSeq = 'hashSeq',
}

/**
 * Canonical identity of a piece of content.
 */
export interface ContentAddress {
  readonly hash: Hash;
  readonly format: BlobFormat;
}

/** Sort rank of each format, also used for ordering addresses */
const FORMAT_ORDER: Record<BlobFormat, number> = {
  [BlobFormat.Raw]: 0,
  [BlobFormat.HashSeq]: 1,
};

// =============================================================================
// Construction
// =============================================================================

export function rawAddress(hash: Hash): ContentAddress {
  return { hash, format: BlobFormat.Raw };
}

export function hashSeqAddress(hash: Hash): ContentAddress {
  return { hash, format: BlobFormat.HashSeq };
}

// =============================================================================
// Comparison
// =============================================================================

/**
 * Order by hash bytes, then by format (raw first)
 */
export function compareContentAddress(a: ContentAddress, b: ContentAddress): number {
  const byHash = a.hash.compare(b.hash);
  if (byHash !== 0) {
    return byHash;
  }
  return FORMAT_ORDER[a.format] - FORMAT_ORDER[b.format];
}

export function contentAddressEquals(a: ContentAddress, b: ContentAddress): boolean {
  return compareContentAddress(a, b) === 0;
}

/**
 * Collapse addresses into a set: duplicates removed, sorted ascending.
 *
 * Announcements carry a set of addresses; this is its canonical array form.
 */
export function contentAddressSet(addresses: Iterable<ContentAddress>): ContentAddress[] {
  const sorted = [...addresses].sort(compareContentAddress);
  return sorted.filter((address, i) => i === 0 || !contentAddressEquals(sorted[i - 1], address));
}

// =============================================================================
// Text Form
// =============================================================================

/**
 * Print an address: the hash as hex for raw, prefixed with `s` for a
 * hash sequence
 */
export function formatContentAddress(address: ContentAddress): string {
  const hex = address.hash.toHex();
  return address.format === BlobFormat.HashSeq ? `s${hex}` : hex;
}

/**
 * Parse the text form produced by formatContentAddress, or return undefined
 */
export function tryParseContentAddress(input: string): ContentAddress | undefined {
  const trimmed = input.trim();

  if (trimmed.length === HASH_LENGTH * 2) {
    const bytes = hexDecode(trimmed, HASH_LENGTH);
    return bytes ? rawAddress(Hash.fromBytes(bytes)) : undefined;
  }

  if (trimmed.length === HASH_LENGTH * 2 + 1 && trimmed[0].toLowerCase() === 's') {
    const bytes = hexDecode(trimmed.slice(1), HASH_LENGTH);
    return bytes ? hashSeqAddress(Hash.fromBytes(bytes)) : undefined;
  }

  return undefined;
}

/**
 * @throws {SpecifierParseError} If the input is not a content address
 */
export function parseContentAddress(input: string): ContentAddress {
  const address = tryParseContentAddress(input);
  if (!address) {
    throw new SpecifierParseError(`Invalid hash and format: ${input}`, input);
  }
  return address;
}
