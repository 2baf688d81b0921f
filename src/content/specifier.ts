/**
 * Content Specifier Resolver
 *
 * Users name content in three ways: a bare hash, a hash with an explicit
 * format, or a ticket that also names a hosting peer. Parsing tries them
 * in that order and the first form that matches wins, so a string valid
 * as both a hash and a content address is always read as a hash.
 *
 * @module content/specifier
 */

import { SpecifierParseError } from '../errors.js';
import {
  type ContentAddress,
  formatContentAddress,
  rawAddress,
  tryParseContentAddress,
} from './address.js';
import { Hash } from './hash.js';
import type { PeerId } from './peer-id.js';
import { BlobTicket } from './ticket.js';

// =============================================================================
// Types
// =============================================================================

export type ContentSpecifier =
  | { kind: 'hash'; hash: Hash }
  | { kind: 'address'; address: ContentAddress }
  | { kind: 'ticket'; ticket: BlobTicket };

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a content specifier.
 *
 * @throws {SpecifierParseError} If the input is not a hash, a content
 * address or a ticket
 */
export function parseContentSpecifier(input: string): ContentSpecifier {
  const hash = Hash.tryParse(input);
  if (hash) {
    return { kind: 'hash', hash };
  }

  const address = tryParseContentAddress(input);
  if (address) {
    return { kind: 'address', address };
  }

  const ticket = BlobTicket.tryParse(input);
  if (ticket) {
    return { kind: 'ticket', ticket };
  }

  throw new SpecifierParseError(`Invalid hash and format: ${input}`, input);
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * The content address a specifier names. A bare hash is a raw blob.
 */
export function resolveAddress(specifier: ContentSpecifier): ContentAddress {
  switch (specifier.kind) {
    case 'hash':
      return rawAddress(specifier.hash);
    case 'address':
      return specifier.address;
    case 'ticket':
      return specifier.ticket.address();
  }
}

/**
 * The hosting peer a specifier names. Only tickets carry one.
 */
export function resolveHost(specifier: ContentSpecifier): PeerId | undefined {
  switch (specifier.kind) {
    case 'hash':
    case 'address':
      return undefined;
    case 'ticket':
      return specifier.ticket.node.peerId;
  }
}

/**
 * Print a specifier in the form it was given
 */
export function formatContentSpecifier(specifier: ContentSpecifier): string {
  switch (specifier.kind) {
    case 'hash':
      return specifier.hash.toString();
    case 'address':
      return formatContentAddress(specifier.address);
    case 'ticket':
      return specifier.ticket.toString();
  }
}
