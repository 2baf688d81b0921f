/**
 * Tracker protocol message model.
 *
 * A client sends exactly one Request per connection and the tracker
 * answers with at most one Response.
 *
 * @module protocol/types
 */

import type { ContentAddress } from '../content/address.js';
import type { PeerId } from '../content/peer-id.js';

// =============================================================================
// Enums
// =============================================================================

/**
 * How much of the announced content the host claims to have.
 */
export enum AnnounceKind {
  /** The host has some of the data */
  Partial = 'partial',

  /** The host has all data reachable from the address */
  Complete = 'complete',
}

export function announceKindFromComplete(complete: boolean): AnnounceKind {
  return complete ? AnnounceKind.Complete : AnnounceKind.Partial;
}

// =============================================================================
// Requests
// =============================================================================

/**
 * A claim that a host has some blobs or hash sequences.
 *
 * The host is explicit so a peer can announce on behalf of another.
 */
export interface Announce {
  /** The peer that supposedly has the data */
  host: PeerId;

  /**
   * The addresses the host claims to have. A set: see contentAddressSet
   * for the canonical form. Empty is accepted but says nothing.
   */
  content: ContentAddress[];

  /** Whether the claim covers all of the data or only some */
  kind: AnnounceKind;
}

export interface QueryFlags {
  /**
   * Only return hosts that announced the complete data.
   *
   * If false, the response may contain hosts with partial data.
   */
  complete: boolean;

  /**
   * Only return hosts the tracker has checked.
   *
   * For partial queries, checked means the host exists and reports a size
   * for the data. For complete queries, the host has been probed for
   * random chunks.
   */
  verified: boolean;
}

/**
 * Ask a tracker who hosts one content address.
 */
export interface Query {
  content: ContentAddress;
  flags: QueryFlags;
}

export type Request =
  | { kind: 'announce'; data: Announce }
  | { kind: 'query'; data: Query };

// =============================================================================
// Responses
// =============================================================================

export interface QueryResponse {
  /** The content that was queried */
  content: ContentAddress;

  /** Hosts that claim the content, in the order the tracker sent them */
  hosts: PeerId[];
}

export type Response = { kind: 'queryResponse'; data: QueryResponse };
