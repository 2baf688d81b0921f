/**
 * Protocol constants
 *
 * @module protocol/constants
 */

import { BlobFormat } from '../content/address.js';
import { AnnounceKind } from './types.js';

/** Protocol identifier presented when connecting to a tracker */
export const TRACKER_ALPN = 'n0/tracker/1';

/** Maximum number of response bytes read from a tracker (16 KiB) */
export const RESPONSE_SIZE_LIMIT = 16 * 1024;

// =============================================================================
// Wire Indices
// =============================================================================

/** Wire index of each blob format */
export const BLOB_FORMAT_INDEX: Record<BlobFormat, number> = {
  [BlobFormat.Raw]: 0,
  [BlobFormat.HashSeq]: 1,
};

/** Blob formats by wire index */
export const BLOB_FORMATS: readonly BlobFormat[] = [BlobFormat.Raw, BlobFormat.HashSeq];

/** Wire index of each announce kind */
export const ANNOUNCE_KIND_INDEX: Record<AnnounceKind, number> = {
  [AnnounceKind.Partial]: 0,
  [AnnounceKind.Complete]: 1,
};

/** Announce kinds by wire index */
export const ANNOUNCE_KINDS: readonly AnnounceKind[] = [AnnounceKind.Partial, AnnounceKind.Complete];

/** Variant indices of the Request union */
export const REQUEST_VARIANT = {
  announce: 0,
  query: 1,
} as const;

/** Variant indices of the Response union */
export const RESPONSE_VARIANT = {
  queryResponse: 0,
} as const;
