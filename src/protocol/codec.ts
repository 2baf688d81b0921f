/**
 * Tracker message codec
 *
 * Layout of each message (see protocol/binary for the primitives):
 *
 *   Request        = varint variant, then Announce (0) or Query (1)
 *   Announce       = host[32] · seq<ContentAddress> · varint kind
 *   Query          = ContentAddress · bool complete · bool verified
 *   Response       = varint variant, then QueryResponse (0)
 *   QueryResponse  = ContentAddress · seq<host[32]>
 *   ContentAddress = hash[32] · varint format
 *
 * There is no length prefix for a whole message: the sender closes its
 * side of the stream when the message is complete.
 *
 * @module protocol/codec
 */

import {
  type ContentAddress,
  contentAddressSet,
} from '../content/address.js';
import { HASH_LENGTH, Hash } from '../content/hash.js';
import { PEER_ID_LENGTH, PeerId } from '../content/peer-id.js';
import { DecodingError, EncodingError } from '../errors.js';
import { BinaryReader, BinaryWriter } from './binary.js';
import {
  ANNOUNCE_KINDS,
  ANNOUNCE_KIND_INDEX,
  BLOB_FORMATS,
  BLOB_FORMAT_INDEX,
  REQUEST_VARIANT,
  RESPONSE_VARIANT,
} from './constants.js';
import type {
  Announce,
  AnnounceKind,
  Query,
  QueryResponse,
  Request,
  Response,
} from './types.js';

// =============================================================================
// Field Codecs
// =============================================================================

function lookupIndex<K extends string>(table: Record<K, number>, key: K, what: string): number {
  const index: number | undefined = table[key];
  if (index === undefined) {
    throw new EncodingError(`Unknown ${what}: ${String(key)}`);
  }
  return index;
}

function writeContentAddress(writer: BinaryWriter, address: ContentAddress): void {
  writer
    .writeFixed(address.hash.bytes, HASH_LENGTH)
    .writeVarint(lookupIndex(BLOB_FORMAT_INDEX, address.format, 'blob format'));
}

function readContentAddress(reader: BinaryReader): ContentAddress {
  const hash = Hash.fromBytes(reader.readFixed(HASH_LENGTH));
  const index = reader.readVarint();
  const format = BLOB_FORMATS[index];
  if (format === undefined) {
    throw new DecodingError(`Unknown blob format ${index}`);
  }
  return { hash, format };
}

function writePeerId(writer: BinaryWriter, peerId: PeerId): void {
  writer.writeFixed(peerId.bytes, PEER_ID_LENGTH);
}

function readPeerId(reader: BinaryReader): PeerId {
  return PeerId.fromBytes(reader.readFixed(PEER_ID_LENGTH));
}

function readAnnounceKind(reader: BinaryReader): AnnounceKind {
  const index = reader.readVarint();
  const kind = ANNOUNCE_KINDS[index];
  if (kind === undefined) {
    throw new DecodingError(`Unknown announce kind ${index}`);
  }
  return kind;
}

// =============================================================================
// Message Codecs
// =============================================================================

function writeAnnounce(writer: BinaryWriter, announce: Announce): void {
  writePeerId(writer, announce.host);
  writer.writeSeq(contentAddressSet(announce.content), writeContentAddress);
  writer.writeVarint(lookupIndex(ANNOUNCE_KIND_INDEX, announce.kind, 'announce kind'));
}

function readAnnounce(reader: BinaryReader): Announce {
  const host = readPeerId(reader);
  const content = contentAddressSet(reader.readSeq(readContentAddress));
  const kind = readAnnounceKind(reader);
  return { host, content, kind };
}

function writeQuery(writer: BinaryWriter, query: Query): void {
  writeContentAddress(writer, query.content);
  writer.writeBool(query.flags.complete).writeBool(query.flags.verified);
}

function readQuery(reader: BinaryReader): Query {
  const content = readContentAddress(reader);
  const complete = reader.readBool();
  const verified = reader.readBool();
  return { content, flags: { complete, verified } };
}

function writeQueryResponse(writer: BinaryWriter, response: QueryResponse): void {
  writeContentAddress(writer, response.content);
  writer.writeSeq(response.hosts, writePeerId);
}

function readQueryResponse(reader: BinaryReader): QueryResponse {
  const content = readContentAddress(reader);
  const hosts = reader.readSeq(readPeerId);
  return { content, hosts };
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Encode a request for the wire.
 *
 * @throws {EncodingError} If the request holds a value outside the model
 */
export function encodeRequest(request: Request): Buffer {
  const writer = new BinaryWriter();

  switch (request.kind) {
    case 'announce':
      writer.writeVarint(REQUEST_VARIANT.announce);
      writeAnnounce(writer, request.data);
      break;
    case 'query':
      writer.writeVarint(REQUEST_VARIANT.query);
      writeQuery(writer, request.data);
      break;
    default: {
      const unknown: never = request;
      throw new EncodingError(`Unknown request kind: ${JSON.stringify(unknown)}`);
    }
  }

  return writer.finish();
}

/**
 * Decode a request received by a tracker.
 *
 * @throws {DecodingError} If the bytes are not exactly one request
 */
export function decodeRequest(bytes: Uint8Array): Request {
  const reader = new BinaryReader(bytes);
  const variant = reader.readVarint();

  let request: Request;
  switch (variant) {
    case REQUEST_VARIANT.announce:
      request = { kind: 'announce', data: readAnnounce(reader) };
      break;
    case REQUEST_VARIANT.query:
      request = { kind: 'query', data: readQuery(reader) };
      break;
    default:
      throw new DecodingError(`Unknown request variant ${variant}`);
  }

  reader.finish();
  return request;
}

/**
 * Encode a tracker response.
 */
export function encodeResponse(response: Response): Buffer {
  const writer = new BinaryWriter();

  switch (response.kind) {
    case 'queryResponse':
      writer.writeVarint(RESPONSE_VARIANT.queryResponse);
      writeQueryResponse(writer, response.data);
      break;
    default: {
      const unknown: never = response.kind;
      throw new EncodingError(`Unknown response kind: ${String(unknown)}`);
    }
  }

  return writer.finish();
}

/**
 * Decode a tracker response.
 *
 * Variants this version does not know are rejected rather than guessed at.
 *
 * @throws {DecodingError} If the bytes are not exactly one known response
 */
export function decodeResponse(bytes: Uint8Array): Response {
  const reader = new BinaryReader(bytes);
  const variant = reader.readVarint();

  let response: Response;
  switch (variant) {
    case RESPONSE_VARIANT.queryResponse:
      response = { kind: 'queryResponse', data: readQueryResponse(reader) };
      break;
    default:
      throw new DecodingError(`Unknown response variant ${variant}`);
  }

  reader.finish();
  return response;
}
