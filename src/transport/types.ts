/**
 * Transport abstraction
 *
 * The tracker protocol needs very little from its transport: dial a peer
 * by identity under a protocol identifier, open one bidirectional stream,
 * and let each side half-close its direction to end a message.
 *
 * @module transport/types
 */

import type { Duplex } from 'stream';
import type { PeerId } from '../content/peer-id.js';

export interface ConnectOptions {
  /** Abort the connection attempt */
  signal?: AbortSignal;
}

/**
 * A bidirectional byte stream. Ending the writable side tells the peer the
 * message is complete; the readable side ends when the peer does the same.
 */
export type BiStream = Duplex;

/**
 * An open connection to one peer.
 */
export interface Connection {
  /** The peer at the other end */
  readonly remote: PeerId;

  /**
   * Open a bidirectional stream.
   *
   * @throws {ConnectionError} If the connection cannot carry another stream
   */
  openBi(): Promise<BiStream>;

  /** Tear down the connection and every stream on it */
  close(): void;
}

/**
 * Local side of a transport, able to dial peers.
 */
export interface Endpoint {
  /**
   * Connect to a peer, selecting a protocol by its identifier.
   *
   * @throws {ConnectionError} If the peer cannot be reached or does not
   * speak the protocol
   */
  connect(peer: PeerId, alpn: string, options?: ConnectOptions): Promise<Connection>;
}
