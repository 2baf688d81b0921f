/**
 * In-process transport
 *
 * Endpoints on a MemoryNetwork reach each other by peer id without any
 * sockets. Streams are pairs of linked Duplexes, so half-close and
 * teardown behave as they do on a real connection.
 *
 * @module transport/memory
 */

import { Duplex } from 'stream';
import type { PeerId } from '../content/peer-id.js';
import { ConnectionError } from '../errors.js';
import type { BiStream, Connection, ConnectOptions, Endpoint } from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Called with the accepting side of every stream opened under a protocol
 */
export type StreamHandler = (stream: BiStream, remote: PeerId) => void | Promise<void>;

export interface MemoryNetworkOptions {
  /**
   * Called when a stream handler throws or rejects. The stream is reset
   * either way. Default: emit a process warning.
   */
  onHandlerError?: (error: unknown, remote: PeerId) => void;
}

// =============================================================================
// Linked Streams
// =============================================================================

/**
 * One half of an in-memory stream pair. Bytes written here are readable
 * on the peer; ending the writable side ends the peer's readable side.
 */
class MemoryStream extends Duplex {
  peer: MemoryStream | null = null;

  override _read(): void {
    // Data is pushed by the peer
  }

  override _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ): void {
    if (!this.peer || this.peer.destroyed) {
      callback(new Error('Remote stream is closed'));
      return;
    }
    this.peer.push(chunk);
    callback();
  }

  override _final(callback: (error?: Error | null) => void): void {
    if (this.peer && !this.peer.destroyed) {
      this.peer.push(null);
    }
    callback();
  }
}

/**
 * Create two linked stream halves
 */
export function createStreamPair(): [BiStream, BiStream] {
  const left = new MemoryStream();
  const right = new MemoryStream();
  left.peer = right;
  right.peer = left;
  return [left, right];
}

// =============================================================================
// MemoryConnection
// =============================================================================

class MemoryConnection implements Connection {
  readonly remote: PeerId;
  private readonly local: PeerId;
  private readonly handler: StreamHandler;
  private readonly onHandlerError: (error: unknown, remote: PeerId) => void;
  private readonly onClose: () => void;
  private readonly streams: BiStream[] = [];
  private closed = false;

  constructor(
    local: PeerId,
    remote: PeerId,
    handler: StreamHandler,
    onHandlerError: (error: unknown, remote: PeerId) => void,
    onClose: () => void
  ) {
    this.local = local;
    this.remote = remote;
    this.handler = handler;
    this.onHandlerError = onHandlerError;
    this.onClose = onClose;
  }

  async openBi(): Promise<BiStream> {
    if (this.closed) {
      throw new ConnectionError(`Connection to ${this.remote.fmtShort()} is closed`);
    }

    const [outgoing, incoming] = createStreamPair();
    this.streams.push(outgoing, incoming);

    void Promise.resolve()
      .then(() => this.handler(incoming, this.local))
      .catch((err: unknown) => {
        incoming.destroy();
        this.onHandlerError(err, this.local);
      });

    return outgoing;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const stream of this.streams) {
      stream.destroy();
    }
    this.streams.length = 0;
    this.onClose();
  }
}

// =============================================================================
// MemoryEndpoint
// =============================================================================

/**
 * An endpoint on a MemoryNetwork.
 */
export class MemoryEndpoint implements Endpoint {
  readonly peerId: PeerId;
  private readonly network: MemoryNetwork;
  private readonly handlers: Map<string, StreamHandler> = new Map();

  constructor(network: MemoryNetwork, peerId: PeerId) {
    this.network = network;
    this.peerId = peerId;
  }

  /**
   * Accept incoming streams for a protocol
   */
  accept(alpn: string, handler: StreamHandler): void {
    this.handlers.set(alpn, handler);
  }

  /**
   * Stop accepting a protocol
   */
  unaccept(alpn: string): void {
    this.handlers.delete(alpn);
  }

  handlerFor(alpn: string): StreamHandler | undefined {
    return this.handlers.get(alpn);
  }

  async connect(peer: PeerId, alpn: string, options: ConnectOptions = {}): Promise<Connection> {
    if (options.signal?.aborted) {
      throw new ConnectionError(`Connection to ${peer.fmtShort()} aborted`, {
        cause: options.signal.reason,
      });
    }

    const target = this.network.lookup(peer);
    if (!target) {
      throw new ConnectionError(`No route to peer ${peer.toString()}`);
    }

    const handler = target.handlerFor(alpn);
    if (!handler) {
      throw new ConnectionError(`Peer ${peer.toString()} does not accept protocol ${alpn}`);
    }

    return this.network.open(this.peerId, peer, handler);
  }
}

// =============================================================================
// MemoryNetwork
// =============================================================================

/**
 * A set of endpoints that can reach each other in process.
 *
 * @example
 * ```typescript
 * const network = new MemoryNetwork();
 * const tracker = network.endpoint(trackerId);
 * tracker.accept(TRACKER_ALPN, handleStream);
 *
 * const client = new TrackerClient(network.endpoint(clientId));
 * await client.query(trackerId, query);
 * ```
 */
export class MemoryNetwork {
  private readonly endpoints: Map<string, MemoryEndpoint> = new Map();
  private readonly onHandlerError: (error: unknown, remote: PeerId) => void;
  private openConnections = 0;

  constructor(options: MemoryNetworkOptions = {}) {
    this.onHandlerError =
      options.onHandlerError ??
      ((error, remote) => {
        const reason = error instanceof Error ? error.message : String(error);
        process.emitWarning(`Stream handler for ${remote.fmtShort()} failed: ${reason}`);
      });
  }

  /**
   * Get or create the endpoint bound to a peer id
   */
  endpoint(peerId: PeerId): MemoryEndpoint {
    const key = peerId.toString();
    let endpoint = this.endpoints.get(key);
    if (!endpoint) {
      endpoint = new MemoryEndpoint(this, peerId);
      this.endpoints.set(key, endpoint);
    }
    return endpoint;
  }

  lookup(peerId: PeerId): MemoryEndpoint | undefined {
    return this.endpoints.get(peerId.toString());
  }

  /** Number of connections opened and not yet closed */
  get activeConnections(): number {
    return this.openConnections;
  }

  open(local: PeerId, remote: PeerId, handler: StreamHandler): Connection {
    this.openConnections++;
    return new MemoryConnection(local, remote, handler, this.onHandlerError, () => {
      this.openConnections--;
    });
  }
}
