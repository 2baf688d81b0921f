/**
 * TCP transport
 *
 * Reaches peers at `host:port` addresses learned out of band (tickets,
 * command-line flags). Right after connecting, the client sends a
 * preamble naming the protocol: one length byte followed by the ASCII
 * protocol identifier. A TCP connection carries a single stream; the
 * socket itself is that stream and `end()` is the half-close.
 *
 * No peer authentication happens here: the peer id only selects which
 * addresses to dial.
 *
 * @module transport/tcp
 */

import { createConnection, type Socket } from 'net';
import type { PeerId } from '../content/peer-id.js';
import { ConnectionError } from '../errors.js';
import { type Logger, createLogger } from '../utils/logger.js';
import type { BiStream, Connection, ConnectOptions, Endpoint } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface TcpEndpointOptions {
  /** Connection timeout per address in milliseconds (default: 5000) */
  connectTimeout?: number;

  /** Known addresses by peer */
  peers?: Array<{ peerId: PeerId; addresses: string[] }>;

  /** Logger for socket-level diagnostics */
  logger?: Logger;
}

export interface SocketAddress {
  host: string;
  port: number;
}

// =============================================================================
// Address Helpers
// =============================================================================

/**
 * Parse `host:port` or `[ipv6]:port`.
 *
 * @throws {ConnectionError} If the address has no valid port
 */
export function parseSocketAddress(input: string): SocketAddress {
  const trimmed = input.trim();
  const colon = trimmed.lastIndexOf(':');
  if (colon <= 0) {
    throw new ConnectionError(`Invalid address "${input}": expected host:port`);
  }

  let host = trimmed.slice(0, colon);
  const portText = trimmed.slice(colon + 1);
  const port = Number(portText);

  if (!/^\d+$/.test(portText) || port < 1 || port > 65535) {
    throw new ConnectionError(`Invalid port in address "${input}"`);
  }

  if (host.startsWith('[') && host.endsWith(']')) {
    host = host.slice(1, -1);
  }

  return { host, port };
}

/**
 * Bytes sent before any protocol data
 *
 * @throws {ConnectionError} If the identifier is empty or longer than 255 bytes
 */
export function encodeProtocolPreamble(alpn: string): Buffer {
  const id = Buffer.from(alpn, 'ascii');
  if (id.length === 0 || id.length > 255) {
    throw new ConnectionError(`Protocol identifier must be 1-255 bytes, got ${id.length}`);
  }
  return Buffer.concat([Buffer.from([id.length]), id]);
}

// =============================================================================
// TcpConnection
// =============================================================================

class TcpConnection implements Connection {
  readonly remote: PeerId;
  private socket: Socket | null;
  private streamOpened = false;

  constructor(remote: PeerId, socket: Socket) {
    this.remote = remote;
    this.socket = socket;
  }

  async openBi(): Promise<BiStream> {
    if (!this.socket || this.socket.destroyed) {
      throw new ConnectionError(`Connection to ${this.remote.fmtShort()} is closed`);
    }
    if (this.streamOpened) {
      throw new ConnectionError('A TCP connection carries a single stream');
    }
    this.streamOpened = true;
    return this.socket;
  }

  close(): void {
    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
    }
  }
}

// =============================================================================
// TcpEndpoint Class
// =============================================================================

/**
 * Endpoint dialing peers over TCP.
 *
 * @example
 * ```typescript
 * const endpoint = new TcpEndpoint();
 * endpoint.addPeer(trackerId, ['tracker.example.org:4919']);
 * const client = new TrackerClient(endpoint);
 * ```
 */
export class TcpEndpoint implements Endpoint {
  private readonly connectTimeout: number;
  private readonly logger: Logger;
  private readonly addressBook: Map<string, SocketAddress[]> = new Map();

  constructor(options: TcpEndpointOptions = {}) {
    this.connectTimeout = options.connectTimeout ?? 5000;
    this.logger = options.logger ?? createLogger({ scope: 'tcp', level: 'silent' });

    for (const { peerId, addresses } of options.peers ?? []) {
      this.addPeer(peerId, addresses);
    }
  }

  /**
   * Add addresses for a peer. Addresses are dialed in the order added.
   *
   * @throws {ConnectionError} If an address is malformed
   */
  addPeer(peerId: PeerId, addresses: string[]): void {
    const key = peerId.toString();
    const known = this.addressBook.get(key) ?? [];
    for (const address of addresses) {
      known.push(parseSocketAddress(address));
    }
    this.addressBook.set(key, known);
  }

  addressesOf(peerId: PeerId): SocketAddress[] {
    return [...(this.addressBook.get(peerId.toString()) ?? [])];
  }

  /**
   * Dial each known address of the peer in turn; the first that accepts
   * a connection is used.
   */
  async connect(peer: PeerId, alpn: string, options: ConnectOptions = {}): Promise<Connection> {
    const addresses = this.addressesOf(peer);
    if (addresses.length === 0) {
      throw new ConnectionError(`No known addresses for peer ${peer.toString()}`);
    }

    const preamble = encodeProtocolPreamble(alpn);
    const failures: string[] = [];

    for (const address of addresses) {
      if (options.signal?.aborted) {
        break;
      }
      try {
        const socket = await this.dial(address, options.signal);
        socket.write(preamble);
        return new TcpConnection(peer, socket);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.debug(`Dial ${address.host}:${address.port} failed: ${message}`);
        failures.push(message);
      }
    }

    if (options.signal?.aborted) {
      throw new ConnectionError(`Connection to ${peer.fmtShort()} aborted`, {
        cause: options.signal.reason,
      });
    }

    throw new ConnectionError(
      `Could not connect to peer ${peer.toString()}: ${failures.join('; ')}`
    );
  }

  private dial(address: SocketAddress, signal?: AbortSignal): Promise<Socket> {
    return new Promise((resolve, reject) => {
      const socket = createConnection({ host: address.host, port: address.port });

      const cleanup = () => {
        clearTimeout(timeout);
        signal?.removeEventListener('abort', onAbort);
        socket.removeListener('connect', onConnect);
        socket.removeListener('error', onError);
      };

      const timeout = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(new ConnectionError(`Connection timeout after ${this.connectTimeout}ms`));
      }, this.connectTimeout);

      const onAbort = () => {
        cleanup();
        socket.destroy();
        reject(new ConnectionError('Connection aborted', { cause: signal?.reason }));
      };

      const onConnect = () => {
        cleanup();
        // Errors after this point surface through the stream operations
        socket.on('error', (err) => {
          this.logger.debug(`Socket ${address.host}:${address.port} error: ${err.message}`);
        });
        resolve(socket);
      };

      const onError = (err: Error) => {
        cleanup();
        socket.destroy();
        reject(
          new ConnectionError(
            `Failed to connect to ${address.host}:${address.port}: ${err.message}`,
            { cause: err }
          )
        );
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      socket.once('connect', onConnect);
      socket.once('error', onError);
    });
  }
}
