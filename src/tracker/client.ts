/**
 * Tracker Exchange Client
 *
 * Performs one announce or one query against a tracker. Every call is a
 * self-contained exchange on its own connection:
 *
 *   Idle -> Connecting -> StreamOpen -> RequestSent -> AwaitingResponse -> Done
 *                 \___________\______________\_______________\_______-> Failed
 *
 * The request ends when the client half-closes its side of the stream;
 * the response ends when the tracker does the same. Nothing is retried.
 *
 * @module tracker/client
 */

import { addAbortSignal } from 'stream';
import { contentAddressEquals, formatContentAddress } from '../content/address.js';
import type { PeerId } from '../content/peer-id.js';
import { MAX_TIMEOUT, isValidTimeout } from '../config/defaults.js';
import { ConnectionError, ContentTrackerError, DecodingError } from '../errors.js';
import { decodeResponse, encodeRequest } from '../protocol/codec.js';
import { RESPONSE_SIZE_LIMIT, TRACKER_ALPN } from '../protocol/constants.js';
import type { Announce, Query, QueryResponse, Request } from '../protocol/types.js';
import { readToEnd, writeAndFinish } from '../transport/stream.js';
import type { Connection, Endpoint } from '../transport/types.js';
import { type Logger, createLogger } from '../utils/logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Progress of a single exchange.
 */
export enum ExchangeState {
  Idle = 'idle',
  Connecting = 'connecting',
  StreamOpen = 'streamOpen',
  RequestSent = 'requestSent',
  AwaitingResponse = 'awaitingResponse',
  Done = 'done',
  Failed = 'failed',
}

export interface TrackerClientOptions {
  /** Protocol identifier presented to the tracker (default: TRACKER_ALPN) */
  alpn?: string;

  /** Maximum response size in bytes (default: RESPONSE_SIZE_LIMIT) */
  responseSizeLimit?: number;

  /** Abort an exchange after this many milliseconds; 0 disables (default: 30000) */
  requestTimeout?: number;

  /** Logger for exchange progress (default: silent) */
  logger?: Logger;
}

/**
 * Per-call options.
 */
export interface ExchangeOptions {
  /** Cancel the exchange; its connection is torn down */
  signal?: AbortSignal;

  /** Observe state transitions */
  onStateChange?: (state: ExchangeState) => void;
}

// =============================================================================
// TrackerClient Class
// =============================================================================

/**
 * Client for the tracker protocol.
 *
 * Holds only immutable settings, so concurrent calls on one instance are
 * independent of each other.
 *
 * @example
 * ```typescript
 * const client = new TrackerClient(endpoint);
 *
 * await client.announce(trackerId, {
 *   host: myId,
 *   content: [rawAddress(hash)],
 *   kind: AnnounceKind.Complete,
 * });
 *
 * const { hosts } = await client.query(trackerId, {
 *   content: rawAddress(hash),
 *   flags: { complete: true, verified: false },
 * });
 * ```
 */
export class TrackerClient {
  private readonly endpoint: Endpoint;
  private readonly alpn: string;
  private readonly responseSizeLimit: number;
  private readonly requestTimeout: number;
  private readonly logger: Logger;

  /**
   * @throws {RangeError} If `requestTimeout` is not an integer from 0 to MAX_TIMEOUT
   */
  constructor(endpoint: Endpoint, options: TrackerClientOptions = {}) {
    const requestTimeout = options.requestTimeout ?? 30000;
    if (!isValidTimeout(requestTimeout)) {
      throw new RangeError(
        `requestTimeout must be an integer from 0 to ${MAX_TIMEOUT}, got ${requestTimeout}`
      );
    }

    this.endpoint = endpoint;
    this.alpn = options.alpn ?? TRACKER_ALPN;
    this.responseSizeLimit = options.responseSizeLimit ?? RESPONSE_SIZE_LIMIT;
    this.requestTimeout = requestTimeout;
    this.logger = options.logger ?? createLogger({ scope: 'tracker', level: 'silent' });
  }

  /**
   * Announce to a tracker that a host has some content.
   *
   * Whatever the tracker sends back is read (within the size cap) and
   * discarded; success means the exchange completed without error.
   *
   * @throws {ContentTrackerError} On any connection, encoding or size failure
   */
  async announce(tracker: PeerId, announce: Announce, options: ExchangeOptions = {}): Promise<void> {
    await this.exchange(tracker, { kind: 'announce', data: announce }, () => undefined, options);
  }

  /**
   * Ask a tracker which hosts claim some content.
   *
   * @throws {ContentTrackerError} On any connection, encoding, decoding or
   * size failure
   */
  async query(tracker: PeerId, query: Query, options: ExchangeOptions = {}): Promise<QueryResponse> {
    return this.exchange(
      tracker,
      { kind: 'query', data: query },
      (bytes): QueryResponse => {
        const response = decodeResponse(bytes);
        switch (response.kind) {
          case 'queryResponse':
            if (!contentAddressEquals(response.data.content, query.content)) {
              this.logger.warn(
                `Tracker answered for ${formatContentAddress(response.data.content)}, ` +
                  `asked for ${formatContentAddress(query.content)}`
              );
            }
            return response.data;
          default: {
            const unexpected: never = response.kind;
            throw new DecodingError(`Unexpected response variant ${String(unexpected)}`);
          }
        }
      },
      options
    );
  }

  // ===========================================================================
  // Exchange
  // ===========================================================================

  private async exchange<T>(
    tracker: PeerId,
    request: Request,
    handleResponse: (bytes: Buffer) => T,
    options: ExchangeOptions
  ): Promise<T> {
    const label = `${request.kind} ${tracker.fmtShort()}`;
    const transition = (state: ExchangeState) => {
      this.logger.debug(`${label}: ${state}`);
      options.onStateChange?.(state);
    };

    const controller = new AbortController();
    const { signal } = controller;

    const onCallerAbort = () => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      onCallerAbort();
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    const timer =
      this.requestTimeout > 0
        ? setTimeout(() => {
            controller.abort(
              new ConnectionError(
                `Exchange with tracker ${tracker.toString()} timed out after ${this.requestTimeout}ms`
              )
            );
          }, this.requestTimeout)
        : undefined;

    let connection: Connection | undefined;

    try {
      transition(ExchangeState.Connecting);
      connection = await this.endpoint.connect(tracker, this.alpn, { signal });
      signal.throwIfAborted();

      const stream = addAbortSignal(signal, await connection.openBi());
      transition(ExchangeState.StreamOpen);

      const payload = encodeRequest(request);
      await writeAndFinish(stream, payload);
      transition(ExchangeState.RequestSent);
      this.logger.debug(`${label}: sent ${payload.length} bytes`);

      transition(ExchangeState.AwaitingResponse);
      const bytes = await readToEnd(stream, this.responseSizeLimit);
      this.logger.debug(`${label}: received ${bytes.length} bytes`);

      const result = handleResponse(bytes);
      transition(ExchangeState.Done);
      return result;
    } catch (err) {
      const error = this.toExchangeError(err, signal, tracker);
      this.logger.debug(`${label}: ${error.message}`);
      transition(ExchangeState.Failed);
      throw error;
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      options.signal?.removeEventListener('abort', onCallerAbort);
      connection?.close();
    }
  }

  /**
   * Map a failure to this package's error types. Aborts report their
   * reason; raw transport errors become ConnectionError.
   */
  private toExchangeError(err: unknown, signal: AbortSignal, tracker: PeerId): ContentTrackerError {
    if (signal.aborted) {
      const reason: unknown = signal.reason;
      if (reason instanceof ContentTrackerError) {
        return reason;
      }
      return new ConnectionError(`Exchange with tracker ${tracker.toString()} was aborted`, {
        cause: reason,
      });
    }

    if (err instanceof ContentTrackerError) {
      return err;
    }

    const message = err instanceof Error ? err.message : String(err);
    return new ConnectionError(`Exchange with tracker ${tracker.toString()} failed: ${message}`, {
      cause: err,
    });
  }
}

// =============================================================================
// One-shot Helpers
// =============================================================================

/**
 * Announce to a tracker that a host has some content.
 */
export async function announce(
  endpoint: Endpoint,
  tracker: PeerId,
  request: Announce,
  options: TrackerClientOptions & ExchangeOptions = {}
): Promise<void> {
  const { signal, onStateChange, ...clientOptions } = options;
  await new TrackerClient(endpoint, clientOptions).announce(tracker, request, {
    signal,
    onStateChange,
  });
}

/**
 * Query a tracker for hosts of some content.
 */
export async function query(
  endpoint: Endpoint,
  tracker: PeerId,
  request: Query,
  options: TrackerClientOptions & ExchangeOptions = {}
): Promise<QueryResponse> {
  const { signal, onStateChange, ...clientOptions } = options;
  return new TrackerClient(endpoint, clientOptions).query(tracker, request, {
    signal,
    onStateChange,
  });
}
