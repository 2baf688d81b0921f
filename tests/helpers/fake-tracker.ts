/**
 * In-process tracker for exercising the client over a MemoryNetwork.
 *
 * Remembers announces and answers queries from them. Verification is not
 * modelled: the `verified` flag is ignored.
 */

import { type ContentAddress, contentAddressEquals } from '../../src/content/address.js';
import type { PeerId } from '../../src/content/peer-id.js';
import { decodeRequest, encodeResponse } from '../../src/protocol/codec.js';
import { TRACKER_ALPN } from '../../src/protocol/constants.js';
import { AnnounceKind, type Query, type Request } from '../../src/protocol/types.js';
import type { MemoryNetwork } from '../../src/transport/memory.js';
import { readToEnd } from '../../src/transport/stream.js';
import type { BiStream } from '../../src/transport/types.js';

export type TrackerBehavior =
  /** Record announces and answer queries */
  | { type: 'serve' }
  /** Answer every request with these bytes */
  | { type: 'reply'; bytes: Buffer }
  /** Read the request and never answer */
  | { type: 'hang' };

interface Entry {
  address: ContentAddress;
  host: PeerId;
  kind: AnnounceKind;
}

export class FakeTracker {
  readonly peerId: PeerId;
  readonly requests: Request[] = [];
  behavior: TrackerBehavior = { type: 'serve' };
  private readonly entries: Entry[] = [];

  constructor(network: MemoryNetwork, peerId: PeerId, alpn: string = TRACKER_ALPN) {
    this.peerId = peerId;
    network.endpoint(peerId).accept(alpn, (stream) => this.handle(stream));
  }

  /**
   * Hosts for a query, in the order they first announced
   */
  hostsFor(query: Query): PeerId[] {
    return this.entries
      .filter((entry) => contentAddressEquals(entry.address, query.content))
      .filter((entry) => !query.flags.complete || entry.kind === AnnounceKind.Complete)
      .map((entry) => entry.host);
  }

  private record(host: PeerId, address: ContentAddress, kind: AnnounceKind): void {
    const existing = this.entries.find(
      (entry) => entry.host.equals(host) && contentAddressEquals(entry.address, address)
    );
    if (existing) {
      existing.kind = kind;
    } else {
      this.entries.push({ address, host, kind });
    }
  }

  private async handle(stream: BiStream): Promise<void> {
    const request = decodeRequest(await readToEnd(stream, 1 << 20));
    this.requests.push(request);

    const behavior = this.behavior;
    switch (behavior.type) {
      case 'hang':
        return;
      case 'reply':
        stream.end(behavior.bytes);
        return;
      case 'serve':
        break;
    }

    if (request.kind === 'announce') {
      for (const address of request.data.content) {
        this.record(request.data.host, address, request.data.kind);
      }
      stream.end();
      return;
    }

    const hosts = this.hostsFor(request.data);
    stream.end(
      encodeResponse({ kind: 'queryResponse', data: { content: request.data.content, hosts } })
    );
  }
}
