import { describe, it, expect, vi } from 'vitest';
import { TRACKER_ALPN } from '../../src/protocol/constants.js';
import { MemoryNetwork } from '../../src/transport/memory.js';
import { readToEnd, writeAndFinish } from '../../src/transport/stream.js';
import { ConnectionError } from '../../src/errors.js';
import { peerOf } from '../helpers/fixtures.js';

describe('MemoryNetwork', () => {
  const clientId = peerOf(1);
  const serverId = peerOf(2);

  function echoNetwork(): MemoryNetwork {
    const network = new MemoryNetwork();
    network.endpoint(serverId).accept(TRACKER_ALPN, async (stream) => {
      const request = await readToEnd(stream, 1024);
      stream.end(Buffer.concat([Buffer.from('echo:'), request]));
    });
    return network;
  }

  it('should return the same endpoint for a peer id', () => {
    const network = new MemoryNetwork();
    expect(network.endpoint(clientId)).toBe(network.endpoint(peerOf(1)));
    expect(network.lookup(serverId)).toBeUndefined();
  });

  it('should carry a request and response with half-close', async () => {
    const network = echoNetwork();
    const connection = await network.endpoint(clientId).connect(serverId, TRACKER_ALPN);
    const stream = await connection.openBi();

    await writeAndFinish(stream, Buffer.from('ping'));
    const response = await readToEnd(stream, 1024);
    connection.close();

    expect(response.toString()).toBe('echo:ping');
  });

  it('should pass the caller id to the handler', async () => {
    const network = new MemoryNetwork();
    const seen = vi.fn();
    network.endpoint(serverId).accept(TRACKER_ALPN, (stream, remote) => {
      seen(remote.toString());
      stream.end();
    });

    const connection = await network.endpoint(clientId).connect(serverId, TRACKER_ALPN);
    const stream = await connection.openBi();
    await writeAndFinish(stream, Buffer.alloc(0));
    await readToEnd(stream, 10);
    connection.close();

    expect(seen).toHaveBeenCalledWith(clientId.toString());
  });

  it('should count open connections', async () => {
    const network = echoNetwork();
    const endpoint = network.endpoint(clientId);

    const first = await endpoint.connect(serverId, TRACKER_ALPN);
    const second = await endpoint.connect(serverId, TRACKER_ALPN);
    expect(network.activeConnections).toBe(2);

    first.close();
    first.close();
    expect(network.activeConnections).toBe(1);

    second.close();
    expect(network.activeConnections).toBe(0);
  });

  it('should refuse streams on a closed connection', async () => {
    const network = echoNetwork();
    const connection = await network.endpoint(clientId).connect(serverId, TRACKER_ALPN);
    connection.close();

    await expect(connection.openBi()).rejects.toThrow(ConnectionError);
  });

  it('should fail to reach an unknown peer', async () => {
    const network = new MemoryNetwork();
    await expect(network.endpoint(clientId).connect(serverId, TRACKER_ALPN)).rejects.toThrow(
      `No route to peer ${serverId.toString()}`
    );
  });

  it('should fail when the peer does not accept the protocol', async () => {
    const network = echoNetwork();
    await expect(network.endpoint(clientId).connect(serverId, 'other/1')).rejects.toThrow(
      `Peer ${serverId.toString()} does not accept protocol other/1`
    );
  });

  it('should stop accepting a protocol', async () => {
    const network = echoNetwork();
    network.endpoint(serverId).unaccept(TRACKER_ALPN);
    await expect(network.endpoint(clientId).connect(serverId, TRACKER_ALPN)).rejects.toThrow(
      ConnectionError
    );
  });

  it('should not connect with an aborted signal', async () => {
    const network = echoNetwork();
    const controller = new AbortController();
    controller.abort();

    await expect(
      network.endpoint(clientId).connect(serverId, TRACKER_ALPN, { signal: controller.signal })
    ).rejects.toThrow(ConnectionError);
    expect(network.activeConnections).toBe(0);
  });

  it('should report handler failures', async () => {
    const failure = new Error('handler broke');
    const reported = new Promise<unknown>((resolve) => {
      const network = new MemoryNetwork({ onHandlerError: (error) => resolve(error) });
      network.endpoint(serverId).accept(TRACKER_ALPN, () => {
        throw failure;
      });
      void network
        .endpoint(clientId)
        .connect(serverId, TRACKER_ALPN)
        .then((connection) => connection.openBi());
    });

    expect(await reported).toBe(failure);
  });
});
