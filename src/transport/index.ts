/**
 * Transports for the tracker protocol.
 *
 * @module transport
 */

export type { BiStream, Connection, ConnectOptions, Endpoint } from './types.js';
export { readToEnd, writeAndFinish } from './stream.js';
export {
  MemoryNetwork,
  MemoryEndpoint,
  createStreamPair,
  type MemoryNetworkOptions,
  type StreamHandler,
} from './memory.js';
export {
  TcpEndpoint,
  parseSocketAddress,
  encodeProtocolPreamble,
  type TcpEndpointOptions,
  type SocketAddress,
} from './tcp.js';
