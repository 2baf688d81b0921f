/**
 * Stream helpers shared by both ends of an exchange.
 *
 * @module transport/stream
 */

import type { Readable, Writable } from 'stream';
import { finished } from 'stream/promises';
import { ResponseTooLargeError } from '../errors.js';

/**
 * Write a whole message and half-close the writable side.
 *
 * Resolves once the bytes have been flushed to the transport.
 */
export async function writeAndFinish(stream: Writable, bytes: Uint8Array): Promise<void> {
  stream.end(bytes);
  await finished(stream, { readable: false });
}

/**
 * Read until the peer ends the stream, failing once more than `limit`
 * bytes arrive.
 *
 * A stream holding exactly `limit` bytes is accepted only when it ends;
 * the read keeps waiting until then, and one more byte fails it.
 *
 * The stream is left open once its readable side ends so the writable
 * side can still be used; it is destroyed only when the cap is exceeded.
 *
 * @throws {ResponseTooLargeError} If the peer sends more than `limit` bytes
 */
export async function readToEnd(stream: Readable, limit: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let total = 0;

  for await (const chunk of stream.iterator({ destroyOnReturn: false })) {
    const data: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    total += data.length;
    if (total > limit) {
      stream.destroy();
      throw new ResponseTooLargeError(limit);
    }
    chunks.push(data);
  }

  return Buffer.concat(chunks, total);
}
