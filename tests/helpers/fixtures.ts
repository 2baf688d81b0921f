import { Hash } from '../../src/content/hash.js';
import { PeerId } from '../../src/content/peer-id.js';

/**
 * A hash whose 32 bytes all equal `fill`
 */
export function hashOf(fill: number): Hash {
  return Hash.fromBytes(Buffer.alloc(32, fill));
}

/**
 * A peer id whose 32 bytes all equal `fill`
 */
export function peerOf(fill: number): PeerId {
  return PeerId.fromBytes(Buffer.alloc(32, fill));
}

/**
 * The error thrown by `fn`; fails the test if nothing is thrown
 */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}
