/**
 * Text encodings for fixed-size binary identifiers.
 *
 * Hex and unpadded lowercase RFC 4648 base32. Decoders return undefined
 * instead of throwing so callers can try several forms in order.
 *
 * @module content/encoding
 */

const BASE32_ALPHABET = 'abcdefghijklmnopqrstuvwxyz234567';

/**
 * Length of the unpadded base32 text for `byteLength` bytes
 */
export function base32Length(byteLength: number): number {
  return Math.ceil((byteLength * 8) / 5);
}

/**
 * Encode bytes as unpadded lowercase base32
 */
export function base32Encode(bytes: Uint8Array): string {
  let output = '';
  let buffer = 0;
  let bitsLeft = 0;

  for (const byte of bytes) {
    buffer = ((buffer << 8) | byte) & 0xffff;
    bitsLeft += 8;

    while (bitsLeft >= 5) {
      bitsLeft -= 5;
      output += BASE32_ALPHABET[(buffer >> bitsLeft) & 0x1f];
    }
  }

  if (bitsLeft > 0) {
    output += BASE32_ALPHABET[(buffer << (5 - bitsLeft)) & 0x1f];
  }

  return output;
}

/**
 * Decode unpadded base32 (any case).
 *
 * Returns undefined on an invalid character or when the unused trailing
 * bits are not zero, so every byte string has exactly one text form.
 */
export function base32Decode(input: string): Buffer | undefined {
  const output: number[] = [];
  let buffer = 0;
  let bitsLeft = 0;

  for (const char of input.toLowerCase()) {
    const val = BASE32_ALPHABET.indexOf(char);
    if (val === -1) {
      return undefined;
    }
    buffer = ((buffer << 5) | val) & 0xffff;
    bitsLeft += 5;

    if (bitsLeft >= 8) {
      bitsLeft -= 8;
      output.push((buffer >> bitsLeft) & 0xff);
    }
  }

  if (bitsLeft >= 5 || (buffer & ((1 << bitsLeft) - 1)) !== 0) {
    return undefined;
  }

  return Buffer.from(output);
}

/**
 * Decode a hex string of exactly `byteLength` bytes (any case)
 */
export function hexDecode(input: string, byteLength: number): Buffer | undefined {
  if (input.length !== byteLength * 2 || !/^[0-9a-fA-F]+$/.test(input)) {
    return undefined;
  }
  return Buffer.from(input, 'hex');
}

/**
 * Decode a fixed-size identifier given as hex or as base32
 */
export function decodeIdentifier(input: string, byteLength: number): Buffer | undefined {
  if (input.length === byteLength * 2) {
    return hexDecode(input, byteLength);
  }
  if (input.length === base32Length(byteLength)) {
    const decoded = base32Decode(input);
    return decoded?.length === byteLength ? decoded : undefined;
  }
  return undefined;
}
