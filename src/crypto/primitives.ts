/**
 * Byte-level helpers shared by the proof calculator and the nonce generator.
 */
import { CryptoInputError } from '../errors.js';

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;

/**
 * XOR two byte arrays of equal length.
 */
export function xor(a: Uint8Array, b: Uint8Array): Uint8Array {
  if (a.length !== b.length) {
    throw new CryptoInputError(`xor: length mismatch (${a.length} vs ${b.length})`);
  }
  const result = new Uint8Array(a.length);
  for (let i = 0; i < a.length; i++) {
    result[i] = a[i] ^ b[i];
  }
  return result;
}

/**
 * Decode a hex string to a Uint8Array.
 * Rejects odd lengths and any non-hex character instead of decoding them to zero.
 */
export function fromHex(hex: string): Uint8Array {
  if (hex.length % 2 !== 0) {
    throw new CryptoInputError('fromHex: odd-length hex string');
  }
  if (!HEX_PATTERN.test(hex)) {
    throw new CryptoInputError('fromHex: non-hex character');
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Encode a Uint8Array to a lowercase hex string.
 */
export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map(b => b.toString(16).padStart(2, '0'))
    .join('');
}
