/**
 * String encoding utilities.
 */

/**
 * Encode a UTF-8 string to bytes.
 */
export function strToBytes(s: string): Uint8Array {
  return new TextEncoder().encode(s);
}
