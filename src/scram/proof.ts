/**
 * Client proof for the router's SCRAM-SHA-256 variant.
 *
 *   authMessage     = clientNonce "," serverNonce "," serverNonce
 *   saltedPassword  = PBKDF2-HMAC-SHA256(password, salt, iterations, 32)
 *   clientKey       = HMAC-SHA256(saltedPassword, "Client Key")
 *   storedKey       = SHA256(clientKey)
 *   clientSignature = HMAC-SHA256(storedKey, authMessage)
 *   clientProof     = clientKey XOR clientSignature
 *
 * The server nonce is repeated where RFC 5802 would put the final nonce.
 * The router firmware also feeds its two HMACs with key and message swapped
 * relative to the lines above; see HmacOrder.
 */
import { pbkdf2 } from '@noble/hashes/pbkdf2';
import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';
import { xor, fromHex, toHex } from '../crypto/primitives.js';
import { strToBytes } from '../crypto/encoding.js';
import { CryptoInputError } from '../errors.js';
import type { NonceChallenge } from './types.js';

/** Output length of SHA-256 and of every derived key in the proof. */
export const PROOF_BYTES = 32;

const CLIENT_KEY_LABEL = strToBytes('Client Key');

/**
 * Which argument of the two HMAC calls carries the key.
 *
 * - `standard`: HMAC(key=saltedPassword, msg="Client Key") and
 *   HMAC(key=storedKey, msg=authMessage), as in RFC 5802.
 * - `swapped`:  HMAC(key="Client Key", msg=saltedPassword) and
 *   HMAC(key=authMessage, msg=storedKey).
 *
 * Both produce a well-formed 32-byte proof; only one is accepted by a given
 * firmware, and a mismatch surfaces as a bare login error code.
 */
export type HmacOrder = 'standard' | 'swapped';

/** The order the router firmware verifies against (pinned by a captured login). */
export const DEVICE_HMAC_ORDER: HmacOrder = 'swapped';

export function buildAuthMessage(clientNonce: string, serverNonce: string): Uint8Array {
  return strToBytes(`${clientNonce},${serverNonce},${serverNonce}`);
}

function keyedHmac(order: HmacOrder, key: Uint8Array, message: Uint8Array): Uint8Array {
  return order === 'standard' ? hmac(sha256, key, message) : hmac(sha256, message, key);
}

function validateInputs(saltHex: string, iterations: number, clientNonce: string, serverNonce: string): Uint8Array {
  if (!Number.isSafeInteger(iterations) || iterations <= 0) {
    throw new CryptoInputError(`iterations must be a positive integer, got ${iterations}`);
  }
  if (clientNonce.length === 0 || serverNonce.length === 0) {
    throw new CryptoInputError('client and server nonces must be non-empty');
  }
  if (saltHex.length === 0) {
    throw new CryptoInputError('salt must not be empty');
  }
  return fromHex(saltHex);
}

/**
 * Derive the hex client proof sent to `user_login_proof`.
 * Deterministic for identical inputs; always 64 lowercase hex characters.
 */
export function computeProof(
  password: string,
  saltHex: string,
  iterations: number,
  clientNonce: string,
  serverNonce: string,
  order: HmacOrder = DEVICE_HMAC_ORDER,
): string {
  const salt = validateInputs(saltHex, iterations, clientNonce, serverNonce);
  const authMessage = buildAuthMessage(clientNonce, serverNonce);

  const saltedPassword = pbkdf2(sha256, strToBytes(password), salt, { c: iterations, dkLen: PROOF_BYTES });
  const clientKey = keyedHmac(order, saltedPassword, CLIENT_KEY_LABEL);
  const storedKey = sha256(clientKey);
  const clientSignature = keyedHmac(order, storedKey, authMessage);

  return toHex(xor(clientKey, clientSignature));
}

/**
 * computeProof over the challenge returned by the nonce exchange.
 */
export function computeProofForChallenge(
  password: string,
  challenge: NonceChallenge,
  order: HmacOrder = DEVICE_HMAC_ORDER,
): string {
  return computeProof(password, challenge.salt, challenge.iterations, challenge.clientNonce, challenge.serverNonce, order);
}
