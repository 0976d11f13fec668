import { randomBytes } from '@noble/hashes/utils';
import { toHex } from '../crypto/primitives.js';

/** Client nonce length in bytes; hex-encoded it is 64 characters. */
export const NONCE_BYTES = 32;

export type NonceGenerator = () => string;

/**
 * Fresh client nonce from the platform CSPRNG, hex-encoded.
 */
export const generateNonce: NonceGenerator = () => toHex(randomBytes(NONCE_BYTES));
