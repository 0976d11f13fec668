/**
 * Failure taxonomy for the router login handshake.
 *
 * Every error raised while establishing a session is a RouterAuthError; the
 * `kind` field lets callers switch on the failure without instanceof chains.
 */

export type RouterAuthErrorKind =
  | 'transport'
  | 'protocol'
  | 'crypto-input'
  | 'server-rejected'
  | 'authentication-rejected';

export abstract class RouterAuthError extends Error {
  abstract readonly kind: RouterAuthErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure, timeout, or an HTTP status the protocol does not expect. */
export class TransportError extends RouterAuthError {
  readonly kind = 'transport';

  constructor(
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** A well-formed response that lacks the tokens or fields the handshake needs. */
export class ProtocolError extends RouterAuthError {
  readonly kind = 'protocol';
}

/** Malformed salt, iteration count or nonce handed to the proof calculator. */
export class CryptoInputError extends RouterAuthError {
  readonly kind = 'crypto-input';
}

/** The nonce exchange answered with a non-zero `err`. */
export class ServerRejectedError extends RouterAuthError {
  readonly kind = 'server-rejected';

  constructor(readonly code: number) {
    super(`router rejected nonce exchange (err=${code})`);
  }
}

/** The proof submission answered with a non-zero `err`: wrong password or proof mismatch. */
export class AuthenticationRejectedError extends RouterAuthError {
  readonly kind = 'authentication-rejected';

  constructor(
    readonly code: number,
    readonly category: string | null,
  ) {
    super(`router rejected login proof (err=${code}, category=${category ?? '-'})`);
  }
}

export function isRouterAuthError(value: unknown): value is RouterAuthError {
  return value instanceof RouterAuthError;
}
