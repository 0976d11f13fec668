/**
 * Handshake state and wire types for the router's SCRAM-style login.
 */

/** Anti-CSRF pair that must be echoed back on every state-changing POST. */
export interface CsrfTokenPair {
  csrf_param: string;
  csrf_token: string;
}

/** Values returned by a successful nonce exchange; consumed once by the proof calculator. */
export interface NonceChallenge {
  clientNonce: string;  // 64 hex chars
  serverNonce: string;  // client nonce followed by the router's own suffix
  salt: string;         // hex
  iterations: number;
}

// ── Wire DTOs ──────────────────────────────────────────────────────────────

export interface NonceRequestDto {
  data: {
    username: string;
    firstnonce: string;
  };
  csrf: CsrfTokenPair;
}

export interface ProofRequestDto {
  data: {
    clientproof: string;
    finalnonce: string;
  };
  csrf: CsrfTokenPair;
}
