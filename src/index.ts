/**
 * router-session: authenticated sessions for a router's SCRAM-protected
 * management API, plus the switch token login and a polling loop around them.
 */

// ── Errors ───────────────────────────────────────────────────────────────────
export {
  RouterAuthError,
  TransportError,
  ProtocolError,
  CryptoInputError,
  ServerRejectedError,
  AuthenticationRejectedError,
  isRouterAuthError,
  type RouterAuthErrorKind,
} from './errors.js';

// ── SCRAM ────────────────────────────────────────────────────────────────────
export type { CsrfTokenPair, NonceChallenge } from './scram/types.js';
export { generateNonce, NONCE_BYTES, type NonceGenerator } from './scram/nonce.js';
export {
  computeProof,
  computeProofForChallenge,
  buildAuthMessage,
  DEVICE_HMAC_ORDER,
  type HmacOrder,
} from './scram/proof.js';

// ── Session ──────────────────────────────────────────────────────────────────
export {
  RouterSession,
  RouterResponse,
  parseSetCookie,
  type FetchLike,
  type FetchResponse,
  type RequestOptions,
  type Scheme,
} from './session/session.js';

// ── Router ───────────────────────────────────────────────────────────────────
export { fetchCsrfTokens, extractCsrfTokens } from './router/csrf.js';
export { RouterAuthClient, authenticate, type RouterAuthClientOptions } from './router/handshake.js';
export { isSessionValid, type ValidatorOptions } from './router/validator.js';
export {
  AuthSessionManager,
  type AuthState,
  type RouterCredentials,
  type AuthSessionManagerOptions,
  type SessionValidator,
} from './router/manager.js';
export { fetchDeviceInfo, type DeviceInfo } from './router/device-info.js';

// ── Switch ───────────────────────────────────────────────────────────────────
export { switchLogin, type SwitchLoginRequest, type SwitchToken } from './switch/auth.js';

// ── Polling loop ─────────────────────────────────────────────────────────────
export { Poller, type PollerOptions, type Collector } from './poller/poller.js';

// ── Ambient ──────────────────────────────────────────────────────────────────
export { loadConfig, ConfigError, type AppConfig } from './config.js';
export { createLogger, silentLogger, type Logger, type LogLevel } from './logger.js';
