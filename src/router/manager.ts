/**
 * Session state machine driven by the polling loop.
 *
 *   unauthenticated ──login ok──▶ authenticated ──probe fails / invalidate()──▶ unauthenticated
 *          │                                                                        │
 *          └──────────────────────── fail(reason) ─────────▶ failed ◀───────────────┘
 *
 * `failed` is entered only when the caller decides (consecutive-failure
 * threshold) and is left only through reset().
 */
import { RouterAuthClient, type RouterAuthClientOptions } from './handshake.js';
import { isSessionValid, DEFAULT_PROBE_TIMEOUT_MS } from './validator.js';
import { silentLogger, type Logger } from '../logger.js';
import type { RouterSession } from '../session/session.js';

export interface RouterCredentials {
  address: string;
  username: string;
  password: string;
}

export type AuthState =
  | { status: 'unauthenticated' }
  | { status: 'authenticated'; session: RouterSession; validatedAt: Date }
  | { status: 'failed'; reason: Error };

export type SessionValidator = (session: RouterSession) => Promise<boolean>;

export interface AuthSessionManagerOptions extends RouterAuthClientOptions {
  /** Timeout for the validity probe. */
  probeTimeoutMs?: number;
  /** Replaces the HostInfo probe. */
  validate?: SessionValidator;
  now?: () => Date;
}

export class AuthSessionManager {
  private _state: AuthState = { status: 'unauthenticated' };
  private inFlight: Promise<RouterSession> | null = null;
  private readonly client: RouterAuthClient;
  private readonly validate: SessionValidator;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly credentials: Readonly<RouterCredentials>,
    options: AuthSessionManagerOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.client = new RouterAuthClient(credentials.address, options);
    const probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.validate =
      options.validate ?? ((session) => isSessionValid(session, { timeoutMs: probeTimeoutMs, logger: this.logger }));
    this.now = options.now ?? (() => new Date());
  }

  get state(): AuthState {
    return this._state;
  }

  /**
   * Return a session that passed validation just now, logging in again when
   * there is none. At most one handshake per call; concurrent callers share
   * the attempt already in progress. Handshake errors propagate unchanged and
   * leave the manager unauthenticated.
   */
  ensureAuthenticated(): Promise<RouterSession> {
    if (!this.inFlight) {
      this.inFlight = this.refresh().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /** Drop the current session; the next ensureAuthenticated() logs in again. */
  invalidate(): void {
    if (this._state.status === 'authenticated') {
      this.logger.info('session_invalidated', { router: this.credentials.address });
      this._state = { status: 'unauthenticated' };
    }
  }

  /** Enter the terminal state; ensureAuthenticated() then rejects with `reason`. */
  fail(reason: Error): void {
    this.logger.error('auth_failed_permanently', { router: this.credentials.address, reason: reason.message });
    this._state = { status: 'failed', reason };
  }

  /** Leave `failed` (or drop a session) and start over from unauthenticated. */
  reset(): void {
    this._state = { status: 'unauthenticated' };
  }

  private async refresh(): Promise<RouterSession> {
    const current = this._state;
    if (current.status === 'failed') {
      throw current.reason;
    }

    if (current.status === 'authenticated') {
      const valid = await this.validate(current.session);
      // invalidate(), reset() or fail() may have run during the probe
      if (this._state === current) {
        if (valid) {
          this._state = { ...current, validatedAt: this.now() };
          return current.session;
        }
        this._state = { status: 'unauthenticated' };
      }
      this.throwIfFailed();
    }

    const { username, password } = this.credentials;
    const session = await this.client.authenticate(username, password);
    this.throwIfFailed();
    this._state = { status: 'authenticated', session, validatedAt: this.now() };
    return session;
  }

  private throwIfFailed(): void {
    if (this._state.status === 'failed') {
      this.logger.warn('session_discarded', { router: this.credentials.address });
      throw this._state.reason;
    }
  }
}
