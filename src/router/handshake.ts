/**
 * Login handshake against the router's `/api/system/user_login_*` endpoints.
 *
 *   GET  /html/index.html              → csrf pair #1 (meta tags)
 *   POST /api/system/user_login_nonce  → salt, iterations, servernonce, csrf pair #2
 *   POST /api/system/user_login_proof  → err == 0 and the session cookie
 *
 * Pair #1 is spent by the nonce exchange; the proof must carry pair #2.
 * Every request of one attempt goes through one fresh RouterSession, which is
 * returned only after the proof is accepted.
 */
import { z } from 'zod';
import { fetchCsrfTokens } from './csrf.js';
import { computeProof, DEVICE_HMAC_ORDER, type HmacOrder } from '../scram/proof.js';
import { generateNonce, type NonceGenerator } from '../scram/nonce.js';
import type { CsrfTokenPair, NonceChallenge, NonceRequestDto, ProofRequestDto } from '../scram/types.js';
import { RouterSession, type FetchLike, type RouterResponse, type Scheme } from '../session/session.js';
import { AuthenticationRejectedError, ProtocolError, ServerRejectedError, TransportError } from '../errors.js';
import { preview, silentLogger, type Logger } from '../logger.js';

export const NONCE_PATH = '/api/system/user_login_nonce';
export const PROOF_PATH = '/api/system/user_login_proof';

export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 15_000;

/** Headers the router's web UI sends with every login POST; the firmware checks them. */
export const LOGIN_HEADERS: Readonly<Record<string, string>> = {
  'Content-Type': 'application/json; charset=utf-8',
  'X-Requested-With': 'XMLHttpRequest',
  '_ResponseFormat': 'JSON',
};

// ── Wire DTOs ──────────────────────────────────────────────────────────────

const errCodeSchema = z.object({ err: z.number().int() });

const nonceResponseSchema = z.object({
  salt: z.string(),
  iterations: z.number(),
  servernonce: z.string().min(1),
  csrf_param: z.string().min(1),
  csrf_token: z.string().min(1),
});

const proofResponseSchema = z.object({
  level: z.union([z.number(), z.string()]).nullish(),
  errorCategory: z.string().nullish(),
});

function parseWire<T>(schema: z.ZodType<T>, value: unknown, endpoint: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ProtocolError(`unexpected ${endpoint} response: ${issues}`);
  }
  return result.data;
}

// ── Client ─────────────────────────────────────────────────────────────────

export interface RouterAuthClientOptions {
  scheme?: Scheme;
  fetch?: FetchLike;
  /** Per-request timeout for the three handshake requests. */
  timeoutMs?: number;
  /** HMAC key/message order; must match the firmware. Default: DEVICE_HMAC_ORDER. */
  hmacOrder?: HmacOrder;
  nonceGenerator?: NonceGenerator;
  logger?: Logger;
}

export class RouterAuthClient {
  private readonly timeoutMs: number;
  private readonly hmacOrder: HmacOrder;
  private readonly nonceGenerator: NonceGenerator;
  private readonly logger: Logger;

  constructor(
    readonly address: string,
    private readonly options: RouterAuthClientOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
    this.hmacOrder = options.hmacOrder ?? DEVICE_HMAC_ORDER;
    this.nonceGenerator = options.nonceGenerator ?? generateNonce;
    this.logger = options.logger ?? silentLogger;
  }

  /** A new, empty cookie context bound to this router. */
  newSession(): RouterSession {
    return new RouterSession(this.address, { scheme: this.options.scheme, fetch: this.options.fetch });
  }

  /**
   * Full login: CSRF fetch → nonce exchange → proof submission.
   * Any failure aborts the attempt; nothing is retried here.
   *
   * @returns the session holding the router-issued session cookie
   */
  async authenticate(username: string, password: string): Promise<RouterSession> {
    const session = this.newSession();
    this.logger.info('login_start', { router: this.address, username });

    // Step 1: CSRF pair from the landing page
    const firstCsrf = await fetchCsrfTokens(session, this.timeoutMs);

    // Step 2: nonce exchange
    const clientNonce = this.nonceGenerator();
    this.logger.debug('nonce_generated', { client_nonce: preview(clientNonce) });
    const { challenge, csrf: secondCsrf } = await this.exchangeNonce(session, username, clientNonce, firstCsrf);
    this.logger.debug('nonce_exchanged', {
      server_nonce: preview(challenge.serverNonce),
      iterations: challenge.iterations,
    });

    // Step 3: proof
    const clientProof = computeProof(
      password,
      challenge.salt,
      challenge.iterations,
      challenge.clientNonce,
      challenge.serverNonce,
      this.hmacOrder,
    );

    // Step 4: submit proof with the pair issued by the nonce exchange.
    // The landing page already set a pre-login cookie; the proof reply must replace it.
    const preLoginCookies = session.cookieHeader();
    const level = await this.submitProof(session, clientProof, challenge.serverNonce, secondCsrf);
    if (session.cookieHeader() === preLoginCookies) {
      throw new ProtocolError('login accepted but the router issued no session cookie');
    }

    this.logger.info('login_ok', { router: this.address, level_granted: level });
    return session;
  }

  private async exchangeNonce(
    session: RouterSession,
    username: string,
    clientNonce: string,
    csrf: CsrfTokenPair,
  ): Promise<{ challenge: NonceChallenge; csrf: CsrfTokenPair }> {
    const body: NonceRequestDto = {
      data: { username, firstnonce: clientNonce },
      csrf,
    };
    const res = await this._post(session, NONCE_PATH, body);
    const json = res.json();

    const { err } = parseWire(errCodeSchema, json, NONCE_PATH);
    if (err !== 0) {
      this.logger.warn('nonce_rejected', { router: this.address, err });
      throw new ServerRejectedError(err);
    }

    const dto = parseWire(nonceResponseSchema, json, NONCE_PATH);
    return {
      challenge: {
        clientNonce,
        serverNonce: dto.servernonce,
        salt: dto.salt,
        iterations: dto.iterations,
      },
      csrf: { csrf_param: dto.csrf_param, csrf_token: dto.csrf_token },
    };
  }

  private async submitProof(
    session: RouterSession,
    clientProof: string,
    serverNonce: string,
    csrf: CsrfTokenPair,
  ): Promise<number | string | null> {
    const body: ProofRequestDto = {
      data: { clientproof: clientProof, finalnonce: serverNonce },
      csrf,
    };
    const res = await this._post(session, PROOF_PATH, body);
    const json = res.json();

    const { err } = parseWire(errCodeSchema, json, PROOF_PATH);
    const dto = parseWire(proofResponseSchema, json, PROOF_PATH);
    if (err !== 0) {
      this.logger.warn('proof_rejected', { router: this.address, err, category: dto.errorCategory ?? null });
      throw new AuthenticationRejectedError(err, dto.errorCategory ?? null);
    }
    return dto.level ?? null;
  }

  private async _post(session: RouterSession, path: string, body: unknown): Promise<RouterResponse> {
    const res = await session.postJson(path, body, { headers: { ...LOGIN_HEADERS }, timeoutMs: this.timeoutMs });
    if (res.status !== 200) {
      throw new TransportError(`POST ${path}: HTTP ${res.status}`, res.status);
    }
    return res;
  }
}

/**
 * One-shot login; see RouterAuthClient.authenticate.
 */
export async function authenticate(
  address: string,
  username: string,
  password: string,
  options?: RouterAuthClientOptions,
): Promise<RouterSession> {
  return new RouterAuthClient(address, options).authenticate(username, password);
}
