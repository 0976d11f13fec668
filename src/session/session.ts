/**
 * Cookie-bearing HTTP context shared by every request of one login attempt,
 * and handed to collectors once the attempt succeeds.
 */
import { ProtocolError, RouterAuthError, TransportError } from '../errors.js';

export type Scheme = 'http' | 'https';

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

/** The part of a WHATWG Response the session reads. */
export interface FetchResponse {
  status: number;
  ok: boolean;
  headers: {
    get(name: string): string | null;
    getSetCookie(): string[];
  };
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>;

export const defaultFetch: FetchLike = (url, init) => fetch(url, init);

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export interface RequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  /** Serialized as the request body. */
  json?: unknown;
  timeoutMs?: number;
  /** When false, Set-Cookie headers of the response are ignored. Default: true. */
  persistCookies?: boolean;
}

export class RouterResponse {
  constructor(
    readonly status: number,
    readonly ok: boolean,
    readonly text: string,
    readonly contentType: string | null,
  ) {}

  /** Parse the body; a non-JSON body is a protocol violation. */
  json(): unknown {
    try {
      return JSON.parse(this.text);
    } catch (error) {
      throw new ProtocolError(`expected JSON body (HTTP ${this.status})`, { cause: error });
    }
  }
}

export interface RouterSessionOptions {
  scheme?: Scheme;
  fetch?: FetchLike;
}

export class RouterSession {
  readonly baseUrl: string;
  private readonly fetchFn: FetchLike;
  private readonly jar = new Map<string, string>();

  constructor(readonly address: string, options: RouterSessionOptions = {}) {
    this.baseUrl = `${options.scheme ?? 'http'}://${address}`;
    this.fetchFn = options.fetch ?? defaultFetch;
  }

  /** Snapshot of the cookie jar. */
  get cookies(): ReadonlyMap<string, string> {
    return new Map(this.jar);
  }

  /** Value for a `Cookie` request header, or null while the jar is empty. */
  cookieHeader(): string | null {
    if (this.jar.size === 0) return null;
    return Array.from(this.jar, ([name, value]) => `${name}=${value}`).join('; ');
  }

  async get(path: string, options: Omit<RequestOptions, 'method' | 'json'> = {}): Promise<RouterResponse> {
    return this.request(path, { ...options, method: 'GET' });
  }

  async postJson(path: string, body: unknown, options: Omit<RequestOptions, 'method' | 'json'> = {}): Promise<RouterResponse> {
    return this.request(path, { ...options, method: 'POST', json: body });
  }

  /**
   * Issue one request against the router. Transport failures, including the
   * timeout, surface as TransportError; HTTP statuses are left to the caller.
   */
  async request(path: string, options: RequestOptions = {}): Promise<RouterResponse> {
    const method = options.method ?? 'GET';
    const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    const headers: Record<string, string> = { ...options.headers };
    const cookie = this.cookieHeader();
    if (cookie) headers['Cookie'] = cookie;

    let body: string | undefined;
    if (options.json !== undefined) {
      body = JSON.stringify(options.json);
      headers['Content-Type'] ??= 'application/json';
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const res = await this.fetchFn(`${this.baseUrl}${path}`, { method, headers, body, signal: controller.signal });
      const text = await res.text();
      if (options.persistCookies ?? true) {
        this.absorbCookies(res.headers.getSetCookie());
      }
      return new RouterResponse(res.status, res.ok, text, res.headers.get('content-type'));
    } catch (error) {
      if (error instanceof RouterAuthError) throw error;
      if (controller.signal.aborted) {
        throw new TransportError(`${method} ${path}: timeout after ${timeoutMs}ms`, null, { cause: error });
      }
      throw new TransportError(`${method} ${path}: ${describeFetchError(error)}`, null, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }

  private absorbCookies(setCookies: string[]): void {
    for (const raw of setCookies) {
      const parsed = parseSetCookie(raw);
      if (!parsed) continue;
      if (parsed.expired) this.jar.delete(parsed.name);
      else this.jar.set(parsed.name, parsed.value);
    }
  }
}

/**
 * Parse one Set-Cookie header into name, value and whether it deletes the cookie.
 * Only the attributes that decide expiry are read; the router scopes all of
 * its cookies to `/` on its own host.
 */
export function parseSetCookie(
  header: string,
  now: Date = new Date(),
): { name: string; value: string; expired: boolean } | null {
  const [pair, ...attributes] = header.split(';');
  const eq = pair.indexOf('=');
  if (eq <= 0) return null;
  const name = pair.slice(0, eq).trim();
  const value = pair.slice(eq + 1).trim();
  if (!name) return null;

  let expired = false;
  for (const attribute of attributes) {
    const [rawKey, ...rest] = attribute.split('=');
    const key = rawKey.trim().toLowerCase();
    const attrValue = rest.join('=').trim();
    if (key === 'max-age') {
      const seconds = Number(attrValue);
      if (Number.isFinite(seconds) && seconds <= 0) expired = true;
    } else if (key === 'expires') {
      const at = Date.parse(attrValue);
      if (Number.isFinite(at) && at <= now.getTime()) expired = true;
    }
  }
  return { name, value, expired };
}

// undici wraps socket errors (ECONNREFUSED, ENOTFOUND, ...) in `cause`.
function describeFetchError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const parts = [`${error.name}: ${error.message}`];
  const cause: unknown = error.cause;
  if (cause instanceof Error) {
    parts.push(`cause=${cause.name}: ${cause.message}`);
    if ('code' in cause && cause.code) parts.push(`code=${String(cause.code)}`);
  }
  return parts.join(' | ');
}
