/**
 * In-process stand-in for the router's web API, plugged into RouterSession
 * through its `fetch` option. Records every request so tests can assert on
 * ordering, headers and bodies.
 */
import { computeProof } from '../../src/scram/proof.js';
import type { FetchInit, FetchLike, FetchResponse } from '../../src/session/session.js';

export const CSRF_1 = { csrf_param: 'csrf-param-1', csrf_token: 'csrf-token-1' };
export const CSRF_2 = { csrf_param: 'csrf-param-2', csrf_token: 'csrf-token-2' };

export const MOCK_PASSWORD = 'test-secret';
export const MOCK_SALT = '00112233445566778899aabbccddeeff00112233445566778899aabbccddeeff';
export const MOCK_ITERATIONS = 1000;
export const MOCK_SERVER_SUFFIX = 'MockServerNonce';
export const SESSION_COOKIE = 'SessionID_R3';

export const LOGIN_PAGE_HTML = `<!DOCTYPE html>
<html><head>
<meta charset="utf-8">
<meta name="csrf_param" content="${CSRF_1.csrf_param}"/>
<meta name="csrf_token" content="${CSRF_1.csrf_token}"/>
<title>Router</title>
</head><body></body></html>`;

export interface RecordedCall {
  method: string;
  path: string;
  headers: Record<string, string>;
  body: unknown;
}

export interface MockRouterOptions {
  password?: string;
  salt?: string;
  iterations?: number;
  /** Non-zero makes user_login_nonce fail with this `err`. */
  nonceErr?: number;
  /** Non-zero makes user_login_proof fail with this `err` regardless of the proof. */
  proofErr?: number;
  /** Accept the proof but send no Set-Cookie with the reply. */
  omitSessionCookie?: boolean;
  /** Replaces the login page body. */
  loginPage?: string;
  /** Forces the status of the named path. */
  statusOverrides?: Record<string, number>;
  /** Paths whose requests fail at the socket level. */
  unreachable?: string[];
  /** Paths whose requests never answer (until aborted). */
  hang?: string[];
}

/** Loose view of the JSON bodies the client posts. */
interface PostedBody {
  data?: Record<string, string>;
  csrf?: { csrf_param?: string; csrf_token?: string };
}

interface Reply {
  status: number;
  body: string;
  contentType?: string;
  setCookies?: string[];
}

const json = (value: unknown, setCookies?: string[]): Reply => ({
  status: 200,
  body: JSON.stringify(value),
  contentType: 'application/json',
  setCookies,
});

export class MockRouter {
  readonly calls: RecordedCall[] = [];
  private readonly options: MockRouterOptions;
  private readonly liveSessions = new Set<string>();
  private issued = 0;

  constructor(options: MockRouterOptions = {}) {
    this.options = options;
  }

  /** Paths requested, in order, as "METHOD /path". */
  get trace(): string[] {
    return this.calls.map((c) => `${c.method} ${c.path}`);
  }

  bodyOf(path: string, index = 0): unknown {
    return this.calls.filter((c) => c.path === path)[index]?.body;
  }

  /** Forget all issued sessions, as a router reboot or idle timeout would. */
  expireSessions(): void {
    this.liveSessions.clear();
  }

  readonly fetch: FetchLike = async (url, init) => {
    const path = new URL(url).pathname;
    const body: PostedBody | undefined = init.body === undefined ? undefined : JSON.parse(init.body);
    this.calls.push({ method: init.method, path, headers: { ...init.headers }, body });

    if (this.options.unreachable?.includes(path)) {
      throw new TypeError('fetch failed', { cause: Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }) });
    }
    if (this.options.hang?.includes(path)) {
      return new Promise<FetchResponse>((_, reject) => {
        init.signal.addEventListener('abort', () => {
          const aborted = new Error('This operation was aborted');
          aborted.name = 'AbortError';
          reject(aborted);
        });
      });
    }

    const reply = this.route(init.method, path, body, init);
    const status = this.options.statusOverrides?.[path] ?? reply.status;
    const headers = new Headers();
    if (reply.contentType) headers.set('content-type', reply.contentType);
    for (const cookie of reply.setCookies ?? []) headers.append('set-cookie', cookie);
    return {
      status,
      ok: status >= 200 && status < 300,
      headers,
      text: async () => reply.body,
    };
  };

  private sessionOf(init: FetchInit): string | null {
    const cookie = init.headers['Cookie'] ?? '';
    const match = new RegExp(`${SESSION_COOKIE}=([^;]+)`).exec(cookie);
    return match ? match[1] : null;
  }

  private isAuthenticated(init: FetchInit): boolean {
    const id = this.sessionOf(init);
    return id !== null && this.liveSessions.has(id);
  }

  private route(method: string, path: string, body: PostedBody | undefined, init: FetchInit): Reply {
    const password = this.options.password ?? MOCK_PASSWORD;
    const salt = this.options.salt ?? MOCK_SALT;
    const iterations = this.options.iterations ?? MOCK_ITERATIONS;

    if (method === 'GET' && path === '/html/index.html') {
      return {
        status: 200,
        body: this.options.loginPage ?? LOGIN_PAGE_HTML,
        contentType: 'text/html',
        setCookies: [`${SESSION_COOKIE}=pre-login; path=/; HttpOnly`],
      };
    }

    if (method === 'POST' && path === '/api/system/user_login_nonce') {
      if (this.options.nonceErr) return json({ err: this.options.nonceErr });
      if (body?.csrf?.csrf_token !== CSRF_1.csrf_token) return json({ err: 9003 });
      return json({
        err: 0,
        salt,
        iterations,
        servernonce: `${body?.data?.firstnonce ?? ''}${MOCK_SERVER_SUFFIX}`,
        modeselected: 1,
        ...CSRF_2,
      });
    }

    if (method === 'POST' && path === '/api/system/user_login_proof') {
      if (this.options.proofErr) return json({ err: this.options.proofErr, errorCategory: 'user_pass_err' });
      if (body?.csrf?.csrf_token !== CSRF_2.csrf_token) return json({ err: 9003, errorCategory: 'csrf' });
      const finalNonce = body?.data?.finalnonce ?? '';
      const firstNonce = finalNonce.slice(0, -MOCK_SERVER_SUFFIX.length);
      const expected = computeProof(password, salt, iterations, firstNonce, finalNonce);
      if (body?.data?.clientproof !== expected) return json({ err: -1, errorCategory: 'user_pass_err', count: 1 });
      this.issued += 1;
      const id = `authed-${this.issued}`;
      this.liveSessions.add(id);
      if (this.options.omitSessionCookie) return json({ err: 0, level: 2 });
      return json({ err: 0, level: 2 }, [`${SESSION_COOKIE}=${id}; path=/; HttpOnly`]);
    }

    if (method === 'GET' && path === '/api/system/HostInfo') {
      if (!this.isAuthenticated(init)) return { status: 404, body: 'Not Found', contentType: 'text/plain' };
      return json([{ HostName: 'laptop', Active: true }]);
    }

    if (method === 'GET' && path === '/api/system/deviceinfo') {
      if (!this.isAuthenticated(init)) return { status: 404, body: 'Not Found', contentType: 'text/plain' };
      return json({ custinfo: { CustDeviceName: 'AX2 Test' }, SoftwareVersion: '10.0.5.1' });
    }

    return { status: 404, body: 'Not Found', contentType: 'text/plain' };
  }
}
