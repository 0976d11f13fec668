import * as cheerio from 'cheerio';
import { ProtocolError } from '../errors.js';
import type { CsrfTokenPair } from '../scram/types.js';
import type { RouterSession } from '../session/session.js';

export const LOGIN_PAGE_PATH = '/html/index.html';

/**
 * Pull the `csrf_param` / `csrf_token` meta tags out of the landing page.
 * Returns null when either tag is missing or empty.
 */
export function extractCsrfTokens(html: string): CsrfTokenPair | null {
  const $ = cheerio.load(html);
  const param = $('meta[name="csrf_param"]').attr('content');
  const token = $('meta[name="csrf_token"]').attr('content');
  if (!param || !token) return null;
  return { csrf_param: param, csrf_token: token };
}

/**
 * GET the static login page through `session`, which also picks up the
 * cookies the router sets before login.
 */
export async function fetchCsrfTokens(session: RouterSession, timeoutMs?: number): Promise<CsrfTokenPair> {
  const res = await session.get(LOGIN_PAGE_PATH, { timeoutMs });
  const tokens = extractCsrfTokens(res.text);
  if (!tokens) {
    throw new ProtocolError(`csrf meta tags missing from ${LOGIN_PAGE_PATH} (HTTP ${res.status})`);
  }
  return tokens;
}
