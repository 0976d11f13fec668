import { silentLogger, type Logger } from '../logger.js';
import type { RouterSession } from '../session/session.js';

export const PROBE_PATH = '/api/system/HostInfo';

export const DEFAULT_PROBE_TIMEOUT_MS = 5_000;

/** Statuses the router answers with once a session cookie has expired. */
const INVALID_SESSION_STATUSES = new Set([401, 403, 404]);

export interface ValidatorOptions {
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Probe an authenticated endpoint to decide whether `session` is still usable.
 *
 * Never throws: expired-session statuses, other non-2xx statuses, transport
 * failures and non-JSON bodies (the login page served with 200) all count as
 * invalid. The probe does not store cookies from the response.
 */
export async function isSessionValid(session: RouterSession, options: ValidatorOptions = {}): Promise<boolean> {
  const logger = options.logger ?? silentLogger;
  try {
    const res = await session.get(PROBE_PATH, {
      timeoutMs: options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS,
      persistCookies: false,
    });
    if (INVALID_SESSION_STATUSES.has(res.status)) {
      logger.info('session_expired', { router: session.address, status: res.status });
      return false;
    }
    if (!res.ok) {
      logger.warn('session_probe_status', { router: session.address, status: res.status });
      return false;
    }
    res.json();
    return true;
  } catch (error) {
    logger.warn('session_probe_failed', {
      router: session.address,
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}
