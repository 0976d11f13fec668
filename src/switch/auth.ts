/**
 * Token login for the managed switch: one POST that returns a transaction id
 * (`_tid_`) to be sent with every later API call.
 */
import { z } from 'zod';
import { RouterSession, type FetchLike, type Scheme } from '../session/session.js';
import { AuthenticationRejectedError, ProtocolError, TransportError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';

export const SWITCH_LOGIN_PATH = '/data/login.json';

export const DEFAULT_SWITCH_TIMEOUT_MS = 10_000;

export type SwitchOperation = 'read' | 'write';

export interface SwitchLoginRequest {
  address: string;
  username: string;
  password: string;
  operation: SwitchOperation;
}

export interface SwitchToken {
  tid: string;
  userLevel: number;
}

export interface SwitchLoginOptions {
  scheme?: Scheme;
  fetch?: FetchLike;
  timeoutMs?: number;
  logger?: Logger;
}

const switchLoginSchema = z.object({
  success: z.boolean(),
  errorcode: z.union([z.number(), z.string()]).nullish(),
  data: z
    .object({
      _tid_: z.union([z.string(), z.number()]),
      usrLvl: z.coerce.number(),
    })
    .nullish(),
});

function errorCode(value: number | string | null | undefined): number {
  if (value === null || value === undefined) return -1;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : -1;
}

export async function switchLogin(request: SwitchLoginRequest, options: SwitchLoginOptions = {}): Promise<SwitchToken> {
  const logger = options.logger ?? silentLogger;
  const session = new RouterSession(request.address, { scheme: options.scheme, fetch: options.fetch });
  const res = await session.postJson(
    SWITCH_LOGIN_PATH,
    { username: request.username, password: request.password, operation: request.operation },
    { timeoutMs: options.timeoutMs ?? DEFAULT_SWITCH_TIMEOUT_MS },
  );
  if (!res.ok) {
    throw new TransportError(`POST ${SWITCH_LOGIN_PATH}: HTTP ${res.status}`, res.status);
  }

  const parsed = switchLoginSchema.safeParse(res.json());
  if (!parsed.success) {
    throw new ProtocolError(`unexpected ${SWITCH_LOGIN_PATH} response`);
  }
  const { success, data, errorcode } = parsed.data;
  if (!success || !data) {
    logger.warn('switch_login_rejected', { switch: request.address, errorcode: errorcode ?? null });
    throw new AuthenticationRejectedError(errorCode(errorcode), null);
  }

  logger.info('switch_login_ok', { switch: request.address, user_level: data.usrLvl });
  return { tid: String(data._tid_), userLevel: data.usrLvl };
}
