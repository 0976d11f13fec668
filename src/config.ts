/**
 * Runtime configuration, read once from the environment by the entry point
 * and passed down explicitly. Nothing below src/main.ts touches process.env.
 */
import { z } from 'zod';
import type { LogLevel } from './logger.js';
import type { RouterCredentials } from './router/manager.js';
import type { Scheme } from './session/session.js';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  ROUTER_ADDRESS: z.string().trim().min(1),
  ROUTER_USERNAME: z.string().trim().min(1),
  ROUTER_PASSWORD: z.string().min(1),
  ROUTER_SCHEME: z.enum(['http', 'https']).default('http'),
  ROUTER_HANDSHAKE_TIMEOUT_MS: positiveInt(15_000),
  ROUTER_PROBE_TIMEOUT_MS: positiveInt(5_000),
  COLLECTION_INTERVAL_SECONDS: positiveInt(300),
  RETRY_INTERVAL_SECONDS: positiveInt(60),
  MAX_CONSECUTIVE_ERRORS: positiveInt(5),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export interface AppConfig {
  router: RouterCredentials & { scheme: Scheme };
  handshakeTimeoutMs: number;
  probeTimeoutMs: number;
  collectionIntervalMs: number;
  retryIntervalMs: number;
  maxConsecutiveErrors: number;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

// Empty strings in .env mean "not set".
function withoutBlanks(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    router: {
      address: e.ROUTER_ADDRESS,
      username: e.ROUTER_USERNAME,
      password: e.ROUTER_PASSWORD,
      scheme: e.ROUTER_SCHEME,
    },
    handshakeTimeoutMs: e.ROUTER_HANDSHAKE_TIMEOUT_MS,
    probeTimeoutMs: e.ROUTER_PROBE_TIMEOUT_MS,
    collectionIntervalMs: e.COLLECTION_INTERVAL_SECONDS * 1000,
    retryIntervalMs: e.RETRY_INTERVAL_SECONDS * 1000,
    maxConsecutiveErrors: e.MAX_CONSECUTIVE_ERRORS,
    logLevel: e.LOG_LEVEL,
  };
}
