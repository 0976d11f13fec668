/**
 * Structured event logger: one JSON object per line, which journald, Docker
 * and most log shippers ingest without a parser.
 *
 *   {"ts":"2026-10-18T12:00:00.000Z","level":"info","scope":"handshake","event":"login_ok","level_granted":2}
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogSink = (line: string, level: Exclude<LogLevel, 'silent'>) => void;

const consoleSink: LogSink = (line, level) => {
  // eslint-disable-next-line no-console
  if (level === 'error' || level === 'warn') console.error(line);
  // eslint-disable-next-line no-console
  else console.log(line);
};

/**
 * Shorten a secret-adjacent value (nonces, tokens) so logs can correlate
 * attempts without recording the full value.
 */
export function preview(value: string, length = 12): string {
  return value.length > length ? `${value.slice(0, length)}...` : value;
}

export function createLogger(scope: string, level: LogLevel = 'info', sink: LogSink = consoleSink): Logger {
  const threshold = RANK[level];

  const emit = (lvl: Exclude<LogLevel, 'silent'>, event: string, fields: LogFields = {}) => {
    if (RANK[lvl] < threshold) return;
    sink(JSON.stringify({ ts: new Date().toISOString(), level: lvl, scope, event, ...fields }), lvl);
  };

  return {
    debug: (event, fields) => emit('debug', event, fields),
    info: (event, fields) => emit('info', event, fields),
    warn: (event, fields) => emit('warn', event, fields),
    error: (event, fields) => emit('error', event, fields),
    child: (child) => createLogger(`${scope}.${child}`, level, sink),
  };
}

/** Logger that drops everything; the default for library callers that pass none. */
export const silentLogger: Logger = createLogger('silent', 'silent');
