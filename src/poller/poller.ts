/**
 * Timer-driven collection loop. Each cycle makes sure the router session is
 * valid, then hands it to the collector. Failed cycles are retried on a
 * shorter interval until too many fail in a row.
 */
import { isRouterAuthError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { AuthSessionManager } from '../router/manager.js';
import type { RouterSession } from '../session/session.js';

export type Collector = (session: RouterSession) => Promise<void>;

export type SessionProvider = Pick<AuthSessionManager, 'ensureAuthenticated' | 'fail'>;

export interface PollerOptions {
  manager: SessionProvider;
  collect: Collector;
  collectionIntervalMs?: number;
  retryIntervalMs?: number;
  maxConsecutiveErrors?: number;
  logger?: Logger;
}

export const DEFAULT_COLLECTION_INTERVAL_MS = 300_000;
export const DEFAULT_RETRY_INTERVAL_MS = 60_000;
export const DEFAULT_MAX_CONSECUTIVE_ERRORS = 5;

export class Poller {
  private readonly manager: SessionProvider;
  private readonly collect: Collector;
  private readonly collectionIntervalMs: number;
  private readonly retryIntervalMs: number;
  private readonly maxConsecutiveErrors: number;
  private readonly logger: Logger;

  private timer: NodeJS.Timeout | null = null;
  private current: Promise<void> | null = null;
  private running = false;
  private cycle = 0;
  private consecutiveErrors = 0;
  private lastError: Error | null = null;
  private stopped: Promise<void> = Promise.resolve();
  private markStopped: () => void = () => {};

  constructor(options: PollerOptions) {
    this.manager = options.manager;
    this.collect = options.collect;
    this.collectionIntervalMs = options.collectionIntervalMs ?? DEFAULT_COLLECTION_INTERVAL_MS;
    this.retryIntervalMs = options.retryIntervalMs ?? DEFAULT_RETRY_INTERVAL_MS;
    this.maxConsecutiveErrors = options.maxConsecutiveErrors ?? DEFAULT_MAX_CONSECUTIVE_ERRORS;
    this.logger = options.logger ?? silentLogger;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get errorCount(): number {
    return this.consecutiveErrors;
  }

  /** Run the first cycle immediately, then keep going until stop() or too many errors. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.stopped = new Promise((resolve) => {
      this.markStopped = resolve;
    });
    this.logger.info('poller_start', {
      collection_interval_ms: this.collectionIntervalMs,
      retry_interval_ms: this.retryIntervalMs,
    });
    this.schedule(0);
  }

  /** Cancel the pending cycle and wait for the one in progress, if any. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const wasRunning = this.running;
    this.running = false;
    if (this.current) await this.current;
    if (wasRunning) {
      this.logger.info('poller_stop', { cycles: this.cycle });
      this.markStopped();
    }
  }

  /** Resolves once the loop has stopped, by stop() or by giving up. */
  whenStopped(): Promise<void> {
    return this.stopped;
  }

  /** One authenticate-then-collect pass. Never throws; returns whether it succeeded. */
  async runCycle(): Promise<boolean> {
    this.cycle += 1;
    const startedAt = Date.now();
    try {
      const session = await this.manager.ensureAuthenticated();
      await this.collect(session);
      this.consecutiveErrors = 0;
      this.lastError = null;
      this.logger.info('cycle_ok', { cycle: this.cycle, duration_ms: Date.now() - startedAt });
      return true;
    } catch (error) {
      this.consecutiveErrors += 1;
      this.lastError = error instanceof Error ? error : new Error(String(error));
      this.logger.error('cycle_failed', {
        cycle: this.cycle,
        kind: isRouterAuthError(error) ? error.kind : 'collector',
        error: this.lastError.message,
        consecutive_errors: this.consecutiveErrors,
        max_consecutive_errors: this.maxConsecutiveErrors,
      });
      return false;
    }
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.current = this.tick().finally(() => {
        this.current = null;
      });
    }, delayMs);
  }

  private async tick(): Promise<void> {
    const ok = await this.runCycle();
    if (!this.running) return;

    if (this.lastError && this.consecutiveErrors >= this.maxConsecutiveErrors) {
      this.manager.fail(this.lastError);
      this.logger.error('poller_gave_up', { consecutive_errors: this.consecutiveErrors });
      this.running = false;
      this.markStopped();
      return;
    }

    const delay = ok ? this.collectionIntervalMs : this.retryIntervalMs;
    this.logger.debug('next_cycle', { delay_ms: delay });
    this.schedule(delay);
  }
}
