#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { AuthSessionManager } from './router/manager.js';
import { fetchDeviceInfo } from './router/device-info.js';
import { Poller } from './poller/poller.js';

async function main(): Promise<number> {
  dotenv.config();
  const config = loadConfig(process.env);
  const logger = createLogger('router-session', config.logLevel);

  const manager = new AuthSessionManager(config.router, {
    scheme: config.router.scheme,
    timeoutMs: config.handshakeTimeoutMs,
    probeTimeoutMs: config.probeTimeoutMs,
    logger: logger.child('auth'),
  });

  const poller = new Poller({
    manager,
    collect: async (session) => {
      const info = await fetchDeviceInfo(session, config.probeTimeoutMs);
      logger.info('device_info', { model: info.model, software_version: info.softwareVersion });
    },
    collectionIntervalMs: config.collectionIntervalMs,
    retryIntervalMs: config.retryIntervalMs,
    maxConsecutiveErrors: config.maxConsecutiveErrors,
    logger: logger.child('poller'),
  });

  const shutdown = (signal: string) => {
    logger.info('shutdown', { signal });
    poller.stop().catch((error: unknown) => {
      logger.error('shutdown_failed', { error: error instanceof Error ? error.message : String(error) });
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  poller.start();
  await poller.whenStopped();
  return manager.state.status === 'failed' ? 1 : 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    // eslint-disable-next-line no-console
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  },
);
