/**
 * Representative lookup service entry point.
 *
 * Loads the constituency datasets once, builds the query cache and serves the
 * lookup API until SIGINT/SIGTERM.
 */

import type { Server } from 'http';
import { config } from './config';
import { logger } from './utils/logger';
import { TTLCache } from './utils/TTLCache';
import { loadDataStore } from './lib/data-store';
import { createApp } from './app';
import type { RepresentativeLookup } from './types';

let server: Server | undefined;

async function shutdown(signal: string): Promise<void> {
  logger.info('Shutting down gracefully...', { signal });

  const running = server;
  if (running) {
    await new Promise<void>((resolve, reject) => {
      running.close(err => (err ? reject(err) : resolve()));
    });
  }

  logger.info('Shutdown complete');
}

function onSignal(signal: string): void {
  shutdown(signal)
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error('Error during shutdown', { error });
      process.exit(1);
    });
}

async function start(): Promise<void> {
  const loaded = await loadDataStore();
  if (loaded.status === 'error') {
    logger.error('Cannot start without constituency data', { error: loaded.error });
    process.exit(1);
  }

  const cache = new TTLCache<RepresentativeLookup>({
    ttlMs: config.cache.ttlMs,
    maxEntries: config.cache.maxEntries,
  });
  const app = createApp({ store: loaded.store, cache });

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  server = app.listen(config.port, () => {
    const memUsage = process.memoryUsage();
    logger.info('Representative lookup service started', {
      port: config.port,
      environment: config.nodeEnv,
      boundaries: loaded.store.boundaries.length,
      cacheTtlMs: config.cache.ttlMs,
      memory: {
        heapUsed: Math.round(memUsage.heapUsed / 1024 / 1024),
        rss: Math.round(memUsage.rss / 1024 / 1024),
      },
    });
  });
}

start().catch((error: unknown) => {
  logger.error('Failed to start service', { error });
  process.exit(1);
});
