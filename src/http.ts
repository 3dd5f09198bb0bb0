#!/usr/bin/env node

import { createApp, createContext } from './app.js';
import { config } from './config/index.js';
import { db, runMigrations, closeDatabase } from './db/index.js';
import { createRedisClient, RedisCredentialStore } from './services/credential-store.js';
import { createLogger } from './services/logger.js';
import { RedisAttemptLimiter } from './services/rate-limit.js';

const log = createLogger('http');

async function main(): Promise<void> {
  // Run database migrations
  log.info('Running database migrations...');
  await runMigrations();
  log.info('Migrations complete');

  // Share credentials and the deny list across instances when Redis is configured
  const redis = config.redis.url ? createRedisClient(config.redis.url) : null;
  const ctx = createContext({
    config,
    knex: db,
    credentialStore: redis ? new RedisCredentialStore(redis) : undefined,
    limiter: redis ? new RedisAttemptLimiter(redis, config.auth.redeemWindowMinutes * 60_000) : undefined,
  });
  log.info(`Credential store: ${redis ? 'redis' : 'memory'}`);

  if (config.scheduler.enabled) {
    ctx.scheduler.start();
  }

  const { port, host } = config.server;
  const server = createApp(ctx).listen(port, host, () => {
    log.info(`Reminder server running at http://${host}:${port}`);
    log.info(`API endpoint: http://${host}:${port}/api`);
  });

  // Handle shutdown
  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info(`${signal} received, shutting down...`);

    server.close();
    await ctx.scheduler.stop();
    await ctx.limiter.close();
    await ctx.credentialStore.close();
    await closeDatabase();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        log.error('Shutdown failed:', error);
        process.exit(1);
      });
    });
  }
}

main().catch((error) => {
  log.error('Fatal error:', error);
  process.exit(1);
});
