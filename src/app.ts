import express from 'express';
import cors from 'cors';
import cookieParser from 'cookie-parser';
import type { Knex } from 'knex';
import type { Config } from './config/index.js';
import { KnexReminderRepository } from './repositories/reminders.js';
import { TaskRepository } from './repositories/tasks.js';
import { UserRepository } from './repositories/users.js';
import { AuthService } from './services/auth.js';
import { systemClock, type Clock } from './services/clock.js';
import { MemoryCredentialStore, type CredentialStore } from './services/credential-store.js';
import { CredentialService } from './services/credentials.js';
import { createDispatcher, type NotificationDispatcher } from './services/notifier.js';
import { MemoryAttemptLimiter, type AttemptLimiter } from './services/rate-limit.js';
import { ReminderService } from './services/reminders.js';
import { ReminderScheduler } from './services/scheduler.js';
import { BearerTokenManager, TokenDenyList } from './services/tokens.js';
import type { AppContext } from './types/context.js';

import authRoutes from './routes/auth.js';
import adminRoutes from './routes/admin.js';
import reminderRoutes from './routes/reminders.js';
import taskRoutes from './routes/tasks.js';

export interface ContextOptions {
  config: Config;
  knex: Knex;
  clock?: Clock;
  dispatcher?: NotificationDispatcher;
  /** Defaults to the in-process store; pass a RedisCredentialStore to share across instances. */
  credentialStore?: CredentialStore;
  limiter?: AttemptLimiter;
}

export function createContext(options: ContextOptions): AppContext {
  const { config, knex } = options;
  const clock = options.clock ?? systemClock;
  const dispatcher = options.dispatcher ?? createDispatcher(config);
  const credentialStore = options.credentialStore ?? new MemoryCredentialStore(clock);
  const limiter = options.limiter ?? new MemoryAttemptLimiter(config.auth.redeemWindowMinutes * 60_000, clock);

  const users = new UserRepository(knex);
  const tasks = new TaskRepository(knex);
  const reminderRepository = new KnexReminderRepository(knex);

  const tokens = new BearerTokenManager(
    clock,
    {
      secret: config.auth.jwtSecret,
      accessTtlSeconds: config.auth.accessTokenTtlSeconds,
      refreshTtlSeconds: config.auth.refreshTokenTtlSeconds,
    },
    new TokenDenyList(credentialStore, clock),
  );

  const credentials = new CredentialService(credentialStore, limiter, clock, {
    secret: config.auth.jwtSecret,
    ttlMs: {
      otp: config.auth.otpTtlMinutes * 60_000,
      reset: config.auth.resetTokenTtlMinutes * 60_000,
    },
    maxAttempts: config.auth.maxRedeemAttempts,
  });

  return {
    config,
    clock,
    users,
    tasks,
    credentialStore,
    limiter,
    tokens,
    reminders: new ReminderService(reminderRepository, tasks, clock, config.defaultTimezone),
    scheduler: new ReminderScheduler(reminderRepository, dispatcher, clock, {
      intervalMs: config.scheduler.intervalMs,
      dispatchTimeoutMs: config.scheduler.dispatchTimeoutMs,
      timezone: config.defaultTimezone,
    }),
    auth: new AuthService(users, tokens, credentials, dispatcher, {
      publicUrl: config.server.publicUrl,
      dispatchTimeoutMs: config.scheduler.dispatchTimeoutMs,
    }),
  };
}

export function createApp(ctx: AppContext): express.Express {
  const app = express();

  // Middleware
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json());
  app.use(cookieParser());

  // Health check endpoint (no auth required)
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: ctx.clock.now().toISOString() });
  });

  // REST API routes
  app.use('/api/auth', authRoutes(ctx));
  app.use('/api/tasks', taskRoutes(ctx));
  app.use('/api/reminders', reminderRoutes(ctx));
  app.use('/api/admin', adminRoutes(ctx));

  return app;
}
