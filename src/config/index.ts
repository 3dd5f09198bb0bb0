import { z } from 'zod';

const configSchema = z.object({
  env: z.enum(['development', 'production', 'test']).default('development'),
  database: z.object({
    type: z.enum(['sqlite', 'postgres']).default('sqlite'),
    path: z.string().default('./data/reminders.db'),
    url: z.string().optional(),
  }),
  redis: z.object({
    url: z.string().optional(),
  }),
  auth: z.object({
    jwtSecret: z.string().min(16),
    accessTokenTtlSeconds: z.number().int().positive().default(24 * 60 * 60),
    refreshTokenTtlSeconds: z.number().int().positive().default(7 * 24 * 60 * 60),
    otpTtlMinutes: z.number().positive().default(5),
    resetTokenTtlMinutes: z.number().positive().default(60),
    maxRedeemAttempts: z.number().int().positive().default(5),
    redeemWindowMinutes: z.number().positive().default(15),
  }),
  smtp: z.object({
    host: z.string().optional(),
    port: z.number().default(587),
    secure: z.boolean().default(false),
    user: z.string().optional(),
    pass: z.string().optional(),
    from: z.string().default('Reminders <no-reply@localhost>'),
  }),
  webhook: z.object({
    url: z.string().optional(),
    apiKey: z.string().optional(),
  }),
  scheduler: z.object({
    enabled: z.boolean().default(true),
    intervalMs: z.number().int().positive().default(60_000),
    dispatchTimeoutMs: z.number().int().positive().default(10_000),
  }),
  server: z.object({
    port: z.number().default(3000),
    host: z.string().default('0.0.0.0'),
    publicUrl: z.string().default('http://localhost:3000'),
  }),
  defaultTimezone: z.string().default('UTC'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

const DEV_SECRET = 'development-secret-key';

function int(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const nodeEnv = env.NODE_ENV === 'production' || env.NODE_ENV === 'test' ? env.NODE_ENV : 'development';
  const isProduction = nodeEnv === 'production';
  const databaseType = isProduction ? (env.DATABASE_TYPE || 'sqlite') : 'sqlite';

  if (isProduction && !env.JWT_SECRET) {
    throw new Error('JWT_SECRET is required in production');
  }

  return configSchema.parse({
    env: nodeEnv,
    database: {
      type: databaseType,
      path: env.DATABASE_PATH || './data/reminders.db',
      url: databaseType === 'postgres' ? env.DATABASE_URL : undefined,
    },
    redis: {
      url: env.REDIS_URL,
    },
    auth: {
      jwtSecret: env.JWT_SECRET || DEV_SECRET,
      accessTokenTtlSeconds: int(env.ACCESS_TOKEN_TTL, 24 * 60 * 60),
      refreshTokenTtlSeconds: int(env.REFRESH_TOKEN_TTL, 7 * 24 * 60 * 60),
      otpTtlMinutes: int(env.OTP_TTL_MINUTES, 5),
      resetTokenTtlMinutes: int(env.RESET_TOKEN_TTL_MINUTES, 60),
      maxRedeemAttempts: int(env.OTP_MAX_ATTEMPTS, 5),
      redeemWindowMinutes: int(env.OTP_ATTEMPT_WINDOW_MINUTES, 15),
    },
    smtp: {
      host: env.SMTP_HOST,
      port: int(env.SMTP_PORT, 587),
      secure: env.SMTP_SECURE === 'true',
      user: env.SMTP_USER,
      pass: env.SMTP_PASS,
      from: env.MAIL_FROM || 'Reminders <no-reply@localhost>',
    },
    webhook: {
      url: env.WEBHOOK_URL,
      apiKey: env.WEBHOOK_API_KEY,
    },
    scheduler: {
      enabled: env.SCHEDULER_ENABLED !== 'false',
      intervalMs: int(env.SCHEDULER_INTERVAL_MS, 60_000),
      dispatchTimeoutMs: int(env.DISPATCH_TIMEOUT_MS, 10_000),
    },
    server: {
      port: int(env.PORT, 3000),
      host: env.HOST || '0.0.0.0',
      publicUrl: env.PUBLIC_URL || `http://localhost:${int(env.PORT, 3000)}`,
    },
    defaultTimezone: env.DEFAULT_TIMEZONE || 'UTC',
    logLevel: env.LOG_LEVEL || 'info',
  });
}

export const config = loadConfig();
