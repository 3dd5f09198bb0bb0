import type { Redis } from 'ioredis';
import { systemClock, type Clock } from './clock.js';

/**
 * Fixed-window attempt counter. `hit` records one attempt under `key` and resolves
 * to the number of attempts made in the current window, this one included.
 */
export interface AttemptLimiter {
  hit(key: string): Promise<number>;
  reset(key: string): Promise<void>;
  close(): Promise<void>;
}

const SWEEP_INTERVAL_MS = 60_000;

/** Single-process counters. Expired windows are dropped by an unref'd sweeper. */
export class MemoryAttemptLimiter implements AttemptLimiter {
  private readonly windows = new Map<string, { count: number; resetAt: number }>();
  private sweeper: NodeJS.Timeout | null = null;

  constructor(
    private readonly windowMs: number,
    private readonly clock: Clock = systemClock,
    options: { sweepIntervalMs?: number } = {},
  ) {
    const sweepIntervalMs = options.sweepIntervalMs ?? SWEEP_INTERVAL_MS;
    if (sweepIntervalMs > 0) {
      this.sweeper = setInterval(() => this.sweep(), sweepIntervalMs);
      this.sweeper.unref();
    }
  }

  get size(): number {
    return this.windows.size;
  }

  async hit(key: string): Promise<number> {
    const now = this.clock.now().getTime();
    const current = this.windows.get(key);

    if (!current || current.resetAt <= now) {
      this.windows.set(key, { count: 1, resetAt: now + this.windowMs });
      return 1;
    }

    current.count++;
    return current.count;
  }

  async reset(key: string): Promise<void> {
    this.windows.delete(key);
  }

  /** Drops windows that have ended. Returns how many were removed. */
  sweep(): number {
    const now = this.clock.now().getTime();
    let removed = 0;
    for (const [key, window] of this.windows) {
      if (window.resetAt <= now) {
        this.windows.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async close(): Promise<void> {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
    this.windows.clear();
  }
}

export class RedisAttemptLimiter implements AttemptLimiter {
  constructor(
    private readonly redis: Redis,
    private readonly windowMs: number,
    private readonly prefix = 'attempts:',
  ) {}

  async hit(key: string): Promise<number> {
    const attempts = await this.redis.incr(this.prefix + key);
    if (attempts === 1) {
      await this.redis.pexpire(this.prefix + key, this.windowMs);
    }
    return attempts;
  }

  async reset(key: string): Promise<void> {
    await this.redis.del(this.prefix + key);
  }

  // Keys expire in Redis; the connection belongs to the credential store.
  async close(): Promise<void> {}
}
