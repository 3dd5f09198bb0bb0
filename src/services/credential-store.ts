import { timingSafeEqual } from 'crypto';
import { Redis } from 'ioredis';
import { z } from 'zod';
import { systemClock, type Clock } from './clock.js';

export const StoredCredentialSchema = z.object({
  /** HMAC of the secret; the secret itself is never stored. */
  digest: z.string(),
  payload: z.string(),
  issuedAt: z.number(),
  expiresAt: z.number(),
});

export type StoredCredential = z.infer<typeof StoredCredentialSchema>;

export type ConsumeResult =
  | { status: 'missing' }
  | { status: 'mismatch' }
  | { status: 'consumed'; credential: StoredCredential };

/**
 * Key/value store with per-entry TTL. `consume` is an atomic compare-and-delete: of two
 * concurrent calls with the right digest for the same key, exactly one gets `consumed`.
 */
export interface CredentialStore {
  /** Overwrites whatever is stored under `key`. */
  put(key: string, credential: StoredCredential, ttlMs: number): Promise<void>;
  consume(key: string, digest: string): Promise<ConsumeResult>;
  has(key: string): Promise<boolean>;
  close(): Promise<void>;
}

export function digestsEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  if (left.length !== right.length) {
    return false;
  }
  return timingSafeEqual(left, right);
}

interface MemoryEntry {
  credential: StoredCredential;
  evictAt: number;
}

const SWEEP_INTERVAL_MS = 60_000;

/**
 * Single-process store. `consume` never awaits between the read and the delete, so it
 * is atomic on the event loop.
 */
export class MemoryCredentialStore implements CredentialStore {
  private readonly entries = new Map<string, MemoryEntry>();
  private sweeper: NodeJS.Timeout | null = null;

  constructor(
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
    return this.entries.size;
  }

  async put(key: string, credential: StoredCredential, ttlMs: number): Promise<void> {
    this.entries.set(key, { credential, evictAt: this.clock.now().getTime() + ttlMs });
  }

  async consume(key: string, digest: string): Promise<ConsumeResult> {
    const entry = this.entries.get(key);
    if (!entry) {
      return { status: 'missing' };
    }
    if (!digestsEqual(entry.credential.digest, digest)) {
      return { status: 'mismatch' };
    }
    this.entries.delete(key);
    return { status: 'consumed', credential: entry.credential };
  }

  async has(key: string): Promise<boolean> {
    const entry = this.entries.get(key);
    if (!entry) {
      return false;
    }
    if (entry.evictAt <= this.clock.now().getTime()) {
      this.entries.delete(key);
      return false;
    }
    return true;
  }

  /** Drops entries past their TTL. Returns how many were removed. */
  sweep(): number {
    const now = this.clock.now().getTime();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.evictAt <= now) {
        this.entries.delete(key);
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
    this.entries.clear();
  }
}

// GET, compare, DEL in one script so redemption is atomic across processes.
// Comparing digests (not secrets) means a timing difference reveals nothing usable.
const CONSUME_SCRIPT = `
local raw = redis.call('GET', KEYS[1])
if not raw then return {0} end
local entry = cjson.decode(raw)
if entry.digest ~= ARGV[1] then return {1} end
redis.call('DEL', KEYS[1])
return {2, raw}
`;

// {0} missing, {1} mismatch, {2, raw} consumed
const ConsumeReply = z.array(z.union([z.number(), z.string()]));

export function createRedisClient(url: string): Redis {
  return new Redis(url, {
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      return Math.min(times * 50, 2000);
    },
  });
}

/** Shares one Redis connection across processes; `close` quits that connection. */
export class RedisCredentialStore implements CredentialStore {
  constructor(
    private readonly redis: Redis,
    private readonly prefix = 'cred:',
  ) {}

  async put(key: string, credential: StoredCredential, ttlMs: number): Promise<void> {
    await this.redis.set(this.prefix + key, JSON.stringify(credential), 'PX', Math.max(1, Math.ceil(ttlMs)));
  }

  async consume(key: string, digest: string): Promise<ConsumeResult> {
    const [code, raw] = ConsumeReply.parse(await this.redis.eval(CONSUME_SCRIPT, 1, this.prefix + key, digest));

    if (code === 0) {
      return { status: 'missing' };
    }
    if (code === 1) {
      return { status: 'mismatch' };
    }
    if (code === 2 && typeof raw === 'string') {
      return { status: 'consumed', credential: StoredCredentialSchema.parse(JSON.parse(raw)) };
    }
    throw new Error(`Unexpected reply from credential script: ${String(code)}`);
  }

  async has(key: string): Promise<boolean> {
    return (await this.redis.exists(this.prefix + key)) === 1;
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
