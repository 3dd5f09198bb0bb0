import { createHmac, randomBytes, randomInt } from 'crypto';
import { InvalidCredentialError, RateLimitedError } from '../errors.js';
import type { Clock } from './clock.js';
import type { CredentialStore } from './credential-store.js';
import { createLogger } from './logger.js';
import type { AttemptLimiter } from './rate-limit.js';

const log = createLogger('credentials');

export type CredentialKind = 'otp' | 'reset';

export interface CredentialServiceOptions {
  /** HMAC key for secret digests. */
  secret: string;
  ttlMs: Record<CredentialKind, number>;
  /** Redemption attempts allowed per subject and kind within the limiter window. */
  maxAttempts: number;
}

const PUBLIC_MESSAGES: Record<CredentialKind, string> = {
  otp: 'Invalid or expired code',
  reset: 'Invalid or expired reset token',
};

// Uniform over 000000-999999
export function generateOtp(): string {
  return randomInt(0, 1_000_000).toString().padStart(6, '0');
}

export function generateResetSecret(): string {
  return randomBytes(32).toString('hex');
}

function storeKey(kind: CredentialKind, subject: string): string {
  return `${kind}:${subject.trim().toLowerCase()}`;
}

/**
 * Short-lived single-use secrets: email verification codes and password reset tokens.
 * Only the newest secret per (kind, subject) is valid.
 */
export class CredentialService {
  constructor(
    private readonly store: CredentialStore,
    private readonly limiter: AttemptLimiter,
    private readonly clock: Clock,
    private readonly options: CredentialServiceOptions,
  ) {}

  ttlMs(kind: CredentialKind): number {
    return this.options.ttlMs[kind];
  }

  async issue(kind: CredentialKind, subject: string, payload: string, ttlMs: number = this.ttlMs(kind)): Promise<string> {
    const secret = kind === 'otp' ? generateOtp() : generateResetSecret();
    const issuedAt = this.clock.now().getTime();

    await this.store.put(
      storeKey(kind, subject),
      { digest: this.digest(secret), payload, issuedAt, expiresAt: issuedAt + ttlMs },
      ttlMs,
    );

    log.debug(`Issued ${kind} for ${subject}, expires in ${ttlMs}ms`);
    return secret;
  }

  /**
   * Consumes the credential and returns its payload. Every failure surfaces as the same
   * InvalidCredentialError; the reason only reaches the log.
   */
  async redeem(kind: CredentialKind, subject: string, suppliedSecret: string): Promise<string> {
    const key = storeKey(kind, subject);

    const attempts = await this.limiter.hit(key);
    if (attempts > this.options.maxAttempts) {
      log.warn(`Too many ${kind} attempts for ${subject} (${attempts})`);
      throw new RateLimitedError();
    }

    const result = await this.store.consume(key, this.digest(suppliedSecret));
    if (result.status !== 'consumed') {
      log.info(`Rejected ${kind} for ${subject}: ${result.status}`);
      throw new InvalidCredentialError(result.status, PUBLIC_MESSAGES[kind]);
    }

    if (this.clock.now().getTime() >= result.credential.expiresAt) {
      log.info(`Rejected ${kind} for ${subject}: expired`);
      throw new InvalidCredentialError('expired', PUBLIC_MESSAGES[kind]);
    }

    await this.limiter.reset(key);
    return result.credential.payload;
  }

  private digest(secret: string): string {
    return createHmac('sha256', this.options.secret).update(secret).digest('hex');
  }
}
