import jwt from 'jsonwebtoken';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import {
  BadSignatureError,
  ErrorCode,
  ExpiredError,
  MalformedTokenError,
  RevokedTokenError,
  TokenError,
  WrongTokenKindError,
  errorMessage,
} from '../errors.js';
import type { Clock } from './clock.js';
import type { CredentialStore } from './credential-store.js';

export type TokenKind = 'access' | 'refresh';

/** Custom claims carried by access tokens, always derived from the current user row. */
export interface UserClaims {
  userId: string;
  email: string;
  roles: string[];
}

const TokenPayloadSchema = z.object({
  sub: z.string().min(1),
  typ: z.enum(['access', 'refresh']),
  jti: z.string().min(1),
  iat: z.number(),
  exp: z.number(),
  userId: z.string().optional(),
  email: z.string().optional(),
  roles: z.array(z.string()).optional(),
});

export type TokenClaims = z.infer<typeof TokenPayloadSchema>;

export interface IssuedToken {
  token: string;
  /** Seconds until expiry. */
  expiresIn: number;
  expiresAt: Date;
}

export interface TokenManagerOptions {
  secret: string;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
}

/**
 * Revoked token ids, each kept until the token would have expired anyway.
 * Stored through a CredentialStore so revocations are shared the same way OTPs are.
 */
export class TokenDenyList {
  constructor(
    private readonly store: CredentialStore,
    private readonly clock: Clock,
  ) {}

  async add(jti: string, expiresAt: Date): Promise<void> {
    const now = this.clock.now().getTime();
    const ttlMs = expiresAt.getTime() - now;
    if (ttlMs <= 0) {
      return;
    }
    await this.store.put(`deny:${jti}`, { digest: '', payload: jti, issuedAt: now, expiresAt: expiresAt.getTime() }, ttlMs);
  }

  has(jti: string): Promise<boolean> {
    return this.store.has(`deny:${jti}`);
  }
}

/**
 * Stateless HS256 bearer tokens. The signature is always verified before any claim is
 * read; expiry, kind and revocation are checked after, in that order.
 */
export class BearerTokenManager {
  constructor(
    private readonly clock: Clock,
    private readonly options: TokenManagerOptions,
    private readonly denyList?: TokenDenyList,
  ) {}

  ttlSeconds(kind: TokenKind): number {
    return kind === 'access' ? this.options.accessTtlSeconds : this.options.refreshTtlSeconds;
  }

  issue(subject: string, claims: UserClaims | null, kind: TokenKind): IssuedToken {
    const iat = Math.floor(this.clock.now().getTime() / 1000);
    const ttl = this.ttlSeconds(kind);
    const exp = iat + ttl;

    const token = jwt.sign({ ...(claims ?? {}), typ: kind, iat, exp }, this.options.secret, {
      algorithm: 'HS256',
      subject,
      jwtid: uuid(),
    });

    return { token, expiresIn: ttl, expiresAt: new Date(exp * 1000) };
  }

  async validate(token: string, expectedKind: TokenKind = 'access'): Promise<TokenClaims> {
    const claims = this.verify(token);

    if (claims.typ !== expectedKind) {
      throw new WrongTokenKindError(expectedKind, claims.typ);
    }
    if (this.denyList && (await this.denyList.has(claims.jti))) {
      throw new RevokedTokenError();
    }
    return claims;
  }

  /**
   * Exchanges a refresh token for a new access token. Claims are loaded fresh for the
   * subject, so role changes apply from the next refresh on.
   */
  async refresh(
    refreshToken: string,
    loadClaims: (subject: string) => Promise<UserClaims | null>,
  ): Promise<IssuedToken> {
    const claims = await this.validate(refreshToken, 'refresh');
    const current = await loadClaims(claims.sub);

    if (!current) {
      throw new TokenError(ErrorCode.INVALID, `Token subject ${claims.sub} no longer exists`);
    }
    return this.issue(claims.sub, current, 'access');
  }

  /** Adds the token's id to the deny list until it expires. No-op without a deny list. */
  async revoke(token: string): Promise<void> {
    if (!this.denyList) {
      return;
    }
    const claims = this.verify(token);
    await this.denyList.add(claims.jti, new Date(claims.exp * 1000));
  }

  private verify(token: string): TokenClaims {
    let decoded: string | jwt.JwtPayload;

    try {
      decoded = jwt.verify(token, this.options.secret, {
        algorithms: ['HS256'],
        clockTimestamp: Math.floor(this.clock.now().getTime() / 1000),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new ExpiredError();
      }
      if (error instanceof jwt.JsonWebTokenError && error.message === 'invalid signature') {
        throw new BadSignatureError();
      }
      throw new MalformedTokenError(errorMessage(error));
    }

    const parsed = TokenPayloadSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new MalformedTokenError('Token payload is missing required claims');
    }
    return parsed.data;
  }
}
