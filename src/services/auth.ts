import bcrypt from 'bcryptjs';
import {
  AuthenticationError,
  ConflictError,
  ErrorCode,
  InvalidCredentialError,
  NotFoundError,
  TokenError,
} from '../errors.js';
import type { RegisterInput, User } from '../db/models/User.js';
import type { UserRepository } from '../repositories/users.js';
import type { CredentialService } from './credentials.js';
import { otpEmail, resetPasswordEmail } from './email-templates.js';
import { createLogger } from './logger.js';
import { sendWithTimeout, type NotificationDispatcher } from './notifier.js';
import type { BearerTokenManager, UserClaims } from './tokens.js';

const log = createLogger('auth');

const BCRYPT_ROUNDS = 10;

export function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, BCRYPT_ROUNDS);
}

export function claimsFor(user: User): UserClaims {
  return { userId: user.id, email: user.email, roles: user.roles };
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  tokenType: 'Bearer';
  /** Seconds until the access token expires. */
  expiresIn: number;
}

export interface AuthServiceOptions {
  publicUrl: string;
  dispatchTimeoutMs: number;
}

export class AuthService {
  constructor(
    private readonly users: UserRepository,
    private readonly tokens: BearerTokenManager,
    private readonly credentials: CredentialService,
    private readonly dispatcher: NotificationDispatcher,
    private readonly options: AuthServiceOptions,
  ) {}

  async register(input: RegisterInput): Promise<User> {
    if (await this.users.findByUsername(input.username)) {
      throw new ConflictError('Username already taken');
    }
    if (await this.users.findByEmail(input.email)) {
      throw new ConflictError('Email already registered');
    }

    // First user becomes admin
    const isFirst = await this.users.isEmpty();

    return this.users.create({
      username: input.username,
      email: input.email,
      password_hash: await hashPassword(input.password),
      roles: isFirst ? ['ADMIN', 'USER'] : ['USER'],
    });
  }

  /** `identifier` is a username, or an email when it contains '@'. */
  async login(identifier: string, password: string): Promise<TokenPair & { user: User }> {
    const user = await this.users.findByIdentifier(identifier);
    if (!user || !(await bcrypt.compare(password, user.password_hash))) {
      throw new AuthenticationError();
    }

    const access = this.tokens.issue(user.username, claimsFor(user), 'access');
    const refresh = this.tokens.issue(user.username, null, 'refresh');

    return {
      accessToken: access.token,
      refreshToken: refresh.token,
      tokenType: 'Bearer',
      expiresIn: access.expiresIn,
      user,
    };
  }

  async refresh(refreshToken: string): Promise<Omit<TokenPair, 'refreshToken'>> {
    const access = await this.tokens.refresh(refreshToken, async (username) => {
      const user = await this.users.findByUsername(username);
      return user ? claimsFor(user) : null;
    });

    return { accessToken: access.token, tokenType: 'Bearer', expiresIn: access.expiresIn };
  }

  /** Revokes the access token, and the refresh token too when one is given. */
  async logout(accessToken: string, refreshToken?: string): Promise<void> {
    if (refreshToken !== undefined) {
      const access = await this.tokens.validate(accessToken);
      const refresh = await this.tokens.validate(refreshToken, 'refresh');
      if (refresh.sub !== access.sub) {
        throw new TokenError(ErrorCode.INVALID, `Refresh token subject ${refresh.sub} does not match ${access.sub}`);
      }
      await this.tokens.revoke(refreshToken);
    }
    await this.tokens.revoke(accessToken);
  }

  /** Emails a fresh verification code, replacing any outstanding one. */
  async issueOtp(email: string): Promise<{ sent: true; destination: string }> {
    const destination = email.trim().toLowerCase();
    const code = await this.credentials.issue('otp', destination, destination);
    const message = otpEmail(code, Math.round(this.credentials.ttlMs('otp') / 60_000));

    await sendWithTimeout(this.dispatcher, { destination, ...message }, this.options.dispatchTimeoutMs);
    log.info(`Verification code sent to ${destination}`);

    return { sent: true, destination };
  }

  async verifyOtp(email: string, code: string): Promise<void> {
    const verified = await this.credentials.redeem('otp', email, code.trim());
    await this.users.markEmailVerified(verified);
  }

  async isEmailVerified(userId: string): Promise<boolean> {
    const user = await this.users.findById(userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return user.email_verified;
  }

  /**
   * Emails a single-use reset link. Resolves to the token, or null when no account
   * matches; callers must answer both cases the same way.
   */
  async issueResetToken(identifier: string): Promise<string | null> {
    const user = await this.users.findByIdentifier(identifier);
    if (!user) {
      log.info('Password reset requested for unknown account');
      return null;
    }

    const secret = await this.credentials.issue('reset', user.id, user.id);
    const token = `${user.id}.${secret}`;
    const link = `${this.options.publicUrl}/reset-password?token=${encodeURIComponent(token)}`;
    const message = resetPasswordEmail(link, Math.round(this.credentials.ttlMs('reset') / 60_000));

    await sendWithTimeout(this.dispatcher, { destination: user.email, ...message }, this.options.dispatchTimeoutMs);
    log.info(`Password reset link sent for user ${user.id}`);

    return token;
  }

  /** Sets the password of the user the token was issued for. Resolves to that user's id. */
  async redeemResetToken(token: string, newPasswordHash: string): Promise<string> {
    const separator = token.indexOf('.');
    if (separator <= 0 || separator === token.length - 1) {
      throw new InvalidCredentialError('missing', 'Invalid or expired reset token');
    }

    const userId = await this.credentials.redeem('reset', token.slice(0, separator), token.slice(separator + 1));

    if (!(await this.users.updatePasswordHash(userId, newPasswordHash))) {
      throw new NotFoundError('User not found');
    }

    log.info(`Password reset for user ${userId}`);
    return userId;
  }
}
