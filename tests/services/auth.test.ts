import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import type { Knex } from 'knex';
import { createContext } from '../../src/app.js';
import {
  AuthenticationError,
  ConflictError,
  InvalidCredentialError,
  RevokedTokenError,
} from '../../src/errors.js';
import { ManualClock } from '../../src/services/clock.js';
import { hashPassword } from '../../src/services/auth.js';
import type { NotificationDispatcher } from '../../src/services/notifier.js';
import type { AppContext } from '../../src/types/context.js';
import { testConfig } from '../helpers/config.js';
import { createTestDb } from '../helpers/db.js';

const T0 = Date.parse('2025-01-01T00:00:00Z');

type Send = NotificationDispatcher['send'];

function codeFrom(body: string | undefined): string {
  const match = body?.match(/>(\d{6})<\/div>/);
  if (!match?.[1]) throw new Error('no code in email body');
  return match[1];
}

function tokenFrom(body: string | undefined): string {
  const match = body?.match(/reset-password\?token=([^"&]+)"/);
  if (!match?.[1]) throw new Error('no reset link in email body');
  return decodeURIComponent(match[1]);
}

describe('AuthService', () => {
  let knex: Knex;
  let clock: ManualClock;
  let send: Mock<Send>;
  let ctx: AppContext;

  beforeEach(async () => {
    knex = await createTestDb();
    clock = new ManualClock(T0);
    send = vi.fn<Send>().mockResolvedValue(undefined);
    ctx = createContext({ config: testConfig(), knex, clock, dispatcher: { send } });
  });

  afterEach(async () => {
    await ctx.limiter.close();
    await ctx.credentialStore.close();
    await knex.destroy();
  });

  const register = (username: string, password = 'password-1') =>
    ctx.auth.register({ username, email: `${username}@example.com`, password });

  describe('register', () => {
    it('makes the first user an admin', async () => {
      const first = await register('alice');
      const second = await register('bob');

      expect(first.roles).toEqual(['ADMIN', 'USER']);
      expect(second.roles).toEqual(['USER']);
      expect(first.password_hash).not.toBe('password-1');
      expect(first.email_verified).toBe(false);
    });

    it('rejects duplicate usernames and emails', async () => {
      await register('alice');

      await expect(register('alice')).rejects.toThrow('Username already taken');
      await expect(
        ctx.auth.register({ username: 'alice2', email: 'alice@example.com', password: 'password-1' }),
      ).rejects.toBeInstanceOf(ConflictError);
    });
  });

  describe('login', () => {
    it('accepts a username or an email', async () => {
      await register('alice');

      const byName = await ctx.auth.login('alice', 'password-1');
      const byEmail = await ctx.auth.login('ALICE@example.com', 'password-1');

      expect(byName).toMatchObject({ tokenType: 'Bearer', expiresIn: 86400 });
      expect(byEmail.user.username).toBe('alice');
      await expect(ctx.tokens.validate(byName.accessToken)).resolves.toMatchObject({
        sub: 'alice',
        email: 'alice@example.com',
        roles: ['ADMIN', 'USER'],
      });
      await expect(ctx.tokens.validate(byName.refreshToken, 'refresh')).resolves.toMatchObject({ sub: 'alice' });
    });

    it('gives the same error for unknown users and wrong passwords', async () => {
      await register('alice');

      await expect(ctx.auth.login('alice', 'wrong-password')).rejects.toThrow('Invalid username or password');
      await expect(ctx.auth.login('nobody', 'password-1')).rejects.toBeInstanceOf(AuthenticationError);
    });

    it('refreshes and logs out', async () => {
      await register('alice');
      const { accessToken, refreshToken } = await ctx.auth.login('alice', 'password-1');

      const refreshed = await ctx.auth.refresh(refreshToken);
      expect(refreshed.tokenType).toBe('Bearer');
      await expect(ctx.tokens.validate(refreshed.accessToken)).resolves.toMatchObject({ sub: 'alice' });

      await ctx.auth.logout(accessToken);
      await expect(ctx.tokens.validate(accessToken)).rejects.toBeInstanceOf(RevokedTokenError);
      await expect(ctx.auth.refresh(refreshToken)).resolves.toMatchObject({ tokenType: 'Bearer' });
    });

    it('revokes the refresh token passed to logout', async () => {
      await register('alice');
      const { accessToken, refreshToken } = await ctx.auth.login('alice', 'password-1');

      await ctx.auth.logout(accessToken, refreshToken);

      await expect(ctx.tokens.validate(accessToken)).rejects.toBeInstanceOf(RevokedTokenError);
      await expect(ctx.auth.refresh(refreshToken)).rejects.toBeInstanceOf(RevokedTokenError);
    });

    it('refuses to revoke another user\'s refresh token', async () => {
      await register('alice');
      await register('bob');
      const alice = await ctx.auth.login('alice', 'password-1');
      const bob = await ctx.auth.login('bob', 'password-1');

      await expect(ctx.auth.logout(alice.accessToken, bob.refreshToken)).rejects.toMatchObject({
        name: 'TokenError',
        code: 'invalid',
      });
      await expect(ctx.auth.refresh(bob.refreshToken)).resolves.toMatchObject({ tokenType: 'Bearer' });
      await expect(ctx.tokens.validate(alice.accessToken)).resolves.toMatchObject({ sub: 'alice' });
    });
  });

  describe('email verification', () => {
    it('verifies with the emailed code once', async () => {
      const alice = await register('alice');

      expect(await ctx.auth.issueOtp('alice@example.com')).toEqual({ sent: true, destination: 'alice@example.com' });
      expect(send).toHaveBeenCalledWith('alice@example.com', 'Your Verification Code', expect.any(String));
      const code = codeFrom(send.mock.calls[0]?.[2]);

      clock.advance(60_000);
      await ctx.auth.verifyOtp('alice@example.com', code);
      expect(await ctx.auth.isEmailVerified(alice.id)).toBe(true);

      clock.advance(1_000);
      await expect(ctx.auth.verifyOtp('alice@example.com', code)).rejects.toMatchObject({
        name: 'InvalidCredentialError',
        publicMessage: 'Invalid or expired code',
      });
    });

    it('rejects a code after five minutes', async () => {
      const alice = await register('alice');
      await ctx.auth.issueOtp('alice@example.com');
      const code = codeFrom(send.mock.calls[0]?.[2]);

      clock.advance(5 * 60_000);
      await expect(ctx.auth.verifyOtp('alice@example.com', code)).rejects.toBeInstanceOf(InvalidCredentialError);
      expect(await ctx.auth.isEmailVerified(alice.id)).toBe(false);
    });
  });

  describe('password reset', () => {
    it('answers unknown accounts without sending anything', async () => {
      expect(await ctx.auth.issueResetToken('nobody@example.com')).toBeNull();
      expect(send).not.toHaveBeenCalled();
    });

    it('resets the password of the account the link was sent to', async () => {
      const alice = await register('alice');
      await register('bob');

      const token = await ctx.auth.issueResetToken('alice');
      expect(token?.startsWith(`${alice.id}.`)).toBe(true);
      expect(send).toHaveBeenCalledWith('alice@example.com', 'Password Reset Request', expect.any(String));
      expect(tokenFrom(send.mock.calls[0]?.[2])).toBe(token);

      const userId = await ctx.auth.redeemResetToken(tokenFrom(send.mock.calls[0]?.[2]), await hashPassword('new-password'));
      expect(userId).toBe(alice.id);

      await expect(ctx.auth.login('alice', 'new-password')).resolves.toMatchObject({ tokenType: 'Bearer' });
      await expect(ctx.auth.login('bob', 'password-1')).resolves.toMatchObject({ tokenType: 'Bearer' });
    });

    it('cannot be redeemed twice or for another account', async () => {
      const alice = await register('alice');
      const bob = await register('bob');
      await ctx.auth.issueResetToken('alice@example.com');
      const token = tokenFrom(send.mock.calls[0]?.[2]);
      const secret = token.slice(alice.id.length + 1);
      const newHash = await hashPassword('new-password');

      await expect(ctx.auth.redeemResetToken(`${bob.id}.${secret}`, newHash)).rejects.toMatchObject({
        publicMessage: 'Invalid or expired reset token',
      });

      await ctx.auth.redeemResetToken(token, newHash);
      await expect(ctx.auth.redeemResetToken(token, newHash)).rejects.toBeInstanceOf(InvalidCredentialError);
    });

    it('rejects tokens without a user part', async () => {
      await expect(ctx.auth.redeemResetToken('no-separator', 'hash')).rejects.toBeInstanceOf(InvalidCredentialError);
      await expect(ctx.auth.redeemResetToken('.secret', 'hash')).rejects.toBeInstanceOf(InvalidCredentialError);
    });
  });
});
