import { Router, type Response } from 'express';
import { z } from 'zod';
import { RegisterInput, toPublicUser } from '../db/models/User.js';
import { createRequireAuth, currentUser, type AuthRequest } from '../middleware/auth.js';
import { sendError } from '../middleware/errors.js';
import { hashPassword } from '../services/auth.js';
import type { AppContext } from '../types/context.js';

const LoginInput = z
  .object({
    identifier: z.string().trim().min(1).optional(),
    username: z.string().trim().min(1).optional(),
    email: z.string().trim().min(1).optional(),
    password: z.string().min(1, 'Password is required'),
  })
  .transform((input, ctx) => {
    const identifier = input.identifier ?? input.username ?? input.email;
    if (!identifier) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Username or email is required' });
      return z.NEVER;
    }
    return { identifier, password: input.password };
  });

const RefreshInput = z.object({ refreshToken: z.string().min(1, 'refreshToken is required') });
const LogoutInput = z.object({ refreshToken: z.string().min(1).optional() });
const VerifyInput = z.object({ code: z.string().trim().regex(/^\d{6}$/, 'Code must be 6 digits') });
const ForgotPasswordInput = z.object({ identifier: z.string().trim().min(1, 'identifier is required') });
const ResetPasswordInput = z.object({
  token: z.string().min(1, 'token is required'),
  password: z.string().min(8, 'Password must be at least 8 characters'),
});

export default function authRoutes(ctx: AppContext): Router {
  const router = Router();
  const requireAuth = createRequireAuth(ctx);

  const setTokenCookie = (res: Response, token: string, expiresIn: number) => {
    res.cookie('token', token, {
      httpOnly: true,
      secure: ctx.config.env === 'production',
      sameSite: 'lax',
      maxAge: expiresIn * 1000,
    });
  };

  // POST /api/auth/register
  router.post('/register', async (req, res) => {
    try {
      const user = await ctx.auth.register(RegisterInput.parse(req.body));
      res.status(201).json({ user: toPublicUser(user) });
    } catch (error) {
      sendError(res, error, 'Registration failed');
    }
  });

  // POST /api/auth/login
  router.post('/login', async (req, res) => {
    try {
      const { identifier, password } = LoginInput.parse(req.body);
      const { user, ...tokens } = await ctx.auth.login(identifier, password);

      setTokenCookie(res, tokens.accessToken, tokens.expiresIn);
      res.json({ ...tokens, user: toPublicUser(user) });
    } catch (error) {
      sendError(res, error, 'Login failed');
    }
  });

  // POST /api/auth/refresh — exchange a refresh token for a new access token
  router.post('/refresh', async (req, res) => {
    try {
      const { refreshToken } = RefreshInput.parse(req.body);
      const result = await ctx.auth.refresh(refreshToken);

      setTokenCookie(res, result.accessToken, result.expiresIn);
      res.json(result);
    } catch (error) {
      sendError(res, error, 'Token refresh failed');
    }
  });

  // POST /api/auth/logout — body may carry the refresh token to revoke with the session
  router.post('/logout', requireAuth, async (req: AuthRequest, res) => {
    try {
      const { refreshToken } = LogoutInput.parse(req.body ?? {});
      if (req.token) {
        await ctx.auth.logout(req.token, refreshToken);
      }
      res.clearCookie('token');
      res.json({ success: true });
    } catch (error) {
      sendError(res, error, 'Logout failed');
    }
  });

  // GET /api/auth/me
  router.get('/me', requireAuth, (req: AuthRequest, res) => {
    res.json(toPublicUser(currentUser(req)));
  });

  // POST /api/auth/verification/send — email a code to the signed-in user
  router.post('/verification/send', requireAuth, async (req: AuthRequest, res) => {
    try {
      const result = await ctx.auth.issueOtp(currentUser(req).email);
      res.json(result);
    } catch (error) {
      sendError(res, error, 'Failed to send verification code');
    }
  });

  // POST /api/auth/verification/verify
  router.post('/verification/verify', requireAuth, async (req: AuthRequest, res) => {
    try {
      const { code } = VerifyInput.parse(req.body);
      await ctx.auth.verifyOtp(currentUser(req).email, code);
      res.json({ verified: true });
    } catch (error) {
      sendError(res, error, 'Verification failed');
    }
  });

  // GET /api/auth/verification/status
  router.get('/verification/status', requireAuth, async (req: AuthRequest, res) => {
    try {
      const verified = await ctx.auth.isEmailVerified(currentUser(req).id);
      res.json({ verified });
    } catch (error) {
      sendError(res, error, 'Failed to read verification status');
    }
  });

  // POST /api/auth/forgot-password — same answer whether or not the account exists
  router.post('/forgot-password', async (req, res) => {
    try {
      const { identifier } = ForgotPasswordInput.parse(req.body);
      await ctx.auth.issueResetToken(identifier);
      res.json({ message: 'If the account exists, a reset link has been sent' });
    } catch (error) {
      sendError(res, error, 'Failed to start password reset');
    }
  });

  // POST /api/auth/reset-password
  router.post('/reset-password', async (req, res) => {
    try {
      const { token, password } = ResetPasswordInput.parse(req.body);
      await ctx.auth.redeemResetToken(token, await hashPassword(password));
      res.json({ success: true });
    } catch (error) {
      sendError(res, error, 'Password reset failed');
    }
  });

  return router;
}
