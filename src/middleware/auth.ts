import type { Request, Response, NextFunction } from 'express';
import { AppError, AuthenticationError } from '../errors.js';
import type { User } from '../db/models/User.js';
import { createLogger } from '../services/logger.js';
import type { AppContext } from '../types/context.js';

const log = createLogger('auth');

export interface AuthRequest extends Request {
  user?: User;
  /** The bearer token the request was authenticated with. */
  token?: string;
}

export function extractToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith('Bearer ')) {
    return authHeader.slice(7).trim() || null;
  }

  const cookie: unknown = req.cookies?.token;
  return typeof cookie === 'string' && cookie ? cookie : null;
}

/** The authenticated user. Only valid behind requireAuth. */
export function currentUser(req: AuthRequest): User {
  if (!req.user) {
    throw new AuthenticationError('Authentication required');
  }
  return req.user;
}

// Middleware: Require a valid access token (Authorization header or `token` cookie)
export function createRequireAuth(ctx: Pick<AppContext, 'tokens' | 'users'>) {
  return async function requireAuth(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    const token = extractToken(req);
    if (!token) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    try {
      const claims = await ctx.tokens.validate(token, 'access');
      const user = claims.userId ? await ctx.users.findById(claims.userId) : null;
      if (!user) {
        res.status(401).json({ error: 'User not found' });
        return;
      }

      req.user = user;
      req.token = token;
      next();
    } catch (error) {
      if (error instanceof AppError) {
        log.debug(`Rejected bearer token: ${error.message}`);
        res.status(error.status).json({ error: error.publicMessage });
        return;
      }
      log.error('Authentication failed:', error);
      res.status(500).json({ error: 'Authentication failed' });
    }
  };
}

// Middleware: Require admin role
export function requireAdmin(req: AuthRequest, res: Response, next: NextFunction): void {
  if (!req.user || !req.user.roles.includes('ADMIN')) {
    res.status(403).json({ error: 'Admin access required' });
    return;
  }
  next();
}
