import { Router } from 'express';
import { toPublicUser } from '../db/models/User.js';
import { createRequireAuth, requireAdmin, type AuthRequest } from '../middleware/auth.js';
import { sendError } from '../middleware/errors.js';
import type { AppContext } from '../types/context.js';

export default function adminRoutes(ctx: AppContext): Router {
  const router = Router();
  router.use(createRequireAuth(ctx), requireAdmin);

  // GET /api/admin/users — list all users
  router.get('/users', async (_req: AuthRequest, res) => {
    try {
      const users = await ctx.users.list();
      res.json({ users: users.map(toPublicUser) });
    } catch (error) {
      sendError(res, error, 'Failed to list users');
    }
  });

  // GET /api/admin/scheduler — polling status
  router.get('/scheduler', (_req: AuthRequest, res) => {
    res.json({
      running: ctx.scheduler.running,
      intervalMs: ctx.config.scheduler.intervalMs,
      now: ctx.clock.now().toISOString(),
    });
  });

  // POST /api/admin/scheduler/tick — run one polling pass now
  router.post('/scheduler/tick', async (_req: AuthRequest, res) => {
    try {
      const summary = await ctx.scheduler.tick();
      if (!summary) {
        res.status(409).json({ error: 'A tick is already running' });
        return;
      }
      res.json(summary);
    } catch (error) {
      sendError(res, error, 'Scheduler tick failed');
    }
  });

  return router;
}
