import { Router } from 'express';
import { z } from 'zod';
import { ReminderState } from '../db/models/Reminder.js';
import { createRequireAuth, currentUser, type AuthRequest } from '../middleware/auth.js';
import { sendError } from '../middleware/errors.js';
import type { AppContext } from '../types/context.js';

const ListRemindersQuery = z.object({
  state: z.union([ReminderState, z.literal('all')]).default('all'),
});

export default function reminderRoutes(ctx: AppContext): Router {
  const router = Router();
  const requireAuth = createRequireAuth(ctx);

  // GET /api/reminders — the signed-in user's reminders, soonest first
  router.get('/', requireAuth, async (req: AuthRequest, res) => {
    try {
      const { state } = ListRemindersQuery.parse(req.query);
      const reminders = await ctx.reminders.list(currentUser(req).id, state === 'all' ? undefined : state);
      res.json({ reminders });
    } catch (error) {
      sendError(res, error, 'Failed to list reminders');
    }
  });

  return router;
}
