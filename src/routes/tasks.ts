import { Router } from 'express';
import { z } from 'zod';
import { NotFoundError } from '../errors.js';
import { ArmReminderInput } from '../db/models/Reminder.js';
import { CreateTaskInput, TaskStatus } from '../db/models/Task.js';
import { createRequireAuth, currentUser, type AuthRequest } from '../middleware/auth.js';
import { sendError } from '../middleware/errors.js';
import type { AppContext } from '../types/context.js';

const ListTasksQuery = z.object({
  status: z.union([TaskStatus, z.literal('all')]).default('all'),
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

export default function taskRoutes(ctx: AppContext): Router {
  const router = Router();
  const requireAuth = createRequireAuth(ctx);

  // GET /api/tasks — list tasks
  router.get('/', requireAuth, async (req: AuthRequest, res) => {
    try {
      const { status, limit } = ListTasksQuery.parse(req.query);
      const tasks = await ctx.tasks.listByUser(currentUser(req).id, status === 'all' ? undefined : status, limit);
      res.json({ tasks });
    } catch (error) {
      sendError(res, error, 'Failed to list tasks');
    }
  });

  // POST /api/tasks — create a task
  router.post('/', requireAuth, async (req: AuthRequest, res) => {
    try {
      const input = CreateTaskInput.parse(req.body);
      const task = await ctx.tasks.create(
        {
          user_id: currentUser(req).id,
          title: input.title,
          description: input.description,
          status: input.status,
          due_date: input.due_date ? new Date(input.due_date) : undefined,
        },
        ctx.clock.now(),
      );
      res.status(201).json({ task });
    } catch (error) {
      sendError(res, error, 'Failed to create task');
    }
  });

  // GET /api/tasks/:id — task with its reminder, if any
  router.get('/:id', requireAuth, async (req: AuthRequest, res) => {
    try {
      const user = currentUser(req);
      const task = await ctx.tasks.findOwned(req.params.id, user.id);
      if (!task) {
        throw new NotFoundError('Task not found');
      }

      const reminder = await ctx.reminders.get(user.id, task.id).catch((error: unknown) => {
        if (error instanceof NotFoundError) return null;
        throw error;
      });
      res.json({ task, reminder });
    } catch (error) {
      sendError(res, error, 'Failed to get task');
    }
  });

  // PUT /api/tasks/:id/reminder — arm (or re-arm) the task's reminder
  router.put('/:id/reminder', requireAuth, async (req: AuthRequest, res) => {
    try {
      const input = ArmReminderInput.parse(req.body);
      const reminder = await ctx.reminders.arm(currentUser(req).id, req.params.id, input);
      res.json({ reminder });
    } catch (error) {
      sendError(res, error, 'Failed to arm reminder');
    }
  });

  // DELETE /api/tasks/:id/reminder — disable without deleting history
  router.delete('/:id/reminder', requireAuth, async (req: AuthRequest, res) => {
    try {
      const reminder = await ctx.reminders.disable(currentUser(req).id, req.params.id);
      res.json({ reminder });
    } catch (error) {
      sendError(res, error, 'Failed to disable reminder');
    }
  });

  // POST /api/tasks/:id/reminder/retry — FAILED back to PENDING
  router.post('/:id/reminder/retry', requireAuth, async (req: AuthRequest, res) => {
    try {
      const reminder = await ctx.reminders.retry(currentUser(req).id, req.params.id);
      res.json({ reminder });
    } catch (error) {
      sendError(res, error, 'Failed to retry reminder');
    }
  });

  return router;
}
