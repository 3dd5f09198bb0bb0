import { z } from 'zod';

export const TaskStatus = z.enum(['todo', 'in_progress', 'done']);
export type TaskStatus = z.infer<typeof TaskStatus>;

export const TaskSchema = z.object({
  id: z.string().uuid(),
  user_id: z.string(),
  title: z.string(),
  description: z.string().nullable(),
  status: TaskStatus,
  due_date: z.coerce.date().nullable(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

export type Task = z.infer<typeof TaskSchema>;

export const CreateTaskInput = z.object({
  title: z.string().trim().min(1),
  description: z.string().optional(),
  status: TaskStatus.default('todo'),
  due_date: z.string().datetime({ offset: true }).optional(),
});

export type CreateTaskInput = z.infer<typeof CreateTaskInput>;
