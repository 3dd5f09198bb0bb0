import { z } from 'zod';

export const ReminderState = z.enum(['disabled', 'pending', 'sent', 'failed']);
export type ReminderState = z.infer<typeof ReminderState>;

export const ReminderSchema = z.object({
  task_id: z.string().uuid(),
  user_id: z.string(),
  due_at: z.coerce.date(),
  state: ReminderState,
  destination: z.string().nullable(),
  attempts: z.coerce.number().int(),
  version: z.coerce.number().int(),
  last_error: z.string().nullable(),
  sent_at: z.coerce.date().nullable(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

export type Reminder = z.infer<typeof ReminderSchema>;

export const ArmReminderInput = z.object({
  due_at: z.string().min(1).describe('ISO date string or relative like "tomorrow at 9am", "in 30 minutes"'),
  destination: z.string().trim().toLowerCase().email().optional(),
  timezone: z.string().optional(),
});

export type ArmReminderInput = z.infer<typeof ArmReminderInput>;
