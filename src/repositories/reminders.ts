import type { Knex } from 'knex';
import { z } from 'zod';
import { RepositoryUnavailableError, errorMessage } from '../errors.js';
import { ReminderSchema, type Reminder, type ReminderState } from '../db/models/Reminder.js';
import { TaskStatus } from '../db/models/Task.js';
import type { ReminderPatch } from '../services/reminder-state.js';

/** A due reminder together with what is needed to address and render the email. */
export const DueReminderSchema = ReminderSchema.extend({
  task_title: z.string(),
  task_description: z.string().nullable(),
  task_status: TaskStatus,
  task_due_date: z.coerce.date().nullable(),
  owner_email: z.string(),
  owner_username: z.string(),
});

export type DueReminder = z.infer<typeof DueReminderSchema>;

export interface ArmedReminder {
  task_id: string;
  user_id: string;
  due_at: Date;
  destination: string | null;
}

/** What a compare-and-set expects to still find: the state and version it read. */
export type ExpectedReminder = Pick<Reminder, 'state' | 'version'>;

export interface ReminderRepository {
  /** Reminders with state = pending and due_at <= now, oldest first. */
  findDue(now: Date, limit?: number): Promise<DueReminder[]>;
  /**
   * Moves `taskId` to `next` only if its state and version still match `expected`,
   * bumping the version. Resolves false when someone else wrote the row first,
   * including a re-arm that left the state at pending.
   */
  compareAndSetState(
    taskId: string,
    expected: ExpectedReminder,
    next: ReminderState,
    patch: ReminderPatch,
    now: Date,
  ): Promise<boolean>;
  get(taskId: string): Promise<Reminder | null>;
  upsertArmed(reminder: ArmedReminder, now: Date): Promise<Reminder>;
  listByUser(userId: string, state?: ReminderState, limit?: number): Promise<Reminder[]>;
}

export class KnexReminderRepository implements ReminderRepository {
  constructor(private readonly knex: Knex) {}

  async findDue(now: Date, limit = 500): Promise<DueReminder[]> {
    try {
      const rows = await this.knex('reminders')
        .join('tasks', 'tasks.id', 'reminders.task_id')
        .join('users', 'users.id', 'reminders.user_id')
        .where('reminders.state', 'pending')
        .where('reminders.due_at', '<=', now.toISOString())
        .whereNot('tasks.status', 'done')
        .orderBy('reminders.due_at', 'asc')
        .limit(limit)
        .select(
          'reminders.*',
          'tasks.title as task_title',
          'tasks.description as task_description',
          'tasks.status as task_status',
          'tasks.due_date as task_due_date',
          'users.email as owner_email',
          'users.username as owner_username',
        );

      return rows.map((row: unknown) => DueReminderSchema.parse(row));
    } catch (error) {
      throw new RepositoryUnavailableError(`findDue failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async compareAndSetState(
    taskId: string,
    expected: ExpectedReminder,
    next: ReminderState,
    patch: ReminderPatch,
    now: Date,
  ): Promise<boolean> {
    const update: Record<string, unknown> = {
      state: next,
      version: this.knex.raw('version + 1'),
      updated_at: now.toISOString(),
    };

    if (patch.due_at !== undefined) update.due_at = patch.due_at.toISOString();
    if (patch.destination !== undefined) update.destination = patch.destination;
    if (patch.last_error !== undefined) update.last_error = patch.last_error;
    if (patch.sent_at !== undefined) update.sent_at = patch.sent_at ? patch.sent_at.toISOString() : null;
    if (patch.attempts === 'increment') {
      update.attempts = this.knex.raw('attempts + 1');
    } else if (patch.attempts !== undefined) {
      update.attempts = patch.attempts;
    }

    try {
      const updated = await this.knex('reminders')
        .where({ task_id: taskId, state: expected.state, version: expected.version })
        .update(update);
      return updated > 0;
    } catch (error) {
      throw new RepositoryUnavailableError(`compareAndSetState failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async get(taskId: string): Promise<Reminder | null> {
    const row = await this.knex('reminders').where('task_id', taskId).first();
    return row ? ReminderSchema.parse(row) : null;
  }

  async upsertArmed(reminder: ArmedReminder, now: Date): Promise<Reminder> {
    const timestamp = now.toISOString();

    const armed = {
      due_at: reminder.due_at.toISOString(),
      state: 'pending',
      destination: reminder.destination,
      attempts: 0,
      last_error: null,
      sent_at: null,
      updated_at: timestamp,
    };

    await this.knex('reminders')
      .insert({ ...armed, task_id: reminder.task_id, user_id: reminder.user_id, version: 0, created_at: timestamp })
      .onConflict('task_id')
      .merge({ ...armed, version: this.knex.raw('?? + 1', ['reminders.version']) });

    const saved = await this.get(reminder.task_id);
    if (!saved) {
      throw new RepositoryUnavailableError(`Reminder ${reminder.task_id} vanished after upsert`);
    }
    return saved;
  }

  async listByUser(userId: string, state?: ReminderState, limit = 200): Promise<Reminder[]> {
    let query = this.knex('reminders').where('user_id', userId);

    if (state) {
      query = query.where('state', state);
    }

    const rows = await query.orderBy('due_at', 'asc').limit(limit);
    return rows.map((row: unknown) => ReminderSchema.parse(row));
  }
}
