import { ConflictError, NotFoundError, ValidationError } from '../errors.js';
import type { ArmReminderInput, Reminder, ReminderState } from '../db/models/Reminder.js';
import type { ReminderRepository } from '../repositories/reminders.js';
import type { TaskRepository } from '../repositories/tasks.js';
import type { Clock } from './clock.js';
import { patchFor, transition, type ReminderEvent } from './reminder-state.js';
import { isValidTimezone, parseRelativeTime } from './timezone.js';

/** User-initiated reminder actions: arm, disable and manual retry. */
export class ReminderService {
  constructor(
    private readonly reminders: ReminderRepository,
    private readonly tasks: TaskRepository,
    private readonly clock: Clock,
    private readonly defaultTimezone: string,
  ) {}

  /** Arms (or re-arms) the reminder of a task the user owns. Any prior state is replaced. */
  async arm(userId: string, taskId: string, input: ArmReminderInput): Promise<Reminder> {
    const task = await this.tasks.findOwned(taskId, userId);
    if (!task) {
      throw new NotFoundError('Task not found');
    }

    const timezone = input.timezone || this.defaultTimezone;
    if (!isValidTimezone(timezone)) {
      throw new ValidationError(`Invalid timezone: ${timezone}`);
    }

    const now = this.clock.now();
    const dueAt = parseRelativeTime(input.due_at, timezone, now);
    if (!dueAt) {
      throw new ValidationError(`Could not parse due_at: ${input.due_at}`);
    }
    if (dueAt <= now) {
      throw new ValidationError('Reminder time must be in the future');
    }

    const existing = await this.reminders.get(taskId);
    transition(existing?.state ?? 'disabled', { type: 'arm', dueAt, destination: input.destination ?? null });

    return this.reminders.upsertArmed(
      { task_id: taskId, user_id: userId, due_at: dueAt, destination: input.destination ?? null },
      now,
    );
  }

  disable(userId: string, taskId: string): Promise<Reminder> {
    return this.apply(userId, taskId, { type: 'disable' });
  }

  /** Moves a FAILED reminder back to PENDING; the next tick picks it up if it is due. */
  retry(userId: string, taskId: string): Promise<Reminder> {
    return this.apply(userId, taskId, { type: 'retry' });
  }

  async get(userId: string, taskId: string): Promise<Reminder> {
    const reminder = await this.reminders.get(taskId);
    if (!reminder || reminder.user_id !== userId) {
      throw new NotFoundError('Reminder not found');
    }
    return reminder;
  }

  list(userId: string, state?: ReminderState): Promise<Reminder[]> {
    return this.reminders.listByUser(userId, state);
  }

  private async apply(userId: string, taskId: string, event: ReminderEvent): Promise<Reminder> {
    const reminder = await this.get(userId, taskId);
    const next = transition(reminder.state, event);
    const now = this.clock.now();

    const committed = await this.reminders.compareAndSetState(
      taskId,
      { state: reminder.state, version: reminder.version },
      next.state,
      patchFor(next.effects, now),
      now,
    );
    if (!committed) {
      throw new ConflictError('Reminder was modified concurrently; please retry');
    }

    return this.get(userId, taskId);
  }
}
