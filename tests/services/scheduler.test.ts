import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import type { Knex } from 'knex';
import { RepositoryUnavailableError } from '../../src/errors.js';
import { KnexReminderRepository, type ReminderRepository } from '../../src/repositories/reminders.js';
import { TaskRepository } from '../../src/repositories/tasks.js';
import { ManualClock } from '../../src/services/clock.js';
import type { NotificationDispatcher } from '../../src/services/notifier.js';
import { ReminderService } from '../../src/services/reminders.js';
import { ReminderScheduler } from '../../src/services/scheduler.js';
import type { User } from '../../src/db/models/User.js';
import { createTask, createTestDb, createUser } from '../helpers/db.js';

const T0 = Date.parse('2025-01-01T00:00:00Z');
const at = (seconds: number) => new Date(T0 + seconds * 1000).toISOString();

type Send = NotificationDispatcher['send'];

describe('ReminderScheduler', () => {
  let knex: Knex;
  let clock: ManualClock;
  let repository: KnexReminderRepository;
  let service: ReminderService;
  let send: Mock<Send>;
  let scheduler: ReminderScheduler;
  let alice: User;

  const schedulerWith = (reminders: ReminderRepository, dispatchTimeoutMs = 1000) =>
    new ReminderScheduler(reminders, { send }, clock, { intervalMs: 60_000, dispatchTimeoutMs, timezone: 'UTC' });

  const armTask = async (title: string, dueInSeconds: number, destination?: string) => {
    const task = await createTask(knex, alice.id, title);
    await service.arm(alice.id, task.id, { due_at: at(dueInSeconds), destination });
    return task;
  };

  beforeEach(async () => {
    knex = await createTestDb();
    clock = new ManualClock(T0);
    repository = new KnexReminderRepository(knex);
    service = new ReminderService(repository, new TaskRepository(knex), clock, 'UTC');
    send = vi.fn<Send>().mockResolvedValue(undefined);
    scheduler = schedulerWith(repository);
    alice = await createUser(knex, 'alice');
  });

  afterEach(async () => {
    await scheduler.stop();
    await knex.destroy();
  });

  it('sends once when due and never again', async () => {
    const task = await armTask('Pay rent', 100);

    clock.set(T0 + 50_000);
    expect(await scheduler.tick()).toEqual({ due: 0, sent: 0, failed: 0, skipped: 0 });
    expect(send).not.toHaveBeenCalled();

    clock.set(T0 + 110_000);
    expect(await scheduler.tick()).toEqual({ due: 1, sent: 1, failed: 0, skipped: 0 });
    expect(send).toHaveBeenCalledTimes(1);
    expect(send).toHaveBeenCalledWith('alice@example.com', 'Reminder: Pay rent', expect.stringContaining('Pay rent'));

    clock.set(T0 + 170_000);
    expect(await scheduler.tick()).toEqual({ due: 0, sent: 0, failed: 0, skipped: 0 });
    expect(send).toHaveBeenCalledTimes(1);

    const reminder = await repository.get(task.id);
    expect(reminder).toMatchObject({ state: 'sent', attempts: 1, last_error: null });
    expect(reminder?.sent_at?.toISOString()).toBe(at(110));
  });

  it('fires exactly at due_at', async () => {
    await armTask('Stand-up', 60);

    clock.set(T0 + 59_999);
    expect((await scheduler.tick())?.due).toBe(0);

    clock.set(T0 + 60_000);
    expect((await scheduler.tick())?.sent).toBe(1);
  });

  it('catches up on reminders that fell due while it was down', async () => {
    await armTask('First', 60);
    await armTask('Second', 120);

    clock.set(T0 + 3_600_000);
    expect(await scheduler.tick()).toEqual({ due: 2, sent: 2, failed: 0, skipped: 0 });
    expect(send.mock.calls.map((call) => call[1])).toEqual(['Reminder: First', 'Reminder: Second']);
  });

  it('sends to the reminder destination when one is set', async () => {
    await armTask('Call Bob', 10, 'bob@example.com');

    clock.set(T0 + 10_000);
    await scheduler.tick();
    expect(send).toHaveBeenCalledWith('bob@example.com', 'Reminder: Call Bob', expect.any(String));
  });

  it('skips reminders of completed tasks', async () => {
    const task = await new TaskRepository(knex).create({ user_id: alice.id, title: 'Done already', status: 'done' });
    await service.arm(alice.id, task.id, { due_at: at(10) });

    clock.set(T0 + 20_000);
    expect((await scheduler.tick())?.due).toBe(0);
    expect(send).not.toHaveBeenCalled();
  });

  it('marks a failed delivery without affecting the others', async () => {
    const broken = await armTask('Broken', 10, 'broken@example.com');
    const fine = await armTask('Fine', 20);
    send.mockImplementation(async (destination) => {
      if (destination === 'broken@example.com') throw new Error('mailbox unavailable');
    });

    clock.set(T0 + 30_000);
    expect(await scheduler.tick()).toEqual({ due: 2, sent: 1, failed: 1, skipped: 0 });

    expect(await repository.get(broken.id)).toMatchObject({
      state: 'failed',
      attempts: 1,
      last_error: 'mailbox unavailable',
      sent_at: null,
    });
    expect(await repository.get(fine.id)).toMatchObject({ state: 'sent', attempts: 1 });

    // Failed reminders stay put until someone retries them
    clock.set(T0 + 90_000);
    expect((await scheduler.tick())?.due).toBe(0);

    await service.retry(alice.id, broken.id);
    send.mockResolvedValue(undefined);
    expect(await scheduler.tick()).toEqual({ due: 1, sent: 1, failed: 0, skipped: 0 });
    expect(await repository.get(broken.id)).toMatchObject({ state: 'sent', attempts: 2, last_error: null });
  });

  it('turns a hung delivery into a failure', async () => {
    scheduler = schedulerWith(repository, 20);
    const task = await armTask('Slow', 10);
    send.mockImplementation(() => new Promise<void>(() => {}));

    clock.set(T0 + 10_000);
    expect(await scheduler.tick()).toEqual({ due: 1, sent: 0, failed: 1, skipped: 0 });
    expect(await repository.get(task.id)).toMatchObject({
      state: 'failed',
      last_error: 'Delivery to alice@example.com timed out after 20ms',
    });
  });

  it('leaves a reminder alone when it is disabled during delivery', async () => {
    const task = await armTask('Racy', 10);
    send.mockImplementation(async () => {
      await service.disable(alice.id, task.id);
    });

    clock.set(T0 + 10_000);
    expect(await scheduler.tick()).toEqual({ due: 1, sent: 0, failed: 0, skipped: 1 });
    expect(await repository.get(task.id)).toMatchObject({ state: 'disabled', attempts: 0 });
  });

  it('keeps a re-arm made during delivery for its new due time', async () => {
    const task = await armTask('Moved', 10);
    send.mockImplementationOnce(async () => {
      await service.arm(alice.id, task.id, { due_at: at(3600) });
    });

    clock.set(T0 + 10_000);
    expect(await scheduler.tick()).toEqual({ due: 1, sent: 0, failed: 0, skipped: 1 });
    expect(await repository.get(task.id)).toMatchObject({
      state: 'pending',
      due_at: new Date(at(3600)),
      attempts: 0,
    });

    clock.set(T0 + 3_700_000);
    expect(await scheduler.tick()).toEqual({ due: 1, sent: 1, failed: 0, skipped: 0 });
    expect(await repository.get(task.id)).toMatchObject({ state: 'sent', attempts: 1 });
  });

  it('does not start a tick while one is running', async () => {
    await armTask('Blocking', 10);
    let release = () => {};
    send.mockImplementation(
      () =>
        new Promise<void>((resolve) => {
          release = () => resolve();
        }),
    );

    clock.set(T0 + 10_000);
    const first = scheduler.tick();
    await vi.waitFor(() => expect(send).toHaveBeenCalledTimes(1));

    expect(await scheduler.tick()).toBeNull();

    release();
    expect(await first).toEqual({ due: 1, sent: 1, failed: 0, skipped: 0 });
    expect(send).toHaveBeenCalledTimes(1);
  });

  it('aborts the tick when storage is unavailable and recovers on the next one', async () => {
    const findDue = vi
      .spyOn(repository, 'findDue')
      .mockRejectedValueOnce(new RepositoryUnavailableError('connection refused'));
    await armTask('Later', 10);

    clock.set(T0 + 10_000);
    await expect(scheduler.tick()).rejects.toBeInstanceOf(RepositoryUnavailableError);
    expect(send).not.toHaveBeenCalled();

    expect(await scheduler.tick()).toEqual({ due: 1, sent: 1, failed: 0, skipped: 0 });
    expect(findDue).toHaveBeenCalledTimes(2);
  });
});

describe('ReminderScheduler.start', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs on minute boundaries until stopped', async () => {
    vi.useFakeTimers({ now: new Date('2025-01-01T00:00:30Z') });

    const reminders: ReminderRepository = {
      findDue: vi.fn().mockResolvedValue([]),
      compareAndSetState: vi.fn(),
      get: vi.fn(),
      upsertArmed: vi.fn(),
      listByUser: vi.fn(),
    };
    const scheduler = new ReminderScheduler(reminders, { send: vi.fn() }, new ManualClock(0), {
      intervalMs: 60_000,
      dispatchTimeoutMs: 1000,
      timezone: 'UTC',
    });

    scheduler.start();
    expect(scheduler.running).toBe(true);

    await vi.advanceTimersByTimeAsync(29_999);
    expect(reminders.findDue).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(reminders.findDue).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(120_000);
    expect(reminders.findDue).toHaveBeenCalledTimes(3);

    await scheduler.stop();
    expect(scheduler.running).toBe(false);

    await vi.advanceTimersByTimeAsync(120_000);
    expect(reminders.findDue).toHaveBeenCalledTimes(3);
  });
});
