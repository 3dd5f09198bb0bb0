import { RepositoryUnavailableError, errorMessage } from '../errors.js';
import type { DueReminder, ReminderRepository } from '../repositories/reminders.js';
import type { Clock } from './clock.js';
import { reminderEmail } from './email-templates.js';
import { createLogger } from './logger.js';
import { sendWithTimeout, type NotificationDispatcher } from './notifier.js';
import { patchFor, transition, type FireOutcome } from './reminder-state.js';

const log = createLogger('scheduler');

export interface TickSummary {
  due: number;
  sent: number;
  failed: number;
  /** Lost the compare-and-set or hit an unexpected error; left for the next tick. */
  skipped: number;
}

export interface SchedulerOptions {
  intervalMs: number;
  dispatchTimeoutMs: number;
  timezone: string;
  batchSize?: number;
}

type FireResult = 'sent' | 'failed' | 'skipped';

export class ReminderScheduler {
  private alignTimer: NodeJS.Timeout | null = null;
  private interval: NodeJS.Timeout | null = null;
  private inFlight: Promise<TickSummary> | null = null;

  constructor(
    private readonly reminders: ReminderRepository,
    private readonly dispatcher: NotificationDispatcher,
    private readonly clock: Clock,
    private readonly options: SchedulerOptions,
  ) {}

  get running(): boolean {
    return this.alignTimer !== null || this.interval !== null;
  }

  /**
   * One polling pass. Resolves null without doing anything when the previous pass is
   * still running. Rejects with RepositoryUnavailableError when storage fails; the
   * reminders not yet processed are picked up by the next pass.
   */
  async tick(): Promise<TickSummary | null> {
    if (this.inFlight) {
      log.warn('Previous tick still running; skipping');
      return null;
    }

    this.inFlight = this.runTick();
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  private async runTick(): Promise<TickSummary> {
    const now = this.clock.now();
    log.debug(`Checking for due reminders at ${now.toISOString()}`);

    const due = await this.reminders.findDue(now, this.options.batchSize);
    const summary: TickSummary = { due: due.length, sent: 0, failed: 0, skipped: 0 };

    if (due.length === 0) {
      return summary;
    }

    log.info(`Found ${due.length} due reminder(s)`);

    for (const reminder of due) {
      const result = await this.fire(reminder);
      summary[result]++;
    }

    log.info(`Tick done: ${summary.sent} sent, ${summary.failed} failed, ${summary.skipped} skipped`);
    return summary;
  }

  private async fire(reminder: DueReminder): Promise<FireResult> {
    const destination = reminder.destination ?? reminder.owner_email;
    const email = reminderEmail({
      title: reminder.task_title,
      description: reminder.task_description,
      status: reminder.task_status,
      dueDate: reminder.task_due_date,
      timezone: this.options.timezone,
    });

    let outcome: FireOutcome;
    try {
      await sendWithTimeout(
        this.dispatcher,
        { destination, subject: email.subject, body: email.body },
        this.options.dispatchTimeoutMs,
      );
      outcome = { ok: true };
    } catch (error) {
      outcome = { ok: false, error: errorMessage(error) };
      log.error(`Failed to send reminder for task ${reminder.task_id} to ${destination}: ${outcome.error}`);
    }

    try {
      const next = transition(reminder.state, { type: 'fire', outcome });
      const finishedAt = this.clock.now();
      const committed = await this.reminders.compareAndSetState(
        reminder.task_id,
        { state: 'pending', version: reminder.version },
        next.state,
        patchFor(next.effects, finishedAt),
        finishedAt,
      );

      if (!committed) {
        log.warn(`Reminder for task ${reminder.task_id} changed during delivery; leaving it as is`);
        return 'skipped';
      }

      if (outcome.ok) {
        log.info(`Reminder sent for task ${reminder.task_id} to ${destination}`);
        return 'sent';
      }
      return 'failed';
    } catch (error) {
      if (error instanceof RepositoryUnavailableError) throw error;
      log.error(`Unexpected error recording reminder ${reminder.task_id}:`, error);
      return 'skipped';
    }
  }

  /**
   * Starts polling. The first pass runs on the next multiple of `intervalMs` (second 0
   * of the next minute for the default interval), then every `intervalMs`.
   */
  start(): void {
    if (this.running) {
      return;
    }

    const { intervalMs } = this.options;
    const delay = intervalMs - (Date.now() % intervalMs);
    log.info(`Starting scheduler with ${intervalMs}ms interval; first tick in ${delay}ms`);

    this.alignTimer = setTimeout(() => {
      this.alignTimer = null;
      this.runScheduled();
      this.interval = setInterval(() => this.runScheduled(), intervalMs);
    }, delay);
  }

  /** Stops polling and waits for a pass that is already running. */
  async stop(): Promise<void> {
    if (this.alignTimer) {
      clearTimeout(this.alignTimer);
      this.alignTimer = null;
    }
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }

    if (this.inFlight) {
      // A rejection here was already logged by runScheduled
      await this.inFlight.catch(() => undefined);
    }
    log.info('Scheduler stopped');
  }

  private runScheduled(): void {
    this.tick().catch((error: unknown) => {
      log.error('Tick aborted:', errorMessage(error));
    });
  }
}
