import { createTransport, type Transporter } from 'nodemailer';
import type { Config } from '../config/index.js';
import { DispatchError, errorMessage } from '../errors.js';
import { createLogger } from './logger.js';

const log = createLogger('notifier');

export interface NotificationDispatcher {
  /** Resolves once the transport accepted the message; rejects with DispatchError otherwise. */
  send(destination: string, subject: string, body: string): Promise<void>;
}

export class SmtpDispatcher implements NotificationDispatcher {
  private readonly transporter: Transporter;

  constructor(
    private readonly smtp: Config['smtp'],
    timeoutMs: number,
  ) {
    this.transporter = createTransport({
      host: smtp.host,
      port: smtp.port,
      secure: smtp.secure,
      auth: smtp.user ? { user: smtp.user, pass: smtp.pass } : undefined,
      connectionTimeout: timeoutMs,
      greetingTimeout: timeoutMs,
      socketTimeout: timeoutMs,
    });
  }

  async send(destination: string, subject: string, body: string): Promise<void> {
    try {
      await this.transporter.sendMail({
        from: this.smtp.from,
        to: destination,
        subject,
        html: body,
      });
    } catch (error) {
      throw new DispatchError(`SMTP delivery to ${destination} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

export class WebhookDispatcher implements NotificationDispatcher {
  constructor(
    private readonly webhook: { url: string; apiKey?: string },
    private readonly timeoutMs: number,
  ) {}

  async send(destination: string, subject: string, body: string): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const headers: Record<string, string> = {
        'Content-Type': 'application/json',
      };

      if (this.webhook.apiKey) {
        headers['Authorization'] = `Bearer ${this.webhook.apiKey}`;
      }

      const response = await fetch(this.webhook.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ to: destination, subject, html: body }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new DispatchError(`Webhook notification failed: ${response.status} ${response.statusText}`);
      }
    } catch (error) {
      if (error instanceof DispatchError) throw error;
      throw new DispatchError(`Webhook notification error: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }
}

/** Used when no transport is configured; the message only reaches the log. */
export class ConsoleDispatcher implements NotificationDispatcher {
  async send(destination: string, subject: string): Promise<void> {
    log.info(`${subject} -> ${destination} (no transport configured)`);
  }
}

export function createDispatcher(config: Pick<Config, 'smtp' | 'webhook' | 'scheduler'>): NotificationDispatcher {
  const timeoutMs = config.scheduler.dispatchTimeoutMs;

  if (config.smtp.host) {
    return new SmtpDispatcher(config.smtp, timeoutMs);
  }
  if (config.webhook.url) {
    return new WebhookDispatcher({ url: config.webhook.url, apiKey: config.webhook.apiKey }, timeoutMs);
  }
  return new ConsoleDispatcher();
}

/**
 * Sends through `dispatcher` but gives up after `timeoutMs`. A hang or any thrown
 * value comes back as a DispatchError.
 */
export async function sendWithTimeout(
  dispatcher: NotificationDispatcher,
  message: { destination: string; subject: string; body: string },
  timeoutMs: number,
): Promise<void> {
  let timer: NodeJS.Timeout | undefined;

  const timedOut = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(
      () => reject(new DispatchError(`Delivery to ${message.destination} timed out after ${timeoutMs}ms`)),
      timeoutMs,
    );
  });

  try {
    await Promise.race([dispatcher.send(message.destination, message.subject, message.body), timedOut]);
  } catch (error) {
    if (error instanceof DispatchError) throw error;
    throw new DispatchError(errorMessage(error), { cause: error });
  } finally {
    clearTimeout(timer);
  }
}
