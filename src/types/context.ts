import type { Config } from '../config/index.js';
import type { UserRepository } from '../repositories/users.js';
import type { TaskRepository } from '../repositories/tasks.js';
import type { AuthService } from '../services/auth.js';
import type { Clock } from '../services/clock.js';
import type { CredentialStore } from '../services/credential-store.js';
import type { AttemptLimiter } from '../services/rate-limit.js';
import type { ReminderService } from '../services/reminders.js';
import type { ReminderScheduler } from '../services/scheduler.js';
import type { BearerTokenManager } from '../services/tokens.js';

/** Everything the HTTP layer needs, built once at startup (or per test). */
export interface AppContext {
  config: Config;
  clock: Clock;
  users: UserRepository;
  tasks: TaskRepository;
  reminders: ReminderService;
  scheduler: ReminderScheduler;
  tokens: BearerTokenManager;
  auth: AuthService;
  /** Backing store for credentials and the token deny list; closed on shutdown. */
  credentialStore: CredentialStore;
  limiter: AttemptLimiter;
}
