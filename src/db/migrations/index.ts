import type { Knex } from 'knex';
import * as createUsers from './001_create_users.js';
import * as createTasks from './002_create_tasks.js';
import * as createReminders from './003_create_reminders.js';
import * as addReminderVersion from './004_add_reminder_version.js';

const migrations: Record<string, Knex.Migration> = {
  '001_create_users': createUsers,
  '002_create_tasks': createTasks,
  '003_create_reminders': createReminders,
  '004_add_reminder_version': addReminderVersion,
};

// Migrations are imported statically so the same list runs from src/ under tsx or
// vitest and from dist/ after a build.
export const migrationSource: Knex.MigrationSource<string> = {
  async getMigrations() {
    return Object.keys(migrations).sort();
  },
  getMigrationName(name) {
    return name;
  },
  async getMigration(name) {
    const migration = migrations[name];
    if (!migration) {
      throw new Error(`Unknown migration: ${name}`);
    }
    return migration;
  },
};
