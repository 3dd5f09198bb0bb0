import { config } from '../config/index.js';
import { createKnex, runMigrations as migrate } from './connection.js';

export const db = createKnex(config.database);

export async function runMigrations(): Promise<void> {
  await migrate(db);
}

export async function closeDatabase(): Promise<void> {
  await db.destroy();
}
