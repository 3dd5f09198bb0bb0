#!/usr/bin/env node

import { config } from '../config/index.js';
import { db, closeDatabase } from '../db/index.js';
import { migrationSource } from '../db/migrations/index.js';

async function main(): Promise<void> {
  const rollback = process.argv.includes('--rollback');
  console.log(`[migrate] ${rollback ? 'Rolling back' : 'Migrating'} ${config.database.type} database`);

  const [batch, names]: [number, string[]] = rollback
    ? await db.migrate.rollback({ migrationSource })
    : await db.migrate.latest({ migrationSource });

  if (names.length === 0) {
    console.log('[migrate] Already up to date');
  } else {
    console.log(`[migrate] Batch ${batch}: ${names.join(', ')}`);
  }
}

main()
  .then(() => closeDatabase())
  .catch(async (error) => {
    console.error('[migrate] Failed:', error);
    await closeDatabase();
    process.exit(1);
  });
