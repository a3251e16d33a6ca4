/**
 * Database Migration Runner
 *
 * Applies schema.sql to the configured SQLite database and lists the
 * resulting tables. Safe to run repeatedly.
 *
 * Usage:
 *   npm run db:migrate
 *   DATABASE_PATH=/path/to/db npm run db:migrate
 */

import { config } from '../config';
import { createDatabase, runMigrations } from './db';

const dbPath = config.database.path;

console.log(`[migrate] Database path: ${dbPath}`);

try {
  const db = createDatabase(dbPath);
  runMigrations(db);

  console.log('[migrate] Schema applied successfully.');

  const tables = db.$client
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .all();

  console.log('[migrate] Tables in database:');
  for (const table of tables) {
    console.log(`  - ${table.name}`);
  }

  const foreignKeys = db.$client.pragma('foreign_keys', { simple: true });
  console.log(`[migrate] Foreign key enforcement: ${foreignKeys === 1 ? 'ENABLED' : 'DISABLED'}`);

  db.$client.close();
} catch (error) {
  console.error('[migrate] Migration failed:', error);
  process.exit(1);
}
