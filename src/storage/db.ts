/**
 * Database Connection Factory
 *
 * Creates Drizzle ORM instances over better-sqlite3 with foreign key
 * enforcement enabled, and applies the schema DDL.
 *
 * Usage:
 *   import { createDatabase, runMigrations } from './db';
 *
 *   const db = createDatabase(config.database.path);
 *   runMigrations(db);
 *
 *   // In tests
 *   const testDb = createDatabase(':memory:');
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';

const SCHEMA_SQL_PATH = join(dirname(fileURLToPath(import.meta.url)), 'schema.sql');

/**
 * Creates a new Drizzle ORM database instance connected to the specified SQLite file.
 *
 * @param dbPath - Path to the SQLite database file. Use ':memory:' for an
 *                 in-memory database (tests).
 * @returns A Drizzle ORM database instance with full schema awareness
 *
 * @example
 * const db = createDatabase('/var/data/tutor.db');
 */
export function createDatabase(dbPath: string = 'socratic-scaffold.db') {
  const sqlite = new Database(dbPath);

  // SQLite ships with foreign keys off; turns and chunks rely on cascades
  sqlite.pragma('foreign_keys = ON');

  return drizzle(sqlite, { schema });
}

/**
 * Type alias for the Drizzle database instance.
 */
export type AppDatabase = ReturnType<typeof createDatabase>;

/**
 * Applies schema.sql to the database. Every statement is idempotent, so
 * this runs on each startup.
 */
export function runMigrations(db: AppDatabase): void {
  const ddl = readFileSync(SCHEMA_SQL_PATH, 'utf8');
  db.$client.exec(ddl);
}
