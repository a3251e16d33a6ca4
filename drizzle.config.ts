/**
 * Drizzle Kit Configuration
 *
 * Used by drizzle-kit for Drizzle Studio (`npm run db:studio`) so the tutoring
 * database can be inspected. The runtime schema itself is created from
 * src/storage/schema.sql by the migration runner.
 */
import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: './src/storage/schema.ts',
  out: './drizzle',
  dialect: 'sqlite',
  dbCredentials: {
    url: process.env.DATABASE_PATH || './socratic-scaffold.db',
  },
  verbose: true,
  strict: true,
});
