/**
 * Storage Module - Barrel Export
 *
 * Usage:
 *   import { createDatabase, runMigrations, SqliteSessionStore } from './storage';
 */

export { createDatabase, runMigrations } from './db';
export type { AppDatabase } from './db';

export { documents, documentChunks, tutorSessions, sessionTurns } from './schema';
export type {
  DocumentRow,
  NewDocumentRow,
  DocumentChunkRow,
  NewDocumentChunkRow,
  TutorSessionRow,
  NewTutorSessionRow,
  SessionTurnRow,
  NewSessionTurnRow,
} from './schema';

export * from './repositories';
