/**
 * Database Schema Definitions
 *
 * Drizzle ORM schema definitions for SQLite. The matching DDL lives in
 * schema.sql, which `runMigrations` applies at startup.
 *
 * The schema backs two concerns:
 * - Corpus: uploaded documents and their embedded chunks
 * - Sessions: one row per tutoring session plus its retained turn log
 *
 * All timestamps are stored as milliseconds since epoch (integer) for
 * SQLite compatibility.
 */

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

/**
 * Documents Table
 *
 * A document is one uploaded text. Its content is not kept whole; only the
 * chunks derived from it are stored.
 */
export const documents = sqliteTable('documents', {
  id: text('id').primaryKey(),

  // Human-readable title used in citations
  title: text('title').notNull(),

  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * Document Chunks Table
 *
 * Chunks are the retrieval unit. Each keeps its embedding vector as a JSON
 * array so the semantic index can be rebuilt without re-embedding.
 */
export const documentChunks = sqliteTable(
  'document_chunks',
  {
    id: text('id').primaryKey(),

    documentId: text('document_id')
      .notNull()
      .references(() => documents.id, { onDelete: 'cascade' }),

    // Zero-based position of the chunk within its document
    ordinal: integer('ordinal').notNull(),

    // Position marker shown in citations, e.g. "page 3"
    location: text('location').notNull(),

    text: text('text').notNull(),

    embedding: text('embedding', { mode: 'json' }).$type<number[]>().notNull(),
  },
  (table) => [index('document_chunks_document_id_idx').on(table.documentId)]
);

/**
 * Tutor Sessions Table
 *
 * The active thread is stored as a JSON document and validated when read
 * back (see serialization.ts). `total_turns` counts every turn since the
 * session was created or last reset, including turns evicted from the log.
 */
export const tutorSessions = sqliteTable(
  'tutor_sessions',
  {
    id: text('id').primaryKey(),

    // JSON-encoded ActiveThread, or null while no question is open
    activeThread: text('active_thread'),

    totalTurns: integer('total_turns').notNull().default(0),

    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),

    lastActivityAt: integer('last_activity_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [index('tutor_sessions_last_activity_idx').on(table.lastActivityAt)]
);

/**
 * Session Turns Table
 *
 * The retained turn log of a session, replaced wholesale on every commit.
 * `evaluation` holds the JSON-encoded EvaluationResult of answer attempts.
 */
export const sessionTurns = sqliteTable(
  'session_turns',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),

    sessionId: text('session_id')
      .notNull()
      .references(() => tutorSessions.id, { onDelete: 'cascade' }),

    // Position of the turn within the retained log
    ordinal: integer('ordinal').notNull(),

    role: text('role', { enum: ['student', 'tutor'] }).notNull(),

    type: text('type', {
      enum: ['new_question', 'answer_attempt', 'meta_question', 'tutor_reply'],
    }).notNull(),

    text: text('text').notNull(),

    evaluation: text('evaluation'),

    timestamp: integer('timestamp', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [index('session_turns_session_id_idx').on(table.sessionId, table.ordinal)]
);

// =============================================================================
// Inferred Types
// =============================================================================

export type DocumentRow = typeof documents.$inferSelect;
export type NewDocumentRow = typeof documents.$inferInsert;

export type DocumentChunkRow = typeof documentChunks.$inferSelect;
export type NewDocumentChunkRow = typeof documentChunks.$inferInsert;

export type TutorSessionRow = typeof tutorSessions.$inferSelect;
export type NewTutorSessionRow = typeof tutorSessions.$inferInsert;

export type SessionTurnRow = typeof sessionTurns.$inferSelect;
export type NewSessionTurnRow = typeof sessionTurns.$inferInsert;
