/**
 * Session Store Implementation
 *
 * Persists tutoring sessions to SQLite. A session is one `tutor_sessions`
 * row plus its retained turns in `session_turns`. Every save rewrites the
 * turn log inside a single transaction, so a crash mid-save leaves the
 * previous commit intact.
 */

import { asc, eq, lt } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { sessionTurns, tutorSessions } from '../schema';
import type { SessionRecord, Turn } from '../../core/models';
import type { SessionStore } from '../../core/session';
import {
  deserializeEvaluation,
  deserializeThread,
  serializeEvaluation,
  serializeThread,
} from '../serialization';

function mapTurn(row: typeof sessionTurns.$inferSelect): Turn {
  const evaluation = deserializeEvaluation(row.evaluation);
  const turn: Turn = {
    role: row.role,
    text: row.text,
    timestamp: row.timestamp,
    type: row.type,
  };
  return evaluation ? { ...turn, evaluation } : turn;
}

/**
 * SessionStore backed by the application database.
 *
 * @example
 * ```typescript
 * const store = new SqliteSessionStore(db);
 * const orchestrator = new TutorOrchestrator({ store, ... }, config);
 *
 * // Periodic cleanup
 * await store.deleteInactiveSince(new Date(Date.now() - ttlMs));
 * ```
 */
export class SqliteSessionStore implements SessionStore {
  constructor(private readonly db: AppDatabase) {}

  async load(sessionId: string): Promise<SessionRecord | null> {
    const sessionRows = await this.db
      .select()
      .from(tutorSessions)
      .where(eq(tutorSessions.id, sessionId))
      .limit(1);

    if (sessionRows.length === 0) {
      return null;
    }

    const row = sessionRows[0];
    const turnRows = await this.db
      .select()
      .from(sessionTurns)
      .where(eq(sessionTurns.sessionId, sessionId))
      .orderBy(asc(sessionTurns.ordinal));

    return {
      id: row.id,
      turns: turnRows.map(mapTurn),
      totalTurns: row.totalTurns,
      activeThread: deserializeThread(row.activeThread),
      createdAt: row.createdAt,
      lastActivityAt: row.lastActivityAt,
    };
  }

  async save(record: SessionRecord): Promise<void> {
    const activeThread = serializeThread(record.activeThread);

    this.db.transaction((tx) => {
      tx.insert(tutorSessions)
        .values({
          id: record.id,
          activeThread,
          totalTurns: record.totalTurns,
          createdAt: record.createdAt,
          lastActivityAt: record.lastActivityAt,
        })
        .onConflictDoUpdate({
          target: tutorSessions.id,
          set: {
            activeThread,
            totalTurns: record.totalTurns,
            lastActivityAt: record.lastActivityAt,
          },
        })
        .run();

      tx.delete(sessionTurns).where(eq(sessionTurns.sessionId, record.id)).run();

      record.turns.forEach((turn, ordinal) => {
        tx.insert(sessionTurns)
          .values({
            sessionId: record.id,
            ordinal,
            role: turn.role,
            type: turn.type,
            text: turn.text,
            evaluation: serializeEvaluation(turn.evaluation),
            timestamp: turn.timestamp,
          })
          .run();
      });
    });
  }

  /**
   * Removes a session and, through the cascade, its turns. Deleting an
   * unknown session is a no-op.
   */
  async delete(sessionId: string): Promise<void> {
    await this.db.delete(tutorSessions).where(eq(tutorSessions.id, sessionId));
  }

  async deleteInactiveSince(cutoff: Date): Promise<number> {
    const removed = await this.db
      .delete(tutorSessions)
      .where(lt(tutorSessions.lastActivityAt, cutoff))
      .returning({ id: tutorSessions.id });

    return removed.length;
  }
}
