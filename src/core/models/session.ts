/**
 * Session Domain Types
 *
 * A Session is one student's tutoring conversation. It holds the bounded
 * turn log and, while a question is open, the ActiveThread: the cached
 * retrieval and reasoning for that question plus its scaffolding state.
 *
 * Only the session orchestrator mutates sessions, and it does so by
 * committing a whole new record per message.
 */

import type { EvaluationResult } from './evaluation';
import type { ReasoningArtifact } from './reasoning';
import type { RetrievedContext } from './retrieval';
import type { ScaffoldState } from './scaffold';

/**
 * Who produced a turn.
 */
export type TurnRole = 'student' | 'tutor';

/**
 * What a student turn was classified as.
 */
export type StudentIntent = 'new_question' | 'answer_attempt' | 'meta_question';

/**
 * Label attached to every turn. Tutor turns are always `tutor_reply`.
 */
export type TurnType = StudentIntent | 'tutor_reply';

/**
 * A single entry in the conversation log. Immutable once appended.
 */
export interface Turn {
  role: TurnRole;
  text: string;
  timestamp: Date;
  type: TurnType;
  /** Present on answer attempts after evaluation */
  evaluation?: EvaluationResult;
}

/**
 * The question currently open for follow-up.
 */
export interface ActiveThread {
  /** The student's question as asked */
  question: string;
  openedAt: Date;
  artifact: ReasoningArtifact;
  context: RetrievedContext;
  scaffold: ScaffoldState;
}

/**
 * Persisted shape of a session.
 *
 * `turns` is the retained (budgeted) log; `totalTurns` counts every turn
 * appended since creation or the last reset.
 */
export interface SessionRecord {
  id: string;
  turns: Turn[];
  totalTurns: number;
  activeThread: ActiveThread | null;
  createdAt: Date;
  lastActivityAt: Date;
}

/**
 * Snapshot returned by `getSessionState`.
 */
export interface SessionState {
  activeThreadPresent: boolean;
  scaffoldLevel: number;
  turnCount: number;
}
