/**
 * Tutoring Engine Errors
 *
 * Every condition the engine raises extends TutorError and carries a stable
 * `code`. Some are recovered inside the pipeline (ambiguous classification,
 * a missing thread); the rest reach the caller, which decides how to present
 * them. Upstream failures carry an `apology` that is safe to show a student.
 */

export type TutorErrorCode =
  | 'CLASSIFICATION_AMBIGUOUS'
  | 'NO_ACTIVE_THREAD'
  | 'UPSTREAM_TIMEOUT'
  | 'UPSTREAM_FAILURE'
  | 'INVARIANT_VIOLATION'
  | 'MESSAGE_CANCELLED'
  | 'EMPTY_MESSAGE'
  | 'EMPTY_DOCUMENT';

/**
 * Base class for all engine errors.
 */
export class TutorError extends Error {
  constructor(
    message: string,
    public readonly code: TutorErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'TutorError';
  }
}

/**
 * The intent judge could not confidently label a turn. Recovered as a
 * meta question so an unclear turn is never scored as a wrong answer.
 */
export class ClassificationAmbiguous extends TutorError {
  constructor(message: string, public readonly confidence?: number) {
    super(message, 'CLASSIFICATION_AMBIGUOUS');
    this.name = 'ClassificationAmbiguous';
  }
}

/**
 * An answer attempt or meta question arrived with no open thread.
 * Recovered by running the new-question pipeline instead.
 */
export class NoActiveThreadError extends TutorError {
  constructor(sessionId: string, intent: string) {
    super(`Session ${sessionId} received ${intent} with no active thread`, 'NO_ACTIVE_THREAD');
    this.name = 'NoActiveThreadError';
  }
}

export const UPSTREAM_APOLOGY =
  "Sorry, I'm having trouble reaching my reference tools right now. Please send that again in a moment.";

/**
 * Shared shape of the two recoverable upstream conditions.
 */
export abstract class UpstreamError extends TutorError {
  readonly apology = UPSTREAM_APOLOGY;

  constructor(
    message: string,
    code: 'UPSTREAM_TIMEOUT' | 'UPSTREAM_FAILURE',
    public readonly operation: string,
    cause?: unknown
  ) {
    super(message, code, cause);
  }
}

/**
 * An external call (search, reasoning, judgment, rendering) did not answer
 * within the configured timeout.
 */
export class UpstreamTimeout extends UpstreamError {
  constructor(operation: string, public readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'UPSTREAM_TIMEOUT', operation);
    this.name = 'UpstreamTimeout';
  }
}

/**
 * An external call failed or returned output that could not be used.
 */
export class UpstreamFailure extends UpstreamError {
  constructor(operation: string, message: string, cause?: unknown) {
    super(`${operation} failed: ${message}`, 'UPSTREAM_FAILURE', operation, cause);
    this.name = 'UpstreamFailure';
  }
}

/**
 * Internal state contradicts the engine's model, e.g. a transition out of
 * a resolved scaffold. Aborts the current message only.
 */
export class InvariantViolation extends TutorError {
  constructor(message: string) {
    super(message, 'INVARIANT_VIOLATION');
    this.name = 'InvariantViolation';
  }
}

/**
 * The caller aborted the message before it committed.
 */
export class MessageCancelled extends TutorError {
  constructor(sessionId: string) {
    super(`Message for session ${sessionId} was cancelled before commit`, 'MESSAGE_CANCELLED');
    this.name = 'MessageCancelled';
  }
}

export class EmptyMessageError extends TutorError {
  constructor() {
    super('Message text must not be empty', 'EMPTY_MESSAGE');
    this.name = 'EmptyMessageError';
  }
}

/**
 * An uploaded document produced no chunks (blank or whitespace only).
 */
export class EmptyDocumentError extends TutorError {
  constructor(title: string) {
    super(`Document "${title}" contains no text to index`, 'EMPTY_DOCUMENT');
    this.name = 'EmptyDocumentError';
  }
}

/**
 * Type guard for the retryable upstream conditions.
 */
export function isUpstreamError(error: unknown): error is UpstreamError {
  return error instanceof UpstreamError;
}
