/**
 * Reasoning Artifact Types
 *
 * The reasoning artifact is the tutor's private worked solution for the open
 * question. It is produced once when a thread opens, cached on the thread,
 * and never shown verbatim to the student: scaffolds are derived from it.
 */

/**
 * One inference step, optionally grounded in retrieved chunks.
 */
export interface ReasoningStep {
  statement: string;
  citedChunkIds: string[];
}

/**
 * Restated question, supporting chain and final answer.
 *
 * `sufficient` is false when the retrieved material cannot support an
 * answer; such an artifact never opens a thread. `misconceptions` are
 * plausible wrong answers, used as multiple-choice distractors.
 */
export interface ReasoningArtifact {
  question: string;
  steps: ReasoningStep[];
  finalAnswer: string;
  misconceptions: string[];
  sufficient: boolean;
}
