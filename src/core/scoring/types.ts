/**
 * Answer Evaluation Contracts
 */

import type { EvaluationDimension, ReasoningArtifact, RetrievedContext } from '../models';

/**
 * Everything a judgment sees. Deliberately has no scaffold level: how much
 * help the student has had must not move the score.
 */
export interface JudgmentInput {
  answer: string;
  artifact: ReasoningArtifact;
  context: RetrievedContext;
}

/**
 * One dimension's verdict.
 */
export interface DimensionJudgment {
  /** Ordinal score on 0-4; fractional or out-of-range values are clamped */
  score: number;
  rationale: string;
  suggestion?: string;
}

/**
 * External capability that judges an answer on one dimension at a time.
 * Each dimension is a separate call so the verdicts stay independent.
 */
export interface JudgmentGenerator {
  judgeDimension(dimension: EvaluationDimension, input: JudgmentInput): Promise<DimensionJudgment>;
}
