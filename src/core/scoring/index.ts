/**
 * Core Scoring Module - Barrel Export
 *
 * Multi-dimensional answer evaluation and the fixed aggregation that turns
 * four sub-scores into a performance tier.
 */

export { AnswerEvaluator, DIMENSION_LABELS } from './answer-evaluator';
export type { AnswerEvaluatorOptions } from './answer-evaluator';
export {
  DEFAULT_DIMENSION_WEIGHTS,
  DEFAULT_TIER_THRESHOLDS,
  MAX_SUB_SCORE,
  isPassingTier,
  tierFor,
  toSubScore,
  weightedScore,
} from './aggregation';
export type { DimensionJudgment, JudgmentGenerator, JudgmentInput } from './types';
