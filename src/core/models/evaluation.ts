/**
 * Answer Evaluation Types
 *
 * A student's answer is judged on four independent dimensions, each on a
 * 0-4 ordinal scale, and the weighted aggregate is thresholded into a tier.
 * The tier is the only thing the scaffolding state machine looks at.
 */

/**
 * The four judged dimensions.
 *
 * - conceptualAccuracy: is the core idea right
 * - reasoningCoherence: does the argument hang together
 * - evidenceUtilization: does it use the source material
 * - conceptualIntegration: does it connect the idea to related concepts
 */
export type EvaluationDimension =
  | 'conceptualAccuracy'
  | 'reasoningCoherence'
  | 'evidenceUtilization'
  | 'conceptualIntegration';

export const EVALUATION_DIMENSIONS: readonly EvaluationDimension[] = [
  'conceptualAccuracy',
  'reasoningCoherence',
  'evidenceUtilization',
  'conceptualIntegration',
];

/** Integer score on the 0-4 ordinal scale */
export type SubScore = 0 | 1 | 2 | 3 | 4;

export type SubScores = Record<EvaluationDimension, SubScore>;

export type DimensionWeights = Record<EvaluationDimension, number>;

/** Overall performance tier, ordered from worst to best */
export type PerformanceTier = 'fail' | 'partial' | 'adequate' | 'strong';

/**
 * Lower bounds (inclusive) on the normalized weighted score for each tier
 * above `fail`.
 */
export interface TierThresholds {
  strong: number;
  adequate: number;
  partial: number;
}

export interface EvaluationResult {
  scores: SubScores;
  /** Weighted mean of the sub-scores, normalized to 0-1 */
  weightedScore: number;
  tier: PerformanceTier;
  feedback: string;
  suggestions: string[];
}
