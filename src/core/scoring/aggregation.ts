/**
 * Score Aggregation
 *
 * weightedScore = Σ weight_d × score_d / 4, with weights normalized to sum
 * to 1, giving a value in 0-1. The tier is the highest band whose lower
 * bound the weighted score reaches:
 *
 *   strong   >= thresholds.strong    (default 0.75)
 *   adequate >= thresholds.adequate  (default 0.55)
 *   partial  >= thresholds.partial   (default 0.30)
 *   fail     otherwise
 *
 * Default weights: conceptual accuracy 0.35, reasoning coherence 0.25,
 * evidence utilization 0.15, conceptual integration 0.25.
 */

import type {
  DimensionWeights,
  PerformanceTier,
  SubScore,
  SubScores,
  TierThresholds,
} from '../models';
import { EVALUATION_DIMENSIONS } from '../models';

export const MAX_SUB_SCORE = 4;

export const DEFAULT_DIMENSION_WEIGHTS: DimensionWeights = {
  conceptualAccuracy: 0.35,
  reasoningCoherence: 0.25,
  evidenceUtilization: 0.15,
  conceptualIntegration: 0.25,
};

export const DEFAULT_TIER_THRESHOLDS: TierThresholds = {
  strong: 0.75,
  adequate: 0.55,
  partial: 0.3,
};

const SUB_SCORES: readonly SubScore[] = [0, 1, 2, 3, 4];

/**
 * Rounds and clamps a raw score onto the 0-4 ordinal scale.
 * Non-finite input becomes 0.
 */
export function toSubScore(raw: number): SubScore {
  if (!Number.isFinite(raw)) return 0;
  return SUB_SCORES[Math.min(MAX_SUB_SCORE, Math.max(0, Math.round(raw)))];
}

export function weightedScore(scores: SubScores, weights: DimensionWeights): number {
  const totalWeight = EVALUATION_DIMENSIONS.reduce((sum, d) => sum + weights[d], 0);
  if (totalWeight <= 0) {
    throw new Error('Evaluation weights must include at least one positive weight');
  }
  const weighted = EVALUATION_DIMENSIONS.reduce((sum, d) => sum + weights[d] * scores[d], 0);
  return weighted / totalWeight / MAX_SUB_SCORE;
}

export function tierFor(score: number, thresholds: TierThresholds): PerformanceTier {
  if (score >= thresholds.strong) return 'strong';
  if (score >= thresholds.adequate) return 'adequate';
  if (score >= thresholds.partial) return 'partial';
  return 'fail';
}

/**
 * True for tiers that resolve a thread.
 */
export function isPassingTier(tier: PerformanceTier): boolean {
  return tier === 'adequate' || tier === 'strong';
}
