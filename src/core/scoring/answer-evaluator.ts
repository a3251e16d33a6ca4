/**
 * Answer Evaluator
 *
 * Scores a student's answer against the thread's reasoning artifact and
 * retrieved context. The four dimensions are judged by separate, parallel
 * calls and then aggregated with fixed weights into a 0-1 score and a tier
 * (see ./aggregation). The evaluator never retries; a failed judgment
 * propagates to the orchestrator, which owns the retry policy.
 *
 * @example
 * ```typescript
 * const evaluator = new AnswerEvaluator(judgmentGenerator);
 * const result = await evaluator.evaluate({ answer, artifact, context });
 * console.log(result.tier, result.scores);
 * ```
 */

import type {
  DimensionWeights,
  EvaluationDimension,
  EvaluationResult,
  SubScores,
  TierThresholds,
} from '../models';
import { EVALUATION_DIMENSIONS } from '../models';
import {
  DEFAULT_DIMENSION_WEIGHTS,
  DEFAULT_TIER_THRESHOLDS,
  tierFor,
  toSubScore,
  weightedScore,
} from './aggregation';
import type { DimensionJudgment, JudgmentGenerator, JudgmentInput } from './types';

/** Dimensions at or below this score contribute suggestions */
const SUGGESTION_SCORE_CEILING = 2;

export const DIMENSION_LABELS: Record<EvaluationDimension, string> = {
  conceptualAccuracy: 'Conceptual accuracy',
  reasoningCoherence: 'Reasoning coherence',
  evidenceUtilization: 'Evidence utilization',
  conceptualIntegration: 'Conceptual integration',
};

export interface AnswerEvaluatorOptions {
  weights?: DimensionWeights;
  thresholds?: TierThresholds;
}

export class AnswerEvaluator {
  private readonly weights: DimensionWeights;
  private readonly thresholds: TierThresholds;

  constructor(
    private readonly judge: JudgmentGenerator,
    options: AnswerEvaluatorOptions = {}
  ) {
    this.weights = options.weights ?? DEFAULT_DIMENSION_WEIGHTS;
    this.thresholds = options.thresholds ?? DEFAULT_TIER_THRESHOLDS;
  }

  async evaluate(input: JudgmentInput): Promise<EvaluationResult> {
    const judgments = await Promise.all(
      EVALUATION_DIMENSIONS.map(
        async (dimension): Promise<[EvaluationDimension, DimensionJudgment]> => [
          dimension,
          await this.judge.judgeDimension(dimension, input),
        ]
      )
    );

    const scores: SubScores = {
      conceptualAccuracy: 0,
      reasoningCoherence: 0,
      evidenceUtilization: 0,
      conceptualIntegration: 0,
    };
    for (const [dimension, judgment] of judgments) {
      scores[dimension] = toSubScore(judgment.score);
    }

    const score = weightedScore(scores, this.weights);

    return {
      scores,
      weightedScore: score,
      tier: tierFor(score, this.thresholds),
      feedback: judgments
        .map(([dimension, judgment]) => `${DIMENSION_LABELS[dimension]}: ${judgment.rationale.trim()}`)
        .join('\n'),
      suggestions: collectSuggestions(judgments, scores),
    };
  }
}

function collectSuggestions(
  judgments: Array<[EvaluationDimension, DimensionJudgment]>,
  scores: SubScores
): string[] {
  const suggestions: string[] = [];
  for (const [dimension, judgment] of judgments) {
    const suggestion = judgment.suggestion?.trim();
    if (suggestion && scores[dimension] <= SUGGESTION_SCORE_CEILING && !suggestions.includes(suggestion)) {
      suggestions.push(suggestion);
    }
  }
  return suggestions;
}
