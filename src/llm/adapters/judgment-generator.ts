/**
 * Model-backed JudgmentGenerator. One call per dimension, each with its
 * own rubric as the system prompt.
 */

import type { EvaluationDimension } from '../../core/models';
import type { DimensionJudgment, JudgmentGenerator, JudgmentInput } from '../../core/scoring';
import type { CompletionClient } from '../types';
import {
  buildAnswerJudgePrompt,
  buildAnswerJudgeSystemPrompt,
  parseDimensionJudgment,
} from '../prompts';

// Same temperature as the classifier so repeated grading agrees
const JUDGE_TEMPERATURE = 0;
const JUDGE_MAX_TOKENS = 400;

export class LlmJudgmentGenerator implements JudgmentGenerator {
  constructor(private readonly client: CompletionClient) {}

  async judgeDimension(dimension: EvaluationDimension, input: JudgmentInput): Promise<DimensionJudgment> {
    const response = await this.client.complete(buildAnswerJudgePrompt(input), {
      system: buildAnswerJudgeSystemPrompt(dimension),
      temperature: JUDGE_TEMPERATURE,
      maxTokens: JUDGE_MAX_TOKENS,
    });
    return parseDimensionJudgment(response.text);
  }
}
