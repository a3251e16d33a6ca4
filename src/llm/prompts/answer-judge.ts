/**
 * Answer Judge Prompt
 *
 * Scores a student's answer on a single evaluation dimension against the
 * reference reasoning and the source chunks. Each dimension gets its own
 * rubric and its own call so one verdict cannot color another. The prompt
 * never says how much help the student has already had.
 */

import { z } from 'zod';
import type { EvaluationDimension } from '../../core/models';
import type { DimensionJudgment, JudgmentInput } from '../../core/scoring';
import { escapePromptContent, formatContextBlock, parseJsonResponse } from './shared';

/**
 * What each dimension measures, phrased for the judge.
 */
export const DIMENSION_RUBRICS: Record<EvaluationDimension, string> = {
  conceptualAccuracy:
    'Conceptual accuracy: are the claims in the answer correct with respect to the reference answer and the source material?',
  reasoningCoherence:
    'Reasoning coherence: does the answer follow a logical chain from premises to conclusion, without gaps or contradictions?',
  evidenceUtilization:
    'Evidence utilization: does the answer draw on the facts stated in the source material rather than on unsupported assertion?',
  conceptualIntegration:
    'Conceptual integration: does the answer connect the relevant ideas to each other, rather than listing them in isolation?',
};

export function buildAnswerJudgeSystemPrompt(dimension: EvaluationDimension): string {
  return `You are grading one aspect of a student's answer.

${DIMENSION_RUBRICS[dimension]}

Score on this scale:
0 - absent or entirely wrong
1 - mostly wrong, with a fragment of relevance
2 - partly right, with significant gaps or errors
3 - largely right, with minor gaps
4 - complete and correct

Judge ONLY this aspect. Use the reference answer and the source material as ground truth.
If the answer falls short, give one concrete suggestion for improving this aspect.

Respond with ONLY a JSON object: { "score": 0-4, "rationale": "one or two sentences", "suggestion": "string or omit" }`;
}

/**
 * Builds the user message for judging one dimension.
 */
export function buildAnswerJudgePrompt(input: JudgmentInput): string {
  const reasoning = input.artifact.steps
    .map((step, index) => `${index + 1}. ${escapePromptContent(step.statement)}`)
    .join('\n');

  return `${formatContextBlock(input.context)}

<question>
${escapePromptContent(input.artifact.question)}
</question>

<reasoning>
${reasoning}
</reasoning>

<reference_answer>
${escapePromptContent(input.artifact.finalAnswer)}
</reference_answer>

<student_answer>
${escapePromptContent(input.answer)}
</student_answer>

Grade the student answer. Respond with JSON only.`;
}

const dimensionJudgmentSchema = z.object({
  score: z.coerce.number(),
  rationale: z.string().trim().min(1),
  suggestion: z
    .string()
    .trim()
    .nullish()
    .transform((value) => (value ? value : undefined)),
});

/**
 * Parses the judge reply. Out-of-range scores are left for the evaluator
 * to clamp.
 *
 * @throws {LLMError} of type 'invalid_response' for malformed replies
 */
export function parseDimensionJudgment(response: string): DimensionJudgment {
  const parsed = parseJsonResponse(dimensionJudgmentSchema, response, 'Answer judge');
  return parsed.suggestion === undefined
    ? { score: parsed.score, rationale: parsed.rationale }
    : { score: parsed.score, rationale: parsed.rationale, suggestion: parsed.suggestion };
}
