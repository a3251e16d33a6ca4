/**
 * Expert Reasoning Prompt
 *
 * Produces the private worked solution for a newly opened question. The
 * model may only use the retrieved chunks, must cite them by id step by
 * step, and must say so when they are not enough to answer. It also lists
 * plausible wrong answers, which later become multiple-choice distractors.
 *
 * None of this output is shown to the student directly.
 */

import { z } from 'zod';
import type { ContextChunk, ReasoningArtifact } from '../../core/models';
import { escapePromptContent, formatContextBlock, parseJsonResponse } from './shared';

export const EXPERT_REASONING_SYSTEM_PROMPT = `You are an expert reasoning system preparing a worked solution that a tutor will use to guide a student.

Rules:
1. Use ONLY information explicitly stated in the provided context chunks.
2. Do not infer, guess, or add outside knowledge.
3. Break the reasoning into short steps. Each step lists the ids of the chunks it relies on.
4. If the context does not contain enough information to answer, set "sufficient" to false, leave "steps" empty and "finalAnswer" empty.
5. List two to four plausible but wrong answers a student might give, each one sentence, in "misconceptions".

Respond with ONLY a JSON object in this exact format:
{
  "steps": [{ "statement": "string", "citedChunkIds": ["chunk id"] }],
  "finalAnswer": "string",
  "misconceptions": ["string"],
  "sufficient": true
}`;

/**
 * Builds the user message for one reasoning request.
 */
export function buildExpertReasoningPrompt(question: string, context: readonly ContextChunk[]): string {
  return `${formatContextBlock(context)}

<question>
${escapePromptContent(question)}
</question>

Work through the question using only the context above. Respond with JSON only.`;
}

const reasoningSchema = z.object({
  steps: z
    .array(
      z.object({
        statement: z.string().trim().min(1),
        citedChunkIds: z.array(z.string()).default([]),
      })
    )
    .default([]),
  finalAnswer: z.string().trim().default(''),
  misconceptions: z.array(z.string().trim().min(1)).default([]),
  sufficient: z.boolean(),
});

/**
 * Parses the reasoning reply into an artifact for `question`.
 *
 * An artifact that claims to be sufficient but carries no steps or no
 * final answer is downgraded to insufficient, so a thread is never opened
 * without something to scaffold toward.
 *
 * @throws {LLMError} of type 'invalid_response' for malformed replies
 */
export function parseReasoningArtifact(response: string, question: string): ReasoningArtifact {
  const parsed = parseJsonResponse(reasoningSchema, response, 'Expert reasoning');
  const complete = parsed.steps.length > 0 && parsed.finalAnswer.length > 0;

  return {
    question,
    steps: parsed.steps,
    finalAnswer: parsed.finalAnswer,
    misconceptions: parsed.misconceptions,
    sufficient: parsed.sufficient && complete,
  };
}
