/**
 * Intent Classifier Prompt
 *
 * Asks the model to label a student turn, given the question currently
 * open, as one of: a new question, an attempt to answer the open question,
 * or a meta question about the tutoring itself. The model reports its
 * confidence; the classifier decides what counts as confident enough.
 */

import { z } from 'zod';
import type { IntentJudgeInput, IntentJudgment } from '../../core/intent';
import { escapePromptContent, parseJsonResponse } from './shared';

export const INTENT_CLASSIFIER_SYSTEM_PROMPT = `You classify messages a student sends to a tutor.

A question is currently open in the conversation. Label the student's latest message as exactly one of:
- "answer_attempt": the student is trying to answer or reason about the open question, even partially or wrongly.
- "new_question": the student is asking about a different topic, or asking a fresh question of their own.
- "meta_question": the student is asking about the tutoring itself (asking for a hint, asking what the tutor meant, saying they are confused) without attempting an answer.

Report how confident you are as a number between 0 and 1.

Respond with ONLY a JSON object: { "label": "answer_attempt" | "new_question" | "meta_question", "confidence": number }`;

/**
 * Builds the user message for one classification.
 */
export function buildIntentClassifierPrompt(input: IntentJudgeInput): string {
  return `<conversation>
${escapePromptContent(input.recentContext)}
</conversation>

<question>
${escapePromptContent(input.question)}
</question>

<student_message>
${escapePromptContent(input.text)}
</student_message>

Classify the student message. Respond with JSON only.`;
}

const intentJudgmentSchema = z.object({
  label: z.enum(['new_question', 'answer_attempt', 'meta_question']),
  confidence: z.coerce.number().min(0).max(1),
});

/**
 * Parses the classifier reply.
 *
 * @throws {LLMError} of type 'invalid_response' for malformed replies
 */
export function parseIntentJudgment(response: string): IntentJudgment {
  return parseJsonResponse(intentJudgmentSchema, response, 'Intent classifier');
}
