/**
 * LLM Prompts Module - Barrel Export
 *
 * Prompt builders and reply parsers for the four model-backed steps of a
 * tutoring turn:
 *
 * 1. **Intent classification**: labelling a student turn against the open question.
 * 2. **Expert reasoning**: the private, cited worked solution for a new question.
 * 3. **Answer judging**: one rubric score per evaluation dimension.
 * 4. **Tutor utterances**: the words of each reply template.
 *
 * @example
 * ```typescript
 * import { buildExpertReasoningPrompt, EXPERT_REASONING_SYSTEM_PROMPT, parseReasoningArtifact } from './prompts';
 *
 * const response = await client.complete(buildExpertReasoningPrompt(question, context), {
 *   system: EXPERT_REASONING_SYSTEM_PROMPT,
 * });
 * const artifact = parseReasoningArtifact(response.text, question);
 * ```
 */

export {
  INTENT_CLASSIFIER_SYSTEM_PROMPT,
  buildIntentClassifierPrompt,
  parseIntentJudgment,
} from './intent-classifier';

export {
  EXPERT_REASONING_SYSTEM_PROMPT,
  buildExpertReasoningPrompt,
  parseReasoningArtifact,
} from './expert-reasoning';

export {
  DIMENSION_RUBRICS,
  buildAnswerJudgeSystemPrompt,
  buildAnswerJudgePrompt,
  parseDimensionJudgment,
} from './answer-judge';

export { SOCRATIC_TUTOR_SYSTEM_PROMPT, buildUtterancePrompt } from './socratic-tutor';

export {
  escapePromptContent,
  extractJsonFromResponse,
  formatContextBlock,
  parseJsonResponse,
} from './shared';
