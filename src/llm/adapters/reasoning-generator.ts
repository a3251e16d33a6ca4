/**
 * Model-backed ReasoningGenerator.
 *
 * @example
 * ```typescript
 * const reasoner = new LlmReasoningGenerator(new AnthropicClient());
 * const artifact = await reasoner.reason('Why do cells need mitochondria?', context);
 * if (!artifact.sufficient) {
 *   // the material does not cover the question
 * }
 * ```
 */

import type { ContextChunk, ReasoningArtifact } from '../../core/models';
import type { ReasoningGenerator } from '../../core/reasoning';
import type { CompletionClient } from '../types';
import {
  EXPERT_REASONING_SYSTEM_PROMPT,
  buildExpertReasoningPrompt,
  parseReasoningArtifact,
} from '../prompts';

// Low temperature keeps the worked solution close to the source text
const REASONING_TEMPERATURE = 0.2;
const REASONING_MAX_TOKENS = 1500;

export class LlmReasoningGenerator implements ReasoningGenerator {
  constructor(private readonly client: CompletionClient) {}

  async reason(question: string, context: readonly ContextChunk[]): Promise<ReasoningArtifact> {
    const response = await this.client.complete(buildExpertReasoningPrompt(question, context), {
      system: EXPERT_REASONING_SYSTEM_PROMPT,
      temperature: REASONING_TEMPERATURE,
      maxTokens: REASONING_MAX_TOKENS,
    });
    return parseReasoningArtifact(response.text, question);
  }
}
