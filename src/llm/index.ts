/**
 * LLM Module - Barrel Export
 *
 * An abstraction layer over the Anthropic SDK, plus the prompt builders and
 * the adapters that plug model calls into the tutoring engine.
 *
 * @example
 * ```typescript
 * import {
 *   AnthropicClient,
 *   LlmIntentJudge,
 *   LlmReasoningGenerator,
 *   LlmJudgmentGenerator,
 *   LlmUtteranceGenerator,
 * } from './llm';
 *
 * const client = new AnthropicClient({ timeoutMs: config.upstream.timeoutMs });
 * const intentJudge = new LlmIntentJudge(client);
 * const reasoner = new LlmReasoningGenerator(client);
 * ```
 */

export { AnthropicClient } from './client';
export type { AnthropicClientOptions } from './client';

export type {
  LLMMessage,
  LLMConfig,
  LLMResponse,
  LLMErrorType,
  CompletionClient,
} from './types';

// Value export: callers match on it with instanceof
export { LLMError } from './types';

export {
  LlmIntentJudge,
  LlmReasoningGenerator,
  LlmJudgmentGenerator,
  LlmUtteranceGenerator,
} from './adapters';

export * from './prompts';
