/**
 * Model-backed implementations of the engine's external capabilities.
 */

export { LlmIntentJudge } from './intent-judge';
export { LlmReasoningGenerator } from './reasoning-generator';
export { LlmJudgmentGenerator } from './judgment-generator';
export { LlmUtteranceGenerator } from './utterance-generator';
