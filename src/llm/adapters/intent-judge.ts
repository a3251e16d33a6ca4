/**
 * Model-backed IntentJudge.
 *
 * Runs at temperature 0 with a small token allowance: the reply is a
 * one-line JSON label.
 */

import type { IntentJudge, IntentJudgeInput, IntentJudgment } from '../../core/intent';
import type { CompletionClient } from '../types';
import {
  INTENT_CLASSIFIER_SYSTEM_PROMPT,
  buildIntentClassifierPrompt,
  parseIntentJudgment,
} from '../prompts';

const CLASSIFIER_TEMPERATURE = 0;
const CLASSIFIER_MAX_TOKENS = 128;

export class LlmIntentJudge implements IntentJudge {
  constructor(private readonly client: CompletionClient) {}

  async classify(input: IntentJudgeInput): Promise<IntentJudgment> {
    const response = await this.client.complete(buildIntentClassifierPrompt(input), {
      system: INTENT_CLASSIFIER_SYSTEM_PROMPT,
      temperature: CLASSIFIER_TEMPERATURE,
      maxTokens: CLASSIFIER_MAX_TOKENS,
    });
    return parseIntentJudgment(response.text);
  }
}
