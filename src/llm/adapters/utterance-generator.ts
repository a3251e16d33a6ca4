/**
 * Model-backed UtteranceGenerator. Renders each tutor template as free
 * text; the dialogue generator adds citations and options afterwards.
 */

import type { TemplateId, UtteranceGenerator, UtteranceInputs } from '../../core/dialogue';
import type { CompletionClient } from '../types';
import { LLMError } from '../types';
import { SOCRATIC_TUTOR_SYSTEM_PROMPT, buildUtterancePrompt } from '../prompts';

const TUTOR_TEMPERATURE = 0.7;
const TUTOR_MAX_TOKENS = 400;

export class LlmUtteranceGenerator implements UtteranceGenerator {
  constructor(private readonly client: CompletionClient) {}

  async render(templateId: TemplateId, inputs: UtteranceInputs): Promise<string> {
    const response = await this.client.complete(buildUtterancePrompt(templateId, inputs), {
      system: SOCRATIC_TUTOR_SYSTEM_PROMPT,
      temperature: TUTOR_TEMPERATURE,
      maxTokens: TUTOR_MAX_TOKENS,
    });

    const text = response.text.trim();
    if (!text) {
      throw new LLMError(`Tutor reply for ${templateId} was empty`, 'invalid_response');
    }
    return text;
  }
}
