/**
 * Socratic Tutor Prompt Builder
 *
 * Builds the prompts that turn a tutor template and its inputs into the
 * words the student reads. There is one instruction block per template;
 * all of them share the same persona and the same constraints:
 *
 * 1. **Ask, don't tell**: until the direct-answer template, the tutor
 *    guides with questions and never states the answer. The renderer is
 *    not given the final answer before that point, so it cannot leak it.
 *
 * 2. **Grounded**: the tutor may quote the provided excerpts word for word,
 *    but must not invent quotes, page numbers or facts. Source lines and
 *    multiple-choice options are appended by the engine, so the tutor must
 *    not write its own.
 *
 * 3. **Conversational continuity**: recent turns are included so a reply
 *    builds on what the student already said.
 */

import type { ScaffoldStrategy } from '../../core/models';
import type { TemplateId, UtteranceInputs } from '../../core/dialogue';
import { escapePromptContent } from './shared';

export const SOCRATIC_TUTOR_SYSTEM_PROMPT = `You are a patient tutor who helps students discover answers themselves through Socratic dialogue, using only the student's own uploaded material.

Rules:
1. Never state the final answer unless the instructions for this reply explicitly give it to you.
2. Quote the provided excerpts word for word when you quote at all. Do not invent quotes, page numbers, or facts.
3. Do not write source lines, citations, or lists of answer options; those are added separately.
4. Build on what the student has already said in the conversation.
5. Keep replies short: two to four sentences, ending with a question unless told otherwise.
6. Reply with the tutor's words only, no preamble or labels.`;

/**
 * What each template asks the tutor to do.
 */
const TEMPLATE_INSTRUCTIONS: Record<TemplateId, string> = {
  socratic_opening:
    'The student just asked the question below. Do not answer it. Point them at the relevant excerpt and ask one guiding question that starts them reasoning toward the answer.',
  scaffold_hint:
    "The student's last attempt fell short. Acknowledge what they got right, then give a hint that draws on the reasoning step provided, and ask them to try again.",
  scaffold_analogy:
    'The student is still stuck after a hint. Explain the idea behind the reasoning steps with a short everyday analogy, then ask them to apply it to the question.',
  scaffold_multiple_choice:
    'The student needs more support. Write a single-sentence question stem that asks them to pick the best answer from options that will be listed after your text. Do not write the options.',
  scaffold_direct_answer:
    'The student has had every level of support. Now give the final answer plainly, walk through the reasoning steps that lead to it, and close by inviting a follow-up question. Do not end with a quiz question.',
  affirming_synthesis:
    "The student's answer is good. Affirm it specifically, restate the key idea in one sentence using the final answer provided, and connect it to the reasoning. Close by inviting a new question. Do not end with a quiz question.",
  meta_clarification:
    'The student asked about the tutoring itself rather than answering. Clarify what you are asking them and why, at the level of support described below, without revealing the answer. End by restating the question you want them to think about.',
};

/**
 * How much help a meta clarification may give, by the thread's current
 * support register.
 */
const REGISTER_GUIDANCE: Record<ScaffoldStrategy, string> = {
  opening: 'Restate the original question in simpler words.',
  hint: 'You may restate the hint you gave.',
  analogy: 'You may restate the analogy you used.',
  multiple_choice: 'You may explain how to eliminate options, without naming the right one.',
  direct_answer: 'The answer has already been given; you may explain it again.',
};

/**
 * Builds the user message for rendering one template.
 *
 * @example
 * ```typescript
 * const prompt = buildUtterancePrompt('scaffold_hint', {
 *   question: 'Why do cells need mitochondria?',
 *   studentText: 'For structure?',
 *   scaffoldLevel: 1,
 *   reasoningSteps: ['Mitochondria produce ATP.'],
 *   excerpts: [{ documentTitle: 'Biology Notes', location: 'page 2', text: '...' }],
 *   conversation: 'Student: Why do cells need mitochondria?',
 * });
 * ```
 */
export function buildUtterancePrompt(templateId: TemplateId, inputs: UtteranceInputs): string {
  const sections: string[] = [`## Your task\n\n${TEMPLATE_INSTRUCTIONS[templateId]}`];

  if (inputs.register) {
    sections.push(`## Level of support\n\n${REGISTER_GUIDANCE[inputs.register]}`);
  }

  sections.push(`<conversation>\n${escapePromptContent(inputs.conversation)}\n</conversation>`);
  sections.push(`<question>\n${escapePromptContent(inputs.question)}\n</question>`);

  if (inputs.studentText) {
    sections.push(`<student_message>\n${escapePromptContent(inputs.studentText)}\n</student_message>`);
  }

  if (inputs.reasoningSteps.length > 0) {
    const steps = inputs.reasoningSteps
      .map((step, index) => `${index + 1}. ${escapePromptContent(step)}`)
      .join('\n');
    sections.push(`<reasoning>\n${steps}\n</reasoning>`);
  }

  if (inputs.excerpts.length > 0) {
    const excerpts = inputs.excerpts
      .map(
        (excerpt) =>
          `[${escapePromptContent(excerpt.documentTitle)}, ${excerpt.location}]\n${escapePromptContent(excerpt.text)}`
      )
      .join('\n\n');
    sections.push(`<context>\n${excerpts}\n</context>`);
  }

  if (inputs.feedback) {
    sections.push(`## Assessment of the last attempt\n\n${inputs.feedback}`);
  }

  if (inputs.suggestions && inputs.suggestions.length > 0) {
    sections.push(`## What to work on\n\n${inputs.suggestions.map((s) => `- ${s}`).join('\n')}`);
  }

  if (inputs.finalAnswer) {
    sections.push(`<reference_answer>\n${escapePromptContent(inputs.finalAnswer)}\n</reference_answer>`);
  }

  return sections.join('\n\n');
}
