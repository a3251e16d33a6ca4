/**
 * Utterance Templates
 *
 * The closed set of templates the utterance generator can be asked to
 * render, and the structured inputs each render receives. What goes into
 * `UtteranceInputs` is what the renderer can know: the final answer is
 * only ever present for the direct-answer and synthesis templates.
 */

import type { ScaffoldLevel, ScaffoldStrategy } from '../models';

export type TemplateId =
  | 'socratic_opening'
  | 'scaffold_hint'
  | 'scaffold_analogy'
  | 'scaffold_multiple_choice'
  | 'scaffold_direct_answer'
  | 'affirming_synthesis'
  | 'meta_clarification';

/**
 * Fixed replies that never go through the utterance generator.
 */
export type FixedReplyId = 'no_material';

export interface ContextExcerpt {
  location: string;
  documentTitle: string;
  text: string;
}

export interface UtteranceInputs {
  /** The open question as the student asked it */
  question: string;
  /** The latest student turn, when replying to one */
  studentText?: string;
  scaffoldLevel: ScaffoldLevel;
  /** Support register for meta clarifications */
  register?: ScaffoldStrategy;
  /** Reasoning statements the renderer may draw on at this level */
  reasoningSteps: string[];
  excerpts: ContextExcerpt[];
  feedback?: string;
  suggestions?: string[];
  /** Present only for scaffold_direct_answer and affirming_synthesis */
  finalAnswer?: string;
  /** Recent conversation formatted for a prompt */
  conversation: string;
}

/**
 * External capability that turns a template and its inputs into tutor text.
 */
export interface UtteranceGenerator {
  render(templateId: TemplateId, inputs: UtteranceInputs): Promise<string>;
}

export const NO_MATERIAL_REPLY =
  "I couldn't find anything in your uploaded material that covers that, so I won't guess. " +
  'Could you rephrase the question, or upload a document that discusses it?';
