/**
 * Dialogue Generator
 *
 * Chooses the template for a tutor reply, assembles what the renderer is
 * allowed to see, renders it, and appends the result to the conversation
 * memory as a tutor turn.
 *
 * Two things are never left to the renderer:
 * - citations, which are built from the retrieved chunks and appended here
 * - multiple-choice options, which are built from the reasoning artifact so
 *   the renderer only writes the question stem
 *
 * Before level 4 the final answer is withheld from the renderer's inputs,
 * and any whole-word occurrence in the rendered text is masked.
 */

import type {
  ActiveThread,
  ContextChunk,
  EvaluationResult,
  ScaffoldLevel,
  ScaffoldStrategy,
} from '../models';
import { InvariantViolation } from '../errors';
import type { ConversationMemory } from '../memory';
import { strategyForLevel } from '../scaffolding';
import {
  NO_MATERIAL_REPLY,
  type ContextExcerpt,
  type FixedReplyId,
  type TemplateId,
  type UtteranceGenerator,
  type UtteranceInputs,
} from './templates';

// ============================================================================
// Types
// ============================================================================

export type ReplyRequest =
  | { kind: 'opening'; thread: ActiveThread }
  | { kind: 'scaffold'; thread: ActiveThread; studentText: string; evaluation: EvaluationResult }
  | { kind: 'synthesis'; thread: ActiveThread; studentText: string; evaluation: EvaluationResult }
  | { kind: 'meta'; thread: ActiveThread; studentText: string }
  | { kind: 'no_material'; question: string };

export interface Citation {
  documentTitle: string;
  location: string;
}

export interface ComposedReply {
  text: string;
  templateId: TemplateId | FixedReplyId;
  citations: Citation[];
}

export interface DialogueGeneratorOptions {
  /** Number of options in multiple-choice scaffolds, correct answer included */
  multipleChoiceOptions: number;
  /** Chunks shown to the renderer as excerpts */
  maxExcerpts: number;
  /** Distinct sources named in a citation line */
  maxCitations: number;
}

export const DEFAULT_DIALOGUE_OPTIONS: DialogueGeneratorOptions = {
  multipleChoiceOptions: 4,
  maxExcerpts: 3,
  maxCitations: 2,
};

const EXCERPT_MAX_CHARS = 500;

const ANSWER_MASK = '[...]';

const SCAFFOLD_TEMPLATES: Record<Exclude<ScaffoldStrategy, 'opening'>, TemplateId> = {
  hint: 'scaffold_hint',
  analogy: 'scaffold_analogy',
  multiple_choice: 'scaffold_multiple_choice',
  direct_answer: 'scaffold_direct_answer',
};

// ============================================================================
// Helpers
// ============================================================================

/**
 * Distinct (document, location) pairs from the top of the context.
 */
export function citationsFor(context: readonly ContextChunk[], max: number): Citation[] {
  const citations: Citation[] = [];
  for (const chunk of context) {
    if (citations.length >= max) break;
    const duplicate = citations.some(
      (c) => c.documentTitle === chunk.documentTitle && c.location === chunk.location
    );
    if (!duplicate) {
      citations.push({ documentTitle: chunk.documentTitle, location: chunk.location });
    }
  }
  return citations;
}

export function formatCitationLine(citations: readonly Citation[]): string {
  return `Source: ${citations.map((c) => `${c.documentTitle}, ${c.location}`).join('; ')}`;
}

/**
 * Whole-word, case-insensitive pattern for the answer; null when it is blank.
 */
function answerPattern(answer: string): RegExp | null {
  const needle = answer.trim();
  if (needle.length === 0) return null;
  const escaped = needle.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(?<![\\p{L}\\p{N}_])${escaped}(?![\\p{L}\\p{N}_])`, 'giu');
}

/**
 * Replaces whole-word, case-insensitive occurrences of the answer.
 *
 * @example
 * maskAnswer('Is it atp?', 'ATP'); // 'Is it [...]?'
 * maskAnswer('ATPase pumps', 'ATP'); // unchanged
 */
export function maskAnswer(text: string, answer: string): string {
  const pattern = answerPattern(answer);
  return pattern ? text.replace(pattern, ANSWER_MASK) : text;
}

function mentionsAnswer(text: string, answer: string): boolean {
  const pattern = answerPattern(answer);
  return pattern !== null && pattern.test(text);
}

/**
 * Multiple-choice options: the final answer plus up to `optionCount - 1`
 * distractors. Distractors come from the artifact's misconceptions first,
 * then from reasoning-step statements that do not mention the answer. The
 * correct option is placed by a hash of the question so the layout is
 * stable for a given thread.
 *
 * Returns the answer alone when no distractor can be found; callers must not
 * present that as a choice.
 */
export function buildChoices(thread: ActiveThread, optionCount: number): string[] {
  const { finalAnswer, misconceptions, steps } = thread.artifact;
  const answer = finalAnswer.trim();
  const seen = new Set([answer.toLowerCase()]);
  const distractors: string[] = [];

  const candidates = [
    ...misconceptions.map((m) => m.trim()),
    ...steps.map((s) => s.statement.trim()).filter((s) => !mentionsAnswer(s, answer)),
  ];
  for (const candidate of candidates) {
    if (distractors.length >= optionCount - 1) break;
    const key = candidate.toLowerCase();
    if (candidate.length === 0 || seen.has(key)) continue;
    seen.add(key);
    distractors.push(candidate);
  }

  const choices = [...distractors];
  let hash = 0;
  for (const ch of thread.question) {
    hash = (hash * 31 + ch.charCodeAt(0)) >>> 0;
  }
  choices.splice(hash % (distractors.length + 1), 0, answer);
  return choices;
}

function formatChoices(choices: readonly string[]): string {
  return choices.map((choice, i) => `${String.fromCharCode(65 + i)}) ${choice}`).join('\n');
}

/**
 * How much of the reasoning chain the renderer sees at each level.
 */
function stepsForLevel(thread: ActiveThread, level: ScaffoldLevel): string[] {
  const statements = thread.artifact.steps.map((s) => s.statement);
  switch (level) {
    case 0:
      return [];
    case 1:
      return statements.slice(0, 1);
    case 2:
      return statements.slice(0, 2);
    case 3:
    case 4:
      return statements;
  }
}

function excerptsFor(context: readonly ContextChunk[], max: number): ContextExcerpt[] {
  return context.slice(0, max).map((chunk) => ({
    documentTitle: chunk.documentTitle,
    location: chunk.location,
    text: chunk.text.length > EXCERPT_MAX_CHARS ? `${chunk.text.slice(0, EXCERPT_MAX_CHARS)}...` : chunk.text,
  }));
}

// ============================================================================
// DialogueGenerator
// ============================================================================

export class DialogueGenerator {
  private readonly options: DialogueGeneratorOptions;

  constructor(
    private readonly utterances: UtteranceGenerator,
    options: Partial<DialogueGeneratorOptions> = {}
  ) {
    this.options = { ...DEFAULT_DIALOGUE_OPTIONS, ...options };
  }

  /**
   * Composes the reply and appends it to `memory` as a tutor turn.
   */
  async respond(
    request: ReplyRequest,
    memory: ConversationMemory,
    timestamp: Date = new Date()
  ): Promise<ComposedReply> {
    const reply = await this.compose(request, memory.formatContext());
    memory.append({
      role: 'tutor',
      text: reply.text,
      timestamp,
      type: 'tutor_reply',
    });
    return reply;
  }

  async compose(request: ReplyRequest, conversation: string): Promise<ComposedReply> {
    switch (request.kind) {
      case 'no_material':
        return { text: NO_MATERIAL_REPLY, templateId: 'no_material', citations: [] };

      case 'opening':
        return this.renderCited(
          'socratic_opening',
          request.thread,
          this.baseInputs(request.thread, 0, conversation)
        );

      case 'scaffold':
        return this.composeScaffold(request.thread, request.studentText, request.evaluation, conversation);

      case 'synthesis': {
        const { thread, studentText, evaluation } = request;
        const text = await this.utterances.render('affirming_synthesis', {
          ...this.baseInputs(thread, thread.scaffold.level, conversation),
          studentText,
          feedback: evaluation.feedback,
          finalAnswer: thread.artifact.finalAnswer,
        });
        return { text: text.trim(), templateId: 'affirming_synthesis', citations: [] };
      }

      case 'meta': {
        const { thread, studentText } = request;
        const level = thread.scaffold.level;
        const text = await this.utterances.render('meta_clarification', {
          ...this.baseInputs(thread, level, conversation),
          studentText,
          register: strategyForLevel(level),
        });
        return {
          text: maskAnswer(text.trim(), thread.artifact.finalAnswer),
          templateId: 'meta_clarification',
          citations: [],
        };
      }
    }
  }

  private async composeScaffold(
    thread: ActiveThread,
    studentText: string,
    evaluation: EvaluationResult,
    conversation: string
  ): Promise<ComposedReply> {
    const level = thread.scaffold.level;
    const strategy = strategyForLevel(level);
    if (strategy === 'opening') {
      throw new InvariantViolation('Scaffold reply requested at level 0');
    }
    let templateId = SCAFFOLD_TEMPLATES[strategy];

    const inputs: UtteranceInputs = {
      ...this.baseInputs(thread, level, conversation),
      studentText,
      feedback: evaluation.feedback,
      suggestions: evaluation.suggestions,
    };
    if (strategy === 'direct_answer') {
      inputs.finalAnswer = thread.artifact.finalAnswer;
    }

    let appendix: string | undefined;
    if (strategy === 'multiple_choice') {
      const choices = buildChoices(thread, this.options.multipleChoiceOptions);
      // A one-option list would be the answer itself
      if (choices.length < 2) {
        templateId = SCAFFOLD_TEMPLATES.analogy;
      } else {
        appendix = formatChoices(choices);
      }
    }
    return this.renderCited(templateId, thread, inputs, appendix);
  }

  /**
   * Renders, masks, then appends the optional appendix and the citation line.
   */
  private async renderCited(
    templateId: TemplateId,
    thread: ActiveThread,
    inputs: UtteranceInputs,
    appendix?: string
  ): Promise<ComposedReply> {
    const rendered = (await this.utterances.render(templateId, inputs)).trim();
    const masked =
      templateId === 'scaffold_direct_answer'
        ? rendered
        : maskAnswer(rendered, thread.artifact.finalAnswer);
    const text = appendix ? `${masked}\n\n${appendix}` : masked;

    const citations = citationsFor(thread.context, this.options.maxCitations);
    return {
      text: citations.length > 0 ? `${text}\n\n${formatCitationLine(citations)}` : text,
      templateId,
      citations,
    };
  }

  private baseInputs(thread: ActiveThread, level: ScaffoldLevel, conversation: string): UtteranceInputs {
    return {
      question: thread.question,
      scaffoldLevel: level,
      reasoningSteps: stepsForLevel(thread, level),
      excerpts: excerptsFor(thread.context, this.options.maxExcerpts),
      conversation,
    };
  }
}
