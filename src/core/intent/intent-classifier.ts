/**
 * Intent Classifier
 *
 * Labels each student turn as a new question, an answer attempt, or a meta
 * question about the tutoring itself. Without an open thread the only
 * possible label is `new_question`, and no judge call is made.
 *
 * With a thread open, explicit help requests ("give me a hint", "what do
 * you mean?") are recognised from a fixed cue list. Everything else goes to
 * the external intent judge. Anything short of a confident judgment is
 * treated as a meta question: an unclear turn must never be scored as a
 * wrong answer.
 *
 * The classifier has no side effects.
 */

import type { ActiveThread, StudentIntent } from '../models';
import { ClassificationAmbiguous, isUpstreamError } from '../errors';

// ============================================================================
// Contracts
// ============================================================================

export interface IntentJudgeInput {
  text: string;
  /** The open thread's question */
  question: string;
  /** Recent conversation, already formatted for a prompt */
  recentContext: string;
}

export interface IntentJudgment {
  label: StudentIntent;
  /** 0-1 */
  confidence: number;
}

/**
 * External capability that labels a turn against an open question.
 */
export interface IntentJudge {
  classify(input: IntentJudgeInput): Promise<IntentJudgment>;
}

export type IntentSource = 'no_thread' | 'cue' | 'judge' | 'ambiguous';

export interface IntentDecision {
  intent: StudentIntent;
  source: IntentSource;
  confidence: number;
}

// ============================================================================
// Help-request cues
// ============================================================================

const META_CUES: readonly RegExp[] = [
  /\bhint\b/,
  /\bwhat do you mean\b/,
  /\bcan you (explain|clarify|rephrase)\b/,
  /\b(i'?m|i am) (stuck|lost|confused)\b/,
  /\bconfused\b/,
  /\b(don'?t|do not) (understand|get it|get what)\b/,
  /\bnot sure what you('re| are) asking\b/,
  /\bmore detail\b/,
  /\bhelp me\b/,
  /\bwhere (do|should) i (start|begin)\b/,
];

/**
 * True when the text is an explicit request for help or clarification,
 * or carries no words at all (e.g. "??").
 */
export function isHelpRequest(text: string): boolean {
  const normalized = text.toLowerCase().replace(/’/g, "'").trim();
  if (!/[a-z0-9]/.test(normalized)) {
    return true;
  }
  return META_CUES.some((cue) => cue.test(normalized));
}

// ============================================================================
// IntentClassifier
// ============================================================================

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.6;

export class IntentClassifier {
  constructor(
    private readonly judge: IntentJudge,
    private readonly confidenceThreshold: number = DEFAULT_CONFIDENCE_THRESHOLD
  ) {}

  async classify(
    text: string,
    thread: ActiveThread | null,
    recentContext: string
  ): Promise<IntentDecision> {
    if (!thread) {
      return { intent: 'new_question', source: 'no_thread', confidence: 1 };
    }

    if (isHelpRequest(text)) {
      return { intent: 'meta_question', source: 'cue', confidence: 1 };
    }

    try {
      const judgment = await this.judgeConfidently({
        text,
        question: thread.question,
        recentContext,
      });
      return { intent: judgment.label, source: 'judge', confidence: judgment.confidence };
    } catch (error) {
      if (error instanceof ClassificationAmbiguous) {
        console.log(`[IntentClassifier] ${error.message}; treating as meta_question`);
        return { intent: 'meta_question', source: 'ambiguous', confidence: error.confidence ?? 0 };
      }
      if (isUpstreamError(error)) {
        console.error(`[IntentClassifier] Judge unavailable (${error.message}); treating as meta_question`);
        return { intent: 'meta_question', source: 'ambiguous', confidence: 0 };
      }
      throw error;
    }
  }

  private async judgeConfidently(input: IntentJudgeInput): Promise<IntentJudgment> {
    const judgment = await this.judge.classify(input);
    if (judgment.confidence < this.confidenceThreshold) {
      throw new ClassificationAmbiguous(
        `Low-confidence ${judgment.label} (${judgment.confidence.toFixed(2)} < ${this.confidenceThreshold})`,
        judgment.confidence
      );
    }
    return judgment;
  }
}
