/**
 * Test Helpers Module
 *
 * Scripted stand-ins for every external collaborator of the tutor engine,
 * an in-memory session store, and small fixture builders. Each fake records
 * what it was asked and can be told to fail its next calls, so tests can
 * drive any branch of the pipeline deterministically.
 */

import type {
  ContextChunk,
  DocumentChunk,
  EvaluationDimension,
  PerformanceTier,
  RankedChunk,
  ReasoningArtifact,
  SessionRecord,
  SubScore,
} from '../src/core/models';
import type { IntentJudge, IntentJudgeInput, IntentJudgment } from '../src/core/intent';
import type { ReasoningGenerator } from '../src/core/reasoning';
import type { DimensionJudgment, JudgmentGenerator, JudgmentInput } from '../src/core/scoring';
import type { TemplateId, UtteranceGenerator, UtteranceInputs } from '../src/core/dialogue';
import type { ChunkRanker } from '../src/core/retrieval';
import type { SessionStore } from '../src/core/session';
import type { ApiError, ApiResult } from '../src/api/types';

// ============================================================================
// Fixtures
// ============================================================================

export const TEST_DOCUMENT_TITLE = 'Cell Biology Notes';

/** Final answer used by the default artifact */
export const DEFAULT_FINAL_ANSWER = 'oxidative phosphorylation';

export function makeChunk(id: string, overrides: Partial<DocumentChunk> = {}): DocumentChunk {
  return {
    id,
    documentId: 'doc_1',
    documentTitle: TEST_DOCUMENT_TITLE,
    location: 'page 1',
    ordinal: 0,
    text: `Passage ${id} about how mitochondria produce ATP.`,
    ...overrides,
  };
}

/**
 * A sufficient two-step artifact citing the first context chunk.
 */
export function makeArtifact(
  question: string,
  context: readonly ContextChunk[],
  overrides: Partial<ReasoningArtifact> = {}
): ReasoningArtifact {
  const cited = context.length > 0 ? [context[0].chunkId] : [];
  return {
    question,
    steps: [
      { statement: 'Mitochondria run the electron transport chain.', citedChunkIds: cited },
      { statement: 'The proton gradient drives ATP synthase.', citedChunkIds: cited },
    ],
    finalAnswer: DEFAULT_FINAL_ANSWER,
    misconceptions: ['glycolysis', 'photosynthesis', 'fermentation'],
    sufficient: true,
    ...overrides,
  };
}

// ============================================================================
// Failure scripting
// ============================================================================

/**
 * Base for fakes that can be told to throw on their next calls.
 */
abstract class Scriptable {
  private readonly failures: Error[] = [];

  /** The next `errors.length` calls throw these, in order */
  failNext(...errors: Error[]): void {
    this.failures.push(...errors);
  }

  protected throwIfScripted(): void {
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
  }
}

// ============================================================================
// Collaborator fakes
// ============================================================================

/**
 * Returns queued judgments in order, then `fallback`.
 */
export class ScriptedIntentJudge extends Scriptable implements IntentJudge {
  readonly calls: IntentJudgeInput[] = [];
  fallback: IntentJudgment = { label: 'answer_attempt', confidence: 0.9 };
  private readonly queue: IntentJudgment[] = [];

  enqueue(...judgments: IntentJudgment[]): void {
    this.queue.push(...judgments);
  }

  async classify(input: IntentJudgeInput): Promise<IntentJudgment> {
    this.calls.push(input);
    this.throwIfScripted();
    return this.queue.shift() ?? this.fallback;
  }
}

/**
 * Produces `makeArtifact(question, context, overrides)` for every question.
 */
export class ScriptedReasoner extends Scriptable implements ReasoningGenerator {
  readonly calls: Array<{ question: string; context: readonly ContextChunk[] }> = [];
  overrides: Partial<ReasoningArtifact> = {};

  async reason(question: string, context: readonly ContextChunk[]): Promise<ReasoningArtifact> {
    this.calls.push({ question, context });
    this.throwIfScripted();
    return makeArtifact(question, context, this.overrides);
  }
}

/**
 * Sub-scores that land an answer in each tier under the default weights
 * and thresholds:
 * fail 0.25, partial 0.5, adequate 0.65, strong 1.0.
 */
export const SCORES_FOR_TIER: Record<PerformanceTier, Record<EvaluationDimension, SubScore>> = {
  fail: { conceptualAccuracy: 1, reasoningCoherence: 1, evidenceUtilization: 1, conceptualIntegration: 1 },
  partial: { conceptualAccuracy: 2, reasoningCoherence: 2, evidenceUtilization: 2, conceptualIntegration: 2 },
  adequate: { conceptualAccuracy: 3, reasoningCoherence: 2, evidenceUtilization: 2, conceptualIntegration: 3 },
  strong: { conceptualAccuracy: 4, reasoningCoherence: 4, evidenceUtilization: 4, conceptualIntegration: 4 },
};

/**
 * Scores every dimension so the whole answer lands in `tier`.
 */
export class TierJudge extends Scriptable implements JudgmentGenerator {
  readonly calls: Array<{ dimension: EvaluationDimension; input: JudgmentInput }> = [];
  tier: PerformanceTier = 'fail';

  async judgeDimension(dimension: EvaluationDimension, input: JudgmentInput): Promise<DimensionJudgment> {
    this.calls.push({ dimension, input });
    this.throwIfScripted();
    const score = SCORES_FOR_TIER[this.tier][dimension];
    return {
      score,
      rationale: `${dimension} scored ${score}`,
      suggestion: score <= 2 ? `Revisit ${dimension}` : undefined,
    };
  }
}

export interface RenderCall {
  templateId: TemplateId;
  inputs: UtteranceInputs;
}

/**
 * Renders `<templateId>: <question>` and records every call. Setting
 * `suffix` appends text to each render, e.g. to leak the final answer.
 * Setting `hook` runs it before each render returns.
 */
export class RecordingUtterances extends Scriptable implements UtteranceGenerator {
  readonly calls: RenderCall[] = [];
  suffix = '';
  hook: (() => Promise<void>) | undefined;

  async render(templateId: TemplateId, inputs: UtteranceInputs): Promise<string> {
    this.calls.push({ templateId, inputs });
    this.throwIfScripted();
    if (this.hook) {
      await this.hook();
    }
    return `${templateId}: ${inputs.question}${this.suffix}`;
  }

  lastCall(): RenderCall | undefined {
    return this.calls[this.calls.length - 1];
  }
}

/**
 * Returns its chunks in order with descending scores, whatever the query.
 */
export class StaticRanker extends Scriptable implements ChunkRanker {
  readonly queries: string[] = [];

  constructor(public chunks: DocumentChunk[] = []) {
    super();
  }

  async search(query: string, k: number): Promise<RankedChunk[]> {
    this.queries.push(query);
    this.throwIfScripted();
    return this.chunks.slice(0, k).map((chunk, i) => ({ chunk, score: 1 - i * 0.1 }));
  }
}

// ============================================================================
// Session store
// ============================================================================

/**
 * Map-backed SessionStore. Records are cloned on the way in and out so a
 * caller can never mutate what is stored.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly records = new Map<string, SessionRecord>();
  saveCount = 0;

  async load(sessionId: string): Promise<SessionRecord | null> {
    const record = this.records.get(sessionId);
    return record ? structuredClone(record) : null;
  }

  async save(record: SessionRecord): Promise<void> {
    this.saveCount += 1;
    this.records.set(record.id, structuredClone(record));
  }

  async delete(sessionId: string): Promise<void> {
    this.records.delete(sessionId);
  }

  async deleteInactiveSince(cutoff: Date): Promise<number> {
    let removed = 0;
    for (const [id, record] of this.records) {
      if (record.lastActivityAt.getTime() < cutoff.getTime()) {
        this.records.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.records.size;
  }
}

// ============================================================================
// Clock
// ============================================================================

/**
 * Controllable clock for expiry tests.
 */
export class FakeClock {
  constructor(private current: Date = new Date('2026-01-15T10:00:00.000Z')) {}

  readonly now = (): Date => new Date(this.current.getTime());

  advanceMinutes(minutes: number): void {
    this.current = new Date(this.current.getTime() + minutes * 60 * 1000);
  }
}

// ============================================================================
// HTTP
// ============================================================================

/**
 * Parses a response body as the API envelope.
 */
export async function getJsonResponse<T>(response: Response): Promise<ApiResult<T>> {
  const body: ApiResult<T> = await response.json();
  return body;
}

/**
 * Body of a success envelope; fails the test on an error envelope.
 */
export async function readData<T>(response: Response): Promise<T> {
  const body = await getJsonResponse<T>(response);
  if (!body.success) {
    throw new Error(`Expected success, got ${body.error.code}: ${body.error.message}`);
  }
  return body.data;
}

/**
 * Error of an error envelope; fails the test on a success envelope.
 */
export async function readError(response: Response): Promise<ApiError> {
  const body = await getJsonResponse<unknown>(response);
  if (body.success) {
    throw new Error('Expected an error response');
  }
  return body.error;
}

export function jsonRequest(body: unknown, method: string = 'POST'): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}
