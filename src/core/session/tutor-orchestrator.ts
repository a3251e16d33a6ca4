/**
 * Tutor Orchestrator
 *
 * Runs the per-message pipeline for a tutoring session:
 *
 *   classify intent
 *     new_question   -> retrieve, reason, open thread (level 0), opening reply
 *     answer_attempt -> evaluate, transition scaffold, scaffold or synthesis reply
 *     meta_question  -> clarification in the current level's register
 *   append turns, commit
 *
 * Messages for one session are serialized through a SessionQueue; sessions
 * never share state. Each message works on a copy of the stored record and
 * commits it with a single `store.save` after the reply exists, so a
 * failure, timeout or cancellation at any stage leaves the session exactly
 * as it was.
 *
 * @example
 * ```typescript
 * const tutor = new TutorOrchestrator(deps, config);
 * tutor.setEventListener((event) => console.log(`[${event.type}]`, event.data));
 *
 * const outcome = await tutor.handleMessage('sess_1', 'What is pretotyping?');
 * console.log(outcome.reply);
 * ```
 */

import type { ActiveThread, SessionRecord, SessionState, StudentIntent, Turn } from '../models';
import { EmptyMessageError, InvariantViolation, NoActiveThreadError, TutorError } from '../errors';
import { ConversationMemory, DEFAULT_MEMORY_BUDGET } from '../memory';
import { HybridRetriever, DEFAULT_RETRIEVER_CONFIG } from '../retrieval';
import { IntentClassifier, DEFAULT_CONFIDENCE_THRESHOLD } from '../intent';
import { AnswerEvaluator, DEFAULT_DIMENSION_WEIGHTS, DEFAULT_TIER_THRESHOLDS } from '../scoring';
import { initialScaffoldState, transition } from '../scaffolding';
import { DialogueGenerator, type ComposedReply, type ReplyRequest } from '../dialogue';
import { groundArtifact, type ReasoningGenerator } from '../reasoning';
import { SessionQueue } from './session-queue';
import { DEFAULT_UPSTREAM_POLICY, UpstreamGuard, guardCollaborators } from './upstream-guard';
import type {
  MessageOptions,
  MessageOutcome,
  OrchestratorEvent,
  OrchestratorEventData,
  OrchestratorEventInput,
  OrchestratorEventListener,
  SessionStore,
  TutorConfig,
  TutorDependencies,
} from './types';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_TUTOR_CONFIG: TutorConfig = {
  retrieval: DEFAULT_RETRIEVER_CONFIG,
  memory: DEFAULT_MEMORY_BUDGET,
  intentConfidenceThreshold: DEFAULT_CONFIDENCE_THRESHOLD,
  weights: DEFAULT_DIMENSION_WEIGHTS,
  thresholds: DEFAULT_TIER_THRESHOLDS,
  multipleChoiceOptions: 4,
  upstream: DEFAULT_UPSTREAM_POLICY,
  sessionTtlMs: 30 * 60 * 1000,
};

/** Turns of recent conversation shown to the intent judge */
const INTENT_CONTEXT_TURNS = 6;

function assertNever(value: never): never {
  throw new InvariantViolation(`Unhandled turn type: ${String(value)}`);
}

// ============================================================================
// Per-message pipeline
// ============================================================================

/**
 * Stages wired to one message's upstream guard.
 */
interface Stages {
  classifier: IntentClassifier;
  retriever: HybridRetriever;
  reasoner: ReasoningGenerator;
  evaluator: AnswerEvaluator;
  dialogue: DialogueGenerator;
}

/**
 * Mutable working state for one message. Nothing here is visible outside
 * the message until `commit`.
 */
interface Draft {
  sessionId: string;
  base: SessionRecord;
  memory: ConversationMemory;
  now: Date;
  events: OrchestratorEvent[];
}

interface StageResult {
  turnType: StudentIntent;
  reply: ComposedReply;
  scaffold: MessageOutcome['scaffold'];
  evaluation?: MessageOutcome['evaluation'];
}

// ============================================================================
// TutorOrchestrator
// ============================================================================

export class TutorOrchestrator {
  private readonly config: TutorConfig;
  private readonly store: SessionStore;
  private readonly now: () => Date;
  private readonly queue = new SessionQueue();
  private eventListener: OrchestratorEventListener | undefined;

  constructor(
    private readonly deps: TutorDependencies,
    config: Partial<TutorConfig> = {}
  ) {
    this.config = { ...DEFAULT_TUTOR_CONFIG, ...config };
    this.store = deps.store;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Registers (or clears) the listener for orchestrator events.
   */
  setEventListener(listener: OrchestratorEventListener | undefined): void {
    this.eventListener = listener;
  }

  // --------------------------------------------------------------------------
  // Public operations
  // --------------------------------------------------------------------------

  /**
   * Processes one student message and returns the tutor's reply.
   *
   * @throws EmptyMessageError for blank text
   * @throws UpstreamTimeout | UpstreamFailure when an external call fails twice
   * @throws MessageCancelled when `options.signal` aborts before commit
   * @throws InvariantViolation when session state is inconsistent
   */
  async handleMessage(
    sessionId: string,
    text: string,
    options: MessageOptions = {}
  ): Promise<MessageOutcome> {
    const trimmed = text.trim();
    if (trimmed.length === 0) {
      throw new EmptyMessageError();
    }

    return this.queue.run(sessionId, async () => {
      try {
        return await this.process(sessionId, trimmed, options.signal);
      } catch (error) {
        const code = error instanceof TutorError ? error.code : 'INTERNAL_ERROR';
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Orchestrator] Message for ${sessionId} failed (${code}): ${message}`);
        this.emit({ type: 'message_failed', sessionId, data: { code, message }, timestamp: this.now() });
        throw error;
      }
    });
  }

  /**
   * Clears the session's turn log and active thread. Unknown sessions are
   * left alone.
   */
  async reset(sessionId: string): Promise<void> {
    await this.queue.run(sessionId, async () => {
      const record = await this.store.load(sessionId);
      if (!record) return;
      const memory = ConversationMemory.fromRecord(record, this.config.memory);
      memory.reset();
      await this.store.save({
        ...record,
        ...memory.toRecordFields(),
        lastActivityAt: this.now(),
      });
      console.log(`[Orchestrator] Session ${sessionId} reset`);
    });
  }

  /**
   * Reads the committed state of a session. Never creates a session, and
   * reports an expired or unknown session as empty.
   */
  async getSessionState(sessionId: string): Promise<SessionState> {
    const record = await this.loadLive(sessionId, this.now());
    if (!record) {
      return { activeThreadPresent: false, scaffoldLevel: 0, turnCount: 0 };
    }
    return {
      activeThreadPresent: record.activeThread !== null,
      scaffoldLevel: record.activeThread?.scaffold.level ?? 0,
      turnCount: record.totalTurns,
    };
  }

  /**
   * Retained turns of a live session, oldest first.
   */
  async getTranscript(sessionId: string): Promise<Turn[]> {
    const record = await this.loadLive(sessionId, this.now());
    return record ? [...record.turns] : [];
  }

  /**
   * Deletes stored sessions that have been idle longer than the TTL.
   */
  async pruneExpiredSessions(): Promise<number> {
    const cutoff = new Date(this.now().getTime() - this.config.sessionTtlMs);
    const removed = await this.store.deleteInactiveSince(cutoff);
    if (removed > 0) {
      console.log(`[Orchestrator] Pruned ${removed} expired session(s)`);
    }
    return removed;
  }

  // --------------------------------------------------------------------------
  // Pipeline
  // --------------------------------------------------------------------------

  private async process(sessionId: string, text: string, signal?: AbortSignal): Promise<MessageOutcome> {
    const now = this.now();
    const guard = new UpstreamGuard(sessionId, this.config.upstream, signal, (operation, error) =>
      this.emit({
        type: 'upstream_retry',
        sessionId,
        data: { operation, error: error.message },
        timestamp: this.now(),
      })
    );
    guard.throwIfCancelled();

    const base = (await this.loadLive(sessionId, now)) ?? this.freshRecord(sessionId, now);
    const draft: Draft = {
      sessionId,
      base,
      memory: ConversationMemory.fromRecord(base, this.config.memory),
      now,
      events: [],
    };
    const stages = this.buildStages(guard);

    const decision = await stages.classifier.classify(
      text,
      draft.memory.activeThread,
      draft.memory.formatContext(INTENT_CONTEXT_TURNS)
    );
    this.record(draft, { type: 'intent_classified', data: decision });

    const result = await this.dispatch(decision.intent, text, draft, stages);

    // Last point at which the message can still be abandoned
    guard.throwIfCancelled();
    await this.commit(draft);

    const thread = draft.memory.activeThread;
    return {
      sessionId,
      reply: result.reply.text,
      turnType: result.turnType,
      templateId: result.reply.templateId,
      scaffold: result.scaffold,
      threadOpen: thread !== null,
      evaluation: result.evaluation,
      citations: result.reply.citations,
    };
  }

  private async dispatch(
    intent: StudentIntent,
    text: string,
    draft: Draft,
    stages: Stages
  ): Promise<StageResult> {
    const thread = draft.memory.activeThread;
    switch (intent) {
      case 'new_question':
        return this.openThread(text, draft, stages);
      case 'answer_attempt':
      case 'meta_question': {
        if (!thread) {
          const error = new NoActiveThreadError(draft.sessionId, intent);
          console.error(`[Orchestrator] ${error.message}; handling as new_question`);
          return this.openThread(text, draft, stages);
        }
        return intent === 'answer_attempt'
          ? this.evaluateAttempt(text, thread, draft, stages)
          : this.clarify(text, thread, draft, stages);
      }
      default:
        return assertNever(intent);
    }
  }

  private async openThread(text: string, draft: Draft, stages: Stages): Promise<StageResult> {
    this.appendStudentTurn(draft, text, 'new_question');

    const context = await stages.retriever.retrieve(text);
    if (context.length === 0) {
      return this.noMaterial(text, 'empty_retrieval', draft, stages);
    }

    const artifact = groundArtifact(await stages.reasoner.reason(text, context), context);
    if (!artifact.sufficient) {
      return this.noMaterial(text, 'insufficient_material', draft, stages);
    }

    const thread: ActiveThread = {
      question: text,
      openedAt: draft.now,
      artifact,
      context,
      scaffold: initialScaffoldState(),
    };
    draft.memory.setActiveThread(thread);
    this.record(draft, { type: 'thread_opened', data: { question: text, chunkCount: context.length } });

    const reply = await this.respond(draft, stages, { kind: 'opening', thread });
    return { turnType: 'new_question', reply, scaffold: thread.scaffold };
  }

  /**
   * Nothing to ground an answer in: any previous thread is closed and no
   * new one is opened.
   */
  private async noMaterial(
    question: string,
    reason: OrchestratorEventData['no_material']['reason'],
    draft: Draft,
    stages: Stages
  ): Promise<StageResult> {
    draft.memory.setActiveThread(null);
    this.record(draft, { type: 'no_material', data: { question, reason } });
    const reply = await this.respond(draft, stages, { kind: 'no_material', question });
    return { turnType: 'new_question', reply, scaffold: null };
  }

  private async evaluateAttempt(
    text: string,
    thread: ActiveThread,
    draft: Draft,
    stages: Stages
  ): Promise<StageResult> {
    if (thread.scaffold.resolved || thread.artifact.finalAnswer.trim() === '') {
      throw new InvariantViolation(
        `Session ${draft.sessionId} has an open thread that is resolved or has no reasoning artifact`
      );
    }

    const evaluation = await stages.evaluator.evaluate({
      answer: text,
      artifact: thread.artifact,
      context: thread.context,
    });
    const step = transition(thread.scaffold, evaluation.tier);
    const updated: ActiveThread = { ...thread, scaffold: step.next };

    this.appendStudentTurn(draft, text, 'answer_attempt', evaluation);
    this.record(draft, {
      type: 'scaffold_transitioned',
      data: { from: step.previous, to: step.next, tier: evaluation.tier },
    });

    draft.memory.setActiveThread(step.next.resolved ? null : updated);
    if (step.outcome !== 'escalated') {
      this.record(draft, {
        type: 'thread_resolved',
        data: { outcome: step.outcome, attempts: step.next.attempts },
      });
    }

    const request: ReplyRequest =
      step.outcome === 'mastered'
        ? { kind: 'synthesis', thread: updated, studentText: text, evaluation }
        : { kind: 'scaffold', thread: updated, studentText: text, evaluation };
    const reply = await this.respond(draft, stages, request);

    return { turnType: 'answer_attempt', reply, scaffold: step.next, evaluation };
  }

  private async clarify(
    text: string,
    thread: ActiveThread,
    draft: Draft,
    stages: Stages
  ): Promise<StageResult> {
    this.appendStudentTurn(draft, text, 'meta_question');
    const reply = await this.respond(draft, stages, { kind: 'meta', thread, studentText: text });
    return { turnType: 'meta_question', reply, scaffold: thread.scaffold };
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private buildStages(guard: UpstreamGuard): Stages {
    const guarded = guardCollaborators(guard, {
      semantic: this.deps.semanticRanker,
      lexical: this.deps.lexicalRanker,
      intentJudge: this.deps.intentJudge,
      reasoner: this.deps.reasoner,
      judge: this.deps.judge,
      utterances: this.deps.utterances,
    });

    return {
      classifier: new IntentClassifier(guarded.intentJudge, this.config.intentConfidenceThreshold),
      retriever: new HybridRetriever(guarded.semantic, guarded.lexical, this.config.retrieval),
      reasoner: guarded.reasoner,
      evaluator: new AnswerEvaluator(guarded.judge, {
        weights: this.config.weights,
        thresholds: this.config.thresholds,
      }),
      dialogue: new DialogueGenerator(guarded.utterances, {
        multipleChoiceOptions: this.config.multipleChoiceOptions,
      }),
    };
  }

  private respond(draft: Draft, stages: Stages, request: ReplyRequest): Promise<ComposedReply> {
    return stages.dialogue.respond(request, draft.memory, draft.now);
  }

  private appendStudentTurn(
    draft: Draft,
    text: string,
    type: StudentIntent,
    evaluation?: MessageOutcome['evaluation']
  ): void {
    const turn: Turn = { role: 'student', text, timestamp: draft.now, type };
    if (evaluation) {
      turn.evaluation = evaluation;
    }
    draft.memory.append(turn);
  }

  private async commit(draft: Draft): Promise<void> {
    await this.store.save({
      id: draft.sessionId,
      ...draft.memory.toRecordFields(),
      createdAt: draft.base.createdAt,
      lastActivityAt: draft.now,
    });
    for (const event of draft.events) {
      this.emit(event);
    }
  }

  private async loadLive(sessionId: string, now: Date): Promise<SessionRecord | null> {
    const record = await this.store.load(sessionId);
    if (!record) return null;
    const expired = now.getTime() - record.lastActivityAt.getTime() > this.config.sessionTtlMs;
    return expired ? null : record;
  }

  private freshRecord(sessionId: string, now: Date): SessionRecord {
    return {
      id: sessionId,
      turns: [],
      totalTurns: 0,
      activeThread: null,
      createdAt: now,
      lastActivityAt: now,
    };
  }

  /**
   * Queues a pipeline event for delivery on commit.
   */
  private record(draft: Draft, input: OrchestratorEventInput): void {
    draft.events.push({ ...input, sessionId: draft.sessionId, timestamp: this.now() });
  }

  private emit(event: OrchestratorEvent): void {
    if (this.eventListener) {
      this.eventListener(event);
    }
  }
}
