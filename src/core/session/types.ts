/**
 * Tutor Orchestrator Types
 *
 * Dependencies, configuration, events and results of the session
 * orchestrator. Every external capability is injected, so the engine runs
 * the same against Anthropic-backed adapters, in-process indexes, or the
 * scripted fakes used in tests.
 */

import type {
  DimensionWeights,
  EvaluationResult,
  PerformanceTier,
  ScaffoldState,
  SessionRecord,
  StudentIntent,
  TierThresholds,
} from '../models';
import type { Citation, FixedReplyId, TemplateId, UtteranceGenerator } from '../dialogue';
import type { IntentJudge, IntentSource } from '../intent';
import type { MemoryBudget } from '../memory';
import type { ReasoningGenerator } from '../reasoning';
import type { ChunkRanker, RetrieverConfig } from '../retrieval';
import type { JudgmentGenerator } from '../scoring';
import type { TransitionOutcome } from '../scaffolding';
import type { UpstreamPolicy } from './upstream-guard';

// ============================================================================
// Persistence
// ============================================================================

/**
 * Durable storage for session records, keyed by session id. The
 * orchestrator calls `save` once per message, after the reply is ready.
 */
export interface SessionStore {
  load(sessionId: string): Promise<SessionRecord | null>;
  save(record: SessionRecord): Promise<void>;
  delete(sessionId: string): Promise<void>;
  /** Deletes sessions whose last activity is before `cutoff`; returns how many */
  deleteInactiveSince(cutoff: Date): Promise<number>;
}

// ============================================================================
// Dependencies and configuration
// ============================================================================

export interface TutorDependencies {
  store: SessionStore;
  semanticRanker: ChunkRanker;
  lexicalRanker: ChunkRanker;
  intentJudge: IntentJudge;
  reasoner: ReasoningGenerator;
  judge: JudgmentGenerator;
  utterances: UtteranceGenerator;
  /** Clock; defaults to the system clock */
  now?: () => Date;
}

export interface TutorConfig {
  retrieval: RetrieverConfig;
  memory: MemoryBudget;
  intentConfidenceThreshold: number;
  weights: DimensionWeights;
  thresholds: TierThresholds;
  multipleChoiceOptions: number;
  upstream: UpstreamPolicy;
  /** Sessions idle longer than this start over */
  sessionTtlMs: number;
}

// ============================================================================
// Events
// ============================================================================

/**
 * Payload for each orchestrator event type. Pipeline events are delivered
 * only once their message commits; retries and failures are delivered as
 * they happen.
 */
export interface OrchestratorEventData {
  intent_classified: { intent: StudentIntent; source: IntentSource; confidence: number };
  thread_opened: { question: string; chunkCount: number };
  no_material: { question: string; reason: 'empty_retrieval' | 'insufficient_material' };
  scaffold_transitioned: { from: ScaffoldState; to: ScaffoldState; tier: PerformanceTier };
  thread_resolved: { outcome: Exclude<TransitionOutcome, 'escalated'>; attempts: number };
  upstream_retry: { operation: string; error: string };
  message_failed: { code: string; message: string };
}

export type OrchestratorEventType = keyof OrchestratorEventData;

export type OrchestratorEvent = {
  [K in OrchestratorEventType]: {
    type: K;
    sessionId: string;
    data: OrchestratorEventData[K];
    timestamp: Date;
  };
}[OrchestratorEventType];

/**
 * An event before the orchestrator stamps it with session and time.
 */
export type OrchestratorEventInput = {
  [K in OrchestratorEventType]: { type: K; data: OrchestratorEventData[K] };
}[OrchestratorEventType];

export type OrchestratorEventListener = (event: OrchestratorEvent) => void;

// ============================================================================
// Results
// ============================================================================

export interface MessageOptions {
  /** Aborting leaves the session exactly as it was */
  signal?: AbortSignal;
}

export interface MessageOutcome {
  sessionId: string;
  reply: string;
  /** How the student turn was handled, after any fallback */
  turnType: StudentIntent;
  templateId: TemplateId | FixedReplyId;
  /** Scaffold state of the thread after this message; null when none was involved */
  scaffold: ScaffoldState | null;
  /** Whether a thread is still open for follow-up */
  threadOpen: boolean;
  evaluation?: EvaluationResult;
  citations: Citation[];
}
