/**
 * Core Domain Models - Barrel Export
 *
 * @example
 * ```typescript
 * import type { SessionRecord, ActiveThread, EvaluationResult } from '../core/models';
 * ```
 */

export type {
  SourceDocument,
  DocumentChunk,
  RankedChunk,
  ContextChunk,
  RetrievedContext,
} from './retrieval';

export type { ReasoningStep, ReasoningArtifact } from './reasoning';

export type {
  EvaluationDimension,
  SubScore,
  SubScores,
  DimensionWeights,
  PerformanceTier,
  TierThresholds,
  EvaluationResult,
} from './evaluation';
export { EVALUATION_DIMENSIONS } from './evaluation';

export type { ScaffoldLevel, ScaffoldState, ScaffoldStrategy } from './scaffold';
export { MAX_SCAFFOLD_LEVEL } from './scaffold';

export type {
  TurnRole,
  StudentIntent,
  TurnType,
  Turn,
  ActiveThread,
  SessionRecord,
  SessionState,
} from './session';
