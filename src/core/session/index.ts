/**
 * Core Session Module - Barrel Export
 *
 * The tutor orchestrator and the seams it is assembled from: the session
 * store contract, the per-session queue, and the upstream guard.
 */

export { TutorOrchestrator, DEFAULT_TUTOR_CONFIG } from './tutor-orchestrator';
export { SessionQueue } from './session-queue';
export {
  UpstreamGuard,
  DEFAULT_UPSTREAM_POLICY,
  guardCollaborators,
  toUpstreamError,
} from './upstream-guard';
export type { UpstreamPolicy, GuardedCollaborators } from './upstream-guard';
export type {
  SessionStore,
  TutorDependencies,
  TutorConfig,
  OrchestratorEvent,
  OrchestratorEventData,
  OrchestratorEventInput,
  OrchestratorEventListener,
  OrchestratorEventType,
  MessageOptions,
  MessageOutcome,
} from './types';
