/**
 * Socratic Scaffold
 *
 * A per-session tutoring engine: it classifies each student turn, retrieves
 * passages from the student's own documents, scores answers on four
 * dimensions, and raises the level of support one step at a time until the
 * student gets there or the answer is given.
 *
 * Entry points:
 * - `createTutorRuntime()` assembles everything from configuration
 * - `createApp(runtime)` exposes it over HTTP (see src/api/server.ts)
 * - `tutor chat` drives it from a terminal (see src/cli/index.ts)
 *
 * @example
 * ```typescript
 * import { createTutorRuntime } from 'socratic-scaffold';
 *
 * const runtime = await createTutorRuntime();
 * await runtime.ingestor.ingest({ title: 'Cell Biology', text: notes });
 * const { reply } = await runtime.orchestrator.handleMessage('sess_1', 'Why do cells need mitochondria?');
 * ```
 */

export {
  createTutorRuntime,
  createCorpusRuntime,
  tutorConfigFrom,
  type TutorRuntime,
  type CorpusRuntime,
  type RuntimeOverrides,
  type CorpusOverrides,
} from './bootstrap';

export { config, configSchema, validateConfig, ConfigValidationError, type Config } from './config';

export * from './core/models';
export * from './core/errors';

export {
  TutorOrchestrator,
  DEFAULT_TUTOR_CONFIG,
  type SessionStore,
  type TutorDependencies,
  type TutorConfig,
  type OrchestratorEvent,
  type OrchestratorEventListener,
  type MessageOptions,
  type MessageOutcome,
} from './core/session';

export { DocumentIngestor, chunkDocument, type IngestRequest, type IngestResult } from './core/ingestion';
export { Corpus, HashingEmbedder, type Embedder, type ChunkRanker } from './core/retrieval';

export { AnthropicClient, LLMError, type CompletionClient } from './llm';
export { createDatabase, runMigrations, DocumentRepository, SqliteSessionStore, type AppDatabase } from './storage';
export { createApp, type AppDependencies } from './api/app';
