/**
 * Runtime Assembly
 *
 * Wires configuration, storage, the in-process corpus and the model-backed
 * adapters into one tutoring runtime. The HTTP server and the CLI both
 * start from here, so they share a single composition root.
 *
 * @example
 * ```typescript
 * const runtime = await createTutorRuntime();
 * const outcome = await runtime.orchestrator.handleMessage('sess_1', 'What is osmosis?');
 * runtime.close();
 * ```
 */

import { config as appConfig, type Config } from './config';
import { Corpus, HashingEmbedder, type Embedder } from './core/retrieval';
import { DocumentIngestor } from './core/ingestion';
import { TutorOrchestrator, type TutorConfig, type TutorDependencies } from './core/session';
import {
  AnthropicClient,
  LlmIntentJudge,
  LlmJudgmentGenerator,
  LlmReasoningGenerator,
  LlmUtteranceGenerator,
  type CompletionClient,
} from './llm';
import {
  createDatabase,
  runMigrations,
  DocumentRepository,
  SqliteSessionStore,
  type AppDatabase,
} from './storage';

/**
 * Storage and corpus without any model-backed collaborator. Enough for
 * ingesting and listing documents, and needs no API key.
 */
export interface CorpusRuntime {
  db: AppDatabase;
  corpus: Corpus;
  documents: DocumentRepository;
  sessions: SqliteSessionStore;
  ingestor: DocumentIngestor;
  /** Closes the database connection */
  close(): void;
}

export interface TutorRuntime extends CorpusRuntime {
  orchestrator: TutorOrchestrator;
}

export interface CorpusOverrides {
  config?: Config;
  /** Existing database, e.g. an in-memory one in tests */
  db?: AppDatabase;
  embedder?: Embedder;
}

export interface RuntimeOverrides extends CorpusOverrides {
  /** Completion client for the default adapters; defaults to AnthropicClient */
  client?: CompletionClient;
  /** Replaces individual model-backed collaborators */
  collaborators?: Partial<Pick<TutorDependencies, 'intentJudge' | 'reasoner' | 'judge' | 'utterances'>>;
  now?: () => Date;
}

/**
 * Maps application configuration onto the orchestrator's settings.
 */
export function tutorConfigFrom(config: Config): TutorConfig {
  return {
    retrieval: {
      topK: config.retrieval.topK,
      poolSize: config.retrieval.poolSize,
      rrfK: config.retrieval.rrfK,
    },
    memory: {
      maxTurns: config.memory.maxTurns,
      tokenBudget: config.memory.tokenBudget,
    },
    intentConfidenceThreshold: config.intent.confidenceThreshold,
    weights: config.evaluation.weights,
    thresholds: config.evaluation.thresholds,
    multipleChoiceOptions: config.scaffolding.multipleChoiceOptions,
    upstream: {
      timeoutMs: config.upstream.timeoutMs,
      retryBackoffMs: config.upstream.retryBackoffMs,
    },
    sessionTtlMs: config.session.ttlMinutes * 60 * 1000,
  };
}

/**
 * Migrates the database and loads every stored chunk into the corpus.
 */
export async function createCorpusRuntime(overrides: CorpusOverrides = {}): Promise<CorpusRuntime> {
  const config = overrides.config ?? appConfig;

  const db = overrides.db ?? createDatabase(config.database.path);
  runMigrations(db);

  const embedder = overrides.embedder ?? new HashingEmbedder();
  const corpus = new Corpus(embedder, config.retrieval.minSimilarity);
  const documents = new DocumentRepository(db);
  const sessions = new SqliteSessionStore(db);

  const ingestor = new DocumentIngestor(documents, embedder, corpus, {
    chunkMaxChars: config.ingestion.chunkMaxChars,
  });
  await ingestor.reloadCorpus();

  return {
    db,
    corpus,
    documents,
    sessions,
    ingestor,
    close: () => db.$client.close(),
  };
}

/**
 * Builds a ready-to-use runtime: the corpus runtime plus the orchestrator
 * and its model-backed collaborators.
 */
export async function createTutorRuntime(overrides: RuntimeOverrides = {}): Promise<TutorRuntime> {
  const config = overrides.config ?? appConfig;
  const base = await createCorpusRuntime(overrides);

  const collaborators = overrides.collaborators ?? {};
  const needsClient =
    !collaborators.intentJudge || !collaborators.reasoner || !collaborators.judge || !collaborators.utterances;

  // The client is only built when some collaborator still needs it, so a
  // fully faked runtime never asks for an API key
  const client: CompletionClient | undefined = needsClient
    ? overrides.client ??
      new AnthropicClient({
        apiKey: config.anthropic.apiKey,
        model: config.anthropic.model,
        maxTokens: config.anthropic.maxTokens,
        timeoutMs: config.upstream.timeoutMs,
      })
    : undefined;

  function requireClient(): CompletionClient {
    if (!client) {
      throw new Error('No completion client available');
    }
    return client;
  }

  const orchestrator = new TutorOrchestrator(
    {
      store: base.sessions,
      semanticRanker: base.corpus.semantic,
      lexicalRanker: base.corpus.lexical,
      intentJudge: collaborators.intentJudge ?? new LlmIntentJudge(requireClient()),
      reasoner: collaborators.reasoner ?? new LlmReasoningGenerator(requireClient()),
      judge: collaborators.judge ?? new LlmJudgmentGenerator(requireClient()),
      utterances: collaborators.utterances ?? new LlmUtteranceGenerator(requireClient()),
      now: overrides.now,
    },
    tutorConfigFrom(config)
  );

  console.log(`[Runtime] Ready with ${base.corpus.size} indexed chunks`);

  return { ...base, orchestrator };
}
