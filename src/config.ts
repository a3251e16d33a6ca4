/**
 * Centralized Configuration Module
 *
 * Type-safe, validated configuration for the tutoring engine, loaded from
 * environment variables. Everything that the tutoring policy treats as a
 * calibration knob (retrieval sizes, memory budget, evaluation weights, tier
 * thresholds, upstream timeouts) lives here so it can be tuned per deployment
 * without touching the engine.
 *
 * Usage:
 *   import { config, validateConfig } from './config';
 *
 *   console.log(config.retrieval.topK);
 *   console.log(config.evaluation.weights.conceptualAccuracy);
 *
 *   // Throws ConfigValidationError for production misconfiguration
 *   validateConfig();
 *
 * @module config
 */

import { z } from 'zod';

// =============================================================================
// Configuration Schema
// =============================================================================

const NODE_ENVS = ['development', 'production', 'test'] as const;
type NodeEnv = (typeof NODE_ENVS)[number];

const weightsSchema = z.object({
  conceptualAccuracy: z.number().min(0).default(0.35),
  reasoningCoherence: z.number().min(0).default(0.25),
  evidenceUtilization: z.number().min(0).default(0.15),
  conceptualIntegration: z.number().min(0).default(0.25),
});

const thresholdsSchema = z
  .object({
    strong: z.number().min(0).max(1).default(0.75),
    adequate: z.number().min(0).max(1).default(0.55),
    partial: z.number().min(0).max(1).default(0.3),
  })
  .refine((t) => t.strong >= t.adequate && t.adequate >= t.partial, {
    message: 'Tier thresholds must satisfy strong >= adequate >= partial',
  });

/**
 * Zod schema for validating environment configuration.
 * Provides runtime validation and TypeScript type inference.
 */
export const configSchema = z.object({
  server: z.object({
    port: z.number().int().positive().default(3001),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(NODE_ENVS).default('development'),
  }),

  database: z.object({
    path: z.string().default('socratic-scaffold.db'),
  }),

  anthropic: z.object({
    apiKey: z.string().optional(),
    model: z.string().default('claude-sonnet-4-5-20250929'),
    maxTokens: z.number().int().positive().default(1024),
  }),

  retrieval: z.object({
    topK: z.number().int().positive().default(5),
    poolSize: z.number().int().positive().default(20),
    rrfK: z.number().min(0).default(60),
    minSimilarity: z.number().min(-1).max(1).default(0.1),
  }),

  memory: z.object({
    maxTurns: z.number().int().positive().default(20),
    tokenBudget: z.number().int().positive().default(3000),
  }),

  intent: z.object({
    confidenceThreshold: z.number().min(0).max(1).default(0.6),
  }),

  evaluation: z.object({
    weights: weightsSchema,
    thresholds: thresholdsSchema,
  }),

  scaffolding: z.object({
    multipleChoiceOptions: z.number().int().min(2).max(6).default(4),
  }),

  upstream: z.object({
    timeoutMs: z.number().int().positive().default(30000),
    retryBackoffMs: z.number().int().min(0).default(500),
  }),

  session: z.object({
    ttlMinutes: z.number().positive().default(30),
    pruneIntervalMinutes: z.number().positive().default(5),
  }),

  ingestion: z.object({
    chunkMaxChars: z.number().int().min(100).default(800),
  }),
});

// TypeScript type inferred from the Zod schema
export type Config = z.infer<typeof configSchema>;

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Parse an integer from an environment variable string.
 * Returns undefined if the value is not a valid integer.
 */
function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Parse a float from an environment variable string.
 * Returns undefined if the value is not a valid number.
 */
function parseFloatOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? undefined : parsed;
}

function parseNodeEnv(value: string | undefined): NodeEnv | undefined {
  return NODE_ENVS.find((env) => env === value);
}

/**
 * Load configuration from environment variables.
 * Unset values are left undefined so the schema defaults apply.
 */
export function loadFromEnvironment(
  env: NodeJS.ProcessEnv = process.env
): z.input<typeof configSchema> {
  return {
    server: {
      port: parseIntOrUndefined(env.PORT),
      host: env.HOST,
      nodeEnv: parseNodeEnv(env.NODE_ENV),
    },
    database: {
      path: env.DATABASE_PATH,
    },
    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.ANTHROPIC_MODEL,
      maxTokens: parseIntOrUndefined(env.ANTHROPIC_MAX_TOKENS),
    },
    retrieval: {
      topK: parseIntOrUndefined(env.RETRIEVAL_TOP_K),
      poolSize: parseIntOrUndefined(env.RETRIEVAL_POOL_SIZE),
      rrfK: parseFloatOrUndefined(env.RETRIEVAL_RRF_K),
      minSimilarity: parseFloatOrUndefined(env.RETRIEVAL_MIN_SIMILARITY),
    },
    memory: {
      maxTurns: parseIntOrUndefined(env.MEMORY_MAX_TURNS),
      tokenBudget: parseIntOrUndefined(env.MEMORY_TOKEN_BUDGET),
    },
    intent: {
      confidenceThreshold: parseFloatOrUndefined(env.INTENT_CONFIDENCE_THRESHOLD),
    },
    evaluation: {
      weights: {
        conceptualAccuracy: parseFloatOrUndefined(env.EVAL_WEIGHT_ACCURACY),
        reasoningCoherence: parseFloatOrUndefined(env.EVAL_WEIGHT_COHERENCE),
        evidenceUtilization: parseFloatOrUndefined(env.EVAL_WEIGHT_EVIDENCE),
        conceptualIntegration: parseFloatOrUndefined(env.EVAL_WEIGHT_INTEGRATION),
      },
      thresholds: {
        strong: parseFloatOrUndefined(env.TIER_STRONG),
        adequate: parseFloatOrUndefined(env.TIER_ADEQUATE),
        partial: parseFloatOrUndefined(env.TIER_PARTIAL),
      },
    },
    scaffolding: {
      multipleChoiceOptions: parseIntOrUndefined(env.MC_OPTION_COUNT),
    },
    upstream: {
      timeoutMs: parseIntOrUndefined(env.UPSTREAM_TIMEOUT_MS),
      retryBackoffMs: parseIntOrUndefined(env.UPSTREAM_RETRY_BACKOFF_MS),
    },
    session: {
      ttlMinutes: parseFloatOrUndefined(env.SESSION_TTL_MINUTES),
      pruneIntervalMinutes: parseFloatOrUndefined(env.SESSION_PRUNE_INTERVAL_MINUTES),
    },
    ingestion: {
      chunkMaxChars: parseIntOrUndefined(env.CHUNK_MAX_CHARS),
    },
  };
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about missing/invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly missingVars: string[];
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(
    message: string,
    missingVars: string[] = [],
    invalidVars: { name: string; reason: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    this.missingVars = missingVars;
    this.invalidVars = invalidVars;
  }
}

/**
 * Validates requirements that only apply to production.
 *
 * In production, ANTHROPIC_API_KEY is required and the evaluation weights
 * must not all be zero. Development and test runs accept defaults.
 *
 * @throws {ConfigValidationError} If required configuration is missing in production
 */
export function validateConfig(target: Config = config): void {
  const missingVars: string[] = [];
  const invalidVars: { name: string; reason: string }[] = [];

  if (isProduction(target) && !target.anthropic.apiKey) {
    missingVars.push('ANTHROPIC_API_KEY');
  }

  const weightSum = Object.values(target.evaluation.weights).reduce((a, b) => a + b, 0);
  if (weightSum <= 0) {
    invalidVars.push({
      name: 'EVAL_WEIGHT_*',
      reason: 'At least one evaluation weight must be positive',
    });
  }

  if (missingVars.length > 0 || invalidVars.length > 0) {
    const errorParts: string[] = [];

    if (missingVars.length > 0) {
      errorParts.push(`Missing required environment variables: ${missingVars.join(', ')}`);
    }

    if (invalidVars.length > 0) {
      const invalidDescriptions = invalidVars
        .map((v) => `${v.name}: ${v.reason}`)
        .join('; ');
      errorParts.push(`Invalid configuration: ${invalidDescriptions}`);
    }

    throw new ConfigValidationError(
      `Configuration error: ${errorParts.join(' | ')}`,
      missingVars,
      invalidVars
    );
  }
}

// =============================================================================
// Configuration Export
// =============================================================================

const parseResult = configSchema.safeParse(loadFromEnvironment());

if (!parseResult.success) {
  console.error('Invalid configuration schema:');
  console.error(parseResult.error.format());
  process.exit(1);
}

/**
 * The validated, type-safe configuration object. Parsed once at module load.
 */
export const config: Config = parseResult.data;

/**
 * Returns the Anthropic API key, or throws when it is not configured.
 * Only the LLM adapters call this, so tests that use fakes never need a key.
 */
export function getAnthropicApiKey(): string {
  if (!config.anthropic.apiKey) {
    throw new ConfigValidationError(
      'ANTHROPIC_API_KEY is not set. Export it before starting the tutor.',
      ['ANTHROPIC_API_KEY']
    );
  }
  return config.anthropic.apiKey;
}

/**
 * Helper function to check if we're running in production mode.
 */
export function isProduction(target: Config = config): boolean {
  return target.server.nodeEnv === 'production';
}

export default config;
