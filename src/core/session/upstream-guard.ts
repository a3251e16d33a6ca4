/**
 * Upstream Guard
 *
 * The single boundary through which the orchestrator calls anything
 * external: rankers, the intent judge, reasoning, judgment and rendering.
 * Each call gets a timeout; a timeout or failure is retried once after a
 * backoff; a second failure is raised as UpstreamTimeout / UpstreamFailure.
 * Aborting the caller's signal ends the wait immediately with
 * MessageCancelled.
 */

import {
  MessageCancelled,
  TutorError,
  UpstreamFailure,
  UpstreamTimeout,
  isUpstreamError,
  type UpstreamError,
} from '../errors';
import { LLMError } from '../../llm/types';
import type { IntentJudge } from '../intent';
import type { ReasoningGenerator } from '../reasoning';
import type { ChunkRanker } from '../retrieval';
import type { JudgmentGenerator } from '../scoring';
import type { UtteranceGenerator } from '../dialogue';

export interface UpstreamPolicy {
  timeoutMs: number;
  retryBackoffMs: number;
}

export const DEFAULT_UPSTREAM_POLICY: UpstreamPolicy = {
  timeoutMs: 30000,
  retryBackoffMs: 500,
};

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Maps whatever an external call threw onto the upstream taxonomy.
 * Engine errors other than upstream ones pass through untouched.
 */
export function toUpstreamError(operation: string, error: unknown, timeoutMs: number): Error {
  if (error instanceof TutorError) {
    return error;
  }
  if (error instanceof LLMError && error.type === 'timeout') {
    return new UpstreamTimeout(operation, timeoutMs);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new UpstreamFailure(operation, message, error);
}

export class UpstreamGuard {
  constructor(
    private readonly sessionId: string,
    private readonly policy: UpstreamPolicy = DEFAULT_UPSTREAM_POLICY,
    private readonly signal?: AbortSignal,
    private readonly onRetry?: (operation: string, error: UpstreamError) => void
  ) {}

  async run<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await this.attempt(operation, call);
    } catch (error) {
      if (!isUpstreamError(error)) {
        throw error;
      }
      this.onRetry?.(operation, error);
      console.log(`[UpstreamGuard] ${error.message}; retrying once in ${this.policy.retryBackoffMs}ms`);
      await delay(this.policy.retryBackoffMs);
      this.throwIfCancelled();
      return this.attempt(operation, call);
    }
  }

  throwIfCancelled(): void {
    if (this.signal?.aborted) {
      throw new MessageCancelled(this.sessionId);
    }
  }

  private async attempt<T>(operation: string, call: () => Promise<T>): Promise<T> {
    this.throwIfCancelled();

    let timer: ReturnType<typeof setTimeout> | undefined;
    let onAbort: (() => void) | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new UpstreamTimeout(operation, this.policy.timeoutMs)),
        this.policy.timeoutMs
      );
    });
    const cancelled = new Promise<never>((_, reject) => {
      onAbort = () => reject(new MessageCancelled(this.sessionId));
      this.signal?.addEventListener('abort', onAbort, { once: true });
    });

    try {
      return await Promise.race([
        call().catch((error: unknown) => {
          throw toUpstreamError(operation, error, this.policy.timeoutMs);
        }),
        timeout,
        cancelled,
      ]);
    } finally {
      if (timer) clearTimeout(timer);
      if (onAbort) this.signal?.removeEventListener('abort', onAbort);
    }
  }
}

// ============================================================================
// Guarded collaborators
// ============================================================================

/**
 * Wraps every external collaborator so each call goes through the guard.
 */
export interface GuardedCollaborators {
  semantic: ChunkRanker;
  lexical: ChunkRanker;
  intentJudge: IntentJudge;
  reasoner: ReasoningGenerator;
  judge: JudgmentGenerator;
  utterances: UtteranceGenerator;
}

export function guardCollaborators(
  guard: UpstreamGuard,
  raw: GuardedCollaborators
): GuardedCollaborators {
  return {
    semantic: { search: (query, k) => guard.run('semantic.search', () => raw.semantic.search(query, k)) },
    lexical: { search: (query, k) => guard.run('lexical.search', () => raw.lexical.search(query, k)) },
    intentJudge: { classify: (input) => guard.run('intent.classify', () => raw.intentJudge.classify(input)) },
    reasoner: {
      reason: (question, context) => guard.run('reasoning.reason', () => raw.reasoner.reason(question, context)),
    },
    judge: {
      judgeDimension: (dimension, input) =>
        guard.run(`judgment.${dimension}`, () => raw.judge.judgeDimension(dimension, input)),
    },
    utterances: {
      render: (templateId, inputs) =>
        guard.run(`utterance.${templateId}`, () => raw.utterances.render(templateId, inputs)),
    },
  };
}
