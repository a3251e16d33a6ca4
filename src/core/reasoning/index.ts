/**
 * Reasoning Contract
 *
 * The reasoning generator produces the thread's private worked solution
 * from the question and the retrieved chunks.
 */

import type { ContextChunk, ReasoningArtifact } from '../models';

export interface ReasoningGenerator {
  reason(question: string, context: readonly ContextChunk[]): Promise<ReasoningArtifact>;
}

/**
 * Drops citations to chunks that were not part of the retrieval, so every
 * cited id in a stored artifact refers to a chunk the thread actually holds.
 */
export function groundArtifact(
  artifact: ReasoningArtifact,
  context: readonly ContextChunk[]
): ReasoningArtifact {
  const known = new Set(context.map((chunk) => chunk.chunkId));
  return {
    ...artifact,
    steps: artifact.steps.map((step) => ({
      statement: step.statement,
      citedChunkIds: [...new Set(step.citedChunkIds.filter((id) => known.has(id)))],
    })),
  };
}
