/**
 * Retrieval Contracts
 *
 * The hybrid retriever only sees rankers. Where a ranking comes from (an
 * in-process index, a vector database, a search service) is the concern of
 * whoever builds the ranker.
 */

import type { RankedChunk } from '../models';

/**
 * A single ranking over the chunk corpus.
 *
 * Implementations return at most `k` chunks ordered best-first and should
 * already exclude candidates below their own relevance floor.
 */
export interface ChunkRanker {
  search(query: string, k: number): Promise<RankedChunk[]>;
}

/**
 * Turns texts into fixed-length vectors for semantic ranking.
 */
export interface Embedder {
  readonly dimensions: number;
  embed(texts: string[]): Promise<number[][]>;
}

export interface RetrieverConfig {
  /** Maximum chunks in a RetrievedContext */
  topK: number;
  /** How many candidates each ranker is asked for */
  poolSize: number;
  /** Reciprocal rank fusion constant; rank r contributes 1 / (rrfK + r) */
  rrfK: number;
}

export const DEFAULT_RETRIEVER_CONFIG: RetrieverConfig = {
  topK: 5,
  poolSize: 20,
  rrfK: 60,
};
