/**
 * Semantic Index
 *
 * Cosine-similarity ranking over precomputed chunk embeddings. The query is
 * embedded with the same embedder that produced the chunk vectors.
 */

import type { DocumentChunk, RankedChunk } from '../models';
import type { ChunkRanker, Embedder } from './types';
import { cosineSimilarity } from './hashing-embedder';
import { compareRanked } from './tokenizer';

export interface EmbeddedChunk {
  chunk: DocumentChunk;
  embedding: number[];
}

export class SemanticIndex implements ChunkRanker {
  constructor(
    private readonly entries: readonly EmbeddedChunk[],
    private readonly embedder: Embedder,
    /** Candidates below this cosine similarity are not returned */
    private readonly minSimilarity: number = 0.1
  ) {}

  get size(): number {
    return this.entries.length;
  }

  async search(query: string, k: number): Promise<RankedChunk[]> {
    if (this.entries.length === 0 || query.trim() === '') {
      return [];
    }

    const [queryVector] = await this.embedder.embed([query]);
    if (!queryVector) return [];

    const scored: Array<{ id: string; score: number; chunk: DocumentChunk }> = [];
    for (const entry of this.entries) {
      const score = cosineSimilarity(queryVector, entry.embedding);
      if (score >= this.minSimilarity) {
        scored.push({ id: entry.chunk.id, score, chunk: entry.chunk });
      }
    }

    return scored
      .sort(compareRanked)
      .slice(0, k)
      .map(({ chunk, score }) => ({ chunk, score }));
  }
}
