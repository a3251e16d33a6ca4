/**
 * Hybrid Retriever
 *
 * Runs a semantic and a lexical ranking independently and fuses them with
 * reciprocal rank fusion: a chunk at 1-based rank r in a list earns
 * 1 / (rrfK + r) from that list, and nothing from a list it is absent from.
 * The fused list is sorted by score (ties by chunk id) and cut to topK.
 *
 * Fusion is a pure function of the two rankings, so identical corpus and
 * query always produce an identical RetrievedContext.
 *
 * @example
 * ```typescript
 * const retriever = new HybridRetriever(corpus.semantic, corpus.lexical, { topK: 5, poolSize: 20, rrfK: 60 });
 * const context = await retriever.retrieve('What is pretotyping?');
 * if (context.length === 0) {
 *   // nothing relevant; tell the student instead of guessing
 * }
 * ```
 */

import type { ContextChunk, DocumentChunk, RankedChunk, RetrievedContext } from '../models';
import type { ChunkRanker, RetrieverConfig } from './types';
import { DEFAULT_RETRIEVER_CONFIG } from './types';
import { compareRanked } from './tokenizer';

/**
 * Fuses any number of best-first rankings into one RetrievedContext.
 *
 * Within a single list only the first occurrence of a chunk counts, so a
 * ranker that returns duplicates cannot inflate a chunk's score.
 */
export function fuseRankings(
  rankings: readonly (readonly RankedChunk[])[],
  options: { rrfK: number; topK: number }
): RetrievedContext {
  const fused = new Map<string, { chunk: DocumentChunk; score: number }>();

  for (const ranking of rankings) {
    const seen = new Set<string>();
    let rank = 0;
    for (const { chunk } of ranking) {
      if (seen.has(chunk.id)) continue;
      seen.add(chunk.id);
      rank += 1;

      const contribution = 1 / (options.rrfK + rank);
      const existing = fused.get(chunk.id);
      if (existing) {
        existing.score += contribution;
      } else {
        fused.set(chunk.id, { chunk, score: contribution });
      }
    }
  }

  return [...fused.values()]
    .map(({ chunk, score }) => ({ id: chunk.id, score, chunk }))
    .sort(compareRanked)
    .slice(0, options.topK)
    .map(({ chunk, score }): ContextChunk => ({
      chunkId: chunk.id,
      documentId: chunk.documentId,
      documentTitle: chunk.documentTitle,
      location: chunk.location,
      text: chunk.text,
      score,
    }));
}

export class HybridRetriever {
  private readonly config: RetrieverConfig;

  constructor(
    private readonly semantic: ChunkRanker,
    private readonly lexical: ChunkRanker,
    config: Partial<RetrieverConfig> = {}
  ) {
    this.config = { ...DEFAULT_RETRIEVER_CONFIG, ...config };
  }

  /**
   * Retrieves at most `topK` fused chunks for the query. An empty result
   * means neither ranker found anything above its relevance floor.
   */
  async retrieve(query: string): Promise<RetrievedContext> {
    const [semanticHits, lexicalHits] = await Promise.all([
      this.semantic.search(query, this.config.poolSize),
      this.lexical.search(query, this.config.poolSize),
    ]);

    return fuseRankings([semanticHits, lexicalHits], {
      rrfK: this.config.rrfK,
      topK: this.config.topK,
    });
  }
}
