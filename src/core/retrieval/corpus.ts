/**
 * Corpus
 *
 * Holds the current snapshot of both in-process indexes. Ingestion swaps in
 * a new snapshot with `load()`; the rankers exposed here delegate to
 * whichever snapshot is current when they are called.
 */

import type { RankedChunk } from '../models';
import { LexicalIndex } from './lexical-index';
import { SemanticIndex, type EmbeddedChunk } from './semantic-index';
import type { ChunkRanker, Embedder } from './types';

export class Corpus {
  private lexicalIndex = new LexicalIndex([]);
  private semanticIndex: SemanticIndex;

  constructor(
    private readonly embedder: Embedder,
    private readonly minSimilarity: number = 0.1
  ) {
    this.semanticIndex = new SemanticIndex([], embedder, minSimilarity);
  }

  /**
   * Replaces the indexed chunks.
   */
  load(entries: readonly EmbeddedChunk[]): void {
    this.lexicalIndex = new LexicalIndex(entries.map((entry) => entry.chunk));
    this.semanticIndex = new SemanticIndex(entries, this.embedder, this.minSimilarity);
    console.log(`[Corpus] Indexed ${entries.length} chunks`);
  }

  get size(): number {
    return this.lexicalIndex.size;
  }

  get semantic(): ChunkRanker {
    return { search: (query: string, k: number): Promise<RankedChunk[]> => this.semanticIndex.search(query, k) };
  }

  get lexical(): ChunkRanker {
    return { search: (query: string, k: number): Promise<RankedChunk[]> => this.lexicalIndex.search(query, k) };
  }
}
