/**
 * Tests for reciprocal rank fusion and the hybrid retriever.
 */

import { describe, it, expect, vi } from 'vitest';
import { HybridRetriever, fuseRankings } from './hybrid-retriever';
import type { ChunkRanker } from './types';
import type { DocumentChunk, RankedChunk } from '../models';

function chunk(id: string): DocumentChunk {
  return {
    id,
    documentId: 'doc_1',
    documentTitle: 'Lean Experiments',
    location: 'page 1',
    ordinal: 0,
    text: `text of ${id}`,
  };
}

function ranked(...ids: string[]): RankedChunk[] {
  return ids.map((id, i) => ({ chunk: chunk(id), score: 1 - i * 0.1 }));
}

function staticRanker(results: RankedChunk[]): ChunkRanker {
  return { search: async () => results };
}

// ============================================================================
// fuseRankings
// ============================================================================

describe('fuseRankings', () => {
  it('should sum reciprocal ranks across both lists', () => {
    const result = fuseRankings([ranked('c1', 'c2', 'c3'), ranked('c3', 'c1')], {
      rrfK: 60,
      topK: 5,
    });

    expect(result.map((c) => c.chunkId)).toEqual(['c1', 'c3', 'c2']);
    expect(result[0].score).toBeCloseTo(1 / 61 + 1 / 62, 10);
    expect(result[1].score).toBeCloseTo(1 / 63 + 1 / 61, 10);
    expect(result[2].score).toBeCloseTo(1 / 62, 10);
  });

  it('should break score ties by chunk id', () => {
    const result = fuseRankings([ranked('b'), ranked('a')], { rrfK: 60, topK: 5 });

    expect(result.map((c) => c.chunkId)).toEqual(['a', 'b']);
    expect(result[0].score).toBe(result[1].score);
  });

  it('should count only the first occurrence of a chunk within one list', () => {
    const result = fuseRankings([ranked('a', 'a', 'b')], { rrfK: 60, topK: 5 });

    expect(result.map((c) => c.chunkId)).toEqual(['a', 'b']);
    expect(result[0].score).toBeCloseTo(1 / 61, 10);
    expect(result[1].score).toBeCloseTo(1 / 62, 10);
  });

  it('should truncate to topK', () => {
    const result = fuseRankings([ranked('a', 'b', 'c', 'd')], { rrfK: 60, topK: 2 });

    expect(result.map((c) => c.chunkId)).toEqual(['a', 'b']);
  });

  it('should return an empty context when both rankings are empty', () => {
    expect(fuseRankings([[], []], { rrfK: 60, topK: 5 })).toEqual([]);
  });

  it('should carry document metadata onto context chunks', () => {
    const [first] = fuseRankings([ranked('c9')], { rrfK: 0, topK: 1 });

    expect(first).toEqual({
      chunkId: 'c9',
      documentId: 'doc_1',
      documentTitle: 'Lean Experiments',
      location: 'page 1',
      text: 'text of c9',
      score: 1,
    });
  });

  it('should keep ids unique and scores non-increasing for overlapping rankings', () => {
    const ids = Array.from({ length: 30 }, (_, i) => `chunk_${String(i).padStart(2, '0')}`);
    const semantic = ranked(...ids.filter((_, i) => i % 2 === 0));
    const lexical = ranked(...[...ids].reverse().filter((_, i) => i % 3 !== 1));

    const result = fuseRankings([semantic, lexical], { rrfK: 60, topK: 8 });

    expect(result).toHaveLength(8);
    expect(new Set(result.map((c) => c.chunkId)).size).toBe(result.length);
    for (let i = 1; i < result.length; i++) {
      expect(result[i].score).toBeLessThanOrEqual(result[i - 1].score);
    }
  });
});

// ============================================================================
// HybridRetriever
// ============================================================================

describe('HybridRetriever', () => {
  it('should ask each ranker for the candidate pool size', async () => {
    const semanticSearch = vi.fn(async () => ranked('a'));
    const lexicalSearch = vi.fn(async () => ranked('b'));
    const retriever = new HybridRetriever(
      { search: semanticSearch },
      { search: lexicalSearch },
      { topK: 3, poolSize: 12, rrfK: 60 }
    );

    await retriever.retrieve('what is pretotyping');

    expect(semanticSearch).toHaveBeenCalledWith('what is pretotyping', 12);
    expect(lexicalSearch).toHaveBeenCalledWith('what is pretotyping', 12);
  });

  it('should return identical results for identical inputs', async () => {
    const retriever = new HybridRetriever(
      staticRanker(ranked('x', 'y', 'z')),
      staticRanker(ranked('z', 'w'))
    );

    const first = await retriever.retrieve('query');
    const second = await retriever.retrieve('query');

    expect(second).toEqual(first);
  });

  it('should return an empty context when nothing clears either floor', async () => {
    const retriever = new HybridRetriever(staticRanker([]), staticRanker([]));

    await expect(retriever.retrieve('anything')).resolves.toEqual([]);
  });
});
