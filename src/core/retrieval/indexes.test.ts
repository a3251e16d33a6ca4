/**
 * Tests for the in-process lexical and semantic indexes.
 */

import { describe, it, expect } from 'vitest';
import { LexicalIndex } from './lexical-index';
import { SemanticIndex } from './semantic-index';
import { HashingEmbedder, cosineSimilarity, normalize } from './hashing-embedder';
import { tokenize } from './tokenizer';
import type { DocumentChunk } from '../models';

function chunk(id: string, text: string): DocumentChunk {
  return { id, documentId: 'doc_1', documentTitle: 'Notes', location: 'page 1', ordinal: 0, text };
}

describe('tokenize', () => {
  it('should lowercase, strip punctuation and drop short and stop words', () => {
    expect(tokenize('What is Pretotyping? The idea, in short!')).toEqual([
      'pretotyping',
      'idea',
      'short',
    ]);
  });
});

describe('LexicalIndex', () => {
  const chunks = [
    chunk('c1', 'Pretotyping tests demand before building the product'),
    chunk('c2', 'Prototypes answer whether something can be built'),
    chunk('c3', 'Cats sleep most of the day'),
  ];

  it('should return only chunks sharing a query term', async () => {
    const index = new LexicalIndex(chunks);

    const hits = await index.search('pretotyping demand', 5);

    expect(hits.map((h) => h.chunk.id)).toEqual(['c1']);
    expect(hits[0].score).toBeGreaterThan(0);
  });

  it('should rank higher term frequency first', async () => {
    const index = new LexicalIndex([
      chunk('c1', 'entropy entropy disorder'),
      chunk('c2', 'entropy measures disorder in systems'),
    ]);

    const hits = await index.search('entropy', 5);

    expect(hits.map((h) => h.chunk.id)).toEqual(['c1', 'c2']);
  });

  it('should return nothing for a query made only of stop words', async () => {
    const index = new LexicalIndex(chunks);

    await expect(index.search('what is the', 5)).resolves.toEqual([]);
  });

  it('should return nothing for an empty corpus', async () => {
    await expect(new LexicalIndex([]).search('pretotyping', 5)).resolves.toEqual([]);
  });
});

describe('HashingEmbedder', () => {
  it('should produce unit vectors of the configured size', async () => {
    const embedder = new HashingEmbedder(64);

    const [vector] = await embedder.embed(['market demand experiments']);
    const magnitude = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));

    expect(vector).toHaveLength(64);
    expect(magnitude).toBeCloseTo(1, 10);
  });

  it('should be deterministic', () => {
    const embedder = new HashingEmbedder();

    expect(embedder.embedOne('same text here')).toEqual(embedder.embedOne('same text here'));
  });

  it('should give the zero vector for text with no tokens', () => {
    const embedder = new HashingEmbedder(8);

    expect(embedder.embedOne('a an of')).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
  });
});

describe('cosineSimilarity', () => {
  it('should return 0 when either vector is zero', () => {
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });

  it('should return 1 for parallel vectors', () => {
    expect(cosineSimilarity(normalize([3, 4]), [6, 8])).toBeCloseTo(1, 10);
  });

  it('should reject vectors of different lengths', () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow('Vector length mismatch');
  });
});

describe('SemanticIndex', () => {
  it('should rank the chunk with identical wording first', async () => {
    const embedder = new HashingEmbedder();
    const chunks = [
      chunk('c1', 'Pretotyping tests demand before building the product'),
      chunk('c2', 'Cats sleep most of the day'),
    ];
    const entries = chunks.map((c) => ({ chunk: c, embedding: embedder.embedOne(c.text) }));
    const index = new SemanticIndex(entries, embedder, 0.1);

    const hits = await index.search('Cats sleep most of the day', 5);

    expect(hits[0].chunk.id).toBe('c2');
    expect(hits[0].score).toBeCloseTo(1, 10);
  });

  it('should drop candidates below the similarity floor', async () => {
    const embedder = new HashingEmbedder();
    const entries = [{ chunk: chunk('c1', 'photosynthesis'), embedding: embedder.embedOne('photosynthesis') }];
    const index = new SemanticIndex(entries, embedder, 0.1);

    await expect(index.search('the of and', 5)).resolves.toEqual([]);
  });
});
