/**
 * Lexical Index
 *
 * In-process BM25 ranking over the chunk corpus. Built once per corpus
 * snapshot; searching never mutates it.
 */

import type { DocumentChunk, RankedChunk } from '../models';
import type { ChunkRanker } from './types';
import { compareRanked, tokenize } from './tokenizer';

const BM25_K1 = 1.2;
const BM25_B = 0.75;

interface IndexedDocument {
  chunk: DocumentChunk;
  termFrequencies: Map<string, number>;
  length: number;
}

export class LexicalIndex implements ChunkRanker {
  private readonly documents: IndexedDocument[];
  private readonly documentFrequencies = new Map<string, number>();
  private readonly averageLength: number;

  constructor(chunks: readonly DocumentChunk[]) {
    this.documents = chunks.map((chunk) => {
      const tokens = tokenize(chunk.text);
      const termFrequencies = new Map<string, number>();
      for (const token of tokens) {
        termFrequencies.set(token, (termFrequencies.get(token) ?? 0) + 1);
      }
      return { chunk, termFrequencies, length: tokens.length };
    });

    for (const doc of this.documents) {
      for (const term of doc.termFrequencies.keys()) {
        this.documentFrequencies.set(term, (this.documentFrequencies.get(term) ?? 0) + 1);
      }
    }

    const totalLength = this.documents.reduce((sum, doc) => sum + doc.length, 0);
    this.averageLength = this.documents.length > 0 ? totalLength / this.documents.length : 0;
  }

  get size(): number {
    return this.documents.length;
  }

  async search(query: string, k: number): Promise<RankedChunk[]> {
    const terms = [...new Set(tokenize(query))];
    if (terms.length === 0 || this.documents.length === 0) {
      return [];
    }

    const scored: Array<{ id: string; score: number; chunk: DocumentChunk }> = [];
    for (const doc of this.documents) {
      const score = this.score(doc, terms);
      if (score > 0) {
        scored.push({ id: doc.chunk.id, score, chunk: doc.chunk });
      }
    }

    return scored
      .sort(compareRanked)
      .slice(0, k)
      .map(({ chunk, score }) => ({ chunk, score }));
  }

  private score(doc: IndexedDocument, terms: string[]): number {
    const n = this.documents.length;
    let total = 0;
    for (const term of terms) {
      const tf = doc.termFrequencies.get(term);
      if (!tf) continue;
      const df = this.documentFrequencies.get(term) ?? 0;
      const idf = Math.log(1 + (n - df + 0.5) / (df + 0.5));
      const norm = this.averageLength > 0 ? doc.length / this.averageLength : 1;
      total += (idf * tf * (BM25_K1 + 1)) / (tf + BM25_K1 * (1 - BM25_B + BM25_B * norm));
    }
    return total;
  }
}
