/**
 * Hashing Embedder
 *
 * Deterministic bag-of-words embedding via feature hashing. It needs no
 * model or network, so it is the default when no embedding service is
 * configured. A sign bit taken from the hash keeps colliding terms from
 * always reinforcing each other.
 */

import type { Embedder } from './types';
import { tokenize } from './tokenizer';

export const DEFAULT_EMBEDDING_DIMENSIONS = 256;

/**
 * 32-bit FNV-1a.
 */
function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export class HashingEmbedder implements Embedder {
  constructor(readonly dimensions: number = DEFAULT_EMBEDDING_DIMENSIONS) {}

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }

  embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      const hash = fnv1a(token);
      const sign = hash & 0x80000000 ? -1 : 1;
      vector[hash % this.dimensions] += sign;
    }
    return normalize(vector);
  }
}

/**
 * Scales a vector to unit length. The zero vector is returned unchanged.
 */
export function normalize(vector: number[]): number[] {
  const magnitude = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  if (magnitude === 0) return vector;
  return vector.map((v) => v / magnitude);
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let magA = 0;
  let magB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    magA += a[i] * a[i];
    magB += b[i] * b[i];
  }
  if (magA === 0 || magB === 0) return 0;
  return dot / (Math.sqrt(magA) * Math.sqrt(magB));
}
