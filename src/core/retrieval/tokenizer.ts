import stopWords from './stop-words.json';

const STOP_WORDS = new Set<string>(stopWords);

/**
 * Lowercases, strips punctuation and drops short and stop words.
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, ' ')
    .split(/\s+/)
    .filter((word) => word.length > 2 && !STOP_WORDS.has(word));
}

/**
 * Orders ranked entries best-first, breaking score ties by chunk id so the
 * same corpus and query always yield the same order.
 */
export function compareRanked(
  a: { score: number; id: string },
  b: { score: number; id: string }
): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
