/**
 * Text Chunker
 *
 * Splits a plain-text document into retrieval chunks. Pages are delimited
 * by form feeds or by `--- page N ---` marker lines; within a page,
 * paragraphs are packed into chunks of at most `maxChars` characters.
 * A paragraph longer than the limit is split at word boundaries.
 */

export const DEFAULT_CHUNK_MAX_CHARS = 800;

const PAGE_MARKER = /^\s*-{3,}\s*page\s+(\d+)\s*-{3,}\s*$/im;
const PAGE_MARKER_GLOBAL = /^\s*-{3,}\s*page\s+(\d+)\s*-{3,}\s*$/gim;

export interface Page {
  number: number;
  text: string;
}

export interface TextChunk {
  /** Zero-based across the whole document */
  ordinal: number;
  location: string;
  text: string;
}

/**
 * Splits a document into numbered pages. Text before the first marker is
 * page 1; a document with neither form feeds nor markers is a single page.
 */
export function splitPages(text: string): Page[] {
  if (text.includes('\f')) {
    return text.split('\f').map((pageText, index) => ({ number: index + 1, text: pageText }));
  }

  if (!PAGE_MARKER.test(text)) {
    return [{ number: 1, text }];
  }

  const pages: Page[] = [];
  let cursor = 0;
  let currentNumber = 1;

  for (const match of text.matchAll(PAGE_MARKER_GLOBAL)) {
    const start = match.index ?? 0;
    pages.push({ number: currentNumber, text: text.slice(cursor, start) });
    currentNumber = Number.parseInt(match[1], 10);
    cursor = start + match[0].length;
  }
  pages.push({ number: currentNumber, text: text.slice(cursor) });

  return pages;
}

/**
 * Splits page text into paragraphs on blank lines, collapsing internal
 * whitespace. Empty paragraphs are dropped.
 */
export function splitParagraphs(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.replace(/\s+/g, ' ').trim())
    .filter((paragraph) => paragraph.length > 0);
}

/**
 * Breaks an over-long paragraph into pieces no longer than `maxChars`,
 * cutting between words. A single word longer than the limit is cut hard.
 */
function splitLongParagraph(paragraph: string, maxChars: number): string[] {
  const pieces: string[] = [];
  let current = '';

  for (const word of paragraph.split(' ')) {
    if (word.length > maxChars) {
      if (current) pieces.push(current);
      current = '';
      for (let i = 0; i < word.length; i += maxChars) {
        pieces.push(word.slice(i, i + maxChars));
      }
      continue;
    }

    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length > maxChars) {
      pieces.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }

  if (current) pieces.push(current);
  return pieces;
}

/**
 * Packs paragraphs greedily, joining them with a blank line while the
 * result stays within `maxChars`.
 */
export function packParagraphs(paragraphs: readonly string[], maxChars: number): string[] {
  const chunks: string[] = [];
  let current = '';

  for (const paragraph of paragraphs) {
    const pieces = paragraph.length > maxChars ? splitLongParagraph(paragraph, maxChars) : [paragraph];

    for (const piece of pieces) {
      const candidate = current ? `${current}\n\n${piece}` : piece;
      if (candidate.length > maxChars) {
        chunks.push(current);
        current = piece;
      } else {
        current = candidate;
      }
    }
  }

  if (current) chunks.push(current);
  return chunks;
}

/**
 * Chunks a whole document.
 *
 * @example
 * chunkDocument('Intro.\f\fMitochondria make ATP.', 800);
 * // [{ ordinal: 0, location: 'page 1', text: 'Intro.' },
 * //  { ordinal: 1, location: 'page 3', text: 'Mitochondria make ATP.' }]
 */
export function chunkDocument(text: string, maxChars: number = DEFAULT_CHUNK_MAX_CHARS): TextChunk[] {
  if (maxChars <= 0) {
    throw new Error('Chunk size must be positive');
  }

  const chunks: TextChunk[] = [];
  for (const page of splitPages(text)) {
    for (const chunkText of packParagraphs(splitParagraphs(page.text), maxChars)) {
      chunks.push({ ordinal: chunks.length, location: `page ${page.number}`, text: chunkText });
    }
  }
  return chunks;
}
