/**
 * Tests for document chunking and ingestion.
 */

import { describe, it, expect } from 'vitest';
import { chunkDocument, packParagraphs, splitPages } from './text-chunker';
import { DocumentIngestor, type DocumentWriter } from './document-ingestor';
import { EmptyDocumentError } from '../errors';
import { Corpus, HashingEmbedder, type EmbeddedChunk } from '../retrieval';

describe('chunkDocument', () => {
  it('should number form-feed pages and skip empty ones', () => {
    expect(chunkDocument('Intro.\f\fMitochondria make ATP.', 800)).toEqual([
      { ordinal: 0, location: 'page 1', text: 'Intro.' },
      { ordinal: 1, location: 'page 3', text: 'Mitochondria make ATP.' },
    ]);
  });

  it('should take page numbers from marker lines', () => {
    const text = 'Preface text.\n--- page 2 ---\nFirst para.\n\nSecond para.\n--- page 5 ---\nLast.';

    expect(chunkDocument(text, 800)).toEqual([
      { ordinal: 0, location: 'page 1', text: 'Preface text.' },
      { ordinal: 1, location: 'page 2', text: 'First para.\n\nSecond para.' },
      { ordinal: 2, location: 'page 5', text: 'Last.' },
    ]);
  });

  it('should collapse whitespace inside a paragraph', () => {
    expect(chunkDocument('Cells   divide\nby mitosis.')).toEqual([
      { ordinal: 0, location: 'page 1', text: 'Cells divide by mitosis.' },
    ]);
  });

  it('should return nothing for blank text', () => {
    expect(chunkDocument('   \n\n  ')).toEqual([]);
  });

  it('should reject a non-positive chunk size', () => {
    expect(() => chunkDocument('text', 0)).toThrow('Chunk size must be positive');
  });
});

describe('splitPages', () => {
  it('should treat unmarked text as one page', () => {
    expect(splitPages('just text')).toEqual([{ number: 1, text: 'just text' }]);
  });
});

describe('packParagraphs', () => {
  it('should join paragraphs while they fit', () => {
    expect(packParagraphs(['aaaa bbbb', 'cccc dddd', 'eeee'], 20)).toEqual([
      'aaaa bbbb\n\ncccc dddd',
      'eeee',
    ]);
  });

  it('should split an over-long paragraph between words', () => {
    expect(packParagraphs(['alpha beta gamma delta'], 11)).toEqual(['alpha beta', 'gamma delta']);
  });

  it('should cut a single over-long word hard', () => {
    expect(packParagraphs(['abcdefghij'], 4)).toEqual(['abcd', 'efgh', 'ij']);
  });
});

function createWriter() {
  const stored: EmbeddedChunk[] = [];
  const titles: string[] = [];
  const writer: DocumentWriter = {
    async createWithChunks(input, chunks) {
      titles.push(input.title);
      for (const chunk of chunks) {
        stored.push({
          chunk: {
            id: chunk.id,
            documentId: input.id,
            documentTitle: input.title,
            location: chunk.location,
            ordinal: chunk.ordinal,
            text: chunk.text,
          },
          embedding: chunk.embedding,
        });
      }
      return { id: input.id, title: input.title, createdAt: new Date(0) };
    },
    async findAllEmbeddedChunks() {
      return [...stored];
    },
  };
  return { writer, stored, titles };
}

function counterIds() {
  let next = 0;
  return (prefix: 'doc' | 'chk') => `${prefix}_${++next}`;
}

describe('DocumentIngestor', () => {
  it('should store embedded chunks and make them searchable', async () => {
    const { writer, stored, titles } = createWriter();
    const embedder = new HashingEmbedder();
    const corpus = new Corpus(embedder);
    const ingestor = new DocumentIngestor(writer, embedder, corpus, { newId: counterIds() });

    const result = await ingestor.ingest({
      title: '  Cell Notes ',
      text: 'Mitochondria produce ATP.\f\fRibosomes build proteins.',
    });

    expect(result.chunkCount).toBe(2);
    expect(result.document.id).toBe('doc_3');
    expect(titles).toEqual(['Cell Notes']);
    expect(stored.map((entry) => entry.chunk.id)).toEqual(['chk_1', 'chk_2']);
    expect(stored[0].embedding).toHaveLength(256);
    expect(corpus.size).toBe(2);

    const hits = await corpus.lexical.search('ribosomes', 5);
    expect(hits.map((hit) => hit.chunk.location)).toEqual(['page 3']);
  });

  it('should reject a document with no text', async () => {
    const { writer, stored } = createWriter();
    const embedder = new HashingEmbedder();
    const ingestor = new DocumentIngestor(writer, embedder, new Corpus(embedder));

    await expect(ingestor.ingest({ title: 'Blank', text: '\n\n' })).rejects.toBeInstanceOf(
      EmptyDocumentError
    );
    expect(stored).toEqual([]);
  });
});
