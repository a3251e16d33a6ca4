/**
 * Document Ingestor
 *
 * Turns an uploaded text into stored, embedded chunks and refreshes the
 * in-process corpus so the next retrieval sees them.
 */

import { randomUUID } from 'node:crypto';
import { EmptyDocumentError } from '../errors';
import type { SourceDocument } from '../models';
import type { Corpus, EmbeddedChunk, Embedder } from '../retrieval';
import { chunkDocument, DEFAULT_CHUNK_MAX_CHARS } from './text-chunker';

/**
 * The slice of document storage ingestion needs.
 */
export interface DocumentWriter {
  createWithChunks(
    input: { id: string; title: string; createdAt?: Date },
    chunks: ReadonlyArray<{ id: string; ordinal: number; location: string; text: string; embedding: number[] }>
  ): Promise<SourceDocument>;
  findAllEmbeddedChunks(): Promise<EmbeddedChunk[]>;
}

export interface IngestRequest {
  title: string;
  text: string;
}

export interface IngestResult {
  document: SourceDocument;
  chunkCount: number;
}

export interface DocumentIngestorOptions {
  chunkMaxChars?: number;
  /** Generates document and chunk ids; defaults to prefixed UUIDs */
  newId?: (prefix: 'doc' | 'chk') => string;
}

function defaultId(prefix: 'doc' | 'chk'): string {
  return `${prefix}_${randomUUID()}`;
}

export class DocumentIngestor {
  private readonly chunkMaxChars: number;
  private readonly newId: (prefix: 'doc' | 'chk') => string;

  constructor(
    private readonly writer: DocumentWriter,
    private readonly embedder: Embedder,
    private readonly corpus: Corpus,
    options: DocumentIngestorOptions = {}
  ) {
    this.chunkMaxChars = options.chunkMaxChars ?? DEFAULT_CHUNK_MAX_CHARS;
    this.newId = options.newId ?? defaultId;
  }

  /**
   * Chunks, embeds and stores a document, then rebuilds the corpus.
   *
   * @throws {EmptyDocumentError} If the text yields no chunks
   */
  async ingest(request: IngestRequest): Promise<IngestResult> {
    const title = request.title.trim();
    const textChunks = chunkDocument(request.text, this.chunkMaxChars);
    if (textChunks.length === 0) {
      throw new EmptyDocumentError(title);
    }

    const embeddings = await this.embedder.embed(textChunks.map((chunk) => chunk.text));
    const chunks = textChunks.map((chunk, index) => ({
      id: this.newId('chk'),
      ordinal: chunk.ordinal,
      location: chunk.location,
      text: chunk.text,
      embedding: embeddings[index],
    }));

    const document = await this.writer.createWithChunks({ id: this.newId('doc'), title }, chunks);
    console.log(`[Ingest] Stored "${title}" as ${chunks.length} chunks`);

    await this.reloadCorpus();
    return { document, chunkCount: chunks.length };
  }

  /**
   * Rebuilds the corpus from every stored chunk.
   */
  async reloadCorpus(): Promise<void> {
    this.corpus.load(await this.writer.findAllEmbeddedChunks());
  }
}
