/**
 * Document Repository Implementation
 *
 * Data access for uploaded documents and their chunks. Documents and chunks
 * are written together in one transaction so the corpus never sees a
 * document without its chunks.
 */

import { asc, count, eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { documentChunks, documents } from '../schema';
import type { SourceDocument } from '../../core/models';
import type { EmbeddedChunk } from '../../core/retrieval';
import type { Repository } from './base';

/**
 * Input type for creating a new document.
 */
export interface CreateDocumentInput {
  /** Unique identifier - typically a prefixed UUID (e.g., 'doc_abc123') */
  id: string;
  title: string;
  /** Defaults to now if not provided */
  createdAt?: Date;
}

export interface UpdateDocumentInput {
  title?: string;
}

/**
 * A chunk ready for storage, before it is joined with its document title.
 */
export interface NewChunkInput {
  id: string;
  ordinal: number;
  location: string;
  text: string;
  embedding: number[];
}

/**
 * A document with the number of chunks stored for it.
 */
export interface DocumentSummary extends SourceDocument {
  chunkCount: number;
}

function mapToDomain(row: typeof documents.$inferSelect): SourceDocument {
  return {
    id: row.id,
    title: row.title,
    createdAt: row.createdAt,
  };
}

/**
 * Repository for documents and their chunks.
 *
 * @example
 * ```typescript
 * const repo = new DocumentRepository(db);
 *
 * const doc = await repo.createWithChunks(
 *   { id: 'doc_001', title: 'Cell Biology Notes' },
 *   [{ id: 'chk_001', ordinal: 0, location: 'page 1', text: '...', embedding }]
 * );
 *
 * corpus.load(await repo.findAllEmbeddedChunks());
 * ```
 */
export class DocumentRepository
  implements Repository<SourceDocument, CreateDocumentInput, UpdateDocumentInput>
{
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<SourceDocument | null> {
    const result = await this.db
      .select()
      .from(documents)
      .where(eq(documents.id, id))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapToDomain(result[0]);
  }

  async findAll(): Promise<SourceDocument[]> {
    const results = await this.db.select().from(documents).orderBy(asc(documents.createdAt));
    return results.map(mapToDomain);
  }

  /**
   * Lists documents, oldest first, with their chunk counts.
   */
  async findAllWithChunkCounts(): Promise<DocumentSummary[]> {
    const results = await this.db
      .select({
        id: documents.id,
        title: documents.title,
        createdAt: documents.createdAt,
        chunkCount: count(documentChunks.id),
      })
      .from(documents)
      .leftJoin(documentChunks, eq(documentChunks.documentId, documents.id))
      .groupBy(documents.id)
      .orderBy(asc(documents.createdAt), asc(documents.id));

    return results;
  }

  async create(input: CreateDocumentInput): Promise<SourceDocument> {
    const result = await this.db
      .insert(documents)
      .values({
        id: input.id,
        title: input.title,
        createdAt: input.createdAt ?? new Date(),
      })
      .returning();

    return mapToDomain(result[0]);
  }

  /**
   * Creates a document and all of its chunks atomically.
   */
  async createWithChunks(
    input: CreateDocumentInput,
    chunks: readonly NewChunkInput[]
  ): Promise<SourceDocument> {
    const createdAt = input.createdAt ?? new Date();

    this.db.transaction((tx) => {
      tx.insert(documents).values({ id: input.id, title: input.title, createdAt }).run();

      for (const chunk of chunks) {
        tx.insert(documentChunks)
          .values({
            id: chunk.id,
            documentId: input.id,
            ordinal: chunk.ordinal,
            location: chunk.location,
            text: chunk.text,
            embedding: chunk.embedding,
          })
          .run();
      }
    });

    return { id: input.id, title: input.title, createdAt };
  }

  async update(id: string, input: UpdateDocumentInput): Promise<SourceDocument> {
    const result = await this.db
      .update(documents)
      .set(input)
      .where(eq(documents.id, id))
      .returning();

    if (result.length === 0) {
      throw new Error(`Document with id '${id}' not found`);
    }

    return mapToDomain(result[0]);
  }

  /**
   * Deletes a document. Its chunks are removed by the cascade.
   *
   * @throws Error if the document does not exist
   */
  async delete(id: string): Promise<void> {
    const result = await this.db
      .delete(documents)
      .where(eq(documents.id, id))
      .returning({ id: documents.id });

    if (result.length === 0) {
      throw new Error(`Document with id '${id}' not found`);
    }
  }

  /**
   * Loads every stored chunk with its embedding, ordered by document and
   * position, in the shape the corpus indexes.
   */
  async findAllEmbeddedChunks(): Promise<EmbeddedChunk[]> {
    const rows = await this.db
      .select({ chunk: documentChunks, documentTitle: documents.title })
      .from(documentChunks)
      .innerJoin(documents, eq(documentChunks.documentId, documents.id))
      .orderBy(asc(documentChunks.documentId), asc(documentChunks.ordinal));

    return rows.map(({ chunk, documentTitle }) => ({
      chunk: {
        id: chunk.id,
        documentId: chunk.documentId,
        documentTitle,
        location: chunk.location,
        ordinal: chunk.ordinal,
        text: chunk.text,
      },
      embedding: chunk.embedding,
    }));
  }
}
