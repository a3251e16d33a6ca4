/**
 * Documents API Routes
 *
 * Endpoints:
 * - POST /documents - Ingest a document and rebuild the corpus
 * - GET /documents - List documents with their chunk counts
 *
 * Ingestion runs synchronously within the request; the new chunks are
 * searchable by the next tutoring turn once it returns.
 */

import { Hono } from 'hono';
import type { DocumentIngestor } from '../../core/ingestion';
import type { DocumentRepository } from '../../storage';
import { validate } from '../middleware/validate';
import { ingestDocumentSchema } from '../types';
import { success } from '../utils/response';

export interface DocumentRouteDependencies {
  ingestor: Pick<DocumentIngestor, 'ingest'>;
  documents: Pick<DocumentRepository, 'findAllWithChunkCounts'>;
}

export function documentRoutes(deps: DocumentRouteDependencies): Hono {
  const router = new Hono();

  router.post('/', validate(ingestDocumentSchema), async (c) => {
    const body = c.get('validatedBody');
    const result = await deps.ingestor.ingest({ title: body.title, text: body.text });
    return success(
      c,
      {
        id: result.document.id,
        title: result.document.title,
        createdAt: result.document.createdAt.toISOString(),
        chunkCount: result.chunkCount,
      },
      201
    );
  });

  router.get('/', async (c) => {
    const summaries = await deps.documents.findAllWithChunkCounts();
    return success(
      c,
      summaries.map((summary) => ({
        id: summary.id,
        title: summary.title,
        createdAt: summary.createdAt.toISOString(),
        chunkCount: summary.chunkCount,
      }))
    );
  });

  return router;
}
