/**
 * Repository Layer - Barrel Export
 *
 * @example
 * ```typescript
 * import { DocumentRepository, SqliteSessionStore } from './storage/repositories';
 *
 * const documentRepo = new DocumentRepository(db);
 * const sessionStore = new SqliteSessionStore(db);
 * ```
 */

export type { Repository } from './base';

export {
  DocumentRepository,
  type CreateDocumentInput,
  type UpdateDocumentInput,
  type NewChunkInput,
  type DocumentSummary,
} from './document.repository';

export { SqliteSessionStore } from './session.repository';
