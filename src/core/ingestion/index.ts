export { DocumentIngestor } from './document-ingestor';
export type {
  DocumentWriter,
  DocumentIngestorOptions,
  IngestRequest,
  IngestResult,
} from './document-ingestor';
export {
  chunkDocument,
  splitPages,
  splitParagraphs,
  packParagraphs,
  DEFAULT_CHUNK_MAX_CHARS,
} from './text-chunker';
export type { Page, TextChunk } from './text-chunker';
