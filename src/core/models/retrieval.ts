/**
 * Retrieval Domain Types
 *
 * Documents are split into chunks at ingestion time. At question time the
 * hybrid retriever ranks those chunks twice (semantically and lexically),
 * fuses the two rankings, and hands the survivors to reasoning, evaluation
 * and citation as a RetrievedContext.
 *
 * Pure types, no runtime dependencies.
 */

/**
 * A source document the student uploaded.
 */
export interface SourceDocument {
  id: string;
  title: string;
  createdAt: Date;
}

/**
 * A chunk of a source document as stored in the corpus.
 */
export interface DocumentChunk {
  id: string;
  documentId: string;
  /** Denormalized so citations can be rendered without a join */
  documentTitle: string;
  /** Human-readable position marker, e.g. "page 3" */
  location: string;
  /** Zero-based order of the chunk within its document */
  ordinal: number;
  text: string;
}

/**
 * One entry of a single ranker's output. Score semantics depend on the
 * ranker (cosine similarity, BM25); only the order is used for fusion.
 */
export interface RankedChunk {
  chunk: DocumentChunk;
  score: number;
}

/**
 * A chunk selected by fused retrieval.
 */
export interface ContextChunk {
  chunkId: string;
  documentId: string;
  documentTitle: string;
  location: string;
  text: string;
  /** Reciprocal-rank fusion score across the semantic and lexical rankings */
  score: number;
}

/**
 * Ordered result of one retrieval. Chunk ids are unique, scores are
 * non-increasing, and equal scores are ordered by chunk id.
 */
export type RetrievedContext = readonly ContextChunk[];
