export { HybridRetriever, fuseRankings } from './hybrid-retriever';
export { LexicalIndex } from './lexical-index';
export { SemanticIndex } from './semantic-index';
export type { EmbeddedChunk } from './semantic-index';
export {
  HashingEmbedder,
  DEFAULT_EMBEDDING_DIMENSIONS,
  cosineSimilarity,
  normalize,
} from './hashing-embedder';
export { Corpus } from './corpus';
export { tokenize } from './tokenizer';
export { DEFAULT_RETRIEVER_CONFIG } from './types';
export type { ChunkRanker, Embedder, RetrieverConfig } from './types';
