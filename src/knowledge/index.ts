/**
 * @fileoverview Knowledge base: chunking, embedding, indexing, retrieval and
 * background refresh
 */

export { chunkText, type ChunkingOptions, type TextChunk } from './chunker.js';
export {
  HashingEmbeddingFunction,
  cosineSimilarity,
  normalize,
  tokenize,
  type EmbeddingFunction,
  type HashingEmbeddingOptions,
} from './embeddings.js';
export * from './knowledge_index.js';
export { Retriever, buildContext, estimateConfidence, type SearchResult, type SnapshotSource } from './retriever.js';
export { KnowledgeAnswerer, buildDigest, NO_KNOWLEDGE_ANSWER, type KnowledgeAnswer } from './answerer.js';
export {
  DirectorySourceLister,
  splitJsonDocument,
  renderTechnology,
  type DirectorySourceDocument,
  type DirectorySourceListerOptions,
  type SourceKind,
} from './source_lister.js';
export { RefreshTask, type RefreshRunner, type RefreshTaskOptions } from './refresh_task.js';
