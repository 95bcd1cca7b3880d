/**
 * @fileoverview Top-K retrieval over a knowledge index snapshot
 */

import { IndexCorruptionError, ValidationError } from '../core/errors.js';
import { compareIds } from '../utils/compare.js';
import { cosineSimilarity, type EmbeddingFunction } from './embeddings.js';
import type { IndexSnapshot, KnowledgeChunk } from './knowledge_index.js';

export interface SearchResult {
  chunk: KnowledgeChunk;
  score: number;
}

export interface SnapshotSource {
  snapshot(): IndexSnapshot;
}

const CONTEXT_CHARS_PER_PASSAGE = 1000;

/**
 * Descending score; equal scores go to the most recently indexed chunk, then
 * to (sourceId, sequenceIndex) so the order is total.
 */
function compareResults(a: SearchResult, b: SearchResult): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.chunk.lastIndexedAt !== b.chunk.lastIndexedAt) {
    return a.chunk.lastIndexedAt < b.chunk.lastIndexedAt ? 1 : -1;
  }
  const bySource = compareIds(a.chunk.sourceId, b.chunk.sourceId);
  if (bySource !== 0) return bySource;
  return a.chunk.sequenceIndex - b.chunk.sequenceIndex;
}

export class Retriever {
  constructor(
    private readonly index: SnapshotSource,
    private readonly embedder: EmbeddingFunction,
  ) {}

  /**
   * At most `k` chunks by descending cosine similarity to `query`.
   * An empty index yields an empty list.
   */
  async search(query: string, k: number): Promise<SearchResult[]> {
    if (!Number.isInteger(k) || k < 1) {
      throw new ValidationError('k', 'integer >= 1', String(k));
    }

    const snapshot = this.index.snapshot();
    if (snapshot.chunks.length === 0) return [];
    if (snapshot.embeddingVersion !== this.embedder.version) {
      throw new IndexCorruptionError(snapshot.embeddingVersion, this.embedder.version, 'search');
    }

    const [queryVector] = await this.embedder.embed([query]);
    const scored = snapshot.chunks.map((chunk) => ({
      chunk,
      score: cosineSimilarity(queryVector, chunk.embedding),
    }));
    scored.sort(compareResults);
    return scored.slice(0, k);
  }
}

/**
 * Numbered passages for a prompt, each truncated to `maxChars`.
 */
export function buildContext(results: readonly SearchResult[], maxChars = CONTEXT_CHARS_PER_PASSAGE): string {
  return results
    .map((result, i) => [
      `[Document ${i + 1}] (Relevance: ${result.score.toFixed(3)})`,
      `Source: ${result.chunk.sourceId}`,
      '',
      result.chunk.text.slice(0, maxChars),
      '',
      '---',
    ].join('\n'))
    .join('\n');
}

/**
 * Confidence in a result set: mostly mean relevance, plus coverage (up to
 * five results) and source diversity (up to three sources).
 */
export function estimateConfidence(results: readonly SearchResult[]): number {
  if (results.length === 0) return 0;
  const meanScore = results.reduce((sum, result) => sum + result.score, 0) / results.length;
  const coverage = Math.min(results.length / 5, 1);
  const sources = new Set(results.map((result) => result.chunk.sourceId)).size;
  const diversity = Math.min(sources / 3, 1);
  const confidence = meanScore * 0.7 + coverage * 0.2 + diversity * 0.1;
  return Math.round(Math.min(1, Math.max(0, confidence)) * 1000) / 1000;
}
