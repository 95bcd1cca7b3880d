/**
 * @fileoverview Embedding functions
 *
 * An EmbeddingFunction carries a version string; the knowledge index refuses
 * to mix vectors from different versions. The default implementation is a
 * feature-hashed bag of words plus character trigrams: deterministic, local
 * and dependency-free, so indexing works without any model download.
 */

import { EmbeddingError } from '../core/errors.js';

export interface EmbeddingFunction {
  /** Identifies the vector space; changes whenever vectors stop being comparable. */
  readonly version: string;
  readonly dimension: number;
  embed(texts: readonly string[]): Promise<number[][]>;
}

export interface HashingEmbeddingOptions {
  dimension?: number;
}

const WORD_WEIGHT = 1;
const TRIGRAM_WEIGHT = 0.5;

// FNV-1a, 32-bit
function hashToken(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i += 1) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

export class HashingEmbeddingFunction implements EmbeddingFunction {
  readonly dimension: number;
  readonly version: string;

  constructor(options: HashingEmbeddingOptions = {}) {
    const dimension = options.dimension ?? 256;
    if (!Number.isInteger(dimension) || dimension < 16) {
      throw new EmbeddingError('hashing', false, `dimension must be an integer >= 16, got ${dimension}`);
    }
    this.dimension = dimension;
    this.version = `hashing-v1-d${dimension}`;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }

  private embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const token of tokenize(text)) {
      this.accumulate(vector, `w:${token}`, WORD_WEIGHT);
      const padded = ` ${token} `;
      for (let i = 0; i + 3 <= padded.length; i += 1) {
        this.accumulate(vector, `t:${padded.slice(i, i + 3)}`, TRIGRAM_WEIGHT);
      }
    }
    return normalize(vector);
  }

  private accumulate(vector: number[], feature: string, weight: number): void {
    const hash = hashToken(feature);
    const bucket = hash % this.dimension;
    // High bit picks the sign so collisions tend to cancel instead of pile up.
    const sign = hash & 0x80000000 ? -1 : 1;
    vector[bucket] += sign * weight;
  }
}

export function normalize(vector: number[]): number[] {
  let norm = 0;
  for (const value of vector) norm += value * value;
  if (norm === 0) return vector;
  const scale = 1 / Math.sqrt(norm);
  return vector.map((value) => value * scale);
}

/**
 * Cosine similarity; 0 when either vector is all zeros.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new EmbeddingError('cosine', false, `dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
