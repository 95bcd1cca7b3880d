import { describe, expect, it } from 'vitest';
import { EmbeddingError } from '../../core/errors.js';
import { HashingEmbeddingFunction, cosineSimilarity, tokenize } from '../embeddings.js';

describe('tokenize', () => {
  it('should lower-case and split on non-alphanumerics', () => {
    expect(tokenize('Hello, World-42!')).toEqual(['hello', 'world', '42']);
  });
});

describe('HashingEmbeddingFunction', () => {
  it('should derive its version from the dimension', () => {
    const embedder = new HashingEmbeddingFunction({ dimension: 64 });

    expect(embedder.version).toBe('hashing-v1-d64');
    expect(embedder.dimension).toBe(64);
  });

  it('should reject dimensions below 16', () => {
    expect(() => new HashingEmbeddingFunction({ dimension: 8 })).toThrow(EmbeddingError);
  });

  it('should produce deterministic unit vectors', async () => {
    const embedder = new HashingEmbeddingFunction({ dimension: 64 });

    const [first] = await embedder.embed(['JWT authentication for the API']);
    const [second] = await embedder.embed(['JWT authentication for the API']);

    expect(first).toEqual(second);
    expect(first).toHaveLength(64);
    const norm = Math.sqrt((first ?? []).reduce((sum, value) => sum + value * value, 0));
    expect(norm).toBeCloseTo(1, 6);
  });

  it('should leave empty text as the zero vector', async () => {
    const embedder = new HashingEmbeddingFunction({ dimension: 16 });

    const [vector] = await embedder.embed(['']);

    expect(vector).toEqual(new Array(16).fill(0));
  });

  it('should place texts that share words closer together', async () => {
    const embedder = new HashingEmbeddingFunction();
    const [query, related, unrelated] = await embedder.embed([
      'jwt authentication tokens',
      'authentication with jwt',
      'docker container images',
    ]);

    expect(cosineSimilarity(query ?? [], related ?? [])).toBeGreaterThan(cosineSimilarity(query ?? [], unrelated ?? []));
  });
});

describe('cosineSimilarity', () => {
  it('should be 1 for parallel vectors and 0 against a zero vector', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('should reject vectors of different dimension', () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow(EmbeddingError);
  });
});
