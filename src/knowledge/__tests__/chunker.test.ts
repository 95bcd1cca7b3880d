import { describe, expect, it } from 'vitest';
import { ValidationError } from '../../core/errors.js';
import { chunkText } from '../chunker.js';

describe('chunkText', () => {
  it('should return nothing for blank text', () => {
    expect(chunkText('   \n ', { chunkSize: 100, overlap: 0.2 })).toEqual([]);
  });

  it('should keep short text as a single trimmed chunk', () => {
    expect(chunkText('  hello  ', { chunkSize: 100, overlap: 0.2 })).toEqual([
      { sequenceIndex: 0, text: 'hello', start: 0, end: 9 },
    ]);
  });

  it('should slide fixed windows with the configured overlap', () => {
    const chunks = chunkText('a'.repeat(250), { chunkSize: 100, overlap: 0.2 });

    expect(chunks.map((chunk) => [chunk.start, chunk.end])).toEqual([
      [0, 100],
      [80, 180],
      [160, 250],
    ]);
    expect(chunks.map((chunk) => chunk.sequenceIndex)).toEqual([0, 1, 2]);
  });

  it('should end a window at a nearby sentence break', () => {
    const text = `${'A'.repeat(60)}. ${'B'.repeat(100)}`;

    const chunks = chunkText(text, { chunkSize: 100, overlap: 0.2 });

    expect(chunks.map((chunk) => [chunk.start, chunk.end])).toEqual([
      [0, 62],
      [42, 142],
      [122, 162],
    ]);
    expect(chunks[0]?.text).toBe(`${'A'.repeat(60)}.`);
    expect(chunks[2]?.text).toBe('B'.repeat(40));
  });

  it('should reject invalid sizes and overlaps', () => {
    expect(() => chunkText('text', { chunkSize: 0, overlap: 0 })).toThrow(ValidationError);
    expect(() => chunkText('text', { chunkSize: 10, overlap: 1 })).toThrow(ValidationError);
    expect(() => chunkText('text', { chunkSize: 10, overlap: -0.1 })).toThrow(ValidationError);
  });
});
