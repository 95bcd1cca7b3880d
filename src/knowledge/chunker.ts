/**
 * @fileoverview Fixed-size overlapping chunking
 *
 * Windows of `chunkSize` characters overlapping by `overlap * chunkSize`.
 * A window's end is moved to the nearest sentence break within
 * SENTENCE_SNAP_CHARS when one exists, so passages rarely stop mid-sentence.
 */

import { ValidationError } from '../core/errors.js';

export interface ChunkingOptions {
  /** Target window length in characters. */
  chunkSize: number;
  /** Fraction of the window repeated at the start of the next one, in [0, 1). */
  overlap: number;
}

export interface TextChunk {
  sequenceIndex: number;
  text: string;
  /** Offsets into the source text. */
  start: number;
  end: number;
}

const SENTENCE_ENDINGS = ['. ', '! ', '? ', '\n\n'] as const;
const SENTENCE_SNAP_CHARS = 100;

// `minEnd` keeps every window ending past the previous one.
function snapToSentenceEnd(text: string, minEnd: number, end: number): number {
  const lowerBound = Math.max(minEnd, end - SENTENCE_SNAP_CHARS);
  const upperBound = Math.min(text.length, end + SENTENCE_SNAP_CHARS);
  let best = -1;
  for (const ending of SENTENCE_ENDINGS) {
    const found = text.lastIndexOf(ending, upperBound - ending.length);
    if (found >= lowerBound) {
      best = Math.max(best, found + ending.length);
    }
  }
  return best >= minEnd ? best : end;
}

export function chunkText(text: string, options: ChunkingOptions): TextChunk[] {
  const { chunkSize, overlap } = options;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ValidationError('chunkSize', 'positive integer', String(chunkSize));
  }
  if (!(overlap >= 0 && overlap < 1)) {
    throw new ValidationError('overlap', 'fraction in [0, 1)', String(overlap));
  }

  if (text.trim().length === 0) return [];
  if (text.length <= chunkSize) {
    return [{ sequenceIndex: 0, text: text.trim(), start: 0, end: text.length }];
  }

  const overlapChars = Math.floor(chunkSize * overlap);
  const chunks: TextChunk[] = [];
  let start = 0;
  let previousEnd = 0;

  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length);
    if (end < text.length) {
      end = snapToSentenceEnd(text, Math.max(start + 1, previousEnd + 1), end);
    }
    previousEnd = end;

    const slice = text.slice(start, end).trim();
    if (slice) {
      chunks.push({ sequenceIndex: chunks.length, text: slice, start, end });
    }
    if (end >= text.length) break;

    const next = end - overlapChars;
    start = next > start ? next : end;
  }

  return chunks;
}
