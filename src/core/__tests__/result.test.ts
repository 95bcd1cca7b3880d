import { describe, expect, it } from 'vitest';
import {
  Err,
  Ok,
  aiOutcome,
  combineModes,
  fallbackOutcome,
  safeAsync,
} from '../result.js';

describe('Result helpers', () => {
  it('should wrap resolved and rejected promises', async () => {
    const ok = await safeAsync(async () => 3);
    const err = await safeAsync(async () => {
      throw new Error('boom');
    });

    expect(ok).toEqual({ ok: true, value: 3 });
    expect(err.ok).toBe(false);
    if (!err.ok) expect(err.error.message).toBe('boom');
  });

  it('should turn non-Error throws into Errors', async () => {
    const result = await safeAsync(() => Promise.reject('text'));

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('text');
  });

  it('should build results directly', () => {
    expect(Ok(2)).toEqual({ ok: true, value: 2 });
    expect(Err('e')).toEqual({ ok: false, error: 'e' });
  });
});

describe('ReasoningOutcome', () => {
  it('should tag AI and fallback outcomes', () => {
    expect(aiOutcome('x')).toEqual({ mode: 'ai', value: 'x' });
    expect(fallbackOutcome('y', 'timeout')).toEqual({ mode: 'fallback', value: 'y', reason: 'timeout' });
  });

  it('should report ai only when every step was ai', () => {
    expect(combineModes(['ai', 'ai'])).toBe('ai');
    expect(combineModes(['ai', 'fallback'])).toBe('fallback');
    expect(combineModes(['fallback', 'ai'])).toBe('fallback');
  });
});
