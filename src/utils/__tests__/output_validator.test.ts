import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { extractJSON, parseModelOutput } from '../output_validator.js';

const Schema = z.object({ complexity: z.enum(['low', 'medium', 'high']) });

describe('extractJSON', () => {
  it('should prefer a fenced code block', () => {
    expect(extractJSON('Here:\n```json\n{"a": 1}\n```\nthanks')).toBe('{"a": 1}');
  });

  it('should find a bare object inside prose', () => {
    expect(extractJSON('Sure! {"a": 1} hope that helps')).toBe('{"a": 1}');
  });

  it('should fall back to the trimmed text', () => {
    expect(extractJSON('  nothing here  ')).toBe('nothing here');
  });
});

describe('parseModelOutput', () => {
  it('should return the validated value', () => {
    const result = parseModelOutput('{"complexity": "high"}', Schema);

    expect(result).toEqual({ ok: true, value: { complexity: 'high' } });
  });

  it('should reject text that is not JSON', () => {
    const result = parseModelOutput('I think it is high', Schema);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Invalid JSON: Could not parse as JSON');
      expect(result.error.rawOutput).toBe('I think it is high');
    }
  });

  it('should reject JSON that violates the schema', () => {
    const result = parseModelOutput('{"complexity": "extreme"}', Schema);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message.startsWith('Schema validation failed: complexity:')).toBe(true);
    }
  });
});
