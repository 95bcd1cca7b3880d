/**
 * @fileoverview Output Validation Utilities
 *
 * Extracts JSON from free-form model replies and validates it against a zod
 * schema. Unparseable or schema-violating replies are failures, never partial
 * successes.
 *
 * @packageDocumentation
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { Err, Ok, type Result } from '../core/result.js';

// ============================================================================
// ERRORS
// ============================================================================

export class OutputValidationError extends Error {
  constructor(
    message: string,
    public readonly details: string[] = [],
    public readonly rawOutput?: string,
  ) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'OutputValidationError';
  }
}

// ============================================================================
// EXTRACTION
// ============================================================================

/**
 * Extract JSON from an LLM response (handles markdown code blocks)
 */
export function extractJSON(text: string): string {
  const jsonBlockMatch = text.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
  if (jsonBlockMatch) {
    return jsonBlockMatch[1].trim();
  }

  const objectMatch = text.match(/\{[\s\S]*\}/);
  if (objectMatch) {
    return objectMatch[0];
  }

  const arrayMatch = text.match(/\[[\s\S]*\]/);
  if (arrayMatch) {
    return arrayMatch[0];
  }

  return text.trim();
}

// ============================================================================
// VALIDATION
// ============================================================================

/**
 * Validate an already-parsed value against a schema.
 */
export function validateValue<T>(
  value: unknown,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Result<T, OutputValidationError> {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return Ok(parsed.data);
  }
  const details = parsed.error.errors.map((issue) => `${issue.path.join('.') || '/'}: ${issue.message}`);
  return Err(new OutputValidationError('Schema validation failed', details));
}

/**
 * Extract, parse and validate a model reply.
 */
export function parseModelOutput<T>(
  output: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Result<T, OutputValidationError> {
  const extracted = extractJSON(output);
  let parsed: unknown;
  try {
    parsed = JSON.parse(extracted);
  } catch {
    return Err(new OutputValidationError('Invalid JSON', ['Could not parse as JSON'], output));
  }
  const validated = validateValue(parsed, schema);
  if (!validated.ok) {
    return Err(new OutputValidationError('Schema validation failed', validated.error.details, output));
  }
  return validated;
}
