/**
 * @fileoverview CLI error handling with structured envelopes
 *
 * Every failure is turned into an ErrorEnvelope: printed as JSON under
 * `--json`, as a message with recovery hints otherwise. Exit codes group
 * errors by kind.
 */

import { isRuleweaverError, getErrorMessage } from '../core/errors.js';

// ============================================================================
// CODES
// ============================================================================

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'CONFIG_INVALID'
  | 'CATALOG_INVALID'
  | 'NOT_FOUND'
  | 'INVALID_CLASSIFICATION'
  | 'INDEX_CORRUPTED'
  | 'INDEX_FAILED'
  | 'BACKEND_UNAVAILABLE'
  | 'INTERNAL';

export const ExitCodes: Record<CliErrorCode, number> = {
  INVALID_ARGUMENT: 2,
  CONFIG_INVALID: 3,
  CATALOG_INVALID: 3,
  NOT_FOUND: 4,
  INVALID_CLASSIFICATION: 4,
  INDEX_CORRUPTED: 5,
  INDEX_FAILED: 5,
  BACKEND_UNAVAILABLE: 6,
  INTERNAL: 1,
};

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `ruleweaver help <command>` for usage information.',
  CONFIG_INVALID: 'Check ruleweaver.config.yaml (or the file passed with --config) against the documented keys.',
  CATALOG_INVALID: 'Fix the rule definitions listed above; rule ids must be unique across all rule files.',
  NOT_FOUND: 'Run `ruleweaver rules` to list the rule ids in the catalog.',
  INVALID_CLASSIFICATION: 'A classification needs projectType, complexity, riskFlags and confidence.',
  INDEX_CORRUPTED: 'Run `ruleweaver index --rebuild` to re-embed every document.',
  INDEX_FAILED: 'Check that the knowledge directory exists and its files are readable.',
  BACKEND_UNAVAILABLE: 'Run `ruleweaver status --probe` to check the reasoning backend.',
  INTERNAL: 'Re-run with --verbose and report the output.',
};

// Maps error codes of the core hierarchy to CLI codes.
const CORE_CODE_MAP: Record<string, CliErrorCode> = {
  NOT_FOUND: 'NOT_FOUND',
  INVALID_CLASSIFICATION: 'INVALID_CLASSIFICATION',
  BACKEND_UNAVAILABLE: 'BACKEND_UNAVAILABLE',
  INDEX_CORRUPTION: 'INDEX_CORRUPTED',
  EMBEDDING_ERROR: 'INDEX_FAILED',
  RULE_CATALOG_ERROR: 'CATALOG_INVALID',
  VALIDATION_ERROR: 'INVALID_ARGUMENT',
  CONFIGURATION_ERROR: 'CONFIG_INVALID',
  PARSE_ERROR: 'CONFIG_INVALID',
};

// ============================================================================
// ERRORS
// ============================================================================

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

// ============================================================================
// ENVELOPES
// ============================================================================

export interface ErrorEnvelope {
  code: CliErrorCode;
  message: string;
  retryable: boolean;
  recoveryHints: string[];
  context: Record<string, unknown>;
}

export function createErrorEnvelope(
  code: CliErrorCode,
  message: string,
  overrides: Partial<Omit<ErrorEnvelope, 'code' | 'message'>> = {},
): ErrorEnvelope {
  return {
    code,
    message,
    retryable: overrides.retryable ?? false,
    recoveryHints: overrides.recoveryHints ?? [ERROR_SUGGESTIONS[code]],
    context: overrides.context ?? {},
  };
}

/** Turn anything thrown into an envelope. */
export function classifyError(error: unknown): ErrorEnvelope {
  if (error instanceof CliError) {
    return createErrorEnvelope(error.code, error.message, {
      recoveryHints: error.suggestion ? [error.suggestion] : [],
      context: { ...(error.details ?? {}) },
    });
  }
  if (isRuleweaverError(error)) {
    const code = CORE_CODE_MAP[error.code] ?? 'INTERNAL';
    const json = error.toJSON();
    return createErrorEnvelope(code, error.message, {
      retryable: error.retryable,
      context: { ...(json.details ?? {}), errorCode: error.code },
    });
  }
  return createErrorEnvelope('INTERNAL', getErrorMessage(error));
}

export function getExitCode(envelope: ErrorEnvelope): number {
  return ExitCodes[envelope.code];
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: envelope }, null, 2);
}

export function formatErrorWithHints(envelope: ErrorEnvelope): string {
  const lines = [`Error [${envelope.code}]: ${envelope.message}`];
  if (envelope.recoveryHints.length > 0) {
    lines.push('', ...envelope.recoveryHints.map((hint) => `Suggestion: ${hint}`));
  }
  return lines.join('\n');
}

export function formatError(error: unknown): string {
  return formatErrorWithHints(classifyError(error));
}
