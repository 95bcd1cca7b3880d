/**
 * @fileoverview Ruleweaver error hierarchy
 *
 * Structural problems (unknown ids, duplicate rules, bad configuration,
 * mixed embedding versions) are thrown as typed errors. Reasoning backend
 * failures are absorbed by the fallback paths and only surface as a
 * BackendUnavailableError value inside status reports and rationales.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class RuleweaverError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// LOOKUP ERRORS
// ============================================================================

export type EntityKind = 'rule' | 'document' | 'stage_template' | 'prompt';

export class NotFoundError extends RuleweaverError {
  readonly code = 'NOT_FOUND';
  readonly retryable = false;

  constructor(
    readonly entity: EntityKind,
    readonly id: string,
  ) {
    super(`Unknown ${entity} id: ${id}`);
    this.name = 'NotFoundError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        entity: this.entity,
        id: this.id,
      },
    };
  }
}

// ============================================================================
// CLASSIFICATION ERRORS
// ============================================================================

export class InvalidClassificationError extends RuleweaverError {
  readonly code = 'INVALID_CLASSIFICATION';
  readonly retryable = false;

  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(`Invalid classification: ${message}`);
    this.name = 'InvalidClassificationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        issues: [...this.issues],
      },
    };
  }
}

// ============================================================================
// BACKEND ERRORS
// ============================================================================

export type BackendFailureReason =
  | 'not_configured'
  | 'timeout'
  | 'cancelled'
  | 'execution_failed'
  | 'invalid_response'
  | 'unavailable';

export class BackendUnavailableError extends RuleweaverError {
  readonly code = 'BACKEND_UNAVAILABLE';
  readonly retryable: boolean;

  constructor(
    readonly provider: string,
    readonly reason: BackendFailureReason,
    message: string,
  ) {
    super(`Reasoning backend ${provider} ${reason}: ${message}`);
    this.name = 'BackendUnavailableError';
    this.retryable = reason === 'timeout' || reason === 'unavailable' || reason === 'execution_failed';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        provider: this.provider,
        reason: this.reason,
      },
    };
  }
}

// ============================================================================
// INDEX ERRORS
// ============================================================================

export class IndexCorruptionError extends RuleweaverError {
  readonly code = 'INDEX_CORRUPTION';
  readonly retryable = false;

  constructor(
    readonly expectedVersion: string,
    readonly actualVersion: string,
    context: string,
  ) {
    super(
      `Embedding version mismatch during ${context}: index uses ${expectedVersion}, got ${actualVersion}. Rebuild the index.`
    );
    this.name = 'IndexCorruptionError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        expectedVersion: this.expectedVersion,
        actualVersion: this.actualVersion,
      },
    };
  }
}

export class EmbeddingError extends RuleweaverError {
  readonly code = 'EMBEDDING_ERROR';

  constructor(
    readonly model: string,
    readonly retryable: boolean,
    message: string,
    readonly inputLength?: number,
  ) {
    super(`Embedding with ${model} failed: ${message}`);
    this.name = 'EmbeddingError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        model: this.model,
        inputLength: this.inputLength,
      },
    };
  }
}

// ============================================================================
// CATALOG ERRORS
// ============================================================================

export class RuleCatalogError extends RuleweaverError {
  readonly code = 'RULE_CATALOG_ERROR';
  readonly retryable = false;

  constructor(
    message: string,
    readonly ruleIds: readonly string[] = [],
    readonly source?: string,
  ) {
    super(`Rule catalog load failed: ${message}`);
    this.name = 'RuleCatalogError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        ruleIds: [...this.ruleIds],
        source: this.source,
      },
    };
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends RuleweaverError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends RuleweaverError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configKey: this.configKey,
      },
    };
  }
}

// ============================================================================
// PARSE ERRORS
// ============================================================================

export class ParseError extends RuleweaverError {
  readonly code = 'PARSE_ERROR';
  readonly retryable = false;

  constructor(
    readonly format: string,
    message: string,
    readonly source?: string,
  ) {
    super(`Failed to parse ${format}${source ? ` (${source})` : ''}: ${message}`);
    this.name = 'ParseError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        format: this.format,
        source: this.source,
      },
    };
  }
}

// ============================================================================
// ERROR TYPE GUARDS
// ============================================================================

export function isRuleweaverError(error: unknown): error is RuleweaverError {
  return error instanceof RuleweaverError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

export function isIndexCorruptionError(error: unknown): error is IndexCorruptionError {
  return error instanceof IndexCorruptionError;
}

export function isBackendUnavailableError(error: unknown): error is BackendUnavailableError {
  return error instanceof BackendUnavailableError;
}

/** Message text of anything thrown. */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
