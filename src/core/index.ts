/**
 * @fileoverview Core ruleweaver infrastructure
 *
 * Result and outcome types plus the error hierarchy used throughout.
 */

// Result types and helpers
export {
  type Result,
  type OkResult,
  type ErrResult,
  Ok,
  Err,
  safeAsync,
  type ReasoningMode,
  type ReasoningOutcome,
  aiOutcome,
  fallbackOutcome,
  combineModes,
} from './result.js';

// Errors
export {
  type ErrorJSON,
  type EntityKind,
  type BackendFailureReason,
  RuleweaverError,
  NotFoundError,
  InvalidClassificationError,
  BackendUnavailableError,
  IndexCorruptionError,
  EmbeddingError,
  RuleCatalogError,
  ValidationError,
  ConfigurationError,
  ParseError,
  isRuleweaverError,
  isNotFoundError,
  isIndexCorruptionError,
  isBackendUnavailableError,
  getErrorMessage,
} from './errors.js';
