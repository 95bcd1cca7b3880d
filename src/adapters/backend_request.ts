/**
 * @fileoverview Bounded calls into the reasoning backend
 *
 * Every failure (no backend, timeout, cancellation, non-zero exit, reply that
 * does not validate) comes back as an Err carrying a BackendUnavailableError,
 * so callers pick their fallback path without try/catch.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { BackendUnavailableError, type BackendFailureReason, getErrorMessage } from '../core/errors.js';
import { Err, Ok, safeAsync, type Result } from '../core/result.js';
import { CancelledError, TimeoutError, withTimeout } from '../utils/async.js';
import { parseModelOutput } from '../utils/output_validator.js';
import { logDebug } from '../telemetry/logger.js';
import type { LlmChatMessage, ReasoningBackend } from './llm_service.js';

export interface BackendRequest {
  messages: LlmChatMessage[];
  timeoutMs: number;
  /** Short label used in timeout messages and logs. */
  purpose: string;
  signal?: AbortSignal;
}

export type BackendResult<T> = Result<T, BackendUnavailableError>;

function classifyFailure(error: Error, signal: AbortSignal | undefined): BackendFailureReason {
  if (error instanceof TimeoutError) return 'timeout';
  if (error instanceof CancelledError || signal?.aborted) return 'cancelled';
  return 'execution_failed';
}

/**
 * Ask the backend for free text.
 */
export async function requestCompletion(
  backend: ReasoningBackend | null,
  request: BackendRequest,
): Promise<BackendResult<string>> {
  if (!backend) {
    return Err(new BackendUnavailableError('none', 'not_configured', 'no reasoning backend configured'));
  }
  if (request.signal?.aborted) {
    return Err(new BackendUnavailableError(backend.provider, 'cancelled', `${request.purpose} cancelled before start`));
  }

  // Owned controller so a timeout also stops the underlying call.
  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort();
  request.signal?.addEventListener('abort', forwardAbort, { once: true });

  try {
    const outcome = await safeAsync(() =>
      withTimeout(
        backend.chat({ messages: request.messages, modelId: backend.modelId, signal: controller.signal }),
        request.timeoutMs,
        { context: request.purpose, signal: request.signal },
      )
    );
    if (!outcome.ok) {
      controller.abort();
      const reason = classifyFailure(outcome.error, request.signal);
      logDebug('Backend request failed', { purpose: request.purpose, reason, error: outcome.error.message });
      return Err(new BackendUnavailableError(backend.provider, reason, getErrorMessage(outcome.error)));
    }
    return Ok(outcome.value.content);
  } finally {
    request.signal?.removeEventListener('abort', forwardAbort);
  }
}

/**
 * Ask the backend for JSON matching `schema`.
 */
export async function requestStructured<T>(
  backend: ReasoningBackend | null,
  request: BackendRequest,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<BackendResult<T>> {
  const completion = await requestCompletion(backend, request);
  if (!completion.ok) return completion;
  const parsed = parseModelOutput(completion.value, schema);
  if (!parsed.ok) {
    logDebug('Backend reply rejected', { purpose: request.purpose, error: parsed.error.message });
    return Err(new BackendUnavailableError(backend?.provider ?? 'none', 'invalid_response', parsed.error.message));
  }
  return Ok(parsed.value);
}
