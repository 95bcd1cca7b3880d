/**
 * @fileoverview Result type for explicit error handling
 *
 * Backend calls return a Result instead of throwing so that the
 * "AI-assisted, else heuristic" branch is an ordinary code path.
 */

// ============================================================================
// CORE RESULT TYPE
// ============================================================================

export type OkResult<T> = { readonly ok: true; readonly value: T };
export type ErrResult<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// ============================================================================
// RESULT HELPERS
// ============================================================================

/**
 * Wrap an async function in a Result
 */
export async function safeAsync<T>(
  fn: () => Promise<T>
): Promise<Result<T, Error>> {
  try {
    return Ok(await fn());
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)));
  }
}

// ============================================================================
// REASONING OUTCOME
// ============================================================================

/** Which path produced a response. Every public response carries one. */
export type ReasoningMode = 'ai' | 'fallback';

/**
 * Tagged outcome of a step that prefers the reasoning backend and degrades to
 * deterministic heuristics. `reason` explains why the fallback ran.
 */
export type ReasoningOutcome<T> =
  | { readonly mode: 'ai'; readonly value: T }
  | { readonly mode: 'fallback'; readonly value: T; readonly reason: string };

export function aiOutcome<T>(value: T): ReasoningOutcome<T> {
  return { mode: 'ai', value };
}

export function fallbackOutcome<T>(value: T, reason: string): ReasoningOutcome<T> {
  return { mode: 'fallback', value, reason };
}

/** Combine step modes: a response is AI-assisted only if every step was. */
export function combineModes(modes: readonly ReasoningMode[]): ReasoningMode {
  return modes.every((mode) => mode === 'ai') ? 'ai' : 'fallback';
}
