/**
 * @fileoverview Async Utilities
 *
 * Timeout and cancellation helpers for calls into the reasoning backend.
 *
 * @packageDocumentation
 */

/**
 * Options for withTimeout function.
 */
export interface WithTimeoutOptions {
  /** Context string for error messages */
  context?: string;
  /** Rejects early with CancelledError when aborted */
  signal?: AbortSignal;
}

/**
 * Error thrown when a promise times out.
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context?: string) {
    const message = context
      ? `Timeout after ${timeoutMs}ms: ${context}`
      : `Operation timed out after ${timeoutMs}ms`;
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Error thrown when the caller abandons an operation.
 */
export class CancelledError extends Error {
  constructor(context?: string) {
    super(context ? `Cancelled: ${context}` : 'Operation cancelled');
    this.name = 'CancelledError';
  }
}

/**
 * Wrap a promise with a timeout.
 *
 * A non-positive or missing timeout disables the timer; the signal is
 * still honoured.
 *
 * @example
 * ```typescript
 * const reply = await withTimeout(backend.chat(options), 15000, { context: 'classify task' });
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs?: number,
  options?: WithTimeoutOptions
): Promise<T> {
  const signal = options?.signal;
  const hasTimer = Boolean(timeoutMs && Number.isFinite(timeoutMs) && timeoutMs > 0);
  if (!hasTimer && !signal) {
    return promise;
  }
  if (signal?.aborted) {
    throw new CancelledError(options?.context);
  }

  let timeoutId: ReturnType<typeof setTimeout> | null = null;
  let onAbort: (() => void) | null = null;

  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        if (hasTimer && timeoutMs) {
          timeoutId = setTimeout(() => {
            reject(new TimeoutError(timeoutMs, options?.context));
          }, timeoutMs);
        }
        if (signal) {
          onAbort = () => reject(new CancelledError(options?.context));
          signal.addEventListener('abort', onAbort, { once: true });
        }
      }),
    ]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
    if (signal && onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}
