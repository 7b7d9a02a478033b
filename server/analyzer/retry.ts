import { setTimeout as sleep } from "node:timers/promises";

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  signal?: AbortSignal;
  /** Return false to give up on a result without further attempts. */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
}

export interface Deadline {
  signal: AbortSignal;
  abort: (reason?: unknown) => void;
  dispose: () => void;
}

function timeoutError(timeoutMs: number): Error {
  const error = new Error(`Request timed out after ${timeoutMs}ms`);
  error.name = "TimeoutError";
  return error;
}

/**
 * Derives a signal that aborts when the parent aborts, after `timeoutMs`, or
 * on an explicit `abort()`.
 * `dispose` must be called once the guarded request has settled.
 */
export function withDeadline(parent: AbortSignal | undefined, timeoutMs: number): Deadline {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(timeoutError(timeoutMs)), timeoutMs);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    abort: (reason) => controller.abort(reason),
    dispose: () => {
      clearTimeout(timeoutId);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return 2 ** attempt * baseDelayMs;
}

/**
 * Runs `operation` up to `attempts` times, waiting 2^i * baseDelayMs after
 * failed attempt i. The wait is interrupted by `signal`, in which case the
 * abort reason is thrown.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  { attempts, baseDelayMs, signal, shouldRetry }: RetryOptions
): Promise<T> {
  const total = Math.max(1, attempts);
  let lastError: unknown;

  for (let attempt = 0; attempt < total; attempt++) {
    signal?.throwIfAborted();

    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      if (signal?.aborted) throw error;
      if (shouldRetry && !shouldRetry(error, attempt)) throw error;
    }

    if (attempt < total - 1) {
      await sleep(backoffDelay(attempt, baseDelayMs), undefined, { signal });
    }
  }

  throw lastError;
}
