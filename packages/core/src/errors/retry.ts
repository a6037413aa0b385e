// ============================================
// Tierlink Retry Utilities
// ============================================

import { ErrorCode, isRetryableError, TierlinkError } from "./types.js";

/**
 * Error thrown when an operation is aborted via AbortSignal.
 */
export class AbortError extends TierlinkError {
  constructor(message = "Operation aborted") {
    super(message, ErrorCode.OPERATION_ABORTED, { isRetryable: false });
    this.name = "AbortError";
  }
}

/**
 * Options for the withRetry function.
 */
export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in milliseconds before first retry (default: 1000) */
  baseDelay?: number;
  /** Maximum delay in milliseconds between retries (default: 30000) */
  maxDelay?: number;
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier?: number;
  /** Custom function to determine if error should be retried */
  shouldRetry?: (error: unknown) => boolean;
  /** Callback called before each retry attempt */
  onRetry?: (error: unknown, attempt: number, delay: number) => void | Promise<void>;
  /** AbortSignal to cancel retry attempts */
  signal?: AbortSignal;
}

type BackoffOptions = Required<Pick<RetryOptions, "maxRetries" | "baseDelay" | "maxDelay" | "backoffMultiplier">>;

const DEFAULT_RETRY_OPTIONS: BackoffOptions = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
};

/**
 * Sleeps for the specified duration with abort signal support.
 *
 * @throws AbortError if the signal is aborted before or during the sleep
 */
export async function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw new AbortError();
  }

  return new Promise((resolve, reject) => {
    let abortHandler: (() => void) | undefined;

    const timeoutId = setTimeout(() => {
      if (signal && abortHandler) {
        signal.removeEventListener("abort", abortHandler);
      }
      resolve();
    }, ms);

    if (signal) {
      abortHandler = (): void => {
        clearTimeout(timeoutId);
        reject(new AbortError());
      };
      signal.addEventListener("abort", abortHandler, { once: true });
    }
  });
}

/**
 * Exponential backoff: baseDelay * backoffMultiplier^(attempt-1), capped at maxDelay.
 */
function calculateDelay(attempt: number, options: BackoffOptions): number {
  const exponentialDelay = options.baseDelay * options.backoffMultiplier ** (attempt - 1);
  return Math.min(exponentialDelay, options.maxDelay);
}

/**
 * Wraps an async function with retry logic using exponential backoff.
 *
 * @example
 * ```typescript
 * const tree = await withRetry(() => applyPlan(plan), {
 *   maxRetries: 1,
 *   shouldRetry: (err) => err instanceof BackendApplyError,
 *   onRetry: () => teardown(),
 * });
 * ```
 *
 * @throws The last error if all retries are exhausted
 * @throws AbortError if the signal is aborted
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const opts: BackoffOptions = {
    maxRetries: options?.maxRetries ?? DEFAULT_RETRY_OPTIONS.maxRetries,
    baseDelay: options?.baseDelay ?? DEFAULT_RETRY_OPTIONS.baseDelay,
    maxDelay: options?.maxDelay ?? DEFAULT_RETRY_OPTIONS.maxDelay,
    backoffMultiplier: options?.backoffMultiplier ?? DEFAULT_RETRY_OPTIONS.backoffMultiplier,
  };
  const shouldRetryFn = options?.shouldRetry ?? isRetryableError;
  const signal = options?.signal;

  let attempt = 0;

  while (true) {
    if (signal?.aborted) {
      throw new AbortError();
    }

    try {
      return await fn();
    } catch (error) {
      attempt++;

      if (attempt > opts.maxRetries || !shouldRetryFn(error)) {
        throw error;
      }

      const delay = calculateDelay(attempt, opts);
      await options?.onRetry?.(error, attempt, delay);
      await abortableSleep(delay, signal);
    }
  }
}
