/**
 * Retry utility with exponential backoff.
 * Used for transient git failures during watcher sweeps.
 */

import { setTimeout as sleep } from 'timers/promises';
import { CancellationError, toError } from './errors.js';

export interface RetryOptions {
  /** Maximum number of attempts (default: 3) */
  maxAttempts?: number;
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 10000) */
  maxDelayMs?: number;
  /** Function to determine if error is retryable (default: all errors are retryable) */
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Aborting stops further attempts and interrupts the backoff sleep */
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
  shouldRetry: (): boolean => true,
};

/**
 * Compute the backoff before the next attempt: exponential with up to 30% jitter,
 * capped at maxDelayMs.
 */
export function computeBackoff(attempt: number, baseDelayMs: number, maxDelayMs: number, random = Math.random): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const jitter = random() * 0.3 * exponentialDelay;
  return Math.min(exponentialDelay + jitter, maxDelayMs);
}

/**
 * Execute a function with retry logic and exponential backoff.
 *
 * @throws The last error if all retries are exhausted, or CancellationError when aborted
 *
 * @example
 * ```typescript
 * await withRetry(() => git.fetch(branch, auth, dir), {
 *   shouldRetry: (err) => err instanceof GitError && err.retryable,
 *   onRetry: (attempt, err, delay) => logger.warn({ attempt, err, delay }, 'Retrying fetch'),
 * });
 * ```
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_OPTIONS.maxAttempts;
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_OPTIONS.baseDelayMs;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_OPTIONS.maxDelayMs;
  const shouldRetry = options.shouldRetry ?? DEFAULT_OPTIONS.shouldRetry;
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (options.signal?.aborted) {
      throw new CancellationError();
    }

    try {
      return await fn();
    } catch (error) {
      lastError = toError(error);

      if (attempt === maxAttempts || !shouldRetry(lastError)) {
        throw lastError;
      }

      const delayMs = computeBackoff(attempt, baseDelayMs, maxDelayMs);
      options.onRetry?.(attempt, lastError, delayMs);

      try {
        await sleep(delayMs, undefined, { signal: options.signal });
      } catch {
        throw new CancellationError();
      }
    }
  }

  throw lastError ?? new Error('Retry failed');
}
