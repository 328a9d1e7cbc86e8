/**
 * Bounded retry with exponential backoff, and abort-aware waiting.
 *
 * Every remote call in the run goes through here so no loop can retry
 * without a cap or outlive the run's wall-clock budget.
 */

import { TimeoutError } from '../errors/index.js';

export interface BackoffPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryOptions {
  signal?: AbortSignal;
  /** Decide whether a failure is worth another attempt (default: always) */
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Delay before retry number `attempt` (1-based): base * 2^(attempt-1), capped
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const delay = Math.pow(2, Math.max(0, attempt - 1)) * baseDelayMs;
  return Math.min(delay, maxDelayMs);
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new TimeoutError('Operation aborted');
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}

/**
 * Sleep for a given number of milliseconds, rejecting early on abort
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new TimeoutError('Operation aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Race a promise against an abort signal. The underlying work is not
 * cancelled, only abandoned.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(abortReason(signal));

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Run `fn` until it succeeds, the failure is not retryable, or the attempt
 * budget is spent. The last error is rethrown.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  policy: BackoffPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const wait = options.sleep ?? sleep;
  let attempt = 1;

  for (;;) {
    throwIfAborted(options.signal);

    try {
      return await abortable(fn(attempt), options.signal);
    } catch (error) {
      if (options.signal?.aborted) throw error;

      const retryable = options.isRetryable ? options.isRetryable(error) : true;
      const hasRetriesLeft = attempt < policy.maxAttempts;
      if (!retryable || !hasRetriesLeft) throw error;

      const delay = backoffDelay(attempt, policy.baseDelayMs, policy.maxDelayMs);
      options.onRetry?.(error, attempt, delay);
      await wait(delay, options.signal);
      attempt++;
    }
  }
}
