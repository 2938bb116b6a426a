import { RateLimitedError, isTransientError } from '../errors.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`, or as soon as `signal` aborts. */
export const sleep: SleepFn = (ms, signal) =>
  new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });

/**
 * Delay before retry number `attempt` (1 = first retry): exponential from
 * `baseDelayMs`, capped at `maxDelayMs`, never shorter than a server's
 * Retry-After.
 */
export function backoffDelay(attempt: number, policy: RetryPolicy, error?: unknown): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  if (error instanceof RateLimitedError && error.retryAfterMs !== undefined) {
    return Math.max(exponential, error.retryAfterMs);
  }
  return exponential;
}

export interface RetryOptions {
  signal?: AbortSignal;
  sleep?: SleepFn;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

/**
 * Runs `fn` until it succeeds, fails with a non-transient error, or
 * `maxAttempts` calls have failed. No retry starts once `signal` aborts.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, policy: RetryPolicy, options: RetryOptions = {}): Promise<T> {
  const wait = options.sleep ?? sleep;
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!isTransientError(error) || attempt >= policy.maxAttempts || options.signal?.aborted) {
        throw error;
      }
      const delay = backoffDelay(attempt, policy, error);
      options.onRetry?.(attempt, delay, error);
      await wait(delay, options.signal);
    }
  }
}
