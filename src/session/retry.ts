import { setTimeout as timerSleep } from 'node:timers/promises';

/** Abortable delay; rejects with an AbortError when the signal fires. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (ms, signal) => {
  await timerSleep(ms, undefined, { signal });
};

export interface RetryOptions {
  attempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  signal?: AbortSignal;
  sleep?: Sleep;
  /** Called after each failed attempt that will be retried. */
  onRetry?: (attempt: number, err: unknown, delayMs: number) => void;
}

/**
 * Call `fn` until it resolves, doubling the delay between attempts up to
 * `maxDelayMs`. Rejects with the last error once attempts run out, or with
 * an AbortError when the signal fires during a wait.
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  let delay = options.initialDelayMs;
  let lastError: unknown = new Error('retry: no attempts made');

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    options.signal?.throwIfAborted();
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt === options.attempts) break;
      options.onRetry?.(attempt, err, delay);
      await wait(delay, options.signal);
      delay = Math.min(delay * 2, options.maxDelayMs);
    }
  }
  throw lastError;
}
