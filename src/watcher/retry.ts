/**
 * Bounded retry with exponential backoff.
 *
 * Delays double from `baseDelayMs`: with a 5s base and 3 attempts the waits
 * are 5s then 10s. Only errors accepted by `isRetryable` are retried; once
 * the signal is aborted no further attempt is scheduled and the last error
 * is rethrown.
 */

import { setTimeout as delay } from 'node:timers/promises';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  isRetryable: (err: unknown) => boolean;
  sleep?: Sleep;
  signal?: AbortSignal;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/** Wait before retry number `retryIndex` (0-based) */
export function backoffDelay(baseDelayMs: number, retryIndex: number): number {
  return baseDelayMs * 2 ** retryIndex;
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  { maxAttempts, baseDelayMs, isRetryable, sleep = defaultSleep, signal, onRetry }: RetryOptions,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= maxAttempts || !isRetryable(err) || signal?.aborted) throw err;

      const delayMs = backoffDelay(baseDelayMs, attempt - 1);
      onRetry?.({ attempt, delayMs, error: err });
      try {
        await sleep(delayMs, signal);
      } catch {
        // Aborted while waiting: surface the failure that caused the wait
        throw err;
      }
      if (signal?.aborted) throw err;
    }
  }
}
