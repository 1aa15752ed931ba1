/**
 * Fixed-count, fixed-delay retry loop.
 */

import type { RetryPolicy } from "./types.js";

/**
 * Sleep function, injectable so tests don't wait for real delays.
 */
export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Result of a retried operation. Individual attempt errors are not kept.
 */
export type RetryResult<T> =
  | { readonly ok: true; readonly value: T; readonly attempts: number }
  | { readonly ok: false; readonly attempts: number };

export interface RetryOptions {
  readonly sleep?: Sleep;
  /** Called after each failed attempt, before sleeping */
  readonly onAttemptFailed?: (attempt: number, error: unknown) => void;
}

/**
 * Run `operation` up to `policy.count` times.
 *
 * Sleeps `policy.delayMs` after every failed attempt, including the last one.
 * A count of zero makes no attempt.
 */
export async function retryFixed<T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; attempt <= policy.count; attempt++) {
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      options.onAttemptFailed?.(attempt, error);
      await sleep(policy.delayMs);
    }
  }

  return { ok: false, attempts: Math.max(policy.count, 0) };
}
