import type { Result } from "../types/contracts.js";

export interface RetryOptions<E> {
  maxAttempts: number;
  /** Delay before the attempt following `attempt` (1-based). */
  backoffMs: (attempt: number) => number;
  isRetryable: (error: E) => boolean;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: { attempt: number; error: E; delayMs: number }) => void;
}

export type RetryOutcome<T, E> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: E; attempts: number };

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export function linearBackoff(baseMs: number): (attempt: number) => number {
  return (attempt) => attempt * baseMs;
}

/**
 * Runs `attempt` until it succeeds, fails with a non-retryable error, or
 * `maxAttempts` is reached. Attempts are sequential; thrown exceptions are not
 * caught and end the loop immediately.
 */
export async function retryWithBackoff<T, E>(
  attempt: (n: number) => Promise<Result<T, E>>,
  opts: RetryOptions<E>
): Promise<RetryOutcome<T, E>> {
  if (!Number.isInteger(opts.maxAttempts) || opts.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${opts.maxAttempts}`);
  }
  const wait = opts.sleep ?? sleep;

  for (let n = 1; ; n++) {
    const res = await attempt(n);
    if (res.ok) return { ok: true, value: res.value, attempts: n };

    if (n >= opts.maxAttempts || !opts.isRetryable(res.error)) {
      return { ok: false, error: res.error, attempts: n };
    }

    const delayMs = Math.max(0, opts.backoffMs(n));
    opts.onRetry?.({ attempt: n, error: res.error, delayMs });
    if (delayMs > 0) await wait(delayMs);
  }
}
