import { defaultSleep, type Sleep } from "./types";

export interface PollOptions {
  timeoutMs: number;
  initialIntervalMs: number;
  /** Multiplier applied to the interval after each miss. Defaults to 1. */
  backoffFactor?: number;
  maxIntervalMs?: number;
  sleep?: Sleep;
}

export interface PollResult<T> {
  value: T | null;
  attempts: number;
  elapsedMs: number;
}

/**
 * Wait, then check, until the check yields a value or the timeout is spent.
 *
 * Elapsed time is the sum of the waits, and the final wait is clamped so the
 * last check lands exactly on the deadline. A check that throws ends the poll
 * with that error.
 */
export async function pollUntil<T>(
  check: (attempt: number) => Promise<T | null>,
  opts: PollOptions,
): Promise<PollResult<T>> {
  const sleep = opts.sleep ?? defaultSleep;
  const factor = opts.backoffFactor ?? 1;
  const maxInterval = opts.maxIntervalMs ?? Number.POSITIVE_INFINITY;

  let interval = Math.min(opts.initialIntervalMs, maxInterval);
  let elapsedMs = 0;
  let attempts = 0;

  if (interval <= 0) {
    throw new Error(`pollUntil interval must be positive, got ${interval}`);
  }

  while (elapsedMs < opts.timeoutMs) {
    const wait = Math.min(interval, opts.timeoutMs - elapsedMs);
    await sleep(wait);
    elapsedMs += wait;
    attempts++;

    const value = await check(attempts);
    if (value !== null) {
      return { value, attempts, elapsedMs };
    }

    interval = Math.min(interval * factor, maxInterval);
  }

  return { value: null, attempts, elapsedMs };
}
