import { setTimeout as delay } from "node:timers/promises";

export interface RetryOptions {
  attempts: number;
  delayMs: number;
  /** Called with the error of a failed attempt; returning false stops retrying and rethrows. */
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  /** Absolute deadline (epoch ms). No attempt starts after it. */
  deadline?: number;
  onRetry?: (err: unknown, attempt: number) => void;
  sleep?: (ms: number) => Promise<unknown>;
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(`Gave up after ${attempts} attempts`, { cause: lastError });
    this.name = "RetryExhaustedError";
  }
}

/**
 * Runs `fn` until it resolves, up to `attempts` times with a fixed delay between tries.
 * Errors rejected by `shouldRetry` propagate unchanged; running out of attempts (or
 * passing the deadline) raises RetryExhaustedError carrying the last error.
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  let lastError: unknown;
  let attempt = 0;
  while (attempt < options.attempts) {
    attempt += 1;
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (options.shouldRetry && !options.shouldRetry(err, attempt)) {
        throw err;
      }
    }
    if (attempt >= options.attempts) break;
    if (options.deadline !== undefined && Date.now() + options.delayMs > options.deadline) break;
    options.onRetry?.(lastError, attempt);
    await sleep(options.delayMs);
  }
  throw new RetryExhaustedError(attempt, lastError);
}
