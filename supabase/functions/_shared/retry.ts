/**
 * Retry with Exponential Backoff
 *
 * Drives an operation that reports failure as an `Err` value. Each failure
 * is classified by `shouldRetry`; a non-retryable failure ends the loop at
 * once, a retryable one waits out the backoff delay and tries again until
 * `maxAttempts` is reached.
 */

import { err, isOk, ok, type Result } from "./result.ts";

export interface RetryConfig<E> {
  /** Total attempts including the first (default: 5) */
  maxAttempts: number;
  /** Delay before the second attempt (default: 2000) */
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Jitter factor 0-1; 0 gives exact delays */
  jitterFactor: number;
  /** Whether a failure may be retried (default: always) */
  shouldRetry?: (error: E, attempt: number) => boolean;
  /** Called after a retryable failure, before waiting */
  onRetry?: (error: E, attempt: number, delayMs: number) => void;
  /** Injected wait; tests replace it to avoid real timers */
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface RetrySuccess<T> {
  value: T;
  attempts: number;
  waitedMs: number;
}

export interface RetryFailure<E> {
  error: E;
  attempts: number;
  waitedMs: number;
  /** False when the loop stopped on a non-retryable failure */
  exhausted: boolean;
}

export const DEFAULT_RETRY_CONFIG = {
  maxAttempts: 5,
  initialDelayMs: 2000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitterFactor: 0,
} as const;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before retry number `retry` (1 = the wait before the second attempt).
 */
export function calculateDelay(
  retry: number,
  config: Pick<RetryConfig<unknown>, "initialDelayMs" | "maxDelayMs" | "backoffMultiplier" | "jitterFactor">,
  random: () => number = Math.random,
): number {
  const exponentialDelay = config.initialDelayMs * Math.pow(config.backoffMultiplier, retry - 1);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  if (config.jitterFactor <= 0) {
    return Math.round(cappedDelay);
  }

  const jitterRange = cappedDelay * config.jitterFactor;
  const jitter = random() * jitterRange * 2 - jitterRange;
  return Math.max(0, Math.round(cappedDelay + jitter));
}

/**
 * Run `operation` until it returns `Ok`, a failure is not retryable, or
 * attempts run out.
 *
 * @example
 * ```typescript
 * const outcome = await retryResult(
 *   (attempt) => provider.translate(text, "en", "es"),
 *   { shouldRetry: (failure) => failure.kind === "transient" },
 * );
 * if (isErr(outcome)) {
 *   logger.warn("Gave up", { attempts: outcome.error.attempts });
 * }
 * ```
 */
export async function retryResult<T, E>(
  operation: (attempt: number) => Promise<Result<T, E>>,
  config?: Partial<RetryConfig<E>>,
): Promise<Result<RetrySuccess<T>, RetryFailure<E>>> {
  const effective: RetryConfig<E> = { ...DEFAULT_RETRY_CONFIG, ...config };
  const wait = effective.sleep ?? sleep;
  const maxAttempts = Math.max(1, effective.maxAttempts);
  let waitedMs = 0;

  for (let attempt = 1; ; attempt++) {
    const outcome = await operation(attempt);
    if (isOk(outcome)) {
      return ok({ value: outcome.value, attempts: attempt, waitedMs });
    }

    const retryable = effective.shouldRetry?.(outcome.error, attempt) ?? true;
    if (!retryable || attempt >= maxAttempts) {
      return err({ error: outcome.error, attempts: attempt, waitedMs, exhausted: retryable });
    }

    const delayMs = calculateDelay(attempt, effective, effective.random);
    effective.onRetry?.(outcome.error, attempt, delayMs);
    await wait(delayMs);
    waitedMs += delayMs;
  }
}
