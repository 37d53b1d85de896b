/**
 * Timeout Utilities
 */

import { TimeoutError } from "./errors.ts";

/**
 * Default timeouts for different operation types (in milliseconds)
 */
export const TIMEOUT_DEFAULTS = {
  /** Health check round trips */
  health: 5000,
} as const;

/**
 * Race a promise against a timeout. The promise itself is not cancelled.
 *
 * @example
 * ```typescript
 * await withTimeout(ledger.ping(), TIMEOUT_DEFAULTS.health, "ledger ping");
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operationName: string = "Operation",
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(operationName, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Execute an abortable operation with a timeout. The signal handed to
 * `operation` fires when the timeout elapses, and the resulting abort is
 * reported as a TimeoutError.
 *
 * @example
 * ```typescript
 * const response = await withAbortableTimeout(
 *   (signal) => fetch(url, { signal }),
 *   config.timeoutMs,
 *   "DeepL translate"
 * );
 * ```
 */
export async function withAbortableTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operationName: string = "Operation",
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await operation(controller.signal);
  } catch (error) {
    if (controller.signal.aborted || (error instanceof Error && error.name === "AbortError")) {
      throw new TimeoutError(operationName, timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}
