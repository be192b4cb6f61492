/**
 * Async Utility Functions
 *
 * Timeouts, cooperative cancellation and bounded concurrency.
 *
 * @module
 */

import { QueryCancelledError } from "../core/errors.js";

// =============================================================================
// Timeout
// =============================================================================

/**
 * Wraps a promise with a timeout.
 * Rejects with the error built by `onTimeout` if the promise doesn't settle in time.
 *
 * @param promise - The promise to wrap
 * @param ms - Timeout in milliseconds
 * @param onTimeout - Builds the rejection reason
 */
export async function timeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error = () => new Error("Operation timed out")
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(onTimeout()), ms);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

// =============================================================================
// Cancellation
// =============================================================================

/**
 * Stops waiting on `promise` once `signal` aborts.
 *
 * The underlying work is not interrupted; its eventual result is ignored.
 * Rejects with QueryCancelledError.
 */
export async function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    // Keep a late rejection from surfacing as unhandled
    promise.catch(() => undefined);
    throw new QueryCancelledError();
  }

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(new QueryCancelledError());
    signal.addEventListener("abort", onAbort, { once: true });
  });

  try {
    return await Promise.race([promise, aborted]);
  } finally {
    if (onAbort) signal.removeEventListener("abort", onAbort);
    promise.catch(() => undefined);
  }
}

/**
 * Throws QueryCancelledError if the signal has fired.
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new QueryCancelledError();
  }
}

// =============================================================================
// Concurrency Utilities
// =============================================================================

/**
 * Runs promises in parallel with a concurrency limit.
 * Results keep the order of `items`.
 *
 * @param items - Items to process
 * @param fn - Async function to apply to each item
 * @param concurrency - Maximum concurrent operations
 */
export async function mapConcurrent<T, U>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<U>,
  concurrency: number
): Promise<U[]> {
  const results: U[] = new Array<U>(items.length);
  let currentIndex = 0;

  async function worker(): Promise<void> {
    while (currentIndex < items.length) {
      const index = currentIndex++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await fn(item, index);
    }
  }

  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
