/**
 * Timeout Utility
 *
 * Bounds an async operation by a timeout and by the caller's abort signal.
 * The operation receives its own AbortSignal, which fires when the timeout
 * elapses or the caller cancels, so the underlying request (HTTP call,
 * database query) is abandoned instead of left running.
 *
 * @module utils/timeout
 */

import { RequestCancelledError, TimeoutError } from "../errors/error-types.ts";

/**
 * Execute operation with timeout
 *
 * @param operation - Starts the work; must honour the signal it is given
 * @param timeoutMs - Timeout in milliseconds
 * @param operationName - Human-readable name for error messages
 * @param parentSignal - Caller cancellation
 * @throws TimeoutError if the operation exceeds timeoutMs
 * @throws RequestCancelledError if parentSignal aborts first
 *
 * @example
 * ```typescript
 * const vector = await withTimeout(
 *   (signal) => client.embed(text, strategy, { signal }),
 *   30000,
 *   "embedding",
 * );
 * ```
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operationName: string,
  parentSignal?: AbortSignal,
): Promise<T> {
  if (parentSignal?.aborted) {
    throw new RequestCancelledError(operationName);
  }

  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const error = new TimeoutError(operationName, timeoutMs);
      // Settle first so the race reports this error, not the aborted operation's
      reject(error);
      controller.abort(error);
    }, timeoutMs);

    if (parentSignal) {
      onParentAbort = () => {
        const error = new RequestCancelledError(operationName);
        reject(error);
        controller.abort(error);
      };
      parentSignal.addEventListener("abort", onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([operation(controller.signal), guard]);
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
    if (parentSignal && onParentAbort) {
      parentSignal.removeEventListener("abort", onParentAbort);
    }
  }
}

/**
 * Throw RequestCancelledError if the signal has already fired
 */
export function throwIfCancelled(signal: AbortSignal | undefined, operationName: string): void {
  if (signal?.aborted) {
    throw new RequestCancelledError(operationName);
  }
}
