/**
 * Unit tests for withTimeout
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import { RequestCancelledError, TimeoutError } from "../../../src/errors/error-types.ts";
import { throwIfCancelled, withTimeout } from "../../../src/utils/timeout.ts";

/** Resolves after ms unless the signal aborts first */
function sleep(ms: number, value: string, signal: AbortSignal): Promise<string> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => resolve(value), ms);
    signal.addEventListener("abort", () => {
      clearTimeout(timer);
      reject(new Error("aborted"));
    }, { once: true });
  });
}

test("withTimeout - resolves when the operation finishes in time", async () => {
  const result = await withTimeout((signal) => sleep(5, "done", signal), 1000, "fast");
  assert.equal(result, "done");
});

test("withTimeout - rejects with TimeoutError and aborts the operation", async () => {
  let operationSignal: AbortSignal | undefined;

  await assert.rejects(
    withTimeout((signal) => {
      operationSignal = signal;
      return sleep(1000, "late", signal);
    }, 10, "slow"),
    (error: unknown) => {
      assert.ok(error instanceof TimeoutError);
      assert.equal(error.message, "Operation 'slow' timed out after 10ms");
      return true;
    },
  );
  assert.equal(operationSignal?.aborted, true);
});

test("withTimeout - propagates operation errors unchanged", async () => {
  const failure = new Error("operation failed");
  await assert.rejects(withTimeout(() => Promise.reject(failure), 1000, "failing"), failure);
});

test("withTimeout - parent abort rejects with RequestCancelledError", async () => {
  const parent = new AbortController();
  const pending = withTimeout((signal) => sleep(1000, "late", signal), 5000, "search", parent.signal);
  parent.abort();

  await assert.rejects(pending, RequestCancelledError);
});

test("withTimeout - already-aborted parent never starts the operation", async () => {
  const parent = new AbortController();
  parent.abort();
  let started = false;

  await assert.rejects(
    withTimeout(async () => {
      started = true;
      return "ran";
    }, 1000, "search", parent.signal),
    RequestCancelledError,
  );
  assert.equal(started, false);
});

test("throwIfCancelled - only throws for an aborted signal", () => {
  const controller = new AbortController();
  throwIfCancelled(undefined, "op");
  throwIfCancelled(controller.signal, "op");

  controller.abort();
  assert.throws(() => throwIfCancelled(controller.signal, "op"), RequestCancelledError);
});
