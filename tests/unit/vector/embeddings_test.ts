/**
 * Unit tests for the OpenAI-compatible embedding client
 *
 * The HTTP layer is a fake fetch handed to the SDK.
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import type { ClientOptions } from "openai";
import { EmbeddingServiceError, RequestCancelledError } from "../../../src/errors/error-types.ts";
import { setupLogger } from "../../../src/telemetry/logger.ts";
import { applyStrategy, OpenAIEmbeddingClient } from "../../../src/vector/embeddings.ts";
import { axis } from "../../fixtures/vectors.ts";

setupLogger({ level: "silent" });

type Fetch = NonNullable<ClientOptions["fetch"]>;

interface Captured {
  url: string;
  body: Record<string, unknown>;
  authorization: string | null;
}

const STRATEGY = { model: "nomic-embed-text:v1.5", prefix: "clustering: ", suffix: " <end>" };

function jsonResponse(status: number, payload: unknown): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function embeddingPayload(vector: number[]) {
  return {
    object: "list",
    model: STRATEGY.model,
    data: [{ object: "embedding", index: 0, embedding: vector }],
    usage: { prompt_tokens: 3, total_tokens: 3 },
  };
}

function fakeService(respond: () => Response | Promise<Response>): { fetch: Fetch; captured: Captured[] } {
  const captured: Captured[] = [];
  const fetch: Fetch = async (input, init) => {
    captured.push({
      url: String(input),
      body: JSON.parse(String(init?.body)),
      authorization: new Headers(init?.headers).get("authorization"),
    });
    return await respond();
  };
  return { fetch, captured };
}

function client(fetch: Fetch, timeoutMs = 1000): OpenAIEmbeddingClient {
  return new OpenAIEmbeddingClient({
    endpoint: "http://embeddings.test/v1",
    apiKey: "test-secret",
    timeoutMs,
    fetch,
  });
}

async function expectServiceError(promise: Promise<unknown>): Promise<EmbeddingServiceError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof EmbeddingServiceError) return error;
    throw error;
  }
  assert.fail("expected EmbeddingServiceError");
}

test("applyStrategy - wraps text in prefix and suffix", () => {
  assert.equal(applyStrategy("pasta", STRATEGY), "clustering: pasta <end>");
  assert.equal(applyStrategy("pasta", { model: "m", prefix: "", suffix: "" }), "pasta");
});

test("OpenAIEmbeddingClient - sends the transformed text to /embeddings", async () => {
  const service = fakeService(() => jsonResponse(200, embeddingPayload(axis(4))));

  const vector = await client(service.fetch).embed("pasta", STRATEGY);

  assert.deepEqual(vector, axis(4));
  assert.equal(service.captured.length, 1);
  assert.equal(service.captured[0]?.url, "http://embeddings.test/v1/embeddings");
  assert.equal(service.captured[0]?.authorization, "Bearer test-secret");
  assert.deepEqual(service.captured[0]?.body, {
    model: "nomic-embed-text:v1.5",
    input: "clustering: pasta <end>",
    encoding_format: "float",
  });
});

test("OpenAIEmbeddingClient - HTTP failure is an EmbeddingServiceError, not retried", async () => {
  const service = fakeService(() => jsonResponse(500, { error: { message: "model crashed" } }));

  const error = await expectServiceError(client(service.fetch).embed("pasta", STRATEGY));

  assert.ok(error.message.startsWith("Embedding service returned HTTP 500: "));
  assert.equal(error.model, "nomic-embed-text:v1.5");
  assert.equal(service.captured.length, 1);
});

test("OpenAIEmbeddingClient - unreachable service", async () => {
  const service = fakeService(() => {
    throw new TypeError("fetch failed");
  });

  const error = await expectServiceError(client(service.fetch).embed("pasta", STRATEGY));

  assert.ok(error.message.startsWith("Embedding service unreachable: "));
});

test("OpenAIEmbeddingClient - wrong dimensionality is rejected", async () => {
  const service = fakeService(() => jsonResponse(200, embeddingPayload([0.1, 0.2, 0.3])));

  const error = await expectServiceError(client(service.fetch).embed("pasta", STRATEGY));

  assert.equal(
    error.message,
    "Embedding dimension mismatch for model 'nomic-embed-text:v1.5': expected 768, got 3",
  );
});

test("OpenAIEmbeddingClient - empty data is rejected", async () => {
  const service = fakeService(() =>
    jsonResponse(200, { object: "list", model: "m", data: [], usage: { prompt_tokens: 0, total_tokens: 0 } })
  );

  const error = await expectServiceError(client(service.fetch).embed("pasta", STRATEGY));

  assert.equal(error.message, "Embedding service returned no vector for model 'nomic-embed-text:v1.5'");
});

test("OpenAIEmbeddingClient - slow service times out", async () => {
  const hanging: Fetch = (_input, init) =>
    new Promise<Response>((_, reject) => {
      init?.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
    });

  const error = await expectServiceError(client(hanging, 20).embed("pasta", STRATEGY));

  assert.equal(error.message, "Embedding request timed out after 20ms");
});

test("OpenAIEmbeddingClient - caller cancellation passes through", async () => {
  const service = fakeService(() => jsonResponse(200, embeddingPayload(axis(0))));
  const controller = new AbortController();
  controller.abort();

  await assert.rejects(
    client(service.fetch).embed("pasta", STRATEGY, { signal: controller.signal }),
    RequestCancelledError,
  );
  assert.equal(service.captured.length, 0);
});
