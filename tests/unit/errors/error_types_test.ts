/**
 * Unit tests for custom error types
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import {
  ConfigurationError,
  DatabaseError,
  EmbeddingServiceError,
  errorMessage,
  InvalidArgumentError,
  KBDBError,
  RequestCancelledError,
  TimeoutError,
  UnknownModalityError,
} from "../../../src/errors/error-types.ts";

test("KBDBError - base error class", () => {
  const error = new KBDBError("Test error", "TEST_ERROR", true, "Try this fix");

  assert.equal(error.message, "Test error");
  assert.equal(error.code, "TEST_ERROR");
  assert.equal(error.recoverable, true);
  assert.equal(error.suggestion, "Try this fix");
  assert.equal(error.name, "KBDBError");
  assert.ok(error instanceof Error);
});

test("UnknownModalityError - lists available modalities", () => {
  const error = new UnknownModalityError("colour", ["qa", "semantic"]);

  assert.equal(error.message, "Unknown modality 'colour'");
  assert.equal(error.code, "UNKNOWN_MODALITY");
  assert.equal(error.recoverable, false);
  assert.equal(error.suggestion, "Use one of: qa, semantic");
  assert.ok(error instanceof KBDBError);
});

test("UnknownModalityError - empty registry", () => {
  const error = new UnknownModalityError("qa");
  assert.equal(error.suggestion, "No modalities are registered");
});

test("EmbeddingServiceError - recoverable with model context", () => {
  const cause = new Error("ECONNREFUSED");
  const error = new EmbeddingServiceError("Embedding service unreachable", "nomic", { cause });

  assert.equal(error.model, "nomic");
  assert.equal(error.code, "EMBEDDING_SERVICE_ERROR");
  assert.equal(error.recoverable, true);
  assert.equal(error.cause, cause);
});

test("DatabaseError - with operation context", () => {
  const error = new DatabaseError("Query failed", "search");

  assert.equal(error.operation, "search");
  assert.equal(error.code, "DATABASE_ERROR");
  assert.equal(error.recoverable, false);
});

test("InvalidArgumentError - names the argument", () => {
  const error = new InvalidArgumentError("top_k must be a positive integer, got 0", "top_k");

  assert.equal(error.argument, "top_k");
  assert.equal(error.code, "INVALID_ARGUMENT");
  assert.equal(error.suggestion, "Fix the 'top_k' argument");
});

test("ConfigurationError - with and without config key", () => {
  const withKey = new ConfigurationError("Missing endpoint", "RM_OPENAI_ENDPOINT");
  const withoutKey = new ConfigurationError("Bad config");

  assert.equal(withKey.configKey, "RM_OPENAI_ENDPOINT");
  assert.equal(withKey.suggestion, "Set a valid value for RM_OPENAI_ENDPOINT");
  assert.equal(withoutKey.configKey, undefined);
  assert.equal(withoutKey.code, "CONFIGURATION_ERROR");
});

test("TimeoutError - message includes operation and duration", () => {
  const error = new TimeoutError("embedding", 30000);

  assert.equal(error.message, "Operation 'embedding' timed out after 30000ms");
  assert.equal(error.timeoutMs, 30000);
  assert.equal(error.recoverable, true);
});

test("RequestCancelledError - code and message", () => {
  const error = new RequestCancelledError("search");

  assert.equal(error.message, "Operation 'search' was cancelled");
  assert.equal(error.code, "REQUEST_CANCELLED");
});

test("errorMessage - renders errors and other thrown values", () => {
  assert.equal(errorMessage(new Error("boom")), "boom");
  assert.equal(errorMessage("plain"), "plain");
  assert.equal(errorMessage(42), "42");
});
