/**
 * Unit tests for tool output formatting
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import { InvalidArgumentError } from "../../../src/errors/error-types.ts";
import { ModalityRegistry } from "../../../src/modalities/registry.ts";
import {
  formatFailure,
  formatModalityList,
  formatResults,
  NO_RESULTS_MESSAGE,
} from "../../../src/vector/format.ts";
import type { SearchResult } from "../../../src/vector/search.ts";

const RESULTS: SearchResult[] = [
  {
    documentId: "00000000-0000-4000-8000-000000000001",
    documentName: "Recipe Book",
    chunkId: "10000000-0000-4000-8000-000000000001",
    chunkIndex: 0,
    chunkContent: "Boil the pasta for nine minutes.",
    score: 0.25,
    distance: 0.25,
  },
  {
    documentId: "00000000-0000-4000-8000-000000000002",
    documentName: "Garden Notes",
    chunkId: "10000000-0000-4000-8000-000000000002",
    chunkIndex: 3,
    chunkContent: "Basil likes sun.",
    score: 1.5,
    distance: 1.5,
  },
];

test("formatResults - one block per result, in order", () => {
  assert.equal(
    formatResults(RESULTS),
    [
      "--- Result 1 | Recipe Book | 00000000-0000-4000-8000-000000000001 ---",
      "Chunk: 0 | Score: 0.2500",
      "--- Document Start ---",
      "Content: Boil the pasta for nine minutes.",
      "--- Document End ---",
      "",
      "--- Result 2 | Garden Notes | 00000000-0000-4000-8000-000000000002 ---",
      "Chunk: 3 | Score: 1.5000",
      "--- Document Start ---",
      "Content: Basil likes sun.",
      "--- Document End ---",
    ].join("\n"),
  );
});

test("formatResults - empty result set", () => {
  assert.equal(formatResults([]), "No relevant information found in the knowledge base.");
  assert.equal(formatResults([]), NO_RESULTS_MESSAGE);
});

test("formatFailure - prefixes the error message", () => {
  assert.equal(
    formatFailure(new InvalidArgumentError("top_k must be a positive integer, got 0", "top_k")),
    "Search failed: top_k must be a positive integer, got 0",
  );
  assert.equal(formatFailure("plain failure"), "Search failed: plain failure");
});

test("formatModalityList - one line per modality", () => {
  const registry = ModalityRegistry.fromDefinitions([
    { name: "semantic", model: "nomic-embed-text:v1.5", description: "Search based on semantic similarity" },
    { name: "dot", model: "m", task: "notes", description: "Dot search", metric: "inner_product" },
  ]);

  assert.equal(
    formatModalityList(registry.list()),
    "search_semantic: Search based on semantic similarity (model: nomic-embed-text:v1.5, task: semantic, metric: cosine)\n" +
      "search_dot: Dot search (model: m, task: notes, metric: inner_product)",
  );
  assert.equal(formatModalityList([]), "No search modalities are registered.");
});
