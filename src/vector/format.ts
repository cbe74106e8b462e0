/**
 * Result Formatting
 *
 * Pure renderers for tool output. Same input, same string.
 *
 * @module vector/format
 */

import { errorMessage } from "../errors/error-types.ts";
import type { ResolvedModality } from "../modalities/types.ts";
import type { SearchResult } from "./search.ts";

export const NO_RESULTS_MESSAGE = "No relevant information found in the knowledge base.";

/** Prefix that marks every failed tool response */
export const FAILURE_PREFIX = "Search failed: ";

export function formatResults(results: readonly SearchResult[]): string {
  if (results.length === 0) {
    return NO_RESULTS_MESSAGE;
  }

  return results
    .map((result, i) =>
      [
        `--- Result ${i + 1} | ${result.documentName} | ${result.documentId} ---`,
        `Chunk: ${result.chunkIndex} | Score: ${result.score.toFixed(4)}`,
        "--- Document Start ---",
        `Content: ${result.chunkContent}`,
        "--- Document End ---",
      ].join("\n")
    )
    .join("\n\n");
}

export function formatFailure(error: unknown): string {
  return `${FAILURE_PREFIX}${errorMessage(error)}`;
}

export function formatModalityList(modalities: readonly ResolvedModality[]): string {
  if (modalities.length === 0) {
    return "No search modalities are registered.";
  }
  return modalities
    .map((m) =>
      `search_${m.name}: ${m.task.description} (model: ${m.strategy.model}, task: ${m.task.name}, metric: ${m.metric})`
    )
    .join("\n");
}
