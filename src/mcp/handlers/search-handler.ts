/**
 * Search Handler
 *
 * The single translation point between the retrieval core and the
 * agent: every failure becomes a logged diagnostic plus a
 * "Search failed: ..." string, never a protocol error.
 *
 * @module mcp/handlers/search-handler
 */

import { z } from "zod";
import { errorMessage, InvalidArgumentError, KBDBError } from "../../errors/error-types.ts";
import { DEFAULT_TOP_K } from "../../lib/config.ts";
import { getLogger } from "../../telemetry/logger.ts";
import { formatFailure, formatResults } from "../../vector/format.ts";
import type { RetrievalEngine } from "../../vector/search.ts";
import type { MCPToolResponse } from "../types.ts";

const logger = getLogger("mcp");

const searchArgsSchema = z.object({
  query: z.string({ required_error: "query is required" }),
  top_k: z.number().optional(),
});

export type SearchToolArgs = z.infer<typeof searchArgsSchema>;

/**
 * Validate raw tool arguments
 *
 * @throws InvalidArgumentError naming the first bad field
 */
export function parseSearchArgs(args: unknown): SearchToolArgs {
  const parsed = searchArgsSchema.safeParse(args ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join(".") : "arguments";
    throw new InvalidArgumentError(`Invalid ${field}: ${issue?.message ?? "invalid arguments"}`, field);
  }
  return parsed.data;
}

export function failure(toolName: string, error: unknown): MCPToolResponse {
  logger.error(`${toolName} failed: ${errorMessage(error)}`, {
    code: error instanceof KBDBError ? error.code : "UNEXPECTED",
  });
  return { text: formatFailure(error), isError: true };
}

/**
 * Run one search_<modality> call
 */
export async function handleSearch(
  engine: RetrievalEngine,
  toolName: string,
  modality: string,
  args: unknown,
  signal?: AbortSignal,
): Promise<MCPToolResponse> {
  try {
    const { query, top_k } = parseSearchArgs(args);
    logger.debug(`${toolName} query: ${query}`, { topK: top_k ?? DEFAULT_TOP_K });

    const results = await engine.search(modality, query, top_k ?? DEFAULT_TOP_K, { signal });
    return { text: formatResults(results), isError: false };
  } catch (error) {
    return failure(toolName, error);
  }
}
