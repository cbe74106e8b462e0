/**
 * Search Command
 *
 * One-off search from the terminal; prints exactly what the MCP tool
 * would return.
 *
 * @module cli/commands/search
 */

import { Command } from "commander";
import { handleSearch } from "../../mcp/handlers/search-handler.ts";
import { searchToolName } from "../../mcp/tools/definitions.ts";
import { DEFAULT_TOP_K } from "../../lib/config.ts";
import { openRuntime, reportFailure } from "../utils.ts";

/**
 * Usage:
 *   kbdb search semantic "how do I boil pasta" --top-k 5
 */
export function createSearchCommand(): Command {
  return new Command("search")
    .description("Search one modality and print the formatted results")
    .argument("<modality>", "Modality name (see 'kbdb modalities')")
    .argument("<query>", "Query text")
    .option("-k, --top-k <n>", "Number of chunks to return", String(DEFAULT_TOP_K))
    .option("--env-file <path>", "Environment file to load")
    .action(async (modality: string, query: string, options: { topK: string; envFile?: string }) => {
      try {
        const { engine, db } = await openRuntime(options.envFile);
        try {
          const response = await handleSearch(engine, searchToolName(modality), modality, {
            query,
            top_k: Number(options.topK),
          });
          console.log(response.text);
          if (response.isError) {
            process.exitCode = 1;
          }
        } finally {
          await db.close();
        }
      } catch (error) {
        reportFailure(error);
      }
    });
}
