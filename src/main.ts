/**
 * KBDB - Multi-modality knowledge base retrieval
 *
 * Main entry point for the application.
 *
 * @module main
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { createMigrateCommand } from "./cli/commands/migrate.ts";
import { createModalitiesCommand } from "./cli/commands/modalities.ts";
import { createSearchCommand } from "./cli/commands/search.ts";
import { createServeCommand } from "./cli/commands/serve.ts";
import { createStatusCommand } from "./cli/commands/status.ts";
import { ServerDefaults } from "./mcp/server/constants.ts";

export function createProgram(): Command {
  return new Command()
    .name("kbdb")
    .version(ServerDefaults.version)
    .description("Search a chunked knowledge base by embedding modality")
    .addCommand(createServeCommand())
    .addCommand(createMigrateCommand())
    .addCommand(createSearchCommand())
    .addCommand(createModalitiesCommand())
    .addCommand(createStatusCommand());
}

/**
 * Main CLI application
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

// Run main if this is the entry point
if (isEntryPoint()) {
  main().catch((error: unknown) => {
    console.error("[kbdb] Fatal error:", error);
    process.exit(1);
  });
}
