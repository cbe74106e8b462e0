/**
 * Serve Command
 *
 * Runs the MCP server on stdio until the client disconnects or the
 * process is signalled.
 *
 * @module cli/commands/serve
 */

import { Command } from "commander";
import { getAllMigrations, MigrationRunner } from "../../db/migrations.ts";
import { KBDBServer } from "../../mcp/kbdb-server.ts";
import { getLogger } from "../../telemetry/logger.ts";
import { openRuntime, reportFailure } from "../utils.ts";

const logger = getLogger("cli");

/**
 * Usage:
 *   kbdb serve              # Serve search tools over stdio
 *   kbdb serve --migrate    # Apply pending migrations first
 */
export function createServeCommand(): Command {
  return new Command("serve")
    .description("Serve the search tools over MCP (stdio)")
    .option("--migrate", "Apply pending schema migrations before serving", false)
    .option("--env-file <path>", "Environment file to load")
    .action(async (options: { migrate: boolean; envFile?: string }) => {
      try {
        const runtime = await openRuntime(options.envFile);
        if (options.migrate) {
          await new MigrationRunner(runtime.db).runUp(getAllMigrations());
        }

        const server = new KBDBServer(runtime.engine, runtime.registry, runtime.db);
        let stopping = false;
        const shutdown = (signal: string) => {
          if (stopping) return;
          stopping = true;
          logger.info(`Received ${signal}`);
          server.stop().then(
            () => process.exit(0),
            (error: unknown) => {
              reportFailure(error);
              process.exit(1);
            },
          );
        };
        process.once("SIGINT", () => shutdown("SIGINT"));
        process.once("SIGTERM", () => shutdown("SIGTERM"));

        await server.start();
      } catch (error) {
        reportFailure(error);
      }
    });
}
