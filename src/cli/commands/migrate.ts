/**
 * Migrate Command
 *
 * @module cli/commands/migrate
 */

import { Command } from "commander";
import { getAllMigrations, MigrationRunner } from "../../db/migrations.ts";
import { openRuntime, reportFailure } from "../utils.ts";

/**
 * Usage:
 *   kbdb migrate               # Apply pending migrations
 *   kbdb migrate --down 0      # Roll back to (excluding) version 0
 */
export function createMigrateCommand(): Command {
  return new Command("migrate")
    .description("Create or update the knowledge base schema")
    .option("--down <version>", "Roll back migrations newer than this version")
    .option("--env-file <path>", "Environment file to load")
    .action(async (options: { down?: string; envFile?: string }) => {
      try {
        const { db } = await openRuntime(options.envFile);
        try {
          const runner = new MigrationRunner(db);
          if (options.down !== undefined) {
            const target = Number(options.down);
            if (!Number.isInteger(target) || target < 0) {
              throw new Error(`--down expects a non-negative integer, got '${options.down}'`);
            }
            const reverted = await runner.runDown(getAllMigrations(), target);
            console.log(`✓ Rolled back ${reverted} migration(s)`);
          } else {
            const applied = await runner.runUp(getAllMigrations());
            console.log(applied > 0 ? `✓ Applied ${applied} migration(s)` : "✓ Schema up to date");
          }
        } finally {
          await db.close();
        }
      } catch (error) {
        reportFailure(error);
      }
    });
}
