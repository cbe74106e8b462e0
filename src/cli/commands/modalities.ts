/**
 * Modalities Command
 *
 * @module cli/commands/modalities
 */

import { Command } from "commander";
import { formatModalityList } from "../../vector/format.ts";
import { loadBase, reportFailure } from "../utils.ts";

export function createModalitiesCommand(): Command {
  return new Command("modalities")
    .description("List the registered search modalities")
    .option("--env-file <path>", "Environment file to load")
    .action(async (options: { envFile?: string }) => {
      try {
        const { registry } = await loadBase(options.envFile);
        console.log(formatModalityList(registry.list()));
      } catch (error) {
        reportFailure(error);
      }
    });
}
