/**
 * Status Command
 *
 * Shows row counts and, per modality, how many chunks carry an
 * embedding it can search.
 *
 * @module cli/commands/status
 */

import { Command } from "commander";
import { DocumentStore, type EmbeddingCount } from "../../db/store.ts";
import type { ModalityRegistry } from "../../modalities/registry.ts";
import { openRuntime, reportFailure } from "../utils.ts";

/**
 * Human-readable coverage report
 */
export function describeCoverage(registry: ModalityRegistry, counts: readonly EmbeddingCount[]): string[] {
  return registry.list().map((modality) => {
    const match = counts.find((c) => c.model === modality.strategy.model && c.task === modality.task.name);
    const count = match?.count ?? 0;
    const marker = count > 0 ? "✓" : "✗";
    return `${marker} ${modality.name}: ${count} embeddings (${modality.strategy.model} / ${modality.task.name}, ${modality.metric})`;
  });
}

export function createStatusCommand(): Command {
  return new Command("status")
    .description("Show knowledge base contents and per-modality coverage")
    .option("--env-file <path>", "Environment file to load")
    .action(async (options: { envFile?: string }) => {
      try {
        const { db, registry } = await openRuntime(options.envFile);
        try {
          const store = new DocumentStore(db);
          const totals = await store.countRows();
          console.log(`Documents: ${totals.documents}`);
          console.log(`Chunks: ${totals.chunks}`);
          console.log(`Embeddings: ${totals.embeddings}`);
          console.log("");
          for (const line of describeCoverage(registry, await store.countEmbeddings())) {
            console.log(line);
          }
        } finally {
          await db.close();
        }
      } catch (error) {
        reportFailure(error);
      }
    });
}
