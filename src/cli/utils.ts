/**
 * CLI Utilities
 *
 * Wires configuration into the runtime objects the commands share.
 *
 * @module cli/utils
 */

import { createClient } from "../db/client.ts";
import type { DbClient } from "../db/types.ts";
import { errorMessage, KBDBError } from "../errors/error-types.ts";
import { type AppConfig, loadConfig } from "../lib/config.ts";
import { loadModalityRegistry } from "../modalities/loader.ts";
import type { ModalityRegistry } from "../modalities/registry.ts";
import { getLogger, setupLogger } from "../telemetry/logger.ts";
import { OpenAIEmbeddingClient } from "../vector/embeddings.ts";
import { RetrievalEngine } from "../vector/search.ts";

const logger = getLogger("cli");

export interface Runtime {
  config: AppConfig;
  registry: ModalityRegistry;
  db: DbClient;
  engine: RetrievalEngine;
}

/**
 * Load configuration, configure logging and build the registry
 */
export async function loadBase(envFile?: string): Promise<{ config: AppConfig; registry: ModalityRegistry }> {
  const config = loadConfig(envFile);
  setupLogger({ level: config.logLevel });
  const registry = await loadModalityRegistry(config.modalitiesFile);
  return { config, registry };
}

/**
 * Connect to the database and assemble the retrieval engine
 */
export async function openRuntime(envFile?: string): Promise<Runtime> {
  const { config, registry } = await loadBase(envFile);

  const db = createClient(config.database, config.dbTimeoutMs);
  await db.connect();
  logger.info(`Database connected (${db.driver})`);

  const embeddingClient = new OpenAIEmbeddingClient({
    endpoint: config.embedding.endpoint,
    apiKey: config.embedding.apiKey,
    timeoutMs: config.embedding.timeoutMs,
  });

  const engine = new RetrievalEngine(registry, embeddingClient, db, {
    maxTopK: config.maxTopK,
    dbTimeoutMs: config.dbTimeoutMs,
  });

  return { config, registry, db, engine };
}

/**
 * Print a command failure and set a non-zero exit code
 */
export function reportFailure(error: unknown): void {
  const suggestion = error instanceof KBDBError && error.suggestion ? `\n  ${error.suggestion}` : "";
  console.error(`Error: ${errorMessage(error)}${suggestion}`);
  process.exitCode = 1;
}
