/**
 * Modality File Loader
 *
 * Reads a registry override from YAML (JSON is valid YAML):
 *
 * ```yaml
 * modalities:
 *   - name: semantic
 *     model: nomic-embed-text:v1.5
 *     prefix: "clustering: "
 *     description: Search based on semantic similarity
 *     metric: cosine
 * ```
 *
 * @module modalities/loader
 */

import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "../errors/error-types.ts";
import { getLogger } from "../telemetry/logger.ts";
import { ModalityRegistry } from "./registry.ts";
import { DISTANCE_METRICS } from "./types.ts";

const logger = getLogger("modalities");

const modalityFileSchema = z.object({
  modalities: z
    .array(
      z.object({
        name: z.string(),
        model: z.string(),
        prefix: z.string().optional(),
        suffix: z.string().optional(),
        task: z.string().optional(),
        description: z.string(),
        metric: z.enum(DISTANCE_METRICS).optional(),
      }),
    )
    .min(1),
});

/**
 * Parse registry text (YAML or JSON)
 *
 * @throws ConfigurationError on malformed content
 */
export function parseModalityFile(content: string, source = "modalities file"): ModalityRegistry {
  let raw: unknown;
  try {
    raw = parse(content);
  } catch (error) {
    throw new ConfigurationError(`Cannot parse ${source}: ${errorMessage(error)}`, "RM_MODALITIES_FILE");
  }

  const result = modalityFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ConfigurationError(
      `Invalid ${source}${where}: ${issue?.message ?? "unknown error"}`,
      "RM_MODALITIES_FILE",
    );
  }

  return ModalityRegistry.fromDefinitions(result.data.modalities);
}

/**
 * Build the process registry: the file when one is configured, else the defaults
 */
export async function loadModalityRegistry(path?: string): Promise<ModalityRegistry> {
  if (!path) {
    return ModalityRegistry.withDefaults();
  }

  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read modalities file ${path}: ${errorMessage(error)}`, "RM_MODALITIES_FILE");
  }

  const registry = parseModalityFile(content, path);
  logger.info(`Loaded ${registry.size} modalities from ${path}`);
  return registry;
}
