/**
 * Modality Registry
 *
 * Maps a modality name to its embedding strategy, task tag and distance
 * metric. Built once at start-up and deep-frozen; concurrent request
 * handlers share it read-only.
 *
 * @module modalities/registry
 */

import { ConfigurationError, UnknownModalityError } from "../errors/error-types.ts";
import { DEFAULT_MODALITIES } from "./defaults.ts";
import {
  DISTANCE_METRICS,
  type DistanceMetric,
  type ModalityDefinition,
  type ResolvedModality,
} from "./types.ts";

/** Modality names become MCP tool names (`search_<name>`) */
const MODALITY_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

function isDistanceMetric(value: string): value is DistanceMetric {
  return DISTANCE_METRICS.some((metric) => metric === value);
}

function freezeEntry(definition: ModalityDefinition): ResolvedModality {
  const { name } = definition;

  if (!MODALITY_NAME_PATTERN.test(name)) {
    throw new ConfigurationError(
      `Invalid modality name '${name}': use lowercase letters, digits and underscores`,
      "modalities",
    );
  }
  if (definition.model.trim() === "") {
    throw new ConfigurationError(`Modality '${name}' has no embedding model`, "modalities");
  }
  const metric = definition.metric ?? "cosine";
  if (!isDistanceMetric(metric)) {
    throw new ConfigurationError(
      `Modality '${name}' uses unsupported metric '${metric}' (expected ${DISTANCE_METRICS.join(", ")})`,
      "modalities",
    );
  }

  return Object.freeze({
    name,
    strategy: Object.freeze({
      model: definition.model,
      prefix: definition.prefix ?? "",
      suffix: definition.suffix ?? "",
    }),
    task: Object.freeze({
      name: definition.task ?? name,
      description: definition.description,
    }),
    metric,
  });
}

export class ModalityRegistry {
  private readonly entries: ReadonlyMap<string, ResolvedModality>;

  private constructor(entries: Map<string, ResolvedModality>) {
    this.entries = entries;
    Object.freeze(this);
  }

  /**
   * Validate and freeze a list of definitions
   *
   * @throws ConfigurationError on an invalid or duplicate entry
   */
  static fromDefinitions(definitions: readonly ModalityDefinition[]): ModalityRegistry {
    const entries = new Map<string, ResolvedModality>();
    for (const definition of definitions) {
      if (entries.has(definition.name)) {
        throw new ConfigurationError(`Duplicate modality '${definition.name}'`, "modalities");
      }
      entries.set(definition.name, freezeEntry(definition));
    }
    return new ModalityRegistry(entries);
  }

  static withDefaults(): ModalityRegistry {
    return ModalityRegistry.fromDefinitions(DEFAULT_MODALITIES);
  }

  /**
   * @throws UnknownModalityError if the name is not registered
   */
  resolve(name: string): ResolvedModality {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new UnknownModalityError(name, this.names());
    }
    return entry;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** Entries in registration order */
  list(): ResolvedModality[] {
    return [...this.entries.values()];
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }
}
