/**
 * Modalities Module
 *
 * @module modalities
 */

export { ModalityRegistry } from "./registry.ts";
export { loadModalityRegistry, parseModalityFile } from "./loader.ts";
export { DEFAULT_MODALITIES } from "./defaults.ts";
export { DISTANCE_METRICS } from "./types.ts";
export type {
  DistanceMetric,
  EmbeddingStrategy,
  ModalityDefinition,
  ResolvedModality,
  TaskDefinition,
} from "./types.ts";
