/**
 * Modality Types
 *
 * @module modalities/types
 */

/**
 * Closed set of supported distance metrics (pgvector operators)
 */
export const DISTANCE_METRICS = ["cosine", "inner_product", "l2"] as const;

export type DistanceMetric = (typeof DISTANCE_METRICS)[number];

/**
 * How query text is turned into a vector: model plus the text transform
 * applied before embedding
 */
export interface EmbeddingStrategy {
  model: string;
  prefix: string;
  suffix: string;
}

/**
 * The task tag stored alongside each embedding row
 */
export interface TaskDefinition {
  name: string;
  description: string;
}

/**
 * Registry input, as written in configuration
 */
export interface ModalityDefinition {
  name: string;
  model: string;
  prefix?: string;
  suffix?: string;
  /** Defaults to the modality name */
  task?: string;
  description: string;
  metric?: DistanceMetric;
}

/**
 * Immutable registry entry
 */
export interface ResolvedModality {
  readonly name: string;
  readonly strategy: Readonly<EmbeddingStrategy>;
  readonly task: Readonly<TaskDefinition>;
  readonly metric: DistanceMetric;
}
