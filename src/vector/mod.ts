/**
 * Vector Retrieval Module
 *
 * Query embedding, metric-specific nearest-neighbour search over
 * PostgreSQL/pgvector, and result formatting.
 *
 * @module vector
 */

// Embedding generation
export { applyStrategy, OpenAIEmbeddingClient } from "./embeddings.ts";
export type { EmbeddingClient, EmbedOptions, OpenAIEmbeddingClientOptions } from "./embeddings.ts";

// Distance metrics
export { distanceTo, METRICS, toScore, toVectorLiteral } from "./metrics.ts";

// Vector search
export { buildSearchQuery, RetrievalEngine } from "./search.ts";
export type { BuiltQuery, RetrievalEngineOptions, SearchOptions, SearchResult } from "./search.ts";

// Formatting
export {
  FAILURE_PREFIX,
  formatFailure,
  formatModalityList,
  formatResults,
  NO_RESULTS_MESSAGE,
} from "./format.ts";
