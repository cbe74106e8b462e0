/**
 * KBDB - Public API Exports
 *
 * Multi-modality retrieval over a pgvector knowledge base, exposed as
 * MCP search tools.
 *
 * Note: The CLI entry point (main) is not exported here.
 * Use `npx tsx src/main.ts serve` to run the server.
 *
 * @module mod
 */

// MCP server
export { KBDBServer } from "./src/mcp/kbdb-server.ts";
export { getTools, handleSearch, searchToolName } from "./src/mcp/mod.ts";
export type { MCPTool, MCPToolResponse, ServerConfig } from "./src/mcp/mod.ts";

// Retrieval
export {
  formatResults,
  NO_RESULTS_MESSAGE,
  OpenAIEmbeddingClient,
  RetrievalEngine,
} from "./src/vector/mod.ts";
export type {
  EmbeddingClient,
  RetrievalEngineOptions,
  SearchResult,
} from "./src/vector/mod.ts";

// Modalities
export { DEFAULT_MODALITIES, loadModalityRegistry, ModalityRegistry } from "./src/modalities/mod.ts";
export type { DistanceMetric, ModalityDefinition, ResolvedModality } from "./src/modalities/mod.ts";

// Database
export {
  createClient,
  DocumentStore,
  getAllMigrations,
  MigrationRunner,
  PGliteClient,
  PostgresClient,
} from "./src/db/mod.ts";
export type { DbClient, DbSession } from "./src/db/mod.ts";

// Configuration
export { DEFAULT_MAX_TOP_K, DEFAULT_TOP_K, loadConfig, parseConfig } from "./src/lib/config.ts";
export type { AppConfig, DatabaseConfig } from "./src/lib/config.ts";

// Logging
export { getLogger, setupLogger } from "./src/telemetry/mod.ts";

// Errors
export {
  ConfigurationError,
  DatabaseError,
  EmbeddingServiceError,
  InvalidArgumentError,
  KBDBError,
  RequestCancelledError,
  TimeoutError,
  UnknownModalityError,
} from "./src/errors/error-types.ts";
