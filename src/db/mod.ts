/**
 * Database Module
 *
 * Provides database clients, migration management and the document store.
 *
 * @module db
 */

// Database clients
export { asDbParams, createClient, PGliteClient, PostgresClient } from "./client.ts";
export type { PostgresClientOptions } from "./client.ts";
export type { DbClient, DbParam, DbSession, QueryOptions, Row } from "./types.ts";

// Migrations
export { createInitialMigration, getAllMigrations, MigrationRunner } from "./migrations.ts";
export type { AppliedMigration, Migration } from "./migrations.ts";

// Store and schema
export { DocumentStore } from "./store.ts";
export type { EmbeddingCount, RowTotals } from "./store.ts";
export * from "./schema/mod.ts";
