/**
 * Drizzle Schema Barrel Export
 *
 * Knowledge base tables.
 *
 * @module db/schema
 */

export * from "./documents.ts";
