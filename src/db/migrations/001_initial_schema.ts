/**
 * Migration 001: Knowledge Base Schema
 *
 * Creates documents, document_chunks and embeddings with cascading
 * foreign keys, plus one HNSW index per distance metric so cosine,
 * inner-product and L2 searches can all use an index.
 *
 * @module db/migrations/001_initial_schema
 */

import type { Migration } from "../migrations.ts";
import type { DbSession } from "../types.ts";
import { EMBEDDING_DIMENSIONS } from "../schema/documents.ts";
import { getLogger } from "../../telemetry/logger.ts";

const logger = getLogger("migrations");

export function createInitialMigration(): Migration {
  return {
    version: 1,
    name: "initial_schema",
    up: async (db: DbSession) => {
      logger.info("Migration 001: creating knowledge base tables...");

      await db.exec("CREATE EXTENSION IF NOT EXISTS vector");

      await db.exec(`
        CREATE TABLE IF NOT EXISTS documents (
          id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
          name TEXT NOT NULL,
          content TEXT NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_documents_name ON documents(name);
      `);

      await db.exec(`
        CREATE TABLE IF NOT EXISTS document_chunks (
          id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
          document_id UUID NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
          "index" INTEGER NOT NULL,
          content TEXT NOT NULL,
          CONSTRAINT document_chunks_document_id_index_key UNIQUE (document_id, "index")
        );
      `);

      await db.exec(`
        CREATE TABLE IF NOT EXISTS embeddings (
          chunk_id UUID NOT NULL REFERENCES document_chunks(id) ON DELETE CASCADE,
          model TEXT NOT NULL,
          task TEXT NOT NULL,
          embedding vector(${EMBEDDING_DIMENSIONS}) NOT NULL,
          CONSTRAINT embeddings_pkey PRIMARY KEY (chunk_id, model, task)
        );
        CREATE INDEX IF NOT EXISTS idx_embeddings_model_task ON embeddings(model, task);
      `);
      logger.info("  ✓ Created documents, document_chunks, embeddings");

      await db.exec(`
        CREATE INDEX IF NOT EXISTS idx_embeddings_hnsw_cosine
          ON embeddings USING hnsw (embedding vector_cosine_ops);
        CREATE INDEX IF NOT EXISTS idx_embeddings_hnsw_ip
          ON embeddings USING hnsw (embedding vector_ip_ops);
        CREATE INDEX IF NOT EXISTS idx_embeddings_hnsw_l2
          ON embeddings USING hnsw (embedding vector_l2_ops);
      `);
      logger.info("  ✓ Created HNSW indexes (cosine, inner product, l2)");
    },
    down: async (db: DbSession) => {
      await db.exec(`
        DROP TABLE IF EXISTS embeddings;
        DROP TABLE IF EXISTS document_chunks;
        DROP TABLE IF EXISTS documents;
      `);
      logger.info("Migration 001 rolled back");
    },
  };
}
