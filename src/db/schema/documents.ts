/**
 * Knowledge Base Tables
 *
 * documents 1:N document_chunks 1:N embeddings, cascading on delete.
 * Rows are written by the out-of-process ingestion pipeline; the
 * retrieval core only reads them.
 *
 * Kept in step with migration 001 (src/db/migrations/001_initial_schema.ts).
 *
 * @module db/schema/documents
 */

import {
  index,
  integer,
  pgTable,
  primaryKey,
  text,
  unique,
  uuid,
  vector,
} from "drizzle-orm/pg-core";

/** Dimensionality of every stored and query vector */
export const EMBEDDING_DIMENSIONS = 768;

export const documents = pgTable(
  "documents",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    name: text("name").notNull(),
    content: text("content").notNull(),
  },
  (table) => [index("idx_documents_name").on(table.name)],
);

export const documentChunks = pgTable(
  "document_chunks",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    documentId: uuid("document_id")
      .notNull()
      .references(() => documents.id, { onDelete: "cascade" }),
    index: integer("index").notNull(),
    content: text("content").notNull(),
  },
  (table) => [unique("document_chunks_document_id_index_key").on(table.documentId, table.index)],
);

export const embeddings = pgTable(
  "embeddings",
  {
    chunkId: uuid("chunk_id")
      .notNull()
      .references(() => documentChunks.id, { onDelete: "cascade" }),
    model: text("model").notNull(),
    task: text("task").notNull(),
    embedding: vector("embedding", { dimensions: EMBEDDING_DIMENSIONS }).notNull(),
  },
  (table) => [
    primaryKey({ name: "embeddings_pkey", columns: [table.chunkId, table.model, table.task] }),
    index("idx_embeddings_model_task").on(table.model, table.task),
    // One ANN index per supported metric
    index("idx_embeddings_hnsw_cosine").using("hnsw", table.embedding.op("vector_cosine_ops")),
    index("idx_embeddings_hnsw_ip").using("hnsw", table.embedding.op("vector_ip_ops")),
    index("idx_embeddings_hnsw_l2").using("hnsw", table.embedding.op("vector_l2_ops")),
  ],
);

export type Document = typeof documents.$inferSelect;
export type NewDocument = typeof documents.$inferInsert;
export type DocumentChunk = typeof documentChunks.$inferSelect;
export type NewDocumentChunk = typeof documentChunks.$inferInsert;
export type Embedding = typeof embeddings.$inferSelect;
export type NewEmbedding = typeof embeddings.$inferInsert;
