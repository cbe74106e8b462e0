/**
 * Document Store
 *
 * Row-level access to documents, chunks and embeddings. The retrieval
 * path only reads (see vector/search.ts); the writers here exist for
 * in-process loaders, fixtures and maintenance commands.
 *
 * @module db/store
 */

import { z } from "zod";
import { DatabaseError, InvalidArgumentError } from "../errors/error-types.ts";
import { toVectorLiteral } from "../vector/metrics.ts";
import { EMBEDDING_DIMENSIONS } from "./schema/documents.ts";
import type { Document, DocumentChunk } from "./schema/documents.ts";
import type { DbSession, Row } from "./types.ts";

const documentRow = z.object({
  id: z.string(),
  name: z.string(),
  content: z.string(),
});

const chunkRow = z.object({
  id: z.string(),
  document_id: z.string(),
  index: z.number().int(),
  content: z.string(),
});

const countRow = z.object({
  model: z.string(),
  task: z.string(),
  count: z.number().int(),
});

const totalsRow = z.object({
  documents: z.number().int(),
  chunks: z.number().int(),
  embeddings: z.number().int(),
});

export interface EmbeddingCount {
  model: string;
  task: string;
  count: number;
}

export interface RowTotals {
  documents: number;
  chunks: number;
  embeddings: number;
}

function parseRow<T>(schema: z.ZodType<T>, row: Row | null | undefined, operation: string): T {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    throw new DatabaseError(`Unexpected row shape from ${operation}: ${parsed.error.message}`, operation);
  }
  return parsed.data;
}

export class DocumentStore {
  constructor(private readonly db: DbSession) {}

  async insertDocument(name: string, content: string): Promise<Document> {
    const row = await this.db.queryOne(
      "INSERT INTO documents (name, content) VALUES ($1, $2) RETURNING id, name, content",
      [name, content],
    );
    return parseRow(documentRow, row, "insertDocument");
  }

  /**
   * @throws DatabaseError when (documentId, index) already exists or the document is missing
   */
  async insertChunk(documentId: string, index: number, content: string): Promise<DocumentChunk> {
    if (!Number.isInteger(index) || index < 0) {
      throw new InvalidArgumentError(`Chunk index must be a non-negative integer, got ${index}`, "index");
    }
    const row = await this.db.queryOne(
      `INSERT INTO document_chunks (document_id, "index", content)
       VALUES ($1, $2, $3)
       RETURNING id, document_id, "index", content`,
      [documentId, index, content],
    );
    const chunk = parseRow(chunkRow, row, "insertChunk");
    return { id: chunk.id, documentId: chunk.document_id, index: chunk.index, content: chunk.content };
  }

  /**
   * Insert or replace the (chunk, model, task) embedding
   *
   * @throws InvalidArgumentError when the vector is not EMBEDDING_DIMENSIONS long
   */
  async upsertEmbedding(chunkId: string, model: string, task: string, vector: readonly number[]): Promise<void> {
    if (vector.length !== EMBEDDING_DIMENSIONS) {
      throw new InvalidArgumentError(
        `Embedding must have ${EMBEDDING_DIMENSIONS} dimensions, got ${vector.length}`,
        "vector",
      );
    }
    await this.db.query(
      `INSERT INTO embeddings (chunk_id, model, task, embedding)
       VALUES ($1, $2, $3, $4::vector)
       ON CONFLICT (chunk_id, model, task) DO UPDATE SET embedding = EXCLUDED.embedding`,
      [chunkId, model, task, toVectorLiteral(vector)],
    );
  }

  async findDocumentsByName(name: string): Promise<Document[]> {
    const rows = await this.db.query(
      "SELECT id, name, content FROM documents WHERE name = $1 ORDER BY id",
      [name],
    );
    return rows.map((row) => parseRow(documentRow, row, "findDocumentsByName"));
  }

  /**
   * Delete a document; its chunks and their embeddings go with it
   *
   * @returns false when no such document existed
   */
  async deleteDocument(id: string): Promise<boolean> {
    const rows = await this.db.query("DELETE FROM documents WHERE id = $1 RETURNING id", [id]);
    return rows.length > 0;
  }

  /** Stored embeddings per (model, task) */
  async countEmbeddings(): Promise<EmbeddingCount[]> {
    const rows = await this.db.query(
      `SELECT model, task, COUNT(*)::int AS count
       FROM embeddings
       GROUP BY model, task
       ORDER BY model, task`,
    );
    return rows.map((row) => parseRow(countRow, row, "countEmbeddings"));
  }

  async countRows(): Promise<RowTotals> {
    const row = await this.db.queryOne(
      `SELECT
         (SELECT COUNT(*)::int FROM documents) AS documents,
         (SELECT COUNT(*)::int FROM document_chunks) AS chunks,
         (SELECT COUNT(*)::int FROM embeddings) AS embeddings`,
    );
    return parseRow(totalsRow, row, "countRows");
  }
}
