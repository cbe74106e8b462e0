/**
 * Retrieval Engine
 *
 * One modality-scoped nearest-neighbour search:
 *   resolve modality → validate → embed query → ANN query → ranked chunks
 *
 * Modality resolution and validation run before the embedding call.
 *
 * @module vector/search
 */

import { and, asc, eq } from "drizzle-orm";
import { QueryBuilder } from "drizzle-orm/pg-core";
import { z } from "zod";
import { asDbParams } from "../db/client.ts";
import { documentChunks, documents, EMBEDDING_DIMENSIONS, embeddings } from "../db/schema/documents.ts";
import type { DbSession, Row } from "../db/types.ts";
import {
  DatabaseError,
  EmbeddingServiceError,
  InvalidArgumentError,
  TimeoutError,
} from "../errors/error-types.ts";
import { DEFAULT_MAX_TOP_K, DEFAULT_TOP_K } from "../lib/config.ts";
import type { ModalityRegistry } from "../modalities/registry.ts";
import type { ResolvedModality } from "../modalities/types.ts";
import { getLogger } from "../telemetry/logger.ts";
import { throwIfCancelled, withTimeout } from "../utils/timeout.ts";
import type { EmbeddingClient } from "./embeddings.ts";
import { distanceTo, toScore } from "./metrics.ts";

const logger = getLogger("vector");

/**
 * One ranked chunk with its parent document
 */
export interface SearchResult {
  documentId: string;
  documentName: string;
  chunkId: string;
  chunkIndex: number;
  chunkContent: string;
  /** Metric's natural value: cosine distance, L2 distance or inner product */
  score: number;
  /** Ascending sort key (pgvector operator value) */
  distance: number;
}

export interface RetrievalEngineOptions {
  /** Largest accepted top_k; larger values are rejected, not clamped */
  maxTopK?: number;
  dbTimeoutMs?: number;
}

export interface SearchOptions {
  signal?: AbortSignal;
}

export interface BuiltQuery {
  sql: string;
  params: unknown[];
}

const resultRow = z.object({
  document_id: z.string(),
  name: z.string(),
  chunk_id: z.string(),
  index: z.number().int(),
  content: z.string(),
  distance: z.number(),
});

/**
 * Metric-specific nearest-neighbour SQL for one modality
 *
 * Ties on distance fall back to (document_id, index) so ranking is
 * deterministic.
 */
export function buildSearchQuery(
  modality: ResolvedModality,
  queryVector: readonly number[],
  topK: number,
): BuiltQuery {
  const distance = distanceTo(modality.metric, embeddings.embedding, queryVector);

  return new QueryBuilder()
    .select({
      documentId: documentChunks.documentId,
      documentName: documents.name,
      chunkId: embeddings.chunkId,
      chunkIndex: documentChunks.index,
      chunkContent: documentChunks.content,
      distance: distance.as("distance"),
    })
    .from(embeddings)
    .innerJoin(documentChunks, eq(embeddings.chunkId, documentChunks.id))
    .innerJoin(documents, eq(documentChunks.documentId, documents.id))
    .where(and(eq(embeddings.model, modality.strategy.model), eq(embeddings.task, modality.task.name)))
    .orderBy(asc(distance), asc(documentChunks.documentId), asc(documentChunks.index))
    .limit(topK)
    .toSQL();
}

export class RetrievalEngine {
  private readonly maxTopK: number;
  private readonly dbTimeoutMs: number;

  constructor(
    private readonly registry: ModalityRegistry,
    private readonly embeddingClient: EmbeddingClient,
    private readonly db: DbSession,
    options: RetrievalEngineOptions = {},
  ) {
    this.maxTopK = options.maxTopK ?? DEFAULT_MAX_TOP_K;
    this.dbTimeoutMs = options.dbTimeoutMs ?? 10_000;
  }

  get topKCeiling(): number {
    return this.maxTopK;
  }

  /**
   * Search one modality for the chunks nearest to queryText
   *
   * @throws UnknownModalityError, InvalidArgumentError (before any I/O)
   * @throws EmbeddingServiceError, DatabaseError, RequestCancelledError
   */
  async search(
    modalityName: string,
    queryText: string,
    topK: number = DEFAULT_TOP_K,
    options: SearchOptions = {},
  ): Promise<SearchResult[]> {
    const { signal } = options;
    const modality = this.registry.resolve(modalityName);
    this.validate(queryText, topK);
    throwIfCancelled(signal, "search");

    logger.debug(`Search ${modality.name}`, {
      model: modality.strategy.model,
      task: modality.task.name,
      metric: modality.metric,
      topK,
    });

    const queryVector = await this.embeddingClient.embed(queryText, modality.strategy, { signal });
    if (queryVector.length !== EMBEDDING_DIMENSIONS) {
      throw new EmbeddingServiceError(
        `Embedding dimension mismatch for model '${modality.strategy.model}': expected ${EMBEDDING_DIMENSIONS}, got ${queryVector.length}`,
        modality.strategy.model,
      );
    }

    const query = buildSearchQuery(modality, queryVector, topK);
    const params = asDbParams(query.params);
    let rows: Row[];
    try {
      rows = await withTimeout(
        (querySignal) => this.db.query(query.sql, params, { signal: querySignal }),
        this.dbTimeoutMs,
        "nearest-neighbor query",
        signal,
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new DatabaseError(`Search query timed out after ${error.timeoutMs}ms`, "search", { cause: error });
      }
      throw error;
    }

    const results = rows.map((row) => {
      const parsed = resultRow.safeParse(row);
      if (!parsed.success) {
        throw new DatabaseError(`Unexpected search row: ${parsed.error.message}`, "search");
      }
      const r = parsed.data;
      return {
        documentId: r.document_id,
        documentName: r.name,
        chunkId: r.chunk_id,
        chunkIndex: r.index,
        chunkContent: r.content,
        score: toScore(modality.metric, r.distance),
        distance: r.distance,
      };
    });

    logger.debug(`Search ${modality.name} returned ${results.length} results`);
    return results;
  }

  private validate(queryText: string, topK: number): void {
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new InvalidArgumentError(`top_k must be a positive integer, got ${topK}`, "top_k");
    }
    if (topK > this.maxTopK) {
      throw new InvalidArgumentError(`top_k must be at most ${this.maxTopK}, got ${topK}`, "top_k");
    }
    if (queryText.trim() === "") {
      throw new InvalidArgumentError("query must not be empty", "query");
    }
  }
}
