/**
 * Embedding Client
 *
 * Turns query text into a vector through an OpenAI-compatible
 * `/embeddings` endpoint (OpenAI, Ollama, llama.cpp server, ...).
 * Only queries are embedded here; chunk vectors are precomputed by
 * ingestion. No caching and no retries: a failed call surfaces as
 * EmbeddingServiceError and retry policy is left to the caller.
 *
 * @module vector/embeddings
 */

import OpenAI, { type ClientOptions } from "openai";
import {
  EmbeddingServiceError,
  errorMessage,
  RequestCancelledError,
  TimeoutError,
} from "../errors/error-types.ts";
import { EMBEDDING_DIMENSIONS } from "../db/schema/documents.ts";
import type { EmbeddingStrategy } from "../modalities/types.ts";
import { getLogger } from "../telemetry/logger.ts";
import { withTimeout } from "../utils/timeout.ts";

const logger = getLogger("embeddings");

export interface EmbedOptions {
  signal?: AbortSignal;
}

export interface EmbeddingClient {
  /**
   * @throws EmbeddingServiceError on transport, status, shape or dimension failure
   * @throws RequestCancelledError when options.signal aborts
   */
  embed(text: string, strategy: EmbeddingStrategy, options?: EmbedOptions): Promise<number[]>;
}

/** The exact text sent for embedding */
export function applyStrategy(text: string, strategy: EmbeddingStrategy): string {
  return `${strategy.prefix}${text}${strategy.suffix}`;
}

export interface OpenAIEmbeddingClientOptions {
  endpoint: string;
  apiKey: string;
  timeoutMs?: number;
  dimensions?: number;
  /** Replaces the HTTP layer (tests) */
  fetch?: ClientOptions["fetch"];
}

export class OpenAIEmbeddingClient implements EmbeddingClient {
  private readonly openai: OpenAI;
  private readonly timeoutMs: number;
  private readonly dimensions: number;

  constructor(options: OpenAIEmbeddingClientOptions) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.dimensions = options.dimensions ?? EMBEDDING_DIMENSIONS;
    this.openai = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.endpoint,
      maxRetries: 0,
      fetch: options.fetch,
    });
  }

  async embed(text: string, strategy: EmbeddingStrategy, options: EmbedOptions = {}): Promise<number[]> {
    const { model } = strategy;
    const input = applyStrategy(text, strategy);

    let response: OpenAI.CreateEmbeddingResponse;
    try {
      response = await withTimeout(
        (signal) => this.openai.embeddings.create({ model, input, encoding_format: "float" }, { signal }),
        this.timeoutMs,
        `embedding (${model})`,
        options.signal,
      );
    } catch (error) {
      throw this.toServiceError(error, model);
    }

    const vector = response.data[0]?.embedding;
    if (!Array.isArray(vector) || vector.length === 0) {
      throw new EmbeddingServiceError(`Embedding service returned no vector for model '${model}'`, model);
    }
    if (!vector.every((value) => typeof value === "number" && Number.isFinite(value))) {
      throw new EmbeddingServiceError(`Embedding service returned a non-numeric vector for model '${model}'`, model);
    }
    if (vector.length !== this.dimensions) {
      throw new EmbeddingServiceError(
        `Embedding dimension mismatch for model '${model}': expected ${this.dimensions}, got ${vector.length}`,
        model,
      );
    }

    logger.debug(`Embedded ${input.length} chars with ${model}`);
    return vector;
  }

  private toServiceError(error: unknown, model: string): Error {
    if (error instanceof RequestCancelledError) {
      return error;
    }
    if (error instanceof TimeoutError) {
      return new EmbeddingServiceError(
        `Embedding request timed out after ${error.timeoutMs}ms`,
        model,
        { cause: error },
      );
    }
    if (error instanceof OpenAI.APIError && error.status !== undefined) {
      return new EmbeddingServiceError(
        `Embedding service returned HTTP ${error.status}: ${error.message}`,
        model,
        { cause: error },
      );
    }
    return new EmbeddingServiceError(
      `Embedding service unreachable: ${errorMessage(error)}`,
      model,
      { cause: error },
    );
  }
}
