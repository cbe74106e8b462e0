/**
 * Custom Error Types for KBDB
 *
 * Provides a hierarchy of error classes with user-friendly messages,
 * error codes, recoverability flags, and suggestions for resolution.
 *
 * The retrieval core throws these unchanged; only the MCP tool boundary
 * turns them into "Search failed: ..." strings.
 *
 * @module errors/error-types
 */

/**
 * Base error class for KBDB
 *
 * All custom errors extend this class to provide:
 * - Unique error code for categorization
 * - Recoverable flag to indicate if the caller may try again
 * - User-friendly suggestion for how to resolve the error
 */
export class KBDBError extends Error {
  constructor(
    message: string,
    public code: string,
    public recoverable: boolean = false,
    public suggestion?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintains proper stack trace for where our error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Requested modality is not in the registry
 *
 * User input error, never retried.
 */
export class UnknownModalityError extends KBDBError {
  constructor(public modality: string, public available: readonly string[] = []) {
    super(
      `Unknown modality '${modality}'`,
      "UNKNOWN_MODALITY",
      false,
      available.length > 0
        ? `Use one of: ${available.join(", ")}`
        : "No modalities are registered",
    );
  }
}

/**
 * Embedding service errors
 *
 * Thrown when:
 * - The embedding endpoint is unreachable or times out
 * - The endpoint answers with a non-success status
 * - The response carries no vector, or a vector of the wrong size
 */
export class EmbeddingServiceError extends KBDBError {
  constructor(
    message: string,
    public model: string,
    options?: { cause?: unknown },
  ) {
    super(
      message,
      "EMBEDDING_SERVICE_ERROR",
      true, // Recoverable - the caller decides whether to retry
      "Check RM_OPENAI_ENDPOINT, RM_OPENAI_API_KEY and that the model is served",
      options,
    );
  }
}

/**
 * Database errors
 *
 * Thrown when:
 * - Database connection fails
 * - Query execution fails or times out
 * - A constraint is violated
 */
export class DatabaseError extends KBDBError {
  constructor(
    message: string,
    public operation: string,
    options?: { cause?: unknown },
  ) {
    super(
      message,
      "DATABASE_ERROR",
      false, // Not recoverable - database is critical
      "Check database connectivity and run 'kbdb migrate'",
      options,
    );
  }
}

/**
 * Invalid argument errors
 *
 * Thrown when a caller-supplied value is out of range
 * (top_k <= 0 or above the ceiling, blank query, wrong vector size).
 */
export class InvalidArgumentError extends KBDBError {
  constructor(message: string, public argument: string) {
    super(message, "INVALID_ARGUMENT", false, `Fix the '${argument}' argument`);
  }
}

/**
 * Configuration errors
 *
 * Thrown when:
 * - Required configuration is missing
 * - Configuration is invalid
 * - The modality file cannot be read
 */
export class ConfigurationError extends KBDBError {
  constructor(message: string, public configKey?: string) {
    super(
      message,
      "CONFIGURATION_ERROR",
      false, // Not recoverable - configuration is required
      configKey ? `Set a valid value for ${configKey}` : "Check the environment and .env file",
    );
  }
}

/**
 * Timeout errors
 *
 * Thrown when an operation exceeds its timeout threshold
 */
export class TimeoutError extends KBDBError {
  constructor(
    public operation: string,
    public timeoutMs: number,
  ) {
    super(
      `Operation '${operation}' timed out after ${timeoutMs}ms`,
      "TIMEOUT_ERROR",
      true, // Recoverable - can retry with higher timeout
      "Increase timeout or check server responsiveness",
    );
  }
}

/**
 * The caller abandoned the request before it completed
 */
export class RequestCancelledError extends KBDBError {
  constructor(public operation: string) {
    super(`Operation '${operation}' was cancelled`, "REQUEST_CANCELLED", true);
  }
}

/**
 * Render any thrown value as a one-line message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
