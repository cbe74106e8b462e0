/**
 * Runtime Configuration
 *
 * Reads database, embedding-service and search settings from the
 * environment (optionally seeded from a .env file). Nothing here has a
 * baked-in host, credential or endpoint.
 *
 * @module lib/config
 */

import { existsSync } from "node:fs";
import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../errors/error-types.ts";
import { isLogLevel, type LogLevel } from "../telemetry/logger.ts";

export const DEFAULT_TOP_K = 3;
export const DEFAULT_MAX_TOP_K = 50;

/**
 * Postgres connection settings, or an embedded PGlite data directory
 */
export type DatabaseConfig =
  | {
    kind: "postgres";
    url?: string;
    host?: string;
    port: number;
    database?: string;
    user?: string;
    password?: string;
    poolMax: number;
  }
  | {
    kind: "pglite";
    /** `memory://` or a directory path */
    dataDir: string;
  };

export interface EmbeddingServiceConfig {
  endpoint: string;
  apiKey: string;
  timeoutMs: number;
}

export interface AppConfig {
  database: DatabaseConfig;
  dbTimeoutMs: number;
  embedding: EmbeddingServiceConfig;
  maxTopK: number;
  modalitiesFile?: string;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === "" ? undefined : value))
  .optional();

function positiveInt(fallback: number) {
  return z
    .string()
    .trim()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === "") return fallback;
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a positive integer, got '${value}'` });
        return z.NEVER;
      }
      return parsed;
    });
}

const envSchema = z.object({
  RM_DB_URL: optionalString,
  RM_DB_HOST: optionalString,
  RM_DB_PORT: positiveInt(5432),
  RM_DB_NAME: optionalString,
  RM_DB_USER: optionalString,
  RM_DB_PASSWORD: z.string().optional(),
  RM_DB_POOL_MAX: positiveInt(10),
  RM_DB_TIMEOUT_MS: positiveInt(10_000),
  RM_OPENAI_ENDPOINT: optionalString,
  RM_OPENAI_API_KEY: optionalString,
  RM_EMBEDDING_TIMEOUT_MS: positiveInt(30_000),
  RM_MAX_TOP_K: positiveInt(DEFAULT_MAX_TOP_K),
  RM_MODALITIES_FILE: optionalString,
  RM_LOG_LEVEL: optionalString,
});

function isPostgresUrl(url: string): boolean {
  return url.startsWith("postgres://") || url.startsWith("postgresql://");
}

function databaseConfig(env: z.infer<typeof envSchema>): DatabaseConfig {
  if (env.RM_DB_URL && !isPostgresUrl(env.RM_DB_URL)) {
    return { kind: "pglite", dataDir: env.RM_DB_URL };
  }
  if (!env.RM_DB_URL && !env.RM_DB_HOST) {
    throw new ConfigurationError("Either RM_DB_URL or RM_DB_HOST must be set", "RM_DB_HOST");
  }
  return {
    kind: "postgres",
    url: env.RM_DB_URL,
    host: env.RM_DB_HOST,
    port: env.RM_DB_PORT,
    database: env.RM_DB_NAME,
    user: env.RM_DB_USER,
    password: env.RM_DB_PASSWORD,
    poolMax: env.RM_DB_POOL_MAX,
  };
}

/**
 * Validate an environment map into AppConfig
 *
 * @throws ConfigurationError naming the first offending key
 */
export function parseConfig(env: Env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue ? String(issue.path[0]) : undefined;
    throw new ConfigurationError(
      `Invalid configuration${key ? ` for ${key}` : ""}: ${issue?.message ?? "unknown error"}`,
      key,
    );
  }
  const values = parsed.data;

  if (!values.RM_OPENAI_ENDPOINT) {
    throw new ConfigurationError("RM_OPENAI_ENDPOINT is required", "RM_OPENAI_ENDPOINT");
  }
  if (!values.RM_OPENAI_API_KEY) {
    throw new ConfigurationError("RM_OPENAI_API_KEY is required", "RM_OPENAI_API_KEY");
  }

  const logLevel = values.RM_LOG_LEVEL ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`Invalid configuration for RM_LOG_LEVEL: '${logLevel}'`, "RM_LOG_LEVEL");
  }

  return {
    database: databaseConfig(values),
    dbTimeoutMs: values.RM_DB_TIMEOUT_MS,
    embedding: {
      endpoint: values.RM_OPENAI_ENDPOINT,
      apiKey: values.RM_OPENAI_API_KEY,
      timeoutMs: values.RM_EMBEDDING_TIMEOUT_MS,
    },
    maxTopK: values.RM_MAX_TOP_K,
    modalitiesFile: values.RM_MODALITIES_FILE,
    logLevel,
  };
}

/**
 * Load .env (if present) into process.env, then parse it
 *
 * Production: .env.production only. Development: .env only.
 */
export function loadConfig(envFile?: string): AppConfig {
  const file = envFile ?? (process.env.NODE_ENV === "production" ? ".env.production" : ".env");
  if (existsSync(file)) {
    dotenv.config({ path: file });
  }
  return parseConfig(process.env);
}
