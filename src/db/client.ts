/**
 * Database Clients
 *
 * - PostgresClient: connection-pooled Postgres (postgres.js), production
 * - PGliteClient: embedded Postgres with pgvector (PGlite), tests and local use
 *
 * Every driver error is rethrown as DatabaseError; an aborted query is
 * rethrown as RequestCancelledError.
 *
 * @module db/client
 */

import { PGlite, type Transaction } from "@electric-sql/pglite";
import { vector } from "@electric-sql/pglite/vector";
import postgres from "postgres";
import {
  DatabaseError,
  errorMessage,
  KBDBError,
  RequestCancelledError,
} from "../errors/error-types.ts";
import type { DatabaseConfig } from "../lib/config.ts";
import { getLogger } from "../telemetry/logger.ts";
import { throwIfCancelled } from "../utils/timeout.ts";
import type { DbClient, DbParam, DbSession, QueryOptions, Row } from "./types.ts";

const logger = getLogger("db");

function isDbParam(value: unknown): value is DbParam {
  return value === null || value instanceof Date ||
    ["string", "number", "boolean"].includes(typeof value);
}

/**
 * Narrow query-builder parameters to the values the drivers bind
 *
 * @throws DatabaseError on an unsupported parameter type
 */
export function asDbParams(values: readonly unknown[]): DbParam[] {
  return values.map((value, i) => {
    if (!isDbParam(value)) {
      throw new DatabaseError(`Unsupported parameter $${i + 1} of type ${typeof value}`, "bind");
    }
    return value;
  });
}

function wrapError(error: unknown, operation: string, signal?: AbortSignal): KBDBError {
  if (error instanceof KBDBError) return error;
  if (signal?.aborted) return new RequestCancelledError(operation);
  return new DatabaseError(`Database ${operation} failed: ${errorMessage(error)}`, operation, { cause: error });
}

// ============================================
// PGlite (embedded)
// ============================================

/** The part of PGlite shared by the instance and its transactions */
interface PGliteQueryable {
  query<T>(sql: string, params?: unknown[]): Promise<{ rows: T[] }>;
  exec(sql: string): Promise<unknown>;
}

abstract class PGliteSessionBase implements DbSession {
  protected abstract handle(): PGliteQueryable;

  async query(sql: string, params: readonly DbParam[] = [], options: QueryOptions = {}): Promise<Row[]> {
    throwIfCancelled(options.signal, "query");
    try {
      const result = await this.handle().query<Row>(sql, [...params]);
      return result.rows;
    } catch (error) {
      throw wrapError(error, "query", options.signal);
    }
  }

  async queryOne(sql: string, params: readonly DbParam[] = []): Promise<Row | null> {
    const rows = await this.query(sql, params);
    return rows[0] ?? null;
  }

  async exec(sql: string): Promise<void> {
    try {
      await this.handle().exec(sql);
    } catch (error) {
      throw wrapError(error, "exec");
    }
  }
}

class PGliteTransactionSession extends PGliteSessionBase {
  constructor(private readonly tx: Transaction) {
    super();
  }

  protected handle(): PGliteQueryable {
    return this.tx;
  }
}

export class PGliteClient extends PGliteSessionBase implements DbClient {
  readonly driver = "pglite";
  private db: PGlite | null = null;

  constructor(private readonly dataDir: string = "memory://") {
    super();
  }

  protected handle(): PGliteQueryable {
    if (!this.db) {
      throw new DatabaseError("PGlite client is not connected", "connect");
    }
    return this.db;
  }

  async connect(): Promise<void> {
    if (this.db) return;
    try {
      this.db = await PGlite.create(this.dataDir, { extensions: { vector } });
      await this.db.exec("CREATE EXTENSION IF NOT EXISTS vector");
      logger.debug(`PGlite ready (${this.dataDir})`);
    } catch (error) {
      this.db = null;
      throw wrapError(error, "connect");
    }
  }

  async transaction<T>(fn: (tx: DbSession) => Promise<T>): Promise<T> {
    const db = this.db;
    if (!db) {
      throw new DatabaseError("PGlite client is not connected", "transaction");
    }
    try {
      return await db.transaction((tx) => fn(new PGliteTransactionSession(tx)));
    } catch (error) {
      throw wrapError(error, "transaction");
    }
  }

  async close(): Promise<void> {
    if (this.db) {
      await this.db.close();
      this.db = null;
    }
  }
}

// ============================================
// Postgres (pooled)
// ============================================

/** A pooled client, or a reserved connection (ReservedSql extends Sql) */
type PostgresHandle = postgres.Sql;

abstract class PostgresSessionBase implements DbSession {
  protected abstract handle(): PostgresHandle;

  async query(sql: string, params: readonly DbParam[] = [], options: QueryOptions = {}): Promise<Row[]> {
    const { signal } = options;
    throwIfCancelled(signal, "query");

    const pending = this.handle().unsafe<Row[]>(sql, [...params]);
    const cancel = () => {
      // The pending query rejects once the server acknowledges the cancel
      pending.cancel();
    };
    signal?.addEventListener("abort", cancel, { once: true });

    try {
      const rows = await pending;
      return [...rows];
    } catch (error) {
      throw wrapError(error, "query", signal);
    } finally {
      signal?.removeEventListener("abort", cancel);
    }
  }

  async queryOne(sql: string, params: readonly DbParam[] = []): Promise<Row | null> {
    const rows = await this.query(sql, params);
    return rows[0] ?? null;
  }

  async exec(sql: string): Promise<void> {
    try {
      // No parameters: simple protocol, multiple statements allowed
      await this.handle().unsafe(sql);
    } catch (error) {
      throw wrapError(error, "exec");
    }
  }
}

export interface PostgresClientOptions {
  url?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  poolMax?: number;
  /** Server-side statement_timeout */
  statementTimeoutMs?: number;
}

class ReservedSession extends PostgresSessionBase {
  constructor(private readonly reserved: postgres.ReservedSql) {
    super();
  }

  protected handle(): PostgresHandle {
    return this.reserved;
  }
}

export class PostgresClient extends PostgresSessionBase implements DbClient {
  readonly driver = "postgres";
  private sql: postgres.Sql | null = null;

  constructor(private readonly options: PostgresClientOptions) {
    super();
  }

  protected handle(): PostgresHandle {
    if (!this.sql) {
      throw new DatabaseError("Postgres client is not connected", "connect");
    }
    return this.sql;
  }

  async connect(): Promise<void> {
    if (this.sql) return;

    const settings = {
      host: this.options.host,
      port: this.options.port,
      database: this.options.database,
      username: this.options.user,
      password: this.options.password,
      max: this.options.poolMax ?? 10,
      idle_timeout: 30,
      connect_timeout: 10,
      onnotice: () => {},
      connection: {
        application_name: "kbdb",
        ...(this.options.statementTimeoutMs !== undefined
          ? { statement_timeout: this.options.statementTimeoutMs }
          : {}),
      },
    };
    const sql = this.options.url ? postgres(this.options.url, settings) : postgres(settings);

    try {
      await sql`SELECT 1`;
    } catch (error) {
      await sql.end({ timeout: 1 });
      throw wrapError(error, "connect");
    }
    this.sql = sql;
    logger.debug(`Postgres pool ready (max ${settings.max})`);
  }

  async transaction<T>(fn: (tx: DbSession) => Promise<T>): Promise<T> {
    const sql = this.sql;
    if (!sql) {
      throw new DatabaseError("Postgres client is not connected", "transaction");
    }

    let reserved: postgres.ReservedSql;
    try {
      reserved = await sql.reserve();
    } catch (error) {
      throw wrapError(error, "transaction");
    }

    const session = new ReservedSession(reserved);
    try {
      await session.exec("BEGIN");
      const result = await fn(session);
      await session.exec("COMMIT");
      return result;
    } catch (error) {
      try {
        await session.exec("ROLLBACK");
      } catch (rollbackError) {
        logger.error(`Rollback failed: ${errorMessage(rollbackError)}`);
      }
      throw wrapError(error, "transaction");
    } finally {
      reserved.release();
    }
  }

  async close(): Promise<void> {
    if (this.sql) {
      await this.sql.end({ timeout: 5 });
      this.sql = null;
    }
  }
}

/**
 * Create an (unconnected) client for the configured database
 */
export function createClient(config: DatabaseConfig, statementTimeoutMs?: number): DbClient {
  if (config.kind === "pglite") {
    return new PGliteClient(config.dataDir);
  }
  return new PostgresClient({
    url: config.url,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    poolMax: config.poolMax,
    statementTimeoutMs,
  });
}
