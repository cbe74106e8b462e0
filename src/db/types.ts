/**
 * Database Client Types
 *
 * Driver-neutral surface shared by the pooled Postgres client and the
 * embedded PGlite client.
 *
 * @module db/types
 */

export type Row = Record<string, unknown>;

/** Values the retrieval queries bind as parameters */
export type DbParam = string | number | boolean | null | Date;

export interface QueryOptions {
  /** Abandon the query (and cancel it server-side where the driver can) */
  signal?: AbortSignal;
}

/**
 * Statement-level access: a pooled client, or one connection held for a
 * transaction
 */
export interface DbSession {
  query(sql: string, params?: readonly DbParam[], options?: QueryOptions): Promise<Row[]>;
  queryOne(sql: string, params?: readonly DbParam[]): Promise<Row | null>;
  /** Run one or more statements without parameters */
  exec(sql: string): Promise<void>;
}

export interface DbClient extends DbSession {
  readonly driver: "postgres" | "pglite";
  connect(): Promise<void>;
  /**
   * Run fn on a single connection inside BEGIN/COMMIT; rolls back and
   * rethrows on error. The connection is released in every case.
   */
  transaction<T>(fn: (tx: DbSession) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
