/**
 * In-process stand-ins for the database
 */

import type { DbClient, DbParam, DbSession, QueryOptions, Row } from "../../src/db/types.ts";

/**
 * DbSession that counts queries, forwarding to an inner session when given
 */
export class SpyDbSession implements DbSession {
  readonly queries: string[] = [];

  constructor(private readonly inner: DbSession | null = null) {}

  async query(sql: string, params?: readonly DbParam[], options?: QueryOptions): Promise<Row[]> {
    this.queries.push(sql);
    return this.inner ? await this.inner.query(sql, params, options) : [];
  }

  async queryOne(sql: string, params?: readonly DbParam[]): Promise<Row | null> {
    const rows = await this.query(sql, params);
    return rows[0] ?? null;
  }

  async exec(sql: string): Promise<void> {
    this.queries.push(sql);
    if (this.inner) {
      await this.inner.exec(sql);
    }
  }
}

/**
 * DbSession whose queries never complete until their signal aborts
 */
export class HangingDbSession extends SpyDbSession {
  readonly signals: AbortSignal[] = [];

  override query(sql: string, _params?: readonly DbParam[], options?: QueryOptions): Promise<Row[]> {
    this.queries.push(sql);
    const signal = options?.signal;
    if (signal) {
      this.signals.push(signal);
    }
    return new Promise<Row[]>((_, reject) => {
      signal?.addEventListener("abort", () => reject(new Error("query aborted")), { once: true });
    });
  }
}

/**
 * DbClient with no database behind it; resolves `closed` once close() runs
 */
export class ClosableDbClient extends SpyDbSession implements DbClient {
  readonly driver = "pglite" as const;
  closeCount = 0;
  readonly closed: Promise<void>;
  private markClosed: () => void = () => {};

  constructor() {
    super();
    this.closed = new Promise<void>((resolve) => {
      this.markClosed = resolve;
    });
  }

  async connect(): Promise<void> {}

  async transaction<T>(fn: (tx: DbSession) => Promise<T>): Promise<T> {
    return await fn(this);
  }

  async close(): Promise<void> {
    this.closeCount++;
    this.markClosed();
  }
}
