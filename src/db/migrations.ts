/**
 * Migration Runner
 *
 * Applies versioned schema migrations in order and records them in
 * `migrations_history`. Each migration runs in its own transaction;
 * re-running is a no-op.
 *
 * @module db/migrations
 */

import { getLogger } from "../telemetry/logger.ts";
import { createInitialMigration } from "./migrations/001_initial_schema.ts";
import type { DbClient, DbSession } from "./types.ts";

const logger = getLogger("migrations");

export interface Migration {
  version: number;
  name: string;
  up: (db: DbSession) => Promise<void>;
  down: (db: DbSession) => Promise<void>;
}

export interface AppliedMigration {
  version: number;
  name: string;
  appliedAt: Date;
}

export { createInitialMigration };

/**
 * All migrations, ascending by version
 */
export function getAllMigrations(): Migration[] {
  return [createInitialMigration()];
}

export class MigrationRunner {
  constructor(private readonly db: DbClient) {}

  async init(): Promise<void> {
    await this.db.exec(`
      CREATE TABLE IF NOT EXISTS migrations_history (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
  }

  async getApplied(): Promise<AppliedMigration[]> {
    await this.init();
    const rows = await this.db.query(
      "SELECT version, name, applied_at FROM migrations_history ORDER BY version",
    );
    return rows.map((row) => ({
      version: Number(row.version),
      name: String(row.name),
      appliedAt: row.applied_at instanceof Date ? row.applied_at : new Date(String(row.applied_at)),
    }));
  }

  /**
   * Apply every migration not yet recorded
   *
   * @returns number of migrations applied
   */
  async runUp(migrations: Migration[]): Promise<number> {
    const applied = new Set((await this.getApplied()).map((m) => m.version));
    const pending = [...migrations]
      .sort((a, b) => a.version - b.version)
      .filter((m) => !applied.has(m.version));

    for (const migration of pending) {
      logger.info(`Applying migration ${migration.version}: ${migration.name}`);
      await this.db.transaction(async (tx) => {
        await migration.up(tx);
        await tx.query(
          "INSERT INTO migrations_history (version, name) VALUES ($1, $2)",
          [migration.version, migration.name],
        );
      });
    }

    if (pending.length === 0) {
      logger.debug("Schema up to date");
    }
    return pending.length;
  }

  /**
   * Roll back applied migrations newer than targetVersion, newest first
   *
   * @returns number of migrations rolled back
   */
  async runDown(migrations: Migration[], targetVersion = 0): Promise<number> {
    const applied = new Set((await this.getApplied()).map((m) => m.version));
    const toRevert = [...migrations]
      .sort((a, b) => b.version - a.version)
      .filter((m) => m.version > targetVersion && applied.has(m.version));

    for (const migration of toRevert) {
      logger.info(`Reverting migration ${migration.version}: ${migration.name}`);
      await this.db.transaction(async (tx) => {
        await migration.down(tx);
        await tx.query("DELETE FROM migrations_history WHERE version = $1", [migration.version]);
      });
    }
    return toRevert.length;
  }
}
