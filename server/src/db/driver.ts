/**
 * Database driver abstraction: better-sqlite3 for the embedded file store,
 * pg for a networked PostgreSQL database. Queries are written once with `?`
 * placeholders; the Postgres client rewrites them to `$1, $2, ...`.
 */

import Database from "better-sqlite3";
import pg from "pg";

export type DatabaseDriver = "sqlite" | "postgres";

/** better-sqlite3 cannot bind booleans, so SQL uses TRUE/FALSE literals instead. */
export type SqlParam = string | number | null;

export interface DbResult {
  rows: Record<string, unknown>[];
  rowCount: number;
}

export interface DatabaseClient {
  readonly driver: DatabaseDriver;
  query(sql: string, params?: SqlParam[]): Promise<DbResult>;
  run(sql: string, params?: SqlParam[]): Promise<{ changes: number }>;
  exec(sql: string): Promise<void>;
  close(): Promise<void>;
}

export interface SqliteClientOptions {
  /** How long a statement waits on a locked database (ms). */
  busyTimeoutMs?: number;
}

export function createSqliteClient(
  filename: string,
  options: SqliteClientOptions = {},
): DatabaseClient {
  // better-sqlite3 rejects an explicit `timeout: undefined`.
  const sqlite = new Database(
    filename,
    options.busyTimeoutMs === undefined ? {} : { timeout: options.busyTimeoutMs },
  );
  if (filename !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }

  return {
    driver: "sqlite",

    async query(sql: string, params: SqlParam[] = []): Promise<DbResult> {
      const rows = sqlite
        .prepare<SqlParam[], Record<string, unknown>>(sql)
        .all(...params);
      return { rows, rowCount: rows.length };
    },

    async run(sql: string, params: SqlParam[] = []): Promise<{ changes: number }> {
      const result = sqlite.prepare<SqlParam[]>(sql).run(...params);
      return { changes: result.changes };
    },

    async exec(sql: string): Promise<void> {
      sqlite.exec(sql);
    },

    async close(): Promise<void> {
      sqlite.close();
    },
  };
}

/**
 * Minimal surface the Postgres client needs. `pg.Pool` is wrapped by
 * createPgPoolRunner; tests wrap an in-process PGlite instance.
 */
export interface PgQueryRunner {
  query(sql: string, params: SqlParam[]): Promise<DbResult>;
  end(): Promise<void>;
}

export interface PgPoolOptions {
  statementTimeoutMs?: number;
  connectionTimeoutMs?: number;
}

export function createPgPoolRunner(
  connectionString: string,
  options: PgPoolOptions = {},
): PgQueryRunner {
  const pool = new pg.Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: options.connectionTimeoutMs ?? 10_000,
    statement_timeout: options.statementTimeoutMs,
  });

  return {
    async query(sql: string, params: SqlParam[]): Promise<DbResult> {
      const result = await pool.query<Record<string, unknown>>(sql, params);
      return { rows: result.rows, rowCount: result.rowCount ?? 0 };
    },
    end: () => pool.end(),
  };
}

export function createPostgresClient(runner: PgQueryRunner): DatabaseClient {
  return {
    driver: "postgres",

    async query(sql: string, params: SqlParam[] = []): Promise<DbResult> {
      return runner.query(convertPlaceholders(sql), params);
    },

    async run(sql: string, params: SqlParam[] = []): Promise<{ changes: number }> {
      const result = await runner.query(convertPlaceholders(sql), params);
      return { changes: result.rowCount };
    },

    async exec(sql: string): Promise<void> {
      // Extended protocol takes one statement per call.
      const statements = sql.split(";").filter((s) => s.trim());
      for (const stmt of statements) {
        await runner.query(stmt, []);
      }
    },

    async close(): Promise<void> {
      await runner.end();
    },
  };
}

/**
 * Convert SQLite ? placeholders to PostgreSQL $1, $2, etc.
 */
export function convertPlaceholders(sql: string): string {
  let index = 0;
  return sql.replace(/\?/g, () => `$${++index}`);
}
