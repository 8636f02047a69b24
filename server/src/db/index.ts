import { ConfigError, DB_STATEMENT_TIMEOUT_MS } from "../config.js";
import { ensureDataDir, getDefaultSqlitePath } from "../services/paths.js";
import type { Logger } from "../logger.js";
import {
  createPgPoolRunner,
  createPostgresClient,
  createSqliteClient,
} from "./driver.js";
import type { DatabaseClient, DatabaseDriver } from "./driver.js";
import { runMigrations } from "./migrate.js";
import { SqlSubscriberStore } from "./subscribers.js";
import type { SubscriberStore } from "./subscribers.js";

export type { SubscriberStore } from "./subscribers.js";

export interface DatabaseTarget {
  driver: DatabaseDriver;
  /** File path for sqlite, connection string for postgres. */
  location: string;
}

/**
 * Pick the backend from a connection string. Unset means the embedded SQLite
 * file under DATA_DIR; sqlite:/file: URLs name another file (or :memory:).
 */
export function resolveDatabaseTarget(databaseUrl: string | undefined): DatabaseTarget {
  const url = databaseUrl?.trim();
  if (!url) {
    return { driver: "sqlite", location: getDefaultSqlitePath() };
  }
  if (/^postgres(ql)?:\/\//i.test(url)) {
    return { driver: "postgres", location: url };
  }
  const sqlite = /^(sqlite|file):(?:\/\/)?(.*)$/i.exec(url);
  if (sqlite) {
    const location = sqlite[2]?.trim();
    if (!location) {
      throw new ConfigError(
        `DATABASE_URL ${sqlite[1]}: has no database path. Use e.g. sqlite:///path/to/subscribers.db or sqlite::memory:.`,
      );
    }
    return { driver: "sqlite", location };
  }
  throw new ConfigError(
    `Unsupported DATABASE_URL scheme: ${url.split(":")[0]}. Use postgres://, postgresql://, sqlite: or leave it unset.`,
  );
}

export function createDatabaseClient(target: DatabaseTarget): DatabaseClient {
  if (target.driver === "postgres") {
    return createPostgresClient(
      createPgPoolRunner(target.location, {
        statementTimeoutMs: DB_STATEMENT_TIMEOUT_MS,
      }),
    );
  }
  if (target.location === getDefaultSqlitePath()) {
    ensureDataDir();
  }
  return createSqliteClient(target.location, { busyTimeoutMs: DB_STATEMENT_TIMEOUT_MS });
}

/**
 * Open the store over an existing client and create the table if absent.
 */
export async function openSubscriberStore(
  client: DatabaseClient,
  log: Logger,
): Promise<SubscriberStore> {
  await runMigrations(client, log);
  return new SqlSubscriberStore(client, log);
}

/**
 * Open the store named by a connection string. Throws ConfigError for an
 * unsupported scheme; connection or migration failures reject as well, since
 * callers run this once at startup.
 */
export async function createSubscriberStore(
  databaseUrl: string | undefined,
  log: Logger,
): Promise<SubscriberStore> {
  const target = resolveDatabaseTarget(databaseUrl);
  const client = createDatabaseClient(target);
  try {
    return await openSubscriberStore(client, log);
  } catch (err) {
    await client.close().catch((closeErr: unknown) => {
      log.warn({ err: String(closeErr) }, "Error closing database after failed open");
    });
    throw err;
  }
}
