import type { DatabaseClient } from "./driver.js";
import type { Logger } from "../logger.js";
import * as m001 from "./migrations/001_subscribers.js";

const migrations = [{ name: "001_subscribers", ...m001 }];

const MIGRATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS _migrations (
    name VARCHAR(255) PRIMARY KEY,
    applied_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP
  )
`;

async function getApplied(client: DatabaseClient): Promise<Set<string>> {
  await client.exec(MIGRATIONS_TABLE);
  const { rows } = await client.query("SELECT name FROM _migrations");
  return new Set(rows.map((r) => String(r.name)));
}

/**
 * Apply pending migrations. Every migration is idempotent (IF NOT EXISTS),
 * so two processes racing on first start both succeed.
 */
export async function runMigrations(
  client: DatabaseClient,
  log: Logger,
): Promise<void> {
  const applied = await getApplied(client);
  for (const m of migrations) {
    if (applied.has(m.name)) continue;
    log.info({ migration: m.name, driver: client.driver }, "Applying migration");
    await m.up(client);
    await client.run(
      "INSERT INTO _migrations (name) VALUES (?) ON CONFLICT (name) DO NOTHING",
      [m.name],
    );
  }
}
