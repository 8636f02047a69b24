import type { DatabaseClient } from "../driver.js";

/**
 * Subscribers: one row per email ever subscribed. Unsubscribing is a soft
 * delete (is_active = false); resubscribing reuses the row with a new token.
 */
const SQLITE_DDL = `
  CREATE TABLE IF NOT EXISTS subscribers (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    email TEXT UNIQUE NOT NULL,
    subscribed_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
    unsubscribed_at TEXT NULL,
    is_active INTEGER NOT NULL DEFAULT 1,
    unsubscribe_token TEXT UNIQUE
  );
  CREATE INDEX IF NOT EXISTS idx_subscribers_email ON subscribers(email);
  CREATE INDEX IF NOT EXISTS idx_subscribers_active ON subscribers(is_active);
`;

const POSTGRES_DDL = `
  CREATE TABLE IF NOT EXISTS subscribers (
    id SERIAL PRIMARY KEY,
    email VARCHAR(255) UNIQUE NOT NULL,
    subscribed_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
    unsubscribed_at TIMESTAMP NULL,
    is_active BOOLEAN NOT NULL DEFAULT TRUE,
    unsubscribe_token VARCHAR(64) UNIQUE
  );
  CREATE INDEX IF NOT EXISTS idx_subscribers_email ON subscribers(email);
  CREATE INDEX IF NOT EXISTS idx_subscribers_active ON subscribers(is_active);
`;

export const up = async (client: DatabaseClient): Promise<void> => {
  await client.exec(client.driver === "postgres" ? POSTGRES_DDL : SQLITE_DDL);
};
