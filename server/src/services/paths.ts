import { join, resolve } from "path";
import { mkdirSync, existsSync } from "fs";
import { DB_FILENAME } from "../config.js";

const DATA_DIR = resolve(process.env.DATA_DIR ?? join(process.cwd(), "data"));

export function ensureDataDir(): void {
  if (!existsSync(DATA_DIR)) {
    mkdirSync(DATA_DIR, { recursive: true });
  }
}

/** Default SQLite file used when DATABASE_URL is unset. */
export function getDefaultSqlitePath(): string {
  return join(DATA_DIR, DB_FILENAME);
}
