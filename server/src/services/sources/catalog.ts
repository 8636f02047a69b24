import { readFile } from "fs/promises";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { sourceCatalogSchema } from "@newsdesk/shared";
import type { SourceConfig } from "@newsdesk/shared";
import { ConfigError, SOURCES_FILE } from "../../config.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

/** server/config/sources.json, relative to this file (server/src/services/sources). */
export const DEFAULT_SOURCES_FILE = join(__dirname, "..", "..", "..", "config", "sources.json");

/** Validate a parsed catalog. Throws ConfigError listing the first problem. */
export function parseSourceCatalog(raw: unknown): SourceConfig[] {
  const parsed = sourceCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? ` at ${issue.path.map(String).join(".")}` : "";
    throw new ConfigError(`Invalid source catalog${where}: ${issue?.message ?? "validation failed"}`);
  }
  return parsed.data.sources;
}

export async function loadSourceCatalog(
  path: string = SOURCES_FILE ?? DEFAULT_SOURCES_FILE,
): Promise<SourceConfig[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf8"));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Could not read source catalog ${path}: ${msg}`);
  }
  return parseSourceCatalog(raw);
}
