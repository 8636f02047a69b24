/**
 * Central app config. All values can be overridden via environment variables.
 * Entry points load .env (dotenv) before importing this module.
 */

/** Newsletter display name (subjects, pages, email footer). Env: APP_NAME */
export const APP_NAME = process.env.APP_NAME?.trim() || "AgentNews";

/** Server port. Env: PORT. Default 5000. */
export const PORT = Number(process.env.PORT) || 5000;

/** Server listen host. Env: HOST. Default "0.0.0.0". */
export const HOST = process.env.HOST?.trim() || "0.0.0.0";

/** Enable Fastify logger. Env: LOGGER. Set to "false" or "0" to disable. Default true. */
export const LOGGER =
  process.env.LOGGER !== "false" && process.env.LOGGER !== "0";

/** Trust X-Forwarded-* headers (client IP for rate limiting behind a proxy). Env: TRUST_PROXY. Set to "true" or "1" to enable. Default false. */
export const TRUST_PROXY =
  process.env.TRUST_PROXY === "true" || process.env.TRUST_PROXY === "1";

/** pino level for the server and CLI loggers. Env: LOG_LEVEL. Default "info". */
export const LOG_LEVEL = process.env.LOG_LEVEL?.trim() || "info";

/** Public origin of the web endpoint, used in unsubscribe links. Env: NEWSLETTER_BASE_URL. */
export const NEWSLETTER_BASE_URL =
  process.env.NEWSLETTER_BASE_URL?.trim() || "http://localhost:5000";

export type NewsletterCadence = "weekly" | "daily";

/** Drives the subject line and intro ("Weekly"/"Daily"). Env: NEWSLETTER_CADENCE. Default "weekly". */
export const NEWSLETTER_CADENCE: NewsletterCadence =
  process.env.NEWSLETTER_CADENCE?.trim().toLowerCase() === "daily"
    ? "daily"
    : "weekly";

/** Articles per newsletter. Env: MAX_ARTICLES. Default 5. */
export const MAX_ARTICLES = Number(process.env.MAX_ARTICLES) || 5;

/** Connection string. Unset means the embedded SQLite file. Env: DATABASE_URL. */
export const DATABASE_URL = process.env.DATABASE_URL?.trim() || undefined;

/** SQLite database filename (under DATA_DIR). Env: DB_FILENAME. Default "subscribers.db". */
export const DB_FILENAME = process.env.DB_FILENAME?.trim() || "subscribers.db";

/** Per-statement timeout for PostgreSQL, busy timeout for SQLite (ms). Env: DB_STATEMENT_TIMEOUT_MS. Default 15s. */
export const DB_STATEMENT_TIMEOUT_MS =
  Math.trunc(Number(process.env.DB_STATEMENT_TIMEOUT_MS)) || 15_000;

/** SMTP host. Env: SMTP_HOST. Default "smtp.gmail.com". */
export const SMTP_HOST = process.env.SMTP_HOST?.trim() || "smtp.gmail.com";

/** SMTP port. Env: SMTP_PORT. Default 465 (implicit TLS). */
export const SMTP_PORT = Number(process.env.SMTP_PORT) || 465;

/** Connection, greeting and socket timeout for SMTP (ms). Env: SMTP_TIMEOUT_MS. Default 30s. */
export const SMTP_TIMEOUT_MS = Number(process.env.SMTP_TIMEOUT_MS) || 30_000;

/** Timeout for each page fetched while scraping (ms). Env: SCRAPE_TIMEOUT_MS. Default 10s. */
export const SCRAPE_TIMEOUT_MS = Number(process.env.SCRAPE_TIMEOUT_MS) || 10_000;

/** User-Agent sent when scraping. Env: SCRAPE_USER_AGENT. */
export const SCRAPE_USER_AGENT =
  process.env.SCRAPE_USER_AGENT?.trim() ||
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";

/** Path to the source catalog JSON. Env: SOURCES_FILE. Default server/config/sources.json. */
export const SOURCES_FILE = process.env.SOURCES_FILE?.trim() || undefined;

/** Rate limit: max requests per window per IP. Env: RATE_LIMIT_MAX. Default 100. */
export const RATE_LIMIT_MAX = Number(process.env.RATE_LIMIT_MAX) || 100;

/** Rate limit window. Env: RATE_LIMIT_TIME_WINDOW. Default "1 minute". */
export const RATE_LIMIT_TIME_WINDOW =
  process.env.RATE_LIMIT_TIME_WINDOW?.trim() || "1 minute";

/** Raised for settings the process cannot start without. Entry points exit 1 on it. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface MailConfig {
  user: string;
  password: string;
  from: string;
  host: string;
  port: number;
  timeoutMs: number;
}

/**
 * Mail account identity and credential. MAIL_USER / MAIL_PASSWORD, with the
 * GMAIL_USER / GMAIL_APP_PASSWORD names accepted as well.
 */
export function loadMailConfig(
  env: NodeJS.ProcessEnv = process.env,
): MailConfig {
  const user = (env.MAIL_USER ?? env.GMAIL_USER)?.trim();
  const password = env.MAIL_PASSWORD ?? env.GMAIL_APP_PASSWORD;
  if (!user || !password) {
    throw new ConfigError(
      "Mail credentials not found. Set MAIL_USER and MAIL_PASSWORD (or GMAIL_USER and GMAIL_APP_PASSWORD).",
    );
  }
  return {
    user,
    password,
    from: env.MAIL_FROM?.trim() || user,
    host: SMTP_HOST,
    port: SMTP_PORT,
    timeoutMs: SMTP_TIMEOUT_MS,
  };
}
