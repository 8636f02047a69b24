import { nanoid } from "nanoid";
import type { DatabaseClient, DatabaseDriver } from "./driver.js";
import type { Logger } from "../logger.js";

export const UNSUBSCRIBE_TOKEN_LENGTH = 32;

export const SUBSCRIBE_SUCCESS_MESSAGE = "Successfully subscribed!";
export const RESUBSCRIBE_SUCCESS_MESSAGE =
  "Welcome back! Your subscription has been reactivated.";
export const ALREADY_SUBSCRIBED_MESSAGE = "You're already subscribed.";
export const UNSUBSCRIBE_SUCCESS_MESSAGE = "Successfully unsubscribed!";
export const NOT_FOUND_MESSAGE = "Email not found in subscriber list";
export const INVALID_TOKEN_MESSAGE = "Invalid or expired unsubscribe link.";

export interface SubscriberRecord {
  id: number;
  email: string;
  /** ISO 8601 */
  subscribedAt: string;
  unsubscribedAt: string | null;
  isActive: boolean;
  unsubscribeToken: string;
}

/** What the dispatcher and token pages need about an active subscriber. */
export interface ActiveSubscriber {
  email: string;
  token: string;
}

export interface StoreResult {
  success: boolean;
  message: string;
}

export interface AddSubscriberResult extends StoreResult {
  /** True only when no row existed for the email. Reactivation is not new. */
  isNew: boolean;
}

export interface TokenRemovalResult extends StoreResult {
  email?: string;
}

export type HealthCheckResult = { ok: true } | { ok: false; error: string };

/**
 * Subscriber persistence. Every method resolves: storage errors are logged
 * and reported through the result (success false, empty list, zero, null).
 */
export interface SubscriberStore {
  readonly driver: DatabaseDriver;
  add(email: string): Promise<AddSubscriberResult>;
  remove(email: string): Promise<StoreResult>;
  /** Deactivate the active row holding this token in a single statement. */
  removeByToken(token: string): Promise<TokenRemovalResult>;
  /** Newest subscription first. */
  listActive(): Promise<ActiveSubscriber[]>;
  countActive(): Promise<number>;
  findByToken(token: string): Promise<ActiveSubscriber | null>;
  findByEmail(email: string): Promise<SubscriberRecord | null>;
  healthCheck(): Promise<HealthCheckResult>;
  close(): Promise<void>;
}

export function generateUnsubscribeToken(): string {
  return nanoid(UNSUBSCRIBE_TOKEN_LENGTH);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** sqlite returns "YYYY-MM-DD HH:MM:SS" (UTC) text; pg returns Date. */
export function toIsoTimestamp(value: unknown): string | null {
  if (value == null) return null;
  if (value instanceof Date) return value.toISOString();
  const text = String(value).trim();
  if (!text) return null;
  const sqliteForm = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}(\.\d+)?$/.test(text);
  const parsed = new Date(sqliteForm ? `${text.replace(" ", "T")}Z` : text);
  return Number.isNaN(parsed.getTime()) ? text : parsed.toISOString();
}

function toBoolean(value: unknown): boolean {
  return value === true || value === 1 || value === "1" || value === "t";
}

function toActiveSubscriber(row: Record<string, unknown>): ActiveSubscriber {
  return {
    email: String(row.email),
    token: String(row.unsubscribe_token ?? ""),
  };
}

function toRecord(row: Record<string, unknown>): SubscriberRecord {
  return {
    id: Number(row.id),
    email: String(row.email),
    subscribedAt: toIsoTimestamp(row.subscribed_at) ?? "",
    unsubscribedAt: toIsoTimestamp(row.unsubscribed_at),
    isActive: toBoolean(row.is_active),
    unsubscribeToken: String(row.unsubscribe_token ?? ""),
  };
}

const SUBSCRIBER_COLUMNS =
  "id, email, subscribed_at, unsubscribed_at, is_active, unsubscribe_token";

/**
 * SubscriberStore over either driver. Each mutation is one SQL statement, so
 * concurrent requests rely on the database's row-level atomicity.
 */
export class SqlSubscriberStore implements SubscriberStore {
  constructor(
    private readonly client: DatabaseClient,
    private readonly log: Logger,
  ) {}

  get driver(): DatabaseDriver {
    return this.client.driver;
  }

  async add(email: string): Promise<AddSubscriberResult> {
    const token = generateUnsubscribeToken();
    try {
      const existing = await this.client.query(
        "SELECT is_active FROM subscribers WHERE email = ?",
        [email],
      );
      const previous = existing.rows[0];
      const isNew = previous === undefined;

      await this.client.run(
        `INSERT INTO subscribers (email, unsubscribe_token, is_active, unsubscribed_at)
         VALUES (?, ?, TRUE, NULL)
         ON CONFLICT (email) DO UPDATE SET
           is_active = TRUE,
           unsubscribed_at = NULL,
           unsubscribe_token = excluded.unsubscribe_token`,
        [email, token],
      );

      let message = SUBSCRIBE_SUCCESS_MESSAGE;
      if (previous !== undefined) {
        message = toBoolean(previous.is_active)
          ? ALREADY_SUBSCRIBED_MESSAGE
          : RESUBSCRIBE_SUCCESS_MESSAGE;
      }
      this.log.info({ email, isNew }, "Subscriber added");
      return { success: true, message, isNew };
    } catch (err) {
      this.log.error({ email, err: errorMessage(err) }, "Error adding subscriber");
      return { success: false, message: `Error: ${errorMessage(err)}`, isNew: false };
    }
  }

  async remove(email: string): Promise<StoreResult> {
    try {
      const { changes } = await this.client.run(
        `UPDATE subscribers
         SET is_active = FALSE, unsubscribed_at = CURRENT_TIMESTAMP
         WHERE email = ? AND is_active = TRUE`,
        [email],
      );
      if (changes === 0) {
        this.log.warn({ email }, "Email not found or already unsubscribed");
        return { success: false, message: NOT_FOUND_MESSAGE };
      }
      this.log.info({ email }, "Subscriber removed");
      return { success: true, message: UNSUBSCRIBE_SUCCESS_MESSAGE };
    } catch (err) {
      this.log.error({ email, err: errorMessage(err) }, "Error removing subscriber");
      return { success: false, message: `Error: ${errorMessage(err)}` };
    }
  }

  async removeByToken(token: string): Promise<TokenRemovalResult> {
    try {
      const { rows } = await this.client.query(
        `UPDATE subscribers
         SET is_active = FALSE, unsubscribed_at = CURRENT_TIMESTAMP
         WHERE unsubscribe_token = ? AND is_active = TRUE
         RETURNING email`,
        [token],
      );
      const row = rows[0];
      if (!row) {
        return { success: false, message: INVALID_TOKEN_MESSAGE };
      }
      const email = String(row.email);
      this.log.info({ email }, "Token unsubscribe successful");
      return { success: true, message: UNSUBSCRIBE_SUCCESS_MESSAGE, email };
    } catch (err) {
      this.log.error({ err: errorMessage(err) }, "Error processing token unsubscribe");
      return { success: false, message: `Error: ${errorMessage(err)}` };
    }
  }

  async listActive(): Promise<ActiveSubscriber[]> {
    try {
      const { rows } = await this.client.query(
        `SELECT email, unsubscribe_token FROM subscribers
         WHERE is_active = TRUE
         ORDER BY subscribed_at DESC, id DESC`,
      );
      return rows.map(toActiveSubscriber);
    } catch (err) {
      this.log.error({ err: errorMessage(err) }, "Error getting subscribers");
      return [];
    }
  }

  async countActive(): Promise<number> {
    try {
      const { rows } = await this.client.query(
        "SELECT CAST(COUNT(*) AS INTEGER) AS count FROM subscribers WHERE is_active = TRUE",
      );
      return Number(rows[0]?.count ?? 0);
    } catch (err) {
      this.log.error({ err: errorMessage(err) }, "Error getting subscriber count");
      return 0;
    }
  }

  async findByToken(token: string): Promise<ActiveSubscriber | null> {
    try {
      const { rows } = await this.client.query(
        `SELECT email, unsubscribe_token FROM subscribers
         WHERE unsubscribe_token = ? AND is_active = TRUE`,
        [token],
      );
      const row = rows[0];
      return row ? toActiveSubscriber(row) : null;
    } catch (err) {
      this.log.error({ err: errorMessage(err) }, "Error validating unsubscribe token");
      return null;
    }
  }

  async findByEmail(email: string): Promise<SubscriberRecord | null> {
    try {
      const { rows } = await this.client.query(
        `SELECT ${SUBSCRIBER_COLUMNS} FROM subscribers WHERE email = ?`,
        [email],
      );
      const row = rows[0];
      return row ? toRecord(row) : null;
    } catch (err) {
      this.log.error({ email, err: errorMessage(err) }, "Error looking up subscriber");
      return null;
    }
  }

  async healthCheck(): Promise<HealthCheckResult> {
    try {
      await this.client.query("SELECT 1 AS ok");
      return { ok: true };
    } catch (err) {
      this.log.error({ err: errorMessage(err) }, "Database health check failed");
      return { ok: false, error: errorMessage(err) };
    }
  }

  async close(): Promise<void> {
    try {
      await this.client.close();
    } catch (err) {
      this.log.warn({ err: errorMessage(err) }, "Error closing database");
    }
  }
}
