import type { Article } from "@newsdesk/shared";
import type { SubscriberStore } from "../db/subscribers.js";
import type { Logger } from "../logger.js";
import { buildUnsubscribeUrl } from "../utils/url.js";
import type { Mailer, SendMailResult } from "./email.js";
import {
  buildSubject,
  formatNewsletter,
  formatWelcomeEmail,
  type NewsletterOptions,
  type SubscriberContext,
} from "./newsletter.js";

export interface Delivery {
  email: string;
  sent: boolean;
  error?: string;
}

/**
 * ok is false only when nothing was attempted (no articles or no active
 * subscribers). Individual failures show up in deliveries.
 */
export interface DispatchResult {
  ok: boolean;
  deliveries: Delivery[];
}

export interface DispatchDeps {
  store: Pick<SubscriberStore, "listActive">;
  mailer: Mailer;
  newsletter: NewsletterOptions;
  log: Logger;
}

export interface WelcomeDeps {
  store: Pick<SubscriberStore, "findByEmail">;
  mailer: Mailer;
  newsletter: NewsletterOptions;
  log: Logger;
  /** Current articles for the greeting; rejection falls back to a placeholder article. */
  loadArticles: () => Promise<Article[]>;
}

export type SendWelcome = (email: string) => Promise<SendMailResult>;

export function welcomeFallbackArticle(options: NewsletterOptions): Article {
  return {
    title: `Welcome to ${options.appName}`,
    link: options.baseUrl,
    summary: `Your first ${options.cadence} issue is on its way. Each one collects the top stories we found that ${options.cadence === "daily" ? "day" : "week"}.`,
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** One personalized mail per active subscriber, sequentially. */
export async function sendToAll(
  articles: Article[],
  deps: DispatchDeps,
): Promise<DispatchResult> {
  const { store, mailer, newsletter, log } = deps;
  if (articles.length === 0) {
    log.warn("No articles to send");
    return { ok: false, deliveries: [] };
  }

  const subscribers = await store.listActive();
  if (subscribers.length === 0) {
    log.warn("No active subscribers");
    return { ok: false, deliveries: [] };
  }

  const subject = buildSubject("newsletter", newsletter);
  const deliveries: Delivery[] = [];
  for (const subscriber of subscribers) {
    const result = await mailer.send({
      to: subscriber.email,
      subject,
      text: formatNewsletter(articles, subscriber, newsletter),
      unsubscribeUrl: buildUnsubscribeUrl(newsletter.baseUrl, subscriber.token),
    });
    if (result.sent) {
      log.info({ email: subscriber.email }, "Newsletter sent");
      deliveries.push({ email: subscriber.email, sent: true });
    } else {
      log.error(
        { email: subscriber.email, err: result.error },
        "Failed to send newsletter",
      );
      deliveries.push({ email: subscriber.email, sent: false, error: result.error });
    }
  }

  const sent = deliveries.filter((d) => d.sent).length;
  log.info({ sent, total: deliveries.length }, "Newsletter dispatch finished");
  return { ok: true, deliveries };
}

export async function sendWelcome(
  email: string,
  deps: WelcomeDeps,
): Promise<SendMailResult> {
  const { store, mailer, newsletter, log } = deps;

  let articles: Article[] = [];
  try {
    articles = await deps.loadArticles();
  } catch (err) {
    log.warn({ err: errorMessage(err) }, "Could not load articles for welcome email");
  }
  if (articles.length === 0) {
    articles = [welcomeFallbackArticle(newsletter)];
  }

  const record = await store.findByEmail(email);
  const subscriber: SubscriberContext | null =
    record && record.isActive && record.unsubscribeToken
      ? { email: record.email, token: record.unsubscribeToken }
      : null;

  const result = await mailer.send({
    to: email,
    subject: buildSubject("welcome", newsletter),
    text: formatWelcomeEmail(articles, subscriber, newsletter),
    ...(subscriber
      ? { unsubscribeUrl: buildUnsubscribeUrl(newsletter.baseUrl, subscriber.token) }
      : {}),
  });
  if (result.sent) {
    log.info({ email }, "Welcome email sent");
  } else {
    log.warn({ email, err: result.error }, "Failed to send welcome email");
  }
  return result;
}
