import type { Article } from "@newsdesk/shared";
import type { NewsletterCadence } from "../config.js";
import { buildUnsubscribeUrl } from "../utils/url.js";

/** Who the message is for. Absent for a generic (non-personalized) body. */
export interface SubscriberContext {
  email: string;
  token: string;
}

export interface NewsletterOptions {
  appName: string;
  cadence: NewsletterCadence;
  /** Origin of the web endpoint; unsubscribe links point at `${baseUrl}/unsubscribe`. */
  baseUrl: string;
  /** Mailbox that handles "reply with UNSUBSCRIBE". */
  replyTo: string;
  now?: Date;
}

export type MessageKind = "newsletter" | "welcome";

const RULE = "=".repeat(50);

const CADENCE_LABEL: Record<NewsletterCadence, string> = {
  weekly: "Weekly",
  daily: "Daily",
};

const CADENCE_PERIOD: Record<NewsletterCadence, string> = {
  weekly: "this week's",
  daily: "today's",
};

/** e.g. "October 19, 2026" (UTC). */
export function formatNewsletterDate(date: Date): string {
  return date.toLocaleDateString("en-US", {
    month: "long",
    day: "numeric",
    year: "numeric",
    timeZone: "UTC",
  });
}

export function buildSubject(
  kind: MessageKind,
  options: Pick<NewsletterOptions, "appName" | "cadence">,
): string {
  if (kind === "welcome") return `Welcome to ${options.appName}!`;
  return `${options.appName} ${CADENCE_LABEL[options.cadence]}`;
}

function articleLines(articles: Article[]): string[] {
  const lines: string[] = [];
  articles.forEach((article, i) => {
    lines.push(`${i + 1}. ${article.title}`);
    lines.push(`   Link: ${article.link}`);
    lines.push(`   Summary: ${article.summary}`);
    lines.push("");
  });
  return lines;
}

function unsubscribeLines(
  subscriber: SubscriberContext | null,
  options: NewsletterOptions,
): string[] {
  if (!subscriber) {
    return ["Reply with UNSUBSCRIBE to stop receiving these emails."];
  }
  return [
    `To unsubscribe, open: ${buildUnsubscribeUrl(options.baseUrl, subscriber.token)}`,
    `Or reply with "UNSUBSCRIBE" to ${options.replyTo}`,
  ];
}

function signOff(appName: string): string[] {
  return ["", "Best regards,", `The ${appName} Team`, ""];
}

/**
 * Plain-text newsletter body. Deterministic apart from the date line.
 * Nothing is escaped: titles and summaries go out as scraped.
 */
export function formatNewsletter(
  articles: Article[],
  subscriber: SubscriberContext | null,
  options: NewsletterOptions,
): string {
  const date = formatNewsletterDate(options.now ?? new Date());
  return [
    `${buildSubject("newsletter", options)} - ${date}`,
    RULE,
    "",
    `Welcome to ${CADENCE_PERIOD[options.cadence]} ${options.appName}! Here are the top stories:`,
    "",
    ...articleLines(articles),
    RULE,
    "",
    `Thanks for reading ${options.appName}!`,
    "",
    ...unsubscribeLines(subscriber, options),
    ...signOff(options.appName),
  ].join("\n");
}

/** One-time greeting sent right after a first subscription. */
export function formatWelcomeEmail(
  articles: Article[],
  subscriber: SubscriberContext | null,
  options: NewsletterOptions,
): string {
  const every = options.cadence === "daily" ? "every day" : "every week";
  return [
    buildSubject("welcome", options),
    RULE,
    "",
    `Thanks for subscribing! ${options.appName} lands in your inbox ${every}.`,
    "",
    "To get you started, here is what's new right now:",
    "",
    ...articleLines(articles),
    RULE,
    "",
    ...unsubscribeLines(subscriber, options),
    ...signOff(options.appName),
  ].join("\n");
}
