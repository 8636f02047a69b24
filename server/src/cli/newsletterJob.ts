import { subscribeBodySchema, type Article } from "@newsdesk/shared";
import { ConfigError } from "../config.js";
import type { SubscriberStore } from "../db/subscribers.js";
import type { Logger } from "../logger.js";
import { sendToAll, sendWelcome } from "../services/dispatcher.js";
import type { MailSetup } from "../services/newsletterRuntime.js";

export interface NewsletterJobDeps {
  log: Logger;
  /** Throws ConfigError when mail credentials are missing. */
  mailSetup: () => MailSetup;
  openStore: () => Promise<SubscriberStore>;
  loadArticles: () => Promise<Article[]>;
}

/** Parsed flags: `--welcome <email>` switches to a single welcome mail. */
export type NewsletterJobMode =
  | { kind: "newsletter" }
  | { kind: "welcome"; email: string }
  | { kind: "invalid"; message: string };

export function parseNewsletterArgs(argv: string[]): NewsletterJobMode {
  const i = argv.indexOf("--welcome");
  if (i === -1) return { kind: "newsletter" };
  const raw = argv[i + 1];
  if (!raw) return { kind: "invalid", message: "--welcome requires an email address" };
  const parsed = subscribeBodySchema.safeParse({ email: raw });
  if (!parsed.success) {
    return { kind: "invalid", message: `Invalid email address: ${raw}` };
  }
  return { kind: "welcome", email: parsed.data.email };
}

/**
 * Batch entry: scrape, format and send to every active subscriber.
 * Resolves the exit code. Missing mail credentials are fatal here.
 */
export async function runNewsletterJob(
  argv: string[],
  deps: NewsletterJobDeps,
): Promise<number> {
  const { log } = deps;
  const mode = parseNewsletterArgs(argv);
  if (mode.kind === "invalid") {
    log.error(mode.message);
    return 1;
  }

  let setup: MailSetup;
  try {
    setup = deps.mailSetup();
  } catch (err) {
    if (err instanceof ConfigError) {
      log.error(err.message);
      return 1;
    }
    throw err;
  }

  const store = await deps.openStore();
  try {
    if (mode.kind === "welcome") {
      const result = await sendWelcome(mode.email, {
        store,
        mailer: setup.mailer,
        newsletter: setup.newsletter,
        log,
        loadArticles: deps.loadArticles,
      });
      return result.sent ? 0 : 1;
    }

    log.info("Starting newsletter job");
    const articles = await deps.loadArticles();
    if (articles.length === 0) {
      log.error("No articles found, newsletter not sent");
      return 1;
    }

    const result = await sendToAll(articles, {
      store,
      mailer: setup.mailer,
      newsletter: setup.newsletter,
      log,
    });
    if (!result.ok) {
      log.error("Newsletter not sent");
      return 1;
    }
    const failed = result.deliveries.filter((d) => !d.sent).length;
    log.info(
      { delivered: result.deliveries.length - failed, failed },
      "Newsletter job completed",
    );
    return 0;
  } finally {
    await store.close();
  }
}
