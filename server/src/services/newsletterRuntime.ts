import type { Article } from "@newsdesk/shared";
import {
  APP_NAME,
  MAX_ARTICLES,
  NEWSLETTER_BASE_URL,
  NEWSLETTER_CADENCE,
  loadMailConfig,
  type MailConfig,
} from "../config.js";
import type { Logger } from "../logger.js";
import { createMailer, createSmtpTransport, type Mailer } from "./email.js";
import type { NewsletterOptions } from "./newsletter.js";
import {
  createPageFetcher,
  fetchAllArticles,
  loadSourceCatalog,
} from "./sources/index.js";

/** Wiring shared by the web server and the batch job. */

export function newsletterOptions(replyTo: string): NewsletterOptions {
  return {
    appName: APP_NAME,
    cadence: NEWSLETTER_CADENCE,
    baseUrl: NEWSLETTER_BASE_URL,
    replyTo,
  };
}

export interface MailSetup {
  mailer: Mailer;
  newsletter: NewsletterOptions;
}

/** Throws ConfigError (via loadMailConfig) when credentials are missing. */
export function createMailSetup(config: MailConfig = loadMailConfig()): MailSetup {
  const mailer = createMailer(createSmtpTransport(config), {
    from: config.from,
    fromName: APP_NAME,
    replyTo: config.from,
  });
  return { mailer, newsletter: newsletterOptions(config.from) };
}

export async function loadLatestArticles(
  log: Logger,
  maxCount: number = MAX_ARTICLES,
): Promise<Article[]> {
  const sources = await loadSourceCatalog();
  return fetchAllArticles(sources, maxCount, {
    fetchPage: createPageFetcher(),
    log,
  });
}
