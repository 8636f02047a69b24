import { articleSchema } from "@newsdesk/shared";
import type { Article, SourceConfig } from "@newsdesk/shared";
import type { Logger } from "../../logger.js";
import { resolveHttpUrl } from "../../utils/url.js";
import type { FetchPage } from "./fetchPage.js";
import { parseDocument, runStrategyChain } from "./strategies.js";
import type { ArticleCandidate } from "./strategies.js";

/** Titles this short or shorter are navigation text, not headlines. */
export const MIN_TITLE_LENGTH = 10;

/** Candidates considered per requested article, to absorb filtered-out links. */
export const OVERFETCH_FACTOR = 2;

export interface SourceAdapterDeps {
  fetchPage: FetchPage;
  log: Logger;
}

/**
 * Turn raw candidates into articles: short titles dropped, absolute http(s)
 * links only, first headline for a link wins, at most maxCount.
 */
export function selectArticles(
  candidates: ArticleCandidate[],
  baseUrl: string,
  maxCount: number,
): Article[] {
  const articles: Article[] = [];
  const seenLinks = new Set<string>();
  for (const candidate of candidates.slice(0, maxCount * OVERFETCH_FACTOR)) {
    if (articles.length >= maxCount) break;
    const title = candidate.title.trim();
    if (title.length <= MIN_TITLE_LENGTH) continue;
    const link = resolveHttpUrl(candidate.href, baseUrl);
    if (!link || seenLinks.has(link)) continue;
    const parsed = articleSchema.safeParse({
      title,
      link,
      summary: candidate.summary?.trim() || title,
    });
    if (!parsed.success) continue;
    seenLinks.add(link);
    articles.push(parsed.data);
  }
  return articles;
}

/**
 * Scrape one source. Never rejects: network and parse failures are logged
 * and yield an empty list.
 */
export async function fetchSourceArticles(
  source: SourceConfig,
  maxCount: number,
  deps: SourceAdapterDeps,
): Promise<Article[]> {
  if (maxCount <= 0) return [];
  const log = deps.log;
  try {
    log.info({ source: source.name, url: source.listingUrl }, "Scraping source");
    const listing = parseDocument(await deps.fetchPage(source.listingUrl));
    let candidates = runStrategyChain(listing, source.strategies, log);

    if (candidates.length === 0 && source.fallback) {
      log.info(
        { source: source.name, url: source.fallback.url },
        "No extraction rule matched, trying fallback page",
      );
      const fallback = parseDocument(await deps.fetchPage(source.fallback.url));
      candidates = runStrategyChain(fallback, source.fallback.strategies, log);
    }

    log.info(
      { source: source.name, candidates: candidates.length },
      "Found potential article links",
    );
    const articles = selectArticles(candidates, source.baseUrl, maxCount);
    log.info({ source: source.name, articles: articles.length }, "Scraped articles");
    return articles;
  } catch (err) {
    log.error(
      { source: source.name, err: err instanceof Error ? err.message : String(err) },
      "Error scraping source",
    );
    return [];
  }
}
