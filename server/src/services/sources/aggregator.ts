import type { Article, SourceConfig } from "@newsdesk/shared";
import type { Logger } from "../../logger.js";
import { fetchSourceArticles } from "./adapter.js";
import type { FetchPage } from "./fetchPage.js";

export interface AggregatorDeps {
  fetchPage: FetchPage;
  log: Logger;
  /** Defaults to fetchSourceArticles. */
  fetchSource?: typeof fetchSourceArticles;
}

/**
 * Drop articles whose case-folded title contains, or is contained in, the
 * title of an article kept earlier. Loose on purpose: a short title such as
 * "AI" swallows every later title that mentions it.
 */
export function dedupeByTitle(articles: Article[]): Article[] {
  const kept: Article[] = [];
  const keptTitles: string[] = [];
  for (const article of articles) {
    const title = article.title.toLowerCase();
    const duplicate = keptTitles.some((t) => t.includes(title) || title.includes(t));
    if (duplicate) continue;
    kept.push(article);
    keptTitles.push(title);
  }
  return kept;
}

/**
 * Scrape every source in priority order, merge, dedupe and cap. A failing
 * source is logged and skipped.
 */
export async function fetchAllArticles(
  sources: SourceConfig[],
  maxCount: number,
  deps: AggregatorDeps,
): Promise<Article[]> {
  const fetchSource = deps.fetchSource ?? fetchSourceArticles;
  const merged: Article[] = [];
  for (const source of sources) {
    try {
      merged.push(...(await fetchSource(source, maxCount, deps)));
    } catch (err) {
      deps.log.error(
        { source: source.name, err: err instanceof Error ? err.message : String(err) },
        "Source failed, skipping",
      );
    }
  }
  const articles = dedupeByTitle(merged).slice(0, maxCount);
  deps.log.info(
    { sources: sources.length, fetched: merged.length, articles: articles.length },
    "Aggregated articles",
  );
  return articles;
}
