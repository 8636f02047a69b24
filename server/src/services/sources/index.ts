export { fetchSourceArticles, selectArticles, MIN_TITLE_LENGTH } from "./adapter.js";
export { fetchAllArticles, dedupeByTitle } from "./aggregator.js";
export { loadSourceCatalog, parseSourceCatalog, DEFAULT_SOURCES_FILE } from "./catalog.js";
export { createPageFetcher } from "./fetchPage.js";
export type { FetchPage } from "./fetchPage.js";
export type { ArticleCandidate, ExtractionStrategy } from "./strategies.js";
