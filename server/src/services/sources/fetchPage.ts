import { SCRAPE_TIMEOUT_MS, SCRAPE_USER_AGENT } from "../../config.js";

/** Fetch one page and return its body. Rejects on network errors, timeouts and non-2xx. */
export type FetchPage = (url: string) => Promise<string>;

export interface PageFetcherOptions {
  timeoutMs?: number;
  userAgent?: string;
  fetchImpl?: typeof fetch;
}

export function createPageFetcher(options: PageFetcherOptions = {}): FetchPage {
  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = options.timeoutMs ?? SCRAPE_TIMEOUT_MS;
  const userAgent = options.userAgent ?? SCRAPE_USER_AGENT;

  return async (url: string): Promise<string> => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const res = await fetchImpl(url, {
        method: "GET",
        redirect: "follow",
        signal: controller.signal,
        headers: {
          "User-Agent": userAgent,
          Accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
        },
      });
      if (!res.ok) {
        throw new Error(`HTTP ${res.status} fetching ${url}`);
      }
      return await res.text();
    } finally {
      clearTimeout(timeoutId);
    }
  };
}
