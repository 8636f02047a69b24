import { describe, expect, it, vi } from "vitest";
import pino from "pino";
import type { Article, SourceConfig } from "@newsdesk/shared";
import { dedupeByTitle, fetchAllArticles } from "./aggregator.js";

const log = pino({ level: "silent" });

function article(title: string, link = `https://news.example/${encodeURIComponent(title)}`): Article {
  return { title, link, summary: title };
}

function source(name: string): SourceConfig {
  return {
    name,
    baseUrl: "https://news.example",
    listingUrl: `https://news.example/${name}`,
    strategies: [{ type: "selector", selector: "a" }],
  };
}

describe("dedupeByTitle", () => {
  it("treats a title contained in another as a duplicate and keeps the first", () => {
    const first = article("OpenAI launches agent");
    const result = dedupeByTitle([first, article("OpenAI launches agent framework")]);
    expect(result).toEqual([first]);
  });

  it("over-merges when a short title is contained in a longer one", () => {
    const first = article("AI");
    expect(dedupeByTitle([first, article("AI safety report")])).toEqual([first]);
  });

  it("matches regardless of case and order of length", () => {
    const first = article("Agent Framework Released Today");
    expect(dedupeByTitle([first, article("agent framework")])).toEqual([first]);
  });

  it("keeps unrelated titles", () => {
    const items = [article("Agents in production"), article("New reasoning benchmark")];
    expect(dedupeByTitle(items)).toEqual(items);
  });
});

describe("fetchAllArticles", () => {
  const fetchPage = async () => "";

  it("merges sources in order, dedupes and caps", async () => {
    const fetchSource = vi.fn(async (s: SourceConfig) =>
      s.name === "first"
        ? [article("Agent framework ships"), article("Robots learn to cook")]
        : [article("agent framework ships v2"), article("MCP servers everywhere")],
    );
    const result = await fetchAllArticles([source("first"), source("second")], 2, {
      fetchPage,
      log,
      fetchSource,
    });
    expect(result.map((a) => a.title)).toEqual([
      "Agent framework ships",
      "Robots learn to cook",
    ]);
    expect(fetchSource).toHaveBeenCalledTimes(2);
  });

  it("skips a source that throws", async () => {
    const fetchSource = vi.fn(async (s: SourceConfig) => {
      if (s.name === "broken") throw new Error("boom");
      return [article("Working source headline")];
    });
    const result = await fetchAllArticles([source("broken"), source("ok")], 5, {
      fetchPage,
      log,
      fetchSource,
    });
    expect(result.map((a) => a.title)).toEqual(["Working source headline"]);
  });
});
