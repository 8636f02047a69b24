import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { describe, expect, it } from "vitest";
import { ConfigError } from "../../config.js";
import { loadSourceCatalog, parseSourceCatalog } from "./catalog.js";

describe("parseSourceCatalog", () => {
  it("returns validated sources", () => {
    const sources = parseSourceCatalog({
      sources: [
        {
          name: "Blog",
          baseUrl: "https://blog.example",
          listingUrl: "https://blog.example/posts",
          strategies: [{ type: "headings", keywords: ["agent"] }],
        },
      ],
    });
    expect(sources).toEqual([
      {
        name: "Blog",
        baseUrl: "https://blog.example",
        listingUrl: "https://blog.example/posts",
        strategies: [{ type: "headings", keywords: ["agent"] }],
      },
    ]);
  });

  it("names the offending path", () => {
    expect(() =>
      parseSourceCatalog({
        sources: [
          {
            name: "Blog",
            baseUrl: "https://blog.example",
            listingUrl: "https://blog.example/posts",
            strategies: [{ type: "regex", pattern: ".*" }],
          },
        ],
      }),
    ).toThrow(/Invalid source catalog at sources\.0\.strategies\.0/);
  });

  it("rejects an empty catalog", () => {
    expect(() => parseSourceCatalog({ sources: [] })).toThrow(ConfigError);
  });
});

describe("loadSourceCatalog", () => {
  it("loads the bundled catalog", async () => {
    const sources = await loadSourceCatalog();
    expect(sources.length).toBeGreaterThan(0);
    for (const source of sources) {
      expect(source.strategies.length).toBeGreaterThan(0);
    }
  });

  it("wraps unreadable files in ConfigError", async () => {
    const dir = await mkdtemp(join(tmpdir(), "catalog-"));
    try {
      const path = join(dir, "sources.json");
      await writeFile(path, "{ not json", "utf8");
      await expect(loadSourceCatalog(path)).rejects.toBeInstanceOf(ConfigError);
      await expect(loadSourceCatalog(join(dir, "missing.json"))).rejects.toThrow(
        /Could not read source catalog/,
      );
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
