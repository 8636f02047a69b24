import { describe, expect, it, vi } from "vitest";
import pino from "pino";
import {
  emphasisStrategy,
  headingsStrategy,
  keywordMatcher,
  parseDocument,
  runStrategyChain,
  selectorStrategy,
  truncateSummary,
} from "./strategies.js";

describe("selectorStrategy", () => {
  const document = parseDocument(`
    <div class="list">
      <a href="/blog/first-post">First post about agents</a>
      <div class="card">
        <a href="/blog/second">Second card   title</a>
        <a href="/x">ignored</a>
      </div>
    </div>`);

  it("returns matched anchors with collapsed text", () => {
    expect(selectorStrategy('a[href*="/blog/"]')(document)).toEqual([
      { title: "First post about agents", href: "/blog/first-post" },
      { title: "Second card title", href: "/blog/second" },
    ]);
  });

  it("takes the first link inside a matched container", () => {
    expect(selectorStrategy(".card")(document)).toEqual([
      { title: "Second card title", href: "/blog/second" },
    ]);
  });
});

describe("keywordMatcher", () => {
  it("matches whole words regardless of case", () => {
    const matches = keywordMatcher(["AI", "multi-agent"]);
    expect(matches("New ai model")).toBe(true);
    expect(matches("A multi-agent benchmark")).toBe(true);
    expect(matches("Maintain the garden")).toBe(false);
  });
});

describe("headingsStrategy", () => {
  it("uses the first link and text below a matching heading", () => {
    const document = parseDocument(`
      <h2>Weather today</h2>
      <p>Sunny <a href="https://w.example/1">forecast</a></p>
      <h2>New agent framework released</h2>
      <p>The framework ships <a href="https://news.example/agents">tools</a> for building.</p>
      <p>Second paragraph.</p>
      <h3>Agents everywhere</h3>
      <p>No link here.</p>`);

    expect(headingsStrategy(["agent"])(document)).toEqual([
      {
        title: "New agent framework released",
        href: "https://news.example/agents",
        summary: "The framework ships tools for building. Second paragraph.",
      },
    ]);
  });

  it("truncates long summaries", () => {
    const long = "word ".repeat(100);
    const document = parseDocument(
      `<h2><a href="https://news.example/a">Agent news roundup</a></h2><p>${long}</p>`,
    );
    const [candidate] = headingsStrategy(["agent"], 48)(document);
    expect(candidate?.href).toBe("https://news.example/a");
    expect(candidate?.summary).toBe(`${"word ".repeat(8)}word...`);
  });
});

describe("emphasisStrategy", () => {
  it("takes the enclosing block as summary and its link", () => {
    const document = parseDocument(`
      <ul>
        <li><strong>Agent toolkit update</strong> adds memory. <a href="https://e.example/toolkit">Read</a></li>
      </ul>
      <p><b>Unrelated bold</b> <a href="https://e.example/other">x</a></p>`);

    expect(emphasisStrategy(["agent"])(document)).toEqual([
      {
        title: "Agent toolkit update",
        href: "https://e.example/toolkit",
        summary: "Agent toolkit update adds memory. Read",
      },
    ]);
  });
});

describe("truncateSummary", () => {
  it("keeps short text as is", () => {
    expect(truncateSummary("short")).toBe("short");
  });

  it("cuts to the limit including the ellipsis", () => {
    const result = truncateSummary("a".repeat(250));
    expect(result).toBe(`${"a".repeat(197)}...`);
  });
});

describe("runStrategyChain", () => {
  const log = pino({ level: "silent" });

  it("returns the first rule with results", () => {
    const document = parseDocument(`<a href="/one">Only link on the page</a>`);
    expect(
      runStrategyChain(document, [
        { type: "selector", selector: ".missing" },
        { type: "selector", selector: "a" },
      ], log),
    ).toEqual([{ title: "Only link on the page", href: "/one" }]);
  });

  it("returns an empty list when nothing matches", () => {
    const document = parseDocument("<p>nothing</p>");
    expect(runStrategyChain(document, [{ type: "headings", keywords: ["agent"] }], log)).toEqual([]);
  });

  it("skips a rule with an invalid selector and tries the next", () => {
    const warn = vi.spyOn(log, "warn");
    const document = parseDocument(`<a href="/blog/one">Agents reach production today</a>`);
    expect(
      runStrategyChain(document, [
        { type: "selector", selector: "a.broken[" },
        { type: "selector", selector: 'a[href*="/blog/"]' },
      ], log),
    ).toEqual([{ title: "Agents reach production today", href: "/blog/one" }]);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});
