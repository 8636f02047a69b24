/**
 * Extraction strategies: pure functions from a parsed page to candidate
 * articles. A source lists its rules in priority order and the first rule
 * that yields anything wins.
 */

import { JSDOM } from "jsdom";
import type { ExtractionRule } from "@newsdesk/shared";
import type { Logger } from "../../logger.js";
import { collapseWhitespace } from "../../utils/html.js";

export const DEFAULT_SUMMARY_MAX_LENGTH = 200;

const HEADING_SELECTOR = "h1, h2, h3, h4";
const HEADING_TAG = /^H[1-4]$/;
const EMPHASIS_SELECTOR = "strong, b, em";
const SUMMARY_BLOCK_SELECTOR = "p, li, div, section, article";

/** An unvalidated record straight off the page; href may be relative. */
export interface ArticleCandidate {
  title: string;
  href: string;
  summary?: string;
}

export type ExtractionStrategy = (document: Document) => ArticleCandidate[];

export function parseDocument(html: string): Document {
  return new JSDOM(html).window.document;
}

export function truncateSummary(
  text: string,
  maxLength: number = DEFAULT_SUMMARY_MAX_LENGTH,
): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength - 3).trimEnd()}...`;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Whole-word, case-insensitive keyword test ("AI" does not match "maintain"). */
export function keywordMatcher(keywords: string[]): (text: string) => boolean {
  const pattern = new RegExp(
    `(^|[^\\p{L}\\p{N}])(${keywords.map(escapeRegExp).join("|")})(?=$|[^\\p{L}\\p{N}])`,
    "iu",
  );
  return (text) => pattern.test(text);
}

function textOf(el: Element): string {
  return collapseWhitespace(el.textContent ?? "");
}

function firstAnchorIn(el: Element): Element | null {
  if (el.tagName === "A" && el.hasAttribute("href")) return el;
  return el.querySelector("a[href]");
}

/** Anchors matched by a CSS selector. Containers contribute their first link. */
export function selectorStrategy(selector: string): ExtractionStrategy {
  return (document) => {
    const candidates: ArticleCandidate[] = [];
    for (const el of document.querySelectorAll(selector)) {
      const anchor = firstAnchorIn(el);
      if (!anchor) continue;
      candidates.push({
        title: textOf(anchor),
        href: anchor.getAttribute("href") ?? "",
      });
    }
    return candidates;
  };
}

/** Elements after a heading, up to the next heading. */
function sectionBody(heading: Element): Element[] {
  const body: Element[] = [];
  let node = heading.nextElementSibling;
  while (node && !HEADING_TAG.test(node.tagName)) {
    body.push(node);
    node = node.nextElementSibling;
  }
  return body;
}

/** Digest pages: headings mentioning a keyword, summarised by the content below them. */
export function headingsStrategy(
  keywords: string[],
  summaryMaxLength: number = DEFAULT_SUMMARY_MAX_LENGTH,
): ExtractionStrategy {
  const matches = keywordMatcher(keywords);
  return (document) => {
    const candidates: ArticleCandidate[] = [];
    for (const heading of document.querySelectorAll(HEADING_SELECTOR)) {
      const title = textOf(heading);
      if (!title || !matches(title)) continue;
      const body = sectionBody(heading);
      let anchor = firstAnchorIn(heading);
      for (const el of body) {
        if (anchor) break;
        anchor = firstAnchorIn(el);
      }
      if (!anchor) continue;
      const summary = collapseWhitespace(body.map(textOf).join(" "));
      candidates.push({
        title,
        href: anchor.getAttribute("href") ?? "",
        summary: truncateSummary(summary || title, summaryMaxLength),
      });
    }
    return candidates;
  };
}

/** Fallback for digest pages without matching headings: bold/italic keyword mentions. */
export function emphasisStrategy(
  keywords: string[],
  summaryMaxLength: number = DEFAULT_SUMMARY_MAX_LENGTH,
): ExtractionStrategy {
  const matches = keywordMatcher(keywords);
  return (document) => {
    const candidates: ArticleCandidate[] = [];
    for (const el of document.querySelectorAll(EMPHASIS_SELECTOR)) {
      const title = textOf(el);
      if (!title || !matches(title)) continue;
      const block = el.parentElement?.closest(SUMMARY_BLOCK_SELECTOR) ?? null;
      const anchor =
        el.closest("a[href]") ?? el.querySelector("a[href]") ?? block?.querySelector("a[href]") ?? null;
      if (!anchor) continue;
      const summary = block ? textOf(block) : title;
      candidates.push({
        title,
        href: anchor.getAttribute("href") ?? "",
        summary: truncateSummary(summary || title, summaryMaxLength),
      });
    }
    return candidates;
  };
}

export function strategyFor(rule: ExtractionRule): ExtractionStrategy {
  switch (rule.type) {
    case "selector":
      return selectorStrategy(rule.selector);
    case "headings":
      return headingsStrategy(rule.keywords, rule.summaryMaxLength);
    case "emphasis":
      return emphasisStrategy(rule.keywords, rule.summaryMaxLength);
  }
}

/**
 * Apply rules in order and return the first non-empty result. A rule that
 * throws (an invalid CSS selector, say) is logged and skipped.
 */
export function runStrategyChain(
  document: Document,
  rules: ExtractionRule[],
  log: Logger,
): ArticleCandidate[] {
  for (const [index, rule] of rules.entries()) {
    let candidates: ArticleCandidate[];
    try {
      candidates = strategyFor(rule)(document);
    } catch (err) {
      log.warn(
        { rule: index, type: rule.type, err: err instanceof Error ? err.message : String(err) },
        "Extraction rule failed, trying the next one",
      );
      continue;
    }
    if (candidates.length > 0) return candidates;
  }
  return [];
}
