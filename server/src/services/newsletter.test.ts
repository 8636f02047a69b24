import { describe, expect, it } from "vitest";
import type { Article } from "@newsdesk/shared";
import {
  buildSubject,
  formatNewsletter,
  formatNewsletterDate,
  formatWelcomeEmail,
  type NewsletterOptions,
} from "./newsletter.js";

const options: NewsletterOptions = {
  appName: "AgentNews",
  cadence: "weekly",
  baseUrl: "https://news.example/",
  replyTo: "editor@news.example",
  now: new Date("2026-10-19T12:00:00Z"),
};

const articles: Article[] = [
  {
    title: "Agents reach production",
    link: "https://site.example/a",
    summary: "Teams ship agents <at scale>.",
  },
  { title: "MCP servers everywhere", link: "https://site.example/b", summary: "A roundup." },
];

describe("formatNewsletter", () => {
  it("renders the header, numbered articles and generic unsubscribe text", () => {
    const text = formatNewsletter(articles, null, options);
    const lines = text.split("\n");

    expect(lines[0]).toBe("AgentNews Weekly - October 19, 2026");
    expect(lines[1]).toBe("=".repeat(50));
    expect(lines[3]).toBe("Welcome to this week's AgentNews! Here are the top stories:");
    expect(lines.slice(5, 13)).toEqual([
      "1. Agents reach production",
      "   Link: https://site.example/a",
      "   Summary: Teams ship agents <at scale>.",
      "",
      "2. MCP servers everywhere",
      "   Link: https://site.example/b",
      "   Summary: A roundup.",
      "",
    ]);
    expect(lines).toContain("Reply with UNSUBSCRIBE to stop receiving these emails.");
    expect(text).not.toContain("unsubscribe?token=");
  });

  it("embeds the subscriber's token in the unsubscribe link", () => {
    const text = formatNewsletter(articles, { email: "a@x.com", token: "tok_123-abc" }, options);
    const lines = text.split("\n");
    expect(lines).toContain(
      "To unsubscribe, open: https://news.example/unsubscribe?token=tok_123-abc",
    );
    expect(lines).toContain('Or reply with "UNSUBSCRIBE" to editor@news.example');
    expect(lines).not.toContain("Reply with UNSUBSCRIBE to stop receiving these emails.");
  });

  it("uses the daily wording for a daily cadence", () => {
    const text = formatNewsletter(articles, null, { ...options, cadence: "daily" });
    const lines = text.split("\n");
    expect(lines[0]).toBe("AgentNews Daily - October 19, 2026");
    expect(lines[3]).toBe("Welcome to today's AgentNews! Here are the top stories:");
  });

  it("ends with the sign-off", () => {
    const lines = formatNewsletter(articles, null, options).split("\n");
    expect(lines.slice(-4)).toEqual(["", "Best regards,", "The AgentNews Team", ""]);
  });
});

describe("formatWelcomeEmail", () => {
  it("greets the subscriber and lists articles", () => {
    const text = formatWelcomeEmail(articles, { email: "a@x.com", token: "t1" }, options);
    const lines = text.split("\n");
    expect(lines[0]).toBe("Welcome to AgentNews!");
    expect(lines[3]).toBe("Thanks for subscribing! AgentNews lands in your inbox every week.");
    expect(lines).toContain("1. Agents reach production");
    expect(lines).toContain("To unsubscribe, open: https://news.example/unsubscribe?token=t1");
  });
});

describe("buildSubject", () => {
  it("names the cadence or the welcome", () => {
    expect(buildSubject("newsletter", options)).toBe("AgentNews Weekly");
    expect(buildSubject("newsletter", { ...options, cadence: "daily" })).toBe("AgentNews Daily");
    expect(buildSubject("welcome", options)).toBe("Welcome to AgentNews!");
  });
});

describe("formatNewsletterDate", () => {
  it("formats in UTC", () => {
    expect(formatNewsletterDate(new Date("2026-01-05T23:30:00Z"))).toBe("January 5, 2026");
  });
});
