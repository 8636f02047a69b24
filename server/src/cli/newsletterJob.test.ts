import { describe, expect, it, vi } from "vitest";
import pino from "pino";
import type { Article } from "@newsdesk/shared";
import { ConfigError } from "../config.js";
import { createSqliteClient } from "../db/driver.js";
import { openSubscriberStore } from "../db/index.js";
import type { Mailer, SendMailOptions } from "../services/email.js";
import type { MailSetup } from "../services/newsletterRuntime.js";
import { parseNewsletterArgs, runNewsletterJob } from "./newsletterJob.js";

const log = pino({ level: "silent" });

const articles: Article[] = [
  { title: "Agents reach production", link: "https://site.example/a", summary: "Summary." },
];

function setup() {
  const sent: SendMailOptions[] = [];
  const mailer: Mailer = {
    send: async (options) => {
      sent.push(options);
      return { sent: true };
    },
  };
  const mail: MailSetup = {
    mailer,
    newsletter: {
      appName: "AgentNews",
      cadence: "weekly",
      baseUrl: "https://news.example",
      replyTo: "editor@news.example",
    },
  };
  return { sent, mail };
}

async function storeWith(emails: string[]) {
  const store = await openSubscriberStore(createSqliteClient(":memory:"), log);
  for (const email of emails) await store.add(email);
  return store;
}

describe("parseNewsletterArgs", () => {
  it("defaults to the newsletter", () => {
    expect(parseNewsletterArgs([])).toEqual({ kind: "newsletter" });
  });

  it("reads --welcome <email>", () => {
    expect(parseNewsletterArgs(["--welcome", "New@X.com"])).toEqual({
      kind: "welcome",
      email: "new@x.com",
    });
  });

  it("rejects --welcome without a valid address", () => {
    expect(parseNewsletterArgs(["--welcome"])).toEqual({
      kind: "invalid",
      message: "--welcome requires an email address",
    });
    expect(parseNewsletterArgs(["--welcome", "nope"]).kind).toBe("invalid");
  });
});

describe("runNewsletterJob", () => {
  it("sends the newsletter to every active subscriber", async () => {
    const { sent, mail } = setup();
    const store = await storeWith(["a@x.com", "b@x.com"]);
    const code = await runNewsletterJob([], {
      log,
      mailSetup: () => mail,
      openStore: async () => store,
      loadArticles: async () => articles,
    });
    expect(code).toBe(0);
    expect(sent.map((m) => m.to).sort()).toEqual(["a@x.com", "b@x.com"]);
  });

  it("exits 1 when no articles were found", async () => {
    const { sent, mail } = setup();
    const store = await storeWith(["a@x.com"]);
    const code = await runNewsletterJob([], {
      log,
      mailSetup: () => mail,
      openStore: async () => store,
      loadArticles: async () => [],
    });
    expect(code).toBe(1);
    expect(sent).toEqual([]);
  });

  it("exits 1 when there are no subscribers", async () => {
    const { mail } = setup();
    const store = await storeWith([]);
    const code = await runNewsletterJob([], {
      log,
      mailSetup: () => mail,
      openStore: async () => store,
      loadArticles: async () => articles,
    });
    expect(code).toBe(1);
  });

  it("exits 1 without opening the store when mail is not configured", async () => {
    const openStore = vi.fn(async () => storeWith([]));
    const code = await runNewsletterJob([], {
      log,
      mailSetup: () => {
        throw new ConfigError("Mail credentials not found.");
      },
      openStore,
      loadArticles: async () => articles,
    });
    expect(code).toBe(1);
    expect(openStore).not.toHaveBeenCalled();
  });

  it("sends a single welcome email with --welcome", async () => {
    const { sent, mail } = setup();
    const store = await storeWith(["a@x.com", "new@x.com"]);
    const code = await runNewsletterJob(["--welcome", "new@x.com"], {
      log,
      mailSetup: () => mail,
      openStore: async () => store,
      loadArticles: async () => articles,
    });
    expect(code).toBe(0);
    expect(sent).toHaveLength(1);
    expect(sent[0]?.to).toBe("new@x.com");
    expect(sent[0]?.subject).toBe("Welcome to AgentNews!");
  });
});
