import { readFile } from "fs/promises";

/**
 * Legacy subscriber list: one address per line (first comma-separated field),
 * no header. Blank lines and lines without "@" are ignored.
 */
export function parseSubscriberList(content: string): string[] {
  const emails: string[] = [];
  for (const line of content.split(/\r?\n/)) {
    const email = (line.split(",")[0] ?? "").trim();
    if (email && email.includes("@")) {
      emails.push(email);
    }
  }
  return emails;
}

export async function readSubscriberFile(path: string): Promise<string[]> {
  return parseSubscriberList(await readFile(path, "utf8"));
}
