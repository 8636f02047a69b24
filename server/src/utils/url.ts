/**
 * Trims whitespace and removes trailing slashes. Used for hostnames, pathnames, and URL-like strings.
 */
export function normalizeHostname(input: string): string {
  let v = input.trim();
  if (!v) return "";
  while (v.endsWith("/")) {
    v = v.slice(0, -1);
  }
  return v;
}

/**
 * Resolve an href found on a scraped page against the source's base URL.
 * Returns null unless the result is an absolute http(s) URL.
 */
export function resolveHttpUrl(href: string, baseUrl: string): string | null {
  const raw = href.trim();
  if (!raw) return null;
  let resolved: URL;
  try {
    resolved = new URL(raw, baseUrl);
  } catch {
    return null;
  }
  if (resolved.protocol !== "http:" && resolved.protocol !== "https:") {
    return null;
  }
  return resolved.toString();
}

/** Token-bearing unsubscribe link for one subscriber. */
export function buildUnsubscribeUrl(baseUrl: string, token: string): string {
  return `${normalizeHostname(baseUrl)}/unsubscribe?token=${encodeURIComponent(token)}`;
}
