/** Escape text for HTML element content and double-quoted attributes. */
export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** Collapse runs of whitespace (including newlines) to single spaces. */
export function collapseWhitespace(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}
