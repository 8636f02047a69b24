import { escapeHtml } from "../../utils/html.js";

export type FlashKind = "success" | "error";

export interface Flash {
  kind: FlashKind;
  message: string;
}

const STYLE = `
  body { font-family: system-ui, -apple-system, "Segoe UI", sans-serif; max-width: 600px; margin: 40px auto; padding: 0 20px; color: #222; background: #f5f6fa; }
  .container { background: #fff; padding: 32px; border-radius: 12px; box-shadow: 0 4px 16px rgba(0,0,0,.08); }
  h1 { margin-top: 0; }
  .stats { background: #eef2ff; padding: 12px 16px; border-radius: 8px; margin-bottom: 20px; }
  .message { padding: 12px 16px; border-radius: 8px; margin-bottom: 20px; }
  .message.success { background: #e6f4ea; color: #155724; }
  .message.error { background: #fdecea; color: #721c24; }
  form { display: flex; gap: 8px; flex-wrap: wrap; }
  input[type=email] { flex: 1; min-width: 200px; padding: 10px; border: 1px solid #ccc; border-radius: 6px; }
  .button { padding: 10px 20px; border: none; border-radius: 6px; background: #4f46e5; color: #fff; cursor: pointer; text-decoration: none; display: inline-block; }
  .button.secondary { background: #6b7280; }
  .button.danger { background: #dc2626; }
  .footer { margin-top: 24px; font-size: .85em; color: #666; }
`;

function layout(appName: string, title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(appName)} - ${escapeHtml(title)}</title>
  <style>${STYLE}</style>
</head>
<body>
  <div class="container">
${body}
  </div>
</body>
</html>
`;
}

function flashBlock(flash: Flash | undefined): string {
  if (!flash) return "";
  return `    <div class="message ${flash.kind}">${escapeHtml(flash.message)}</div>\n`;
}

export function renderIndexPage(params: {
  appName: string;
  subscriberCount: number;
  flash?: Flash;
}): string {
  const app = escapeHtml(params.appName);
  const body = `    <h1>${app}</h1>
    <div class="stats">${params.subscriberCount} active subscribers</div>
${flashBlock(params.flash)}    <h3>Subscribe to ${app}</h3>
    <p>Get the latest stories delivered to your inbox.</p>
    <form method="POST" action="/subscribe">
      <input type="email" name="email" placeholder="Enter your email address" required>
      <button type="submit" class="button">Subscribe</button>
    </form>
    <hr>
    <h3>Unsubscribe</h3>
    <p>You can unsubscribe at any time.</p>
    <form method="POST" action="/unsubscribe">
      <input type="email" name="email" placeholder="Enter your email address" required>
      <button type="submit" class="button danger">Unsubscribe</button>
    </form>
    <div class="footer">We respect your privacy. Every newsletter carries a one-click unsubscribe link.</div>`;
  return layout(params.appName, "Newsletter", body);
}

export type CompletedAction = "subscribe" | "unsubscribe";

export function renderSuccessPage(params: {
  appName: string;
  action: CompletedAction;
  message: string;
}): string {
  const app = escapeHtml(params.appName);
  const heading =
    params.action === "subscribe"
      ? `Welcome to ${app}!`
      : "Successfully Unsubscribed";
  const detail =
    params.action === "subscribe"
      ? "Check your inbox for a welcome email."
      : `You won't receive any more newsletters from ${app}. You can subscribe again at any time.`;
  const body = `    <h1>${heading}</h1>
    <div class="message success">${escapeHtml(params.message)}</div>
    <p>${detail}</p>
    <a href="/" class="button secondary">Back to homepage</a>`;
  return layout(
    params.appName,
    params.action === "subscribe" ? "Subscribed" : "Unsubscribed",
    body,
  );
}

/** Posting the form (confirm=yes) performs the unsubscribe; GET never does. */
export function renderConfirmUnsubscribePage(params: {
  appName: string;
  email: string;
  token: string;
}): string {
  const app = escapeHtml(params.appName);
  const action = `/unsubscribe?token=${encodeURIComponent(params.token)}`;
  const body = `    <h1>Confirm Unsubscribe</h1>
    <p>Unsubscribe <strong>${escapeHtml(params.email)}</strong> from ${app}?</p>
    <form method="POST" action="${escapeHtml(action)}">
      <input type="hidden" name="token" value="${escapeHtml(params.token)}">
      <input type="hidden" name="confirm" value="yes">
      <button type="submit" class="button danger">Yes, unsubscribe me</button>
      <a href="/" class="button secondary">Cancel</a>
    </form>`;
  return layout(params.appName, "Confirm Unsubscribe", body);
}
