import nodemailer from "nodemailer";
import type { SendMailOptions as NodemailerMessage } from "nodemailer";
import type { MailConfig } from "../config.js";

/** The part of a nodemailer Transporter we use. Tests pass a fake. */
export interface MailTransport {
  sendMail(message: NodemailerMessage): Promise<unknown>;
}

export interface SendMailOptions {
  to: string;
  subject: string;
  text: string;
  /** Adds a List-Unsubscribe header so mail clients can offer one-click unsubscribe. */
  unsubscribeUrl?: string;
}

export interface SendMailResult {
  sent: boolean;
  error?: string;
}

export interface Mailer {
  send(options: SendMailOptions): Promise<SendMailResult>;
}

export interface MailerIdentity {
  /** Sender address. */
  from: string;
  /** Display name shown next to the sender address. */
  fromName: string;
  /** Where "reply with UNSUBSCRIBE" replies go. Defaults to `from`. */
  replyTo?: string;
}

/**
 * SMTP transport with explicit timeouts; nodemailer otherwise waits minutes
 * on an unresponsive server.
 */
export function createSmtpTransport(config: MailConfig): MailTransport {
  return nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: config.port === 465,
    auth: { user: config.user, pass: config.password },
    connectionTimeout: config.timeoutMs,
    greetingTimeout: config.timeoutMs,
    socketTimeout: config.timeoutMs,
  });
}

/**
 * Plain-text mail sender. Returns { sent: true } on success, { sent: false, error } on failure.
 */
export function createMailer(
  transport: MailTransport,
  identity: MailerIdentity,
): Mailer {
  return {
    async send(options: SendMailOptions): Promise<SendMailResult> {
      try {
        await transport.sendMail({
          from: { name: identity.fromName, address: identity.from },
          to: options.to,
          replyTo: identity.replyTo?.trim() || identity.from,
          subject: options.subject,
          text: options.text,
          ...(options.unsubscribeUrl
            ? { list: { unsubscribe: options.unsubscribeUrl } }
            : {}),
        });
        return { sent: true };
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        return { sent: false, error: msg };
      }
    },
  };
}
