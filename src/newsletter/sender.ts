// pattern: Imperative Shell
import { readFileSync } from "node:fs";
import Mailgun from "mailgun.js";
import FormData from "form-data";
import type { Logger } from "pino";
import { formatNewsletterDate } from "./renderer";

/**
 * Discriminated union result type for a single newsletter email.
 */
export type SendResult =
  | { readonly success: true; readonly messageId: string }
  | { readonly success: false; readonly error: string };

/**
 * Sends the newsletter to one recipient. Never throws; errors are returned
 * in the result.
 */
export type SendNewsletterFn = (
  recipient: string,
  subject: string,
  html: string,
  logger: Logger,
) => Promise<SendResult>;

/** Result of an authenticated call that sends nothing. */
export type MailCheckResult =
  | { readonly success: true; readonly domain: string }
  | { readonly success: false; readonly error: string };

export type CheckMailFn = (logger: Logger) => Promise<MailCheckResult>;

export type DispatchReport = {
  readonly sent: number;
  readonly failed: number;
  readonly errors: ReadonlyArray<{ readonly recipient: string; readonly error: string }>;
};

function mailgunClient(apiKey: string) {
  const mailgun = new Mailgun(FormData);
  return mailgun.client({ username: "api", key: apiKey });
}

/**
 * Creates a Mailgun-based newsletter sender.
 *
 * @param apiKey - Mailgun API key
 * @param domain - Mailgun sending domain
 * @param fromName - Display name of the sender
 */
export function createMailgunSender(
  apiKey: string,
  domain: string,
  fromName: string,
): SendNewsletterFn {
  const mg = mailgunClient(apiKey);

  return async function sendNewsletter(
    recipient: string,
    subject: string,
    html: string,
    logger: Logger,
  ): Promise<SendResult> {
    try {
      const result = await mg.messages.create(domain, {
        from: `${fromName} <noreply@${domain}>`,
        to: [recipient],
        subject,
        html,
      });

      logger.info({ messageId: result.id, recipient }, "newsletter email sent");
      return { success: true, messageId: result.id ?? "unknown" };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ recipient, error: message }, "newsletter email send failed");
      return { success: false, error: message };
    }
  };
}

/**
 * Creates a credential check that looks up the sending domain with the
 * configured key. Never throws.
 */
export function createMailgunCheck(apiKey: string, domain: string): CheckMailFn {
  const mg = mailgunClient(apiKey);

  return async function checkMail(logger: Logger): Promise<MailCheckResult> {
    try {
      const info = await mg.domains.get(domain);
      logger.info({ domain: info.name }, "mail credentials verified");
      return { success: true, domain: info.name };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ domain, error: message }, "mail credential check failed");
      return { success: false, error: message };
    }
  };
}

export function newsletterSubject(date: Date): string {
  return `📰 Votre newsletter quotidienne - ${formatNewsletterDate(date)}`;
}

/**
 * Mails a rendered newsletter file to each recipient in turn and counts
 * the outcomes. An unreadable file fails every recipient without sending.
 */
export async function dispatchNewsletter(
  htmlPath: string,
  recipients: ReadonlyArray<string>,
  send: SendNewsletterFn,
  logger: Logger,
  date: Date = new Date(),
): Promise<DispatchReport> {
  let html: string;
  try {
    html = readFileSync(htmlPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ htmlPath, error: message }, "newsletter file unreadable");
    return {
      sent: 0,
      failed: recipients.length,
      errors: recipients.map((recipient) => ({ recipient, error: message })),
    };
  }

  const subject = newsletterSubject(date);
  let sent = 0;
  const errors: Array<{ recipient: string; error: string }> = [];

  for (const recipient of recipients) {
    const result = await send(recipient, subject, html, logger);
    if (result.success) {
      sent++;
    } else {
      errors.push({ recipient, error: result.error });
    }
  }

  logger.info(
    { sent, failed: errors.length, recipientCount: recipients.length },
    "newsletter dispatch complete",
  );
  return { sent, failed: errors.length, errors };
}
