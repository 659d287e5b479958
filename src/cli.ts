// pattern: Imperative Shell
import type { Logger } from "pino";
import { dispatchNewsletter } from "./newsletter";
import type { CheckMailFn, SendNewsletterFn } from "./newsletter";

export type CliCommand =
  | { readonly kind: "run"; readonly once: boolean }
  | { readonly kind: "send"; readonly htmlPath: string }
  | { readonly kind: "check-mail" };

/**
 * Reads the command from the process arguments (without node and script).
 *
 * - `--send <file.html>` mails an already rendered newsletter
 * - `--check-mail` verifies the mail credentials without sending
 * - otherwise a generation run, single-shot with `--once`
 */
export function parseCliArgs(args: ReadonlyArray<string>): CliCommand {
  const sendIndex = args.indexOf("--send");
  if (sendIndex !== -1) {
    const htmlPath = args[sendIndex + 1];
    if (!htmlPath || htmlPath.startsWith("--")) {
      throw new Error("--send needs the path of a rendered newsletter");
    }
    return { kind: "send", htmlPath };
  }

  if (args.includes("--check-mail")) {
    return { kind: "check-mail" };
  }

  return { kind: "run", once: args.includes("--once") };
}

/** Mails an existing newsletter file. Exit code 0 once at least one recipient got it. */
export async function sendRenderedNewsletter(
  htmlPath: string,
  recipients: ReadonlyArray<string>,
  send: SendNewsletterFn,
  logger: Logger,
  date: Date = new Date(),
): Promise<number> {
  if (recipients.length === 0) {
    logger.error("no recipients configured in dispatch.recipients");
    return 1;
  }

  const report = await dispatchNewsletter(htmlPath, recipients, send, logger, date);
  return report.sent > 0 ? 0 : 1;
}

export async function checkMailCredentials(
  check: CheckMailFn,
  logger: Logger,
): Promise<number> {
  const result = await check(logger);
  return result.success ? 0 : 1;
}
