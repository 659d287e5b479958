import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { createLlmClient } from "./llm/client";
import {
  createMailgunCheck,
  createMailgunSender,
  runNewsletterCycle,
} from "./newsletter";
import type { SendNewsletterFn } from "./newsletter";
import { checkMailCredentials, parseCliArgs, sendRenderedNewsletter } from "./cli";
import type { CliCommand } from "./cli";
import { createNewsletterScheduler } from "./scheduler";
import { registerShutdownHandlers } from "./lifecycle";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";

async function main(): Promise<void> {
  const logger = createLogger();

  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "invalid command line",
    );
    process.exit(1);
  }

  logger.info({ command: command.kind }, "tagesbrief starting");

  let config: AppConfig;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    { provider: config.llm.provider, model: config.llm.model },
    "config loaded",
  );

  const apiKey = process.env["MAILGUN_API_KEY"];
  const domain = process.env["MAILGUN_DOMAIN"];

  if (command.kind === "send" || command.kind === "check-mail") {
    if (!apiKey || !domain) {
      logger.fatal("MAILGUN_API_KEY and MAILGUN_DOMAIN must be set to use the mail commands");
      process.exit(1);
    }

    const exitCode =
      command.kind === "send"
        ? await sendRenderedNewsletter(
            resolve(command.htmlPath),
            config.dispatch.recipients,
            createMailgunSender(apiKey, domain, config.dispatch.fromName),
            logger,
          )
        : await checkMailCredentials(createMailgunCheck(apiKey, domain), logger);
    process.exit(exitCode);
  }

  const model = createLlmClient(config);

  let send: SendNewsletterFn | null = null;
  if (apiKey && domain) {
    send = createMailgunSender(apiKey, domain, config.dispatch.fromName);
  } else {
    logger.warn("MAILGUN_API_KEY or MAILGUN_DOMAIN not set, email dispatch disabled");
  }

  const deps = { config, model, logger, send };

  const cronExpression = config.schedule.cron;
  if (command.once || !cronExpression) {
    const result = await runNewsletterCycle(deps);
    process.exit(result.success ? 0 : 1);
  } else {
    const scheduler = createNewsletterScheduler(cronExpression, deps);
    logger.info({ schedule: cronExpression }, "newsletter scheduler started");
    registerShutdownHandlers({ schedulers: [scheduler], logger });
  }
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
