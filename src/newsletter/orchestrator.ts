// pattern: Imperative Shell
import type { LanguageModel } from "ai";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import {
  collectCandidates,
  extractArticle,
  generateSections,
  selectCandidate,
} from "../pipeline";
import { loadTemplate, renderNewsletter } from "./renderer";
import { buildRunRecord, writeNewsletterHtml, writeRunRecord } from "./writer";
import { dispatchNewsletter } from "./sender";
import type { DispatchReport, SendNewsletterFn } from "./sender";

export type RunStage = "select" | "extract" | "generate" | "render" | "write";

export type RunResult =
  | {
      readonly success: true;
      readonly htmlPath: string;
      readonly jsonPath: string | null;
      readonly dispatch: DispatchReport | null;
    }
  | { readonly success: false; readonly stage: RunStage; readonly error: string };

export type NewsletterDeps = {
  readonly config: AppConfig;
  readonly model: LanguageModel;
  readonly logger: Logger;
  /** Omitted when mail credentials are not configured. */
  readonly send?: SendNewsletterFn | null;
  readonly now?: () => Date;
};

/**
 * Runs one newsletter cycle: collect → select → extract → generate → render
 * → write, then the optional JSON record and email dispatch.
 *
 * Behavior:
 * - Feed sources that fail are skipped; every later stage is fail-fast and
 *   the first failure ends the run with its stage and message.
 * - Nothing is written to disk unless all four sections were generated.
 * - A JSON record that cannot be written is logged as a warning only.
 * - Dispatch outcomes are reported, never turned into a run failure.
 */
export async function runNewsletterCycle(deps: NewsletterDeps): Promise<RunResult> {
  const { config, model, logger } = deps;
  const startedAt = Date.now();
  const date = deps.now ? deps.now() : new Date();

  const fail = (stage: RunStage, error: string): RunResult => {
    logger.error({ stage, error }, "newsletter run aborted");
    return { success: false, stage, error };
  };

  logger.info({ sourceCount: config.sources.length }, "newsletter run starting");

  const candidates = await collectCandidates(
    config.sources,
    {
      userAgent: config.extraction.userAgent,
      timeoutMs: config.extraction.timeoutMs,
      verifyTls: config.extraction.verifyTls,
    },
    logger,
  );
  if (candidates.length === 0) {
    return fail("select", "no candidates collected from any source");
  }

  const selected = selectCandidate(candidates, config.scoring, logger);
  if (!selected) {
    return fail("select", "no eligible candidate");
  }
  const { candidate } = selected;

  const extraction = await extractArticle(candidate, config.extraction, logger);
  if (!extraction.success) {
    return fail("extract", extraction.error);
  }

  const generation = await generateSections(
    model,
    extraction.content.text,
    config.generation,
    logger,
  );
  if (!generation.success) {
    return fail("generate", `section ${generation.failedSection} missing`);
  }
  const { sections } = generation;

  let html: string;
  try {
    const template = loadTemplate(config.template.path);
    html = renderNewsletter(template, {
      title: candidate.title,
      sections,
      sourceUrl: candidate.url,
      date,
    });
  } catch (err) {
    return fail("render", err instanceof Error ? err.message : String(err));
  }

  let htmlPath: string;
  try {
    htmlPath = writeNewsletterHtml(config.output.dir, html, date);
  } catch (err) {
    return fail("write", err instanceof Error ? err.message : String(err));
  }
  logger.info({ htmlPath }, "newsletter written");

  let jsonPath: string | null = null;
  if (config.output.writeJson) {
    try {
      const record = buildRunRecord(
        candidate.title,
        sections,
        candidate.url,
        `${config.llm.provider}:${config.llm.model}`,
        date,
      );
      jsonPath = writeRunRecord(config.output.dir, record, date);
      logger.info({ jsonPath }, "run record written");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn({ error: message }, "run record not written");
    }
  }

  let dispatch: DispatchReport | null = null;
  if (deps.send && config.dispatch.recipients.length > 0) {
    dispatch = await dispatchNewsletter(
      htmlPath,
      config.dispatch.recipients,
      deps.send,
      logger,
      date,
    );
  } else {
    logger.info("newsletter dispatch disabled");
  }

  logger.info(
    { htmlPath, durationMs: Date.now() - startedAt },
    "newsletter run complete",
  );
  return { success: true, htmlPath, jsonPath, dispatch };
}
