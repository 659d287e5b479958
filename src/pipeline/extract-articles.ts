import type { Logger } from "pino";
import type { ExtractionConfig } from "../config";
import { fetchArticle } from "./fetcher";
import { extractContent } from "./extractor";
import type { ArticleContent, Candidate } from "./types";

export type ExtractionOutcome =
  | { readonly success: true; readonly content: ArticleContent }
  | { readonly success: false; readonly error: string };

/**
 * Fetches the selected candidate's page and extracts its body text.
 * A failed fetch, a parse error or a page without usable paragraphs
 * is reported as a failure; partial text is never returned.
 *
 * @param candidate - The selected feed entry.
 * @param config - Extraction settings (user agent, timeout, limits, TLS policy).
 * @param logger - Logger instance for progress and error messages.
 */
export async function extractArticle(
  candidate: Candidate,
  config: ExtractionConfig,
  logger: Logger,
): Promise<ExtractionOutcome> {
  if (!config.verifyTls) {
    logger.warn(
      { url: candidate.url },
      "tls certificate verification disabled for article fetch",
    );
  }

  const fetched = await fetchArticle(candidate.url, config, logger);
  if (!fetched.success) {
    return { success: false, error: fetched.error };
  }

  let text: string;
  try {
    text = extractContent(fetched.body, config, fetched.charset);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ url: candidate.url, error: message }, "article parse failed");
    return { success: false, error: message };
  }

  if (text.length === 0) {
    logger.error({ url: candidate.url }, "no usable paragraphs in article");
    return { success: false, error: "no usable paragraphs found" };
  }

  logger.info(
    { url: candidate.url, textLength: text.length },
    "article content extracted",
  );
  return { success: true, content: { candidate, text } };
}
