// pattern: imperative-shell
import { generateText } from "ai";
import type { LanguageModel } from "ai";
import type { Logger } from "pino";
import type { GenerationConfig } from "../config";
import { buildPrompt } from "./prompts";
import { codePointLength, takeCodePoints } from "./text";
import type { SectionKind, SectionSet } from "./types";

/**
 * Progress of one newsletter's generation. Sections are produced in the
 * order article, vocabulary, grammar, summary; the first missing section
 * moves the machine to `failed`, which is terminal.
 */
export type GenerationState =
  | { readonly status: "pending" }
  | {
      readonly status: "article_done";
      readonly sections: Pick<SectionSet, "article">;
    }
  | {
      readonly status: "vocabulary_done";
      readonly sections: Pick<SectionSet, "article" | "vocabulary">;
    }
  | {
      readonly status: "grammar_done";
      readonly sections: Pick<SectionSet, "article" | "vocabulary" | "grammar">;
    }
  | { readonly status: "summary_done"; readonly sections: SectionSet }
  | { readonly status: "failed"; readonly failedSection: SectionKind };

export type GenerationOutcome =
  | { readonly success: true; readonly sections: SectionSet }
  | { readonly success: false; readonly failedSection: SectionKind };

export const INITIAL_GENERATION_STATE: GenerationState = { status: "pending" };

/** The section the machine waits for, or null once it has stopped. */
export function nextSection(state: GenerationState): SectionKind | null {
  switch (state.status) {
    case "pending":
      return "article";
    case "article_done":
      return "vocabulary";
    case "vocabulary_done":
      return "grammar";
    case "grammar_done":
      return "summary";
    case "summary_done":
    case "failed":
      return null;
  }
}

/**
 * Feeds the result of the awaited section into the machine. A null (missing)
 * result fails the generation; terminal states are returned unchanged.
 */
export function advance(
  state: GenerationState,
  text: string | null,
): GenerationState {
  switch (state.status) {
    case "pending":
      return text
        ? { status: "article_done", sections: { article: text } }
        : { status: "failed", failedSection: "article" };
    case "article_done":
      return text
        ? {
            status: "vocabulary_done",
            sections: { ...state.sections, vocabulary: text },
          }
        : { status: "failed", failedSection: "vocabulary" };
    case "vocabulary_done":
      return text
        ? {
            status: "grammar_done",
            sections: { ...state.sections, grammar: text },
          }
        : { status: "failed", failedSection: "grammar" };
    case "grammar_done":
      return text
        ? {
            status: "summary_done",
            sections: { ...state.sections, summary: text },
          }
        : { status: "failed", failedSection: "summary" };
    case "summary_done":
    case "failed":
      return state;
  }
}

/**
 * Caps the simplified article at `maxLength` code points without ending
 * mid-sentence: the cut backs off to the last period it contains.
 */
export function trimArticle(text: string, maxLength: number): string {
  if (codePointLength(text) <= maxLength) {
    return text;
  }

  const cut = takeCodePoints(text, maxLength);
  const lastPeriod = cut.lastIndexOf(".");
  return lastPeriod === -1 ? `${cut}.` : cut.substring(0, lastPeriod + 1);
}

/**
 * Requests one section from the model in a single attempt.
 * Returns null when the call fails, times out or yields only whitespace.
 */
export async function generateSection(
  model: LanguageModel,
  kind: SectionKind,
  articleText: string,
  options: GenerationConfig,
  logger: Logger,
): Promise<string | null> {
  try {
    const { text } = await generateText({
      model,
      prompt: buildPrompt(kind, articleText),
      temperature: options.temperature,
      maxOutputTokens:
        kind === "article" ? options.articleMaxTokens : options.sectionMaxTokens,
      maxRetries: 0,
      abortSignal: AbortSignal.timeout(options.timeoutMs),
    });

    const generated = text.trim();
    if (generated.length === 0) {
      logger.warn({ section: kind }, "model returned an empty section");
      return null;
    }

    return kind === "article"
      ? trimArticle(generated, options.articleMaxLength)
      : generated;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ section: kind, error: message }, "section generation failed");
    return null;
  }
}

function describeSection(kind: SectionKind, text: string): Record<string, number> {
  switch (kind) {
    case "vocabulary":
      return { entries: text.split("\n").filter((line) => line.includes("=")).length };
    case "summary":
      return { words: text.split(/\s+/).length };
    case "article":
    case "grammar":
      return { characters: text.length };
  }
}

/**
 * Generates the four newsletter sections one after the other, stopping at
 * the first one the model fails to deliver.
 */
export async function generateSections(
  model: LanguageModel,
  articleText: string,
  options: GenerationConfig,
  logger: Logger,
): Promise<GenerationOutcome> {
  let state = INITIAL_GENERATION_STATE;

  for (let kind = nextSection(state); kind; kind = nextSection(state)) {
    logger.info({ section: kind }, "generating section");
    const text = await generateSection(model, kind, articleText, options, logger);
    state = advance(state, text);

    if (text) {
      logger.info({ section: kind, ...describeSection(kind, text) }, "section generated");
    }
  }

  if (state.status === "summary_done") {
    return { success: true, sections: state.sections };
  }

  if (state.status !== "failed") {
    throw new Error(`generation stopped in unexpected state ${state.status}`);
  }

  logger.error({ section: state.failedSection }, "newsletter generation aborted");
  return { success: false, failedSection: state.failedSection };
}
