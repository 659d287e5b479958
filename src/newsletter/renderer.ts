import { readFileSync } from "node:fs";
import type { SectionSet } from "../pipeline/types";
import { parseVocabulary, renderVocabularyItems } from "./vocabulary";

export type NewsletterInput = {
  readonly title: string;
  readonly sections: SectionSet;
  readonly sourceUrl: string;
  readonly date: Date;
};

export const PLACEHOLDERS = {
  title: "{{TITRE_ARTICLE}}",
  article: "{{ARTICLE_SIMPLIFIE}}",
  vocabulary: "{{VOCABULAIRE_ITEMS}}",
  grammar: "{{POINT_LANGUE}}",
  summary: "{{RESUME_FRANCAIS}}",
  date: "{{DATE}}",
  sourceUrl: "{{LIEN_ARTICLE}}",
} as const;

const LINE_BREAK = "<br><br>";

function withBreaks(text: string): string {
  return text.replaceAll("\n", LINE_BREAK);
}

const pad = (value: number): string => String(value).padStart(2, "0");

/** Formats a date as DD/MM/YYYY in local time. */
export function formatNewsletterDate(date: Date): string {
  return `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()}`;
}

/**
 * Reads the newsletter template from disk.
 * @throws Error naming the path when the file is missing or unreadable.
 */
export function loadTemplate(templatePath: string): string {
  try {
    return readFileSync(templatePath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read template at ${templatePath}: ${message}`);
  }
}

/**
 * Fills the template placeholders with the newsletter content.
 *
 * Values are substituted as-is, in placeholder order: nothing is HTML-escaped,
 * and placeholder syntax inside generated text can be picked up by a later
 * substitution.
 */
export function renderNewsletter(template: string, input: NewsletterInput): string {
  const replacements: ReadonlyArray<readonly [string, string]> = [
    [PLACEHOLDERS.title, input.title],
    [PLACEHOLDERS.article, withBreaks(input.sections.article)],
    [
      PLACEHOLDERS.vocabulary,
      renderVocabularyItems(parseVocabulary(input.sections.vocabulary)),
    ],
    [PLACEHOLDERS.grammar, withBreaks(input.sections.grammar)],
    [PLACEHOLDERS.summary, withBreaks(input.sections.summary)],
    [PLACEHOLDERS.date, formatNewsletterDate(input.date)],
    [PLACEHOLDERS.sourceUrl, input.sourceUrl],
  ];

  return replacements.reduce(
    (html, [placeholder, value]) => html.split(placeholder).join(value),
    template,
  );
}
