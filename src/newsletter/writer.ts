// pattern: Imperative Shell
import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { SectionSet } from "../pipeline/types";

/** JSON record written beside each newsletter; field names are the on-disk keys. */
export type RunRecord = {
  readonly generation_date: string;
  readonly original_title: string;
  readonly source_url: string;
  readonly full_text: string;
  readonly model_name: string;
  readonly status: "success";
};

const pad = (value: number): string => String(value).padStart(2, "0");

/** `YYYYMMDD_HHMMSS` in local time, shared by the HTML and JSON file names. */
export function outputTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

function formatGenerationDate(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

function writeOutputFile(dir: string, fileName: string, contents: string): string {
  const path = join(dir, fileName);
  try {
    mkdirSync(dir, { recursive: true });
    writeFileSync(path, contents, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to write ${path}: ${message}`);
  }
  return path;
}

/**
 * Writes the rendered newsletter as `newsletter_<timestamp>.html`.
 * @returns The path of the written file.
 */
export function writeNewsletterHtml(dir: string, html: string, date: Date): string {
  return writeOutputFile(dir, `newsletter_${outputTimestamp(date)}.html`, html);
}

/** Plain-text version of the newsletter stored in the run record. */
export function formatNewsletterText(title: string, sections: SectionSet): string {
  return [
    `📰 ${title}`,
    "",
    "=== ARTICLE SIMPLIFIÉ (Niveau A2) ===",
    sections.article,
    "",
    "=== VOCABULAIRE UTILE ===",
    sections.vocabulary,
    "",
    "=== POINT DE LANGUE ===",
    sections.grammar,
    "",
    "=== RÉSUMÉ EN FRANÇAIS ===",
    sections.summary,
  ].join("\n");
}

export function buildRunRecord(
  title: string,
  sections: SectionSet,
  sourceUrl: string,
  modelName: string,
  date: Date,
): RunRecord {
  return {
    generation_date: formatGenerationDate(date),
    original_title: title,
    source_url: sourceUrl,
    full_text: formatNewsletterText(title, sections),
    model_name: modelName,
    status: "success",
  };
}

export function writeRunRecord(dir: string, record: RunRecord, date: Date): string {
  return writeOutputFile(
    dir,
    `newsletter_${outputTimestamp(date)}.json`,
    JSON.stringify(record, null, 2),
  );
}
