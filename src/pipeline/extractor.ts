// pattern: functional-core
import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { codePointLength, takeCodePoints } from "./text";

export type ExtractOptions = {
  readonly minParagraphLength: number;
  readonly maxLength: number;
};

function loadDocument(html: string | Buffer, charset: string | null): CheerioAPI {
  if (typeof html === "string") {
    return cheerio.load(html);
  }

  // BOM, then the transport charset, then <meta>; undeclared pages are UTF-8
  return cheerio.loadBuffer(html, {
    encoding: {
      transportLayerEncodingLabel: charset ?? undefined,
      defaultEncoding: "utf-8",
    },
  });
}

/**
 * Extracts the article body as plain text: every paragraph longer than
 * `minParagraphLength` once trimmed, separated by blank lines, then cut
 * at `maxLength` code points (mid-sentence if need be).
 *
 * Raw bytes are decoded with the page's declared charset; `charset` is the
 * one from the Content-Type header, when there was one.
 */
export function extractContent(
  html: string | Buffer,
  options: ExtractOptions,
  charset: string | null = null,
): string {
  const $ = loadDocument(html, charset);

  const paragraphs = $("p")
    .map((_, el) => $(el).text().trim())
    .get()
    .filter((text) => codePointLength(text) > options.minParagraphLength);

  return takeCodePoints(paragraphs.join("\n\n"), options.maxLength);
}
