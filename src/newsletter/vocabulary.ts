// pattern: functional-core

export type VocabEntry = {
  readonly word: string;
  readonly translation: string;
};

const ORDINAL_PREFIX = /^\d+\.\s*/;

/**
 * Parses the vocabulary section, one `N. word = translation` entry per line.
 * Only the first `=` separates word from translation; lines without one
 * are skipped.
 */
export function parseVocabulary(text: string): Array<VocabEntry> {
  const entries: Array<VocabEntry> = [];

  for (const line of text.split("\n")) {
    const separator = line.indexOf("=");
    if (separator === -1) {
      continue;
    }

    entries.push({
      word: line.substring(0, separator).replace(ORDINAL_PREFIX, "").trim(),
      translation: line.substring(separator + 1).trim(),
    });
  }

  return entries;
}

export function renderVocabularyItems(entries: ReadonlyArray<VocabEntry>): string {
  return entries
    .map(
      (entry) => `
                    <li class="vocab-item">
                        <div class="vocab-word">${entry.word}</div>
                        <div class="vocab-translation">= ${entry.translation}</div>
                    </li>`,
    )
    .join("");
}
