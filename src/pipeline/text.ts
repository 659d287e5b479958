// pattern: functional-core

/** Length in Unicode code points; a character outside the BMP counts once. */
export function codePointLength(text: string): number {
  return [...text].length;
}

/** The first `count` code points of `text`, never ending on half a surrogate pair. */
export function takeCodePoints(text: string, count: number): string {
  if (text.length <= count) {
    return text;
  }
  return Array.from(text).slice(0, count).join("");
}
