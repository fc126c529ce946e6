/**
 * Whitespace normalization for pasted or converted job ads.
 *
 * Line breaks survive (section and bullet detection work line by line);
 * runs of blank lines shrink to a single paragraph break.
 */
export function normalizeText(raw: string): string {
  return raw
    .replace(/\r\n?/g, "\n")
    .replace(/[\t\u00a0\u2007\u202f]/g, " ")
    .split("\n")
    .map((line) => line.replace(/ {2,}/g, " ").trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const BULLET_PREFIX = /^(?:[-•*–·▪►]|\d{1,2}[.)])\s*/;

export function isBulletLine(line: string): boolean {
  return BULLET_PREFIX.test(line);
}

export function stripBullet(line: string): string {
  return line.replace(BULLET_PREFIX, "").trim();
}

export function isCapitalized(word: string): boolean {
  const first = word.charAt(0);
  return first !== first.toLowerCase() && first === first.toUpperCase();
}

/** Splits on sentence punctuation and line breaks, dropping empty pieces. */
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?;])\s+|\n+/)
    .map((s) => s.trim())
    .filter(Boolean);
}

/** Case-insensitive dedupe that keeps the first spelling seen. */
export function dedupeCaseInsensitive(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const key = value.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(value);
  }
  return result;
}
