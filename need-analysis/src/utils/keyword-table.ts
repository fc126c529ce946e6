import { escapeRegExp } from "./text.ts";

export interface KeywordEntry<T> {
  value: T;
  terms: readonly string[];
}

interface KeywordPattern<T> {
  value: T;
  regex: RegExp;
}

export interface KeywordMatch<T> {
  value: T;
  index: number;
}

export interface KeywordTable<T> {
  /** Every entry mentioned in the text, ordered by first appearance. */
  matchAll(text: string): KeywordMatch<T>[];
  /** The entry mentioned earliest in the text, or null. */
  matchFirst(text: string): T | null;
}

// \b only knows ASCII word characters; umlauts and terms such as "C++"
// need explicit letter/digit lookarounds instead
function termSource(term: string): string {
  return escapeRegExp(term.trim()).replace(/\s+/g, "\\s+");
}

function buildPattern(terms: readonly string[]): RegExp {
  const alternatives = [...terms]
    .sort((a, b) => b.length - a.length)
    .map(termSource)
    .join("|");
  return new RegExp(`(?<![\\p{L}\\p{N}_])(?:${alternatives})(?![\\p{L}\\p{N}_])`, "iu");
}

/**
 * Compile a static keyword table into case-insensitive, word-bounded
 * patterns. Entries without terms are dropped.
 */
export function buildKeywordTable<T>(entries: readonly KeywordEntry<T>[]): KeywordTable<T> {
  const patterns: KeywordPattern<T>[] = entries
    .filter((entry) => entry.terms.length > 0)
    .map((entry) => ({ value: entry.value, regex: buildPattern(entry.terms) }));

  function matchAll(text: string): KeywordMatch<T>[] {
    const found: KeywordMatch<T>[] = [];
    for (const pattern of patterns) {
      const match = pattern.regex.exec(text);
      if (match) {
        found.push({ value: pattern.value, index: match.index });
      }
    }
    // Array#sort is stable, so equal positions keep table order
    return found.sort((a, b) => a.index - b.index);
  }

  function matchFirst(text: string): T | null {
    const [first] = matchAll(text);
    return first ? first.value : null;
  }

  return { matchAll, matchFirst };
}
