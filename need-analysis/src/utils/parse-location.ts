/**
 * City recognition for job ads.
 *
 * Handles inputs like:
 *   "Standort: München"
 *   "Location: Berlin, Germany"
 *   "Arbeitsort - Frankfurt am Main (hybrid)"
 *   "... für unser Büro in Köln ..."
 *
 * Known cities (data/cities.json) come back under one canonical name
 * ("München" → "Munich"). An unknown city behind a location label is
 * cleaned up and returned as written.
 */
import { loadDataFile } from "./data-files.ts";
import { buildKeywordTable } from "./keyword-table.ts";
import type { CityEntry } from "./types.ts";

const cities = loadDataFile<CityEntry[]>("cities.json");

const cityTable = buildKeywordTable(
  cities.map((city) => ({ value: city, terms: [city.name, ...city.aliases] }))
);

const byName = new Map<string, CityEntry>();
for (const city of cities) {
  for (const name of [city.name, ...city.aliases]) {
    byName.set(name.toLowerCase(), city);
  }
}

const LOCATION_LABEL =
  /^(?:location|primary city|based in|standort|hauptstandort|arbeitsort|einsatzort|dienstort|ort|stadt)\s*(?::|\s[-–]\s)\s*(.+)$/i;

// Lowercase words allowed inside a city name ("Frankfurt am Main")
const CONNECTOR_WORDS = new Set([
  "am", "an", "im", "in", "der", "die", "das", "de", "del", "da", "du", "van", "von", "of", "la", "le", "a.",
]);

const TRAILING_STOPWORDS = new Set(["am", "an", "im", "in", "der", "die", "das", "und", "oder", "a", "the", "of"]);

/** Earliest known city mentioned anywhere in the text. */
export function findCity(text: string): CityEntry | null {
  return cityTable.matchFirst(text);
}

/** Exact (case-insensitive) lookup of a canonical city name or alias. */
export function lookupCity(name: string): CityEntry | null {
  return byName.get(name.trim().toLowerCase()) ?? null;
}

/**
 * Trim a raw location value down to its city: cut at the first separator,
 * keep capitalized words and name connectors, drop trailing stopwords.
 */
export function cleanCity(raw: string): string {
  const firstPart = raw
    .split(/[,;|(/\n]|\s[-–]\s/)[0]
    .replace(/[^\p{L}\s.-]+/gu, "")
    .trim();

  const kept: string[] = [];
  for (const token of firstPart.split(/\s+/).filter(Boolean)) {
    const first = token.charAt(0);
    if (first !== first.toLowerCase() || CONNECTOR_WORDS.has(token.toLowerCase())) {
      kept.push(token);
      continue;
    }
    break;
  }

  while (kept.length > 0 && TRAILING_STOPWORDS.has(kept[kept.length - 1].toLowerCase())) {
    kept.pop();
  }
  return kept.join(" ");
}

/**
 * Parse a freeform location value. Known cities are canonicalized; other
 * values are cleaned. Returns null for values such as "Remote".
 */
export function parseLocation(raw: string): string | null {
  if (!raw || !raw.trim()) return null;

  const known = findCity(raw);
  if (known) return known.name;

  const cleaned = cleanCity(raw.replace(/\(?\b(?:remote|hybrid)\b\)?/gi, ""));
  return cleaned || null;
}

/**
 * City of a job ad: a labeled location line first, otherwise the first
 * known city mentioned in the text.
 */
export function extractCity(lines: readonly string[], text: string): string | null {
  for (const line of lines) {
    const labeled = LOCATION_LABEL.exec(line);
    if (!labeled) continue;
    const city = parseLocation(labeled[1]);
    if (city) return city;
  }
  return findCity(text)?.name ?? null;
}
