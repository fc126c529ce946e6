/**
 * Normalizes freeform industry strings to canonical industry names and
 * their salary bucket.
 *
 * Strategy (in order):
 *   1. Exact alias match (case-insensitive) against data/industries.json
 *   2. Substring match, longest alias first, so "Management Consulting"
 *      wins over "Consulting"
 *   3. Pass-through: the trimmed raw value, which has no salary bucket
 */
import { loadDataFile } from "./data-files.ts";
import { buildKeywordTable } from "./keyword-table.ts";
import type { IndustryBucket, IndustryEntry } from "./types.ts";

const industries = loadDataFile<IndustryEntry[]>("industries.json");

// Lowercased alias → entry
const aliasToIndustry = new Map<string, IndustryEntry>();

// Longest-first for greedy substring matching
const aliasesByLength: Array<{ alias: string; industry: IndustryEntry }> = [];

for (const industry of industries) {
  for (const alias of [industry.name, ...industry.aliases]) {
    const lower = alias.toLowerCase().trim();
    aliasToIndustry.set(lower, industry);
    aliasesByLength.push({ alias: lower, industry });
  }
}
aliasesByLength.sort((a, b) => b.alias.length - a.alias.length);

const industryTable = buildKeywordTable(
  industries.map((industry) => ({ value: industry.name, terms: industry.aliases }))
);

const INDUSTRY_LABEL = /^(?:industry|branche|sector|sektor)\s*(?::|\s[-–]\s)\s*(.+)$/i;

function findIndustry(raw: string): IndustryEntry | null {
  const key = raw.trim().toLowerCase();
  if (!key) return null;

  const exact = aliasToIndustry.get(key);
  if (exact) return exact;

  for (const entry of aliasesByLength) {
    if (key.includes(entry.alias) || entry.alias.includes(key)) {
      return entry.industry;
    }
  }
  return null;
}

/**
 * Normalize a freeform industry string to its canonical form.
 * Returns the canonical name if found, otherwise the trimmed input as-is.
 */
export function normalizeIndustry(raw: string): string {
  if (!raw || !raw.trim()) return "";
  return findIndustry(raw)?.name ?? raw.trim();
}

/** Salary bucket for an industry value; null when the industry is unknown. */
export function industryBucket(industry: string | null): IndustryBucket | null {
  if (!industry) return null;
  return findIndustry(industry)?.bucket ?? null;
}

/**
 * Industry of a job ad: an "Industry:"/"Branche:" label first, otherwise
 * the earliest industry keyword in the text.
 */
export function extractIndustry(lines: readonly string[], text: string): string | null {
  for (const line of lines) {
    const labeled = INDUSTRY_LABEL.exec(line);
    if (labeled) {
      const industry = normalizeIndustry(labeled[1]);
      if (industry) return industry;
    }
  }
  return industryTable.matchFirst(text);
}
