import { loadDataFile } from "./utils/data-files.ts";
import { buildKeywordTable } from "./utils/keyword-table.ts";
import { dedupeCaseInsensitive } from "./utils/text.ts";
import type { VocabularyEntry } from "./utils/types.ts";

const vocabulary = loadDataFile<VocabularyEntry[]>("skill-vocabulary.json");

// Canonical name and aliases (DE/EN) all resolve to the canonical name
const skillTable = buildKeywordTable(
  vocabulary.map((skill) => ({ value: skill.name, terms: [skill.name, ...skill.aliases] }))
);

/**
 * Extract known skills from a job ad, in order of first mention.
 * Matching is case-insensitive and word-bounded; duplicates are dropped
 * case-insensitively.
 */
export function extractSkills(text: string): string[] {
  return dedupeCaseInsensitive(skillTable.matchAll(text).map((match) => match.value));
}
