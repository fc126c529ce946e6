import { estimateSalaryBand } from "./salary.ts";
import { stripSeniorityCues } from "./role-extract.ts";
import { loadDataFile } from "./utils/data-files.ts";
import { dedupeCaseInsensitive } from "./utils/text.ts";
import { logger } from "./utils/logger.ts";
import type { EnrichmentResult, ExtractionResult, TitleAliases } from "./utils/types.ts";

const titleAliases = loadDataFile<TitleAliases>("title-aliases.json");

const MAX_TOP_SKILLS = 10;

// ── Skills ───────────────────────────────────────────────────────────

/** The first ten must-have skills, in extraction order. */
export function selectTopSkills(skills: readonly string[]): string[] {
  return skills.slice(0, MAX_TOP_SKILLS);
}

// ── Boolean search ───────────────────────────────────────────────────

function aliasesFor(title: string): readonly string[] {
  const key = stripSeniorityCues(title).toLowerCase();
  return Object.hasOwn(titleAliases, key) ? titleAliases[key] : [];
}

function orGroup(terms: readonly string[]): string | null {
  const quoted = dedupeCaseInsensitive(
    terms.map((term) => term.replace(/"/g, "").trim()).filter(Boolean)
  ).map((term) => `"${term}"`);
  return quoted.length > 0 ? `(${quoted.join(" OR ")})` : null;
}

/**
 * Recruiter search string: `("Title" OR "Alias") AND ("Skill" OR ...)`.
 * Empty groups are left out; no title and no skills gives "".
 */
export function buildBooleanSearch(title: string | null, topSkills: readonly string[]): string {
  const titleTerms = title && title.trim() ? [title, ...aliasesFor(title)] : [];
  const groups = [orGroup(titleTerms), orGroup(topSkills)].filter(
    (group): group is string => group !== null
  );
  return groups.join(" AND ");
}

// ── Public API ───────────────────────────────────────────────────────

export function enrich(result: ExtractionResult): EnrichmentResult {
  const topSkills = selectTopSkills(result.must_have_skills);
  const enrichment: EnrichmentResult = {
    top_skills: topSkills,
    boolean_search: buildBooleanSearch(result.job_title, topSkills),
    salary_band: estimateSalaryBand(result),
  };

  logger.debug("Enrichment complete", {
    top_skills: topSkills.length,
    salary_band: enrichment.salary_band !== null,
  });
  return enrichment;
}
