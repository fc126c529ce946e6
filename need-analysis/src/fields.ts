import type { ExtractionResult, FieldPath } from "./utils/types.ts";

/**
 * Canonical field paths. Extractor output, validator input and enricher
 * lookups all use these strings; a field is identified by nothing else.
 */
export const FIELD_PATHS = [
  "company_name",
  "job_title",
  "seniority",
  "department",
  "industry",
  "city",
  "employment_type",
  "contract_type",
  "start_date",
  "languages",
  "must_have_skills",
  "responsibilities",
  "contact_name",
  "contact_email",
  "contact_phone",
] as const satisfies readonly FieldPath[];

/** Dotted Need-Analysis Profile keys accepted in place of canonical paths. */
export const FIELD_ALIASES: Readonly<Record<string, FieldPath>> = Object.freeze({
  "company.name": "company_name",
  "company.industry": "industry",
  "company.contact_name": "contact_name",
  "company.contact_email": "contact_email",
  "company.contact_phone": "contact_phone",
  "position.job_title": "job_title",
  "position.seniority_level": "seniority",
  "team.department_name": "department",
  "location.primary_city": "city",
  "employment.employment_type": "employment_type",
  "employment.contract_type": "contract_type",
  "employment.start_date": "start_date",
  "requirements.languages_required": "languages",
  "requirements.hard_skills_required": "must_have_skills",
  "responsibilities.items": "responsibilities",
});

/** Pflichtfelder used when a caller does not name its own required set. */
export const DEFAULT_REQUIRED_PATHS: readonly FieldPath[] = Object.freeze([
  "company_name",
  "job_title",
  "seniority",
  "city",
  "employment_type",
  "contract_type",
  "must_have_skills",
  "responsibilities",
]);

const FIELD_PATH_SET: ReadonlySet<string> = new Set(FIELD_PATHS);

export function isFieldPath(value: string): value is FieldPath {
  return FIELD_PATH_SET.has(value);
}

/** Canonical path for a canonical or dotted key; null when unknown. */
export function resolveFieldPath(key: string): FieldPath | null {
  if (isFieldPath(key)) return key;
  return Object.hasOwn(FIELD_ALIASES, key) ? FIELD_ALIASES[key] : null;
}

export function isMissingValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === "string") return value.trim() === "";
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

export function emptyExtraction(): ExtractionResult {
  return Object.freeze({
    company_name: null,
    job_title: null,
    seniority: null,
    department: null,
    industry: null,
    city: null,
    employment_type: null,
    contract_type: null,
    start_date: null,
    languages: Object.freeze([]),
    must_have_skills: Object.freeze([]),
    responsibilities: Object.freeze([]),
    contact_name: null,
    contact_email: null,
    contact_phone: null,
  });
}
