// ── Raw input ────────────────────────────────────────────────────────

export type SourceType = "url" | "pdf" | "docx" | "text";

export interface RawInput {
  readonly source_type: SourceType;
  readonly content: string;
}

/** Unchecked caller input; `parseRawInput` narrows it to a RawInput. */
export interface RawInputLike {
  source_type: string;
  content: string;
}

// ── Extraction ───────────────────────────────────────────────────────

export type Seniority = "Junior" | "Mid" | "Senior" | "Lead";

export type EmploymentType =
  | "full_time"
  | "part_time"
  | "contractor"
  | "intern"
  | "working_student";

export type ContractType = "permanent" | "fixed_term";

// Keys double as the canonical field paths (see fields.ts)
export interface ExtractionResult {
  readonly company_name: string | null;
  readonly job_title: string | null;
  // A Seniority from the extractor; other producers may differ in case
  readonly seniority: Seniority | string | null;
  readonly department: string | null;
  readonly industry: string | null;
  readonly city: string | null;
  readonly employment_type: EmploymentType | null;
  readonly contract_type: ContractType | null;
  readonly start_date: string | null;
  readonly languages: readonly string[];
  readonly must_have_skills: readonly string[];
  readonly responsibilities: readonly string[];
  readonly contact_name: string | null;
  readonly contact_email: string | null;
  readonly contact_phone: string | null;
}

export type FieldPath = keyof ExtractionResult;

// ── Validation ───────────────────────────────────────────────────────

export interface ValidationReport {
  missing: FieldPath[];
  confidence: number; // 0..1, two decimals
}

// ── Enrichment ───────────────────────────────────────────────────────

export type SalaryFactor = "base" | "city" | "employment_type" | "contract_type";

export interface SalaryAdjustment {
  factor: SalaryFactor;
  value: string;
  multiplier: number;
}

export interface SalaryBand {
  lower: number;
  upper: number;
  adjustments: SalaryAdjustment[];
}

export interface EnrichmentResult {
  top_skills: string[];
  boolean_search: string;
  salary_band: SalaryBand | null;
}

// ── Pipeline envelope ────────────────────────────────────────────────

export interface PipelineResult {
  extraction: ExtractionResult;
  validation: ValidationReport;
  enrichment: EnrichmentResult | null;
  error: string | null;
}

// ── Data files ───────────────────────────────────────────────────────

/** Canonical name plus the spellings (DE/EN) that map onto it. */
export interface VocabularyEntry {
  name: string;
  aliases: string[];
}

export interface CityEntry extends VocabularyEntry {
  salaryMultiplier: number;
}

export type IndustryBucket =
  | "general"
  | "tech"
  | "finance"
  | "consulting"
  | "industrial"
  | "public";

export interface IndustryEntry extends VocabularyEntry {
  bucket: IndustryBucket;
}

export type SalaryRange = [lower: number, upper: number];

export interface SalaryTable {
  base: Record<"Mid" | "Senior", Record<IndustryBucket, SalaryRange>>;
  employmentType: Record<string, number>;
  contractType: Record<string, number>;
}

/** Lowercased job title → alternative titles for boolean search. */
export type TitleAliases = Record<string, string[]>;
