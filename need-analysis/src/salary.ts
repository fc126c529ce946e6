import { loadDataFile } from "./utils/data-files.ts";
import { lookupCity } from "./utils/parse-location.ts";
import { industryBucket } from "./utils/normalize-industry.ts";
import { logger } from "./utils/logger.ts";
import type {
  ExtractionResult,
  SalaryAdjustment,
  SalaryBand,
  SalaryTable,
} from "./utils/types.ts";

const salaryTable = loadDataFile<SalaryTable>("salary-bands.json");

type BandedSeniority = keyof SalaryTable["base"];

// Seniority may come from other producers in any letter case
const BANDED_SENIORITY = new Map<string, BandedSeniority>([
  ["mid", "Mid"],
  ["senior", "Senior"],
]);

function roundToHundred(value: number): number {
  return Math.round(value / 100) * 100;
}

function multiplierFor(table: Record<string, number>, key: string): number {
  return Object.hasOwn(table, key) ? table[key] : 1;
}

// ── Public API ───────────────────────────────────────────────────────

/**
 * Annual gross salary band (EUR) for Mid and Senior roles, matched
 * case-insensitively.
 *
 * The base range comes from the seniority and the industry's bucket, then
 * the city premium, employment type and contract type are applied in that
 * order. Returns null for other seniorities and when neither the city nor
 * the industry is known.
 */
export function estimateSalaryBand(result: ExtractionResult): SalaryBand | null {
  const seniority = result.seniority
    ? BANDED_SENIORITY.get(result.seniority.trim().toLowerCase())
    : undefined;
  if (!seniority) return null;

  const city = result.city ? lookupCity(result.city) : null;
  const bucket = industryBucket(result.industry);
  if (!city && !bucket) {
    logger.debug("No city or industry context for a salary band");
    return null;
  }

  const [baseLower, baseUpper] = salaryTable.base[seniority][bucket ?? "general"];
  const adjustments: SalaryAdjustment[] = [
    { factor: "base", value: `${seniority}/${bucket ?? "general"}`, multiplier: 1 },
  ];

  if (city) {
    adjustments.push({ factor: "city", value: city.name, multiplier: city.salaryMultiplier });
  }
  if (result.employment_type) {
    adjustments.push({
      factor: "employment_type",
      value: result.employment_type,
      multiplier: multiplierFor(salaryTable.employmentType, result.employment_type),
    });
  }
  if (result.contract_type) {
    adjustments.push({
      factor: "contract_type",
      value: result.contract_type,
      multiplier: multiplierFor(salaryTable.contractType, result.contract_type),
    });
  }

  // Each bound runs the same chain on its own, rounding only at the end
  let lower = baseLower;
  let upper = baseUpper;
  for (const step of adjustments) {
    lower *= step.multiplier;
    upper *= step.multiplier;
  }

  return { lower: roundToHundred(lower), upper: roundToHundred(upper), adjustments };
}
