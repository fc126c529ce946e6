import { MalformedRequiredPathsError } from "./errors.ts";
import { isMissingValue, resolveFieldPath } from "./fields.ts";
import { logger } from "./utils/logger.ts";
import type { ExtractionResult, FieldPath, ValidationReport } from "./utils/types.ts";

// ── Required paths ───────────────────────────────────────────────────

function describeEntry(entry: unknown): string {
  if (typeof entry === "string") return entry;
  if (entry === null || typeof entry !== "object") return String(entry);
  try {
    return JSON.stringify(entry) ?? String(entry);
  } catch (err) {
    // Circular structures cannot be serialized
    logger.debug("Required path entry is not serializable", err);
    return String(entry);
  }
}

/**
 * Turn caller input into canonical field paths. Accepts an array or Set of
 * canonical or dotted keys; repeats collapse to their first occurrence.
 * Throws MalformedRequiredPathsError when the input is not a list or any
 * entry is unknown.
 */
export function parseRequiredPaths(input: unknown): FieldPath[] {
  let entries: unknown[];
  if (Array.isArray(input)) {
    entries = input;
  } else if (input instanceof Set) {
    entries = [...input];
  } else {
    throw new MalformedRequiredPathsError([describeEntry(input)], []);
  }

  const resolved: FieldPath[] = [];
  const invalid: string[] = [];

  for (const entry of entries) {
    const path = typeof entry === "string" ? resolveFieldPath(entry) : null;
    if (!path) {
      invalid.push(describeEntry(entry));
      continue;
    }
    if (!resolved.includes(path)) resolved.push(path);
  }

  if (invalid.length > 0) {
    throw new MalformedRequiredPathsError(invalid, resolved);
  }
  return resolved;
}

// ── Validation ───────────────────────────────────────────────────────

// Half-up to two decimals; EPSILON keeps 0.125-style values from rounding down
function roundConfidence(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

/**
 * Report which required fields the extraction left empty. `missing` keeps
 * the order of `requiredPaths`; an empty requirement set scores 1.
 */
export function validate(
  result: ExtractionResult,
  requiredPaths: Iterable<FieldPath>
): ValidationReport {
  const required: FieldPath[] = [];
  for (const path of requiredPaths) {
    if (!required.includes(path)) required.push(path);
  }

  if (required.length === 0) {
    return { missing: [], confidence: 1 };
  }

  const missing = required.filter((path) => isMissingValue(result[path]));
  const confidence = roundConfidence(1 - missing.length / required.length);

  logger.debug(`Validated ${required.length} required fields`, { missing });
  return { missing, confidence };
}
