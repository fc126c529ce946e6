import { extract } from "./extract.ts";
import { enrich } from "./enrich.ts";
import { parseRequiredPaths, validate } from "./validate.ts";
import { emptyExtraction } from "./fields.ts";
import {
  MalformedRequiredPathsError,
  InvalidRawInputError,
  StageFailure,
  UnsupportedSourceKindError,
  describeError,
} from "./errors.ts";
import type { PipelineStage } from "./errors.ts";
import { logger } from "./utils/logger.ts";
import type {
  EnrichmentResult,
  ExtractionResult,
  FieldPath,
  PipelineResult,
  RawInputLike,
  ValidationReport,
} from "./utils/types.ts";

export { extract } from "./extract.ts";
export { enrich, buildBooleanSearch, selectTopSkills } from "./enrich.ts";
export { estimateSalaryBand } from "./salary.ts";
export { parseRequiredPaths, validate } from "./validate.ts";
export { DEFAULT_REQUIRED_PATHS, FIELD_ALIASES, FIELD_PATHS, resolveFieldPath } from "./fields.ts";
export * from "./errors.ts";
export type * from "./utils/types.ts";

// Errors the stages raise on purpose pass through as-is; anything else is
// tagged with the stage it escaped from.
function toStageError(stage: PipelineStage, err: unknown): Error {
  if (
    err instanceof UnsupportedSourceKindError ||
    err instanceof InvalidRawInputError ||
    err instanceof MalformedRequiredPathsError
  ) {
    return err;
  }
  return new StageFailure(stage, err);
}

/**
 * Run one job ad through extract → validate → enrich.
 *
 * Never throws. A failing stage leaves its message in `error` (the first
 * failure wins) and later stages carry on where they can: a failed
 * extraction validates as an empty result. Enrichment runs whenever no
 * required field is missing.
 */
export function runPipeline(raw: RawInputLike, requiredPaths: unknown): PipelineResult {
  let error: string | null = null;
  const fail = (stage: PipelineStage, err: unknown): void => {
    const stageError = toStageError(stage, err);
    logger.warn(`Pipeline ${stage} stage failed`, stageError);
    error ??= describeError(stageError);
  };

  // ── Extract ──────────────────────────────────────────────────────
  let extraction: ExtractionResult;
  try {
    extraction = extract(raw);
  } catch (err) {
    fail("extract", err);
    extraction = emptyExtraction();
  }
  logger.debug("Pipeline: extraction done");

  // ── Validate ─────────────────────────────────────────────────────
  let required: FieldPath[];
  try {
    required = parseRequiredPaths(requiredPaths);
  } catch (err) {
    fail("validate", err);
    required = err instanceof MalformedRequiredPathsError ? err.resolved : [];
  }

  let validation: ValidationReport;
  try {
    validation = validate(extraction, required);
  } catch (err) {
    fail("validate", err);
    validation = { missing: [...required], confidence: 0 };
  }
  logger.debug("Pipeline: validation done", validation);

  // ── Enrich ───────────────────────────────────────────────────────
  let enrichment: EnrichmentResult | null = null;
  if (validation.missing.length === 0) {
    try {
      enrichment = enrich(extraction);
    } catch (err) {
      fail("enrich", err);
    }
    logger.debug("Pipeline: enrichment done");
  } else {
    logger.debug("Pipeline: enrichment skipped", { missing: validation.missing });
  }

  return { extraction, validation, enrichment, error };
}
