import type { FieldPath } from "./utils/types.ts";

export type PipelineStage = "extract" | "validate" | "enrich";

export class UnsupportedSourceKindError extends Error {
  readonly code = "UNSUPPORTED_SOURCE_KIND";

  constructor(readonly sourceType: string) {
    super(`Unsupported source type "${sourceType}" (expected url, pdf, docx or text)`);
    this.name = "UnsupportedSourceKindError";
  }
}

export class InvalidRawInputError extends Error {
  readonly code = "INVALID_RAW_INPUT";

  constructor(message: string) {
    super(message);
    this.name = "InvalidRawInputError";
  }
}

/**
 * Thrown when required field paths are not a list/set of known field
 * names. `resolved` holds the entries that were usable.
 */
export class MalformedRequiredPathsError extends Error {
  readonly code = "MALFORMED_REQUIRED_PATHS";

  constructor(
    readonly invalidEntries: string[],
    readonly resolved: FieldPath[]
  ) {
    super(`Malformed required field paths: ${invalidEntries.join(", ")}`);
    this.name = "MalformedRequiredPathsError";
  }
}

/** Anything else a stage throws, tagged with the stage it came from. */
export class StageFailure extends Error {
  readonly code = "STAGE_FAILURE";

  constructor(
    readonly stage: PipelineStage,
    cause: unknown
  ) {
    super(`${stage} stage failed: ${describeError(cause)}`, { cause });
    this.name = "StageFailure";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return String(err);
}
