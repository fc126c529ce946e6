import { InvalidRawInputError, UnsupportedSourceKindError } from "./errors.ts";
import type { RawInput, RawInputLike, SourceType } from "./utils/types.ts";

export const SOURCE_TYPES: readonly SourceType[] = Object.freeze(["url", "pdf", "docx", "text"]);

const SOURCE_TYPE_SET: ReadonlySet<string> = new Set(SOURCE_TYPES);

export function isSourceType(value: string): value is SourceType {
  return SOURCE_TYPE_SET.has(value);
}

/**
 * Check caller input before any extraction work. Source kind is checked
 * first so an unknown kind is reported even when the content is empty.
 */
export function parseRawInput(input: RawInputLike): RawInput {
  const sourceType = input.source_type;
  if (typeof sourceType !== "string" || !isSourceType(sourceType)) {
    throw new UnsupportedSourceKindError(String(sourceType));
  }

  const content = input.content;
  if (typeof content !== "string" || !content.trim()) {
    throw new InvalidRawInputError("RawInput content must be a non-empty string");
  }

  return Object.freeze({ source_type: sourceType, content });
}
