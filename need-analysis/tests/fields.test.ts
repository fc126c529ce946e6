import { describe, it, expect } from "vitest";
import {
  DEFAULT_REQUIRED_PATHS,
  FIELD_PATHS,
  emptyExtraction,
  isMissingValue,
  resolveFieldPath,
} from "../src/fields.ts";

describe("resolveFieldPath", () => {
  it("accepts canonical paths", () => {
    expect(resolveFieldPath("city")).toBe("city");
    expect(resolveFieldPath("must_have_skills")).toBe("must_have_skills");
  });

  it("resolves dotted profile keys", () => {
    expect(resolveFieldPath("location.primary_city")).toBe("city");
    expect(resolveFieldPath("position.seniority_level")).toBe("seniority");
    expect(resolveFieldPath("requirements.hard_skills_required")).toBe("must_have_skills");
  });

  it("is case-sensitive", () => {
    expect(resolveFieldPath("Location.Primary_City")).toBeNull();
    expect(resolveFieldPath("CITY")).toBeNull();
  });

  it("ignores inherited object keys", () => {
    expect(resolveFieldPath("toString")).toBeNull();
    expect(resolveFieldPath("__proto__")).toBeNull();
  });
});

describe("isMissingValue", () => {
  it("treats null, blank strings and empty lists as missing", () => {
    expect(isMissingValue(null)).toBe(true);
    expect(isMissingValue(undefined)).toBe(true);
    expect(isMissingValue("  ")).toBe(true);
    expect(isMissingValue([])).toBe(true);
  });

  it("treats anything else as present", () => {
    expect(isMissingValue("Berlin")).toBe(false);
    expect(isMissingValue(["Python"])).toBe(false);
  });
});

describe("emptyExtraction", () => {
  it("has every field path and nothing present", () => {
    const empty = emptyExtraction();
    expect(Object.keys(empty).sort()).toEqual([...FIELD_PATHS].sort());
    expect(FIELD_PATHS.every((path) => isMissingValue(empty[path]))).toBe(true);
    expect(Object.isFrozen(empty)).toBe(true);
  });
});

describe("DEFAULT_REQUIRED_PATHS", () => {
  it("only names canonical paths", () => {
    expect(DEFAULT_REQUIRED_PATHS.every((path) => resolveFieldPath(path) === path)).toBe(true);
  });
});
