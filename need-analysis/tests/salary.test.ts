import { describe, it, expect } from "vitest";
import { estimateSalaryBand } from "../src/salary.ts";
import { emptyExtraction } from "../src/fields.ts";
import type { ExtractionResult } from "../src/utils/types.ts";

function extraction(fields: Partial<ExtractionResult>): ExtractionResult {
  return { ...emptyExtraction(), ...fields };
}

describe("estimateSalaryBand", () => {
  it("applies the city premium to the industry base", () => {
    const band = estimateSalaryBand(
      extraction({ seniority: "Senior", city: "Berlin", industry: "Information Technology" })
    );
    expect(band).toEqual({
      lower: 86100,
      upper: 109200,
      adjustments: [
        { factor: "base", value: "Senior/tech", multiplier: 1 },
        { factor: "city", value: "Berlin", multiplier: 1.05 },
      ],
    });
  });

  it("applies employment and contract multipliers after the city", () => {
    const band = estimateSalaryBand(
      extraction({
        seniority: "Mid",
        industry: "Consulting",
        employment_type: "part_time",
        contract_type: "fixed_term",
      })
    );
    expect(band?.lower).toBe(38600);
    expect(band?.upper).toBe(50500);
    expect(band?.adjustments.map((step) => step.factor)).toEqual([
      "base",
      "employment_type",
      "contract_type",
    ]);
  });

  it("uses the general bucket for an unknown industry in a known city", () => {
    const band = estimateSalaryBand(extraction({ seniority: "Mid", city: "Hamburg", industry: "Gastronomie" }));
    expect(band).toEqual({
      lower: 59400,
      upper: 77800,
      adjustments: [
        { factor: "base", value: "Mid/general", multiplier: 1 },
        { factor: "city", value: "Hamburg", multiplier: 1.08 },
      ],
    });
  });

  it("matches seniority case-insensitively", () => {
    const senior = estimateSalaryBand(extraction({ seniority: "senior", city: "Berlin" }));
    expect(senior).toEqual({
      lower: 78800,
      upper: 99800,
      adjustments: [
        { factor: "base", value: "Senior/general", multiplier: 1 },
        { factor: "city", value: "Berlin", multiplier: 1.05 },
      ],
    });
    const mid = estimateSalaryBand(extraction({ seniority: "MID", industry: "Financial Services" }));
    expect(mid?.lower).toBe(62000);
    expect(mid?.upper).toBe(80000);
    expect(estimateSalaryBand(extraction({ seniority: "junior", city: "Berlin" }))).toBeNull();
  });

  it("returns null for seniorities without a band", () => {
    const context = { city: "Berlin", industry: "Information Technology" };
    expect(estimateSalaryBand(extraction({ seniority: "Junior", ...context }))).toBeNull();
    expect(estimateSalaryBand(extraction({ seniority: "Lead", ...context }))).toBeNull();
    expect(estimateSalaryBand(extraction(context))).toBeNull();
  });

  it("returns null without city or industry context", () => {
    expect(estimateSalaryBand(extraction({ seniority: "Senior", city: "Ulm" }))).toBeNull();
  });
});
