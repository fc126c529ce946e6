import { describe, it, expect } from "vitest";
import { buildBooleanSearch, enrich, selectTopSkills } from "../src/enrich.ts";
import { emptyExtraction } from "../src/fields.ts";
import type { ExtractionResult } from "../src/utils/types.ts";

function extraction(fields: Partial<ExtractionResult>): ExtractionResult {
  return { ...emptyExtraction(), ...fields };
}

const TWELVE_SKILLS = [
  "Python", "SQL", "Docker", "Kubernetes", "AWS", "Terraform",
  "Linux", "Git", "Kafka", "Spark", "Airflow", "Tableau",
];

describe("selectTopSkills", () => {
  it("keeps the first ten skills in order", () => {
    expect(selectTopSkills(TWELVE_SKILLS)).toEqual(TWELVE_SKILLS.slice(0, 10));
  });

  it("keeps shorter lists whole", () => {
    expect(selectTopSkills(["Python"])).toEqual(["Python"]);
  });
});

describe("buildBooleanSearch", () => {
  it("combines title aliases and skills", () => {
    expect(buildBooleanSearch("Data Scientist", ["Python", "SQL"])).toBe(
      '("Data Scientist" OR "Machine Learning Scientist" OR "Data Science Specialist") AND ("Python" OR "SQL")'
    );
  });

  it("looks up aliases without seniority words", () => {
    expect(buildBooleanSearch("Senior Data Engineer", [])).toBe(
      '("Senior Data Engineer" OR "Big Data Engineer" OR "Dateningenieur")'
    );
  });

  it("drops embedded quotes and repeated terms", () => {
    expect(buildBooleanSearch('The "Cloud" Wrangler', ["Git", "git"])).toBe(
      '("The Cloud Wrangler") AND ("Git")'
    );
  });

  it("omits an empty title group", () => {
    expect(buildBooleanSearch(null, ["Python"])).toBe('("Python")');
  });

  it("returns an empty string without title and skills", () => {
    expect(buildBooleanSearch(null, [])).toBe("");
    expect(buildBooleanSearch("   ", [])).toBe("");
  });
});

describe("enrich", () => {
  it("adds a salary band for a senior role with context", () => {
    const result = enrich(
      extraction({
        job_title: "Data Scientist",
        seniority: "Senior",
        city: "Berlin",
        industry: "Information Technology",
        must_have_skills: ["Python"],
      })
    );
    expect(result.top_skills).toEqual(["Python"]);
    expect(result.boolean_search).toBe(
      '("Data Scientist" OR "Machine Learning Scientist" OR "Data Science Specialist") AND ("Python")'
    );
    expect(result.salary_band?.lower).toBe(86100);
    expect(result.salary_band?.upper).toBe(109200);
  });

  it("leaves the band out for junior roles", () => {
    const result = enrich(
      extraction({ seniority: "Junior", city: "Berlin", industry: "Information Technology" })
    );
    expect(result.salary_band).toBeNull();
  });

  it("truncates skills to ten", () => {
    const result = enrich(extraction({ must_have_skills: TWELVE_SKILLS }));
    expect(result.top_skills).toHaveLength(10);
  });

  it("handles an empty extraction", () => {
    expect(enrich(emptyExtraction())).toEqual({
      top_skills: [],
      boolean_search: "",
      salary_band: null,
    });
  });
});
