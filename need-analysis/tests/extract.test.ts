import { describe, it, expect } from "vitest";
import {
  extract,
  extractContact,
  extractLanguages,
  extractResponsibilities,
  extractStartDate,
} from "../src/extract.ts";
import { InvalidRawInputError, UnsupportedSourceKindError } from "../src/errors.ts";

const GERMAN_AD = [
  "Musterfirma GmbH sucht",
  "Senior Softwareentwickler (m/w/d)",
  "Standort: München",
  "Branche: Software",
  "Vollzeit, unbefristet, ab sofort",
  "",
  "Ihre Aufgaben:",
  "- Entwicklung von Microservices mit Java und Kubernetes",
  "- Code Reviews im Team",
  "",
  "Ihr Profil:",
  "- Erfahrung mit Java, Spring Boot und PostgreSQL",
  "- Sehr gute Deutschkenntnisse und Englischkenntnisse",
].join("\r\n");

describe("extract", () => {
  it("extracts title, seniority, company and skills from a one-line ad", () => {
    const result = extract({
      source_type: "text",
      content: "Senior Data Scientist at ACME AG using Python and SQL",
    });
    expect(result.job_title).toBe("Data Scientist");
    expect(result.seniority).toBe("Senior");
    expect(result.company_name).toBe("ACME AG");
    expect(result.must_have_skills).toEqual(["Python", "SQL"]);
    expect(result.city).toBeNull();
    expect(result.responsibilities).toEqual([]);
  });

  it("extracts a German ad", () => {
    const result = extract({ source_type: "docx", content: GERMAN_AD });
    expect(result).toEqual({
      company_name: "Musterfirma GmbH",
      job_title: "Softwareentwickler",
      seniority: "Senior",
      department: null,
      industry: "Information Technology",
      city: "Munich",
      employment_type: "full_time",
      contract_type: "permanent",
      start_date: "ASAP",
      languages: ["German", "English"],
      must_have_skills: ["Java", "Kubernetes", "Spring Boot", "PostgreSQL"],
      responsibilities: [
        "Entwicklung von Microservices mit Java und Kubernetes",
        "Code Reviews im Team",
      ],
      contact_name: null,
      contact_email: null,
      contact_phone: null,
    });
  });

  it("is deterministic", () => {
    const input = { source_type: "text", content: GERMAN_AD };
    expect(extract(input)).toEqual(extract(input));
  });

  it("returns a frozen result", () => {
    const result = extract({ source_type: "text", content: GERMAN_AD });
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.must_have_skills)).toBe(true);
  });

  it("rejects unknown source types", () => {
    expect(() => extract({ source_type: "xml", content: "<job/>" })).toThrow(
      UnsupportedSourceKindError
    );
  });

  it("rejects blank content", () => {
    expect(() => extract({ source_type: "text", content: "   " })).toThrow(InvalidRawInputError);
  });
});

describe("extractResponsibilities", () => {
  it("collects bullets until the next known heading", () => {
    const lines = ["Your tasks", "- Build pipelines", "- Review code", "Requirements", "- Python"];
    expect(extractResponsibilities(lines)).toEqual(["Build pipelines", "Review code"]);
  });

  it("accepts headings with trailing words", () => {
    const lines = ["Deine Aufgaben bei uns:", "• Kunden beraten", "", "Benefits"];
    expect(extractResponsibilities(lines)).toEqual(["Kunden beraten"]);
  });

  it("returns an empty list without a heading", () => {
    expect(extractResponsibilities(["- Build pipelines"])).toEqual([]);
  });
});

describe("extractLanguages", () => {
  it("reads languages from sentences about language skills", () => {
    expect(extractLanguages("Fluent English and German required. Python experience.")).toEqual([
      "English",
      "German",
    ]);
  });

  it("ignores language names without a language cue", () => {
    expect(extractLanguages("Our office is in the German part of Switzerland")).toEqual([]);
  });
});

describe("extractStartDate", () => {
  it("maps immediate starts to ASAP", () => {
    expect(extractStartDate("Beginn ab sofort")).toBe("ASAP");
  });

  it("converts German dates to ISO", () => {
    expect(extractStartDate("Start: 01.09.2025")).toBe("2025-09-01");
  });

  it("keeps an impossible date as written", () => {
    expect(extractStartDate("Startdatum: 2025-13-01")).toBe("2025-13-01");
  });

  it("returns null without a start cue", () => {
    expect(extractStartDate("No date here")).toBeNull();
  });
});

describe("extractContact", () => {
  it("extracts name, e-mail and phone", () => {
    const lines = ["Ansprechpartnerin: Anna Schmidt, anna.schmidt@example.com", "Tel.: +49 30 1234567"];
    expect(extractContact(lines, lines.join("\n"))).toEqual({
      contact_name: "Anna Schmidt",
      contact_email: "anna.schmidt@example.com",
      contact_phone: "+49 30 1234567",
    });
  });

  it("returns nulls when no contact is given", () => {
    expect(extractContact(["Apply online"], "Apply online")).toEqual({
      contact_name: null,
      contact_email: null,
      contact_phone: null,
    });
  });
});
