/**
 * Quick smoke test: runs a few sample ads through the pipeline.
 * Run: npx tsx scripts/sample-run.ts
 */
import { runPipeline } from "../src/pipeline.ts";
import { DEFAULT_REQUIRED_PATHS } from "../src/fields.ts";
import type { RawInputLike } from "../src/utils/types.ts";

const sampleAds: RawInputLike[] = [
  {
    source_type: "text",
    content: "Senior Data Scientist at ACME AG using Python and SQL",
  },
  {
    source_type: "text",
    content: [
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
      "- Erfahrung mit Java, Spring und PostgreSQL",
      "- Sehr gute Deutschkenntnisse und Englischkenntnisse",
    ].join("\n"),
  },
  {
    source_type: "xml",
    content: "<job>Data Engineer</job>",
  },
];

for (const ad of sampleAds) {
  const result = runPipeline(ad, DEFAULT_REQUIRED_PATHS);
  const { extraction, validation, enrichment, error } = result;

  console.log(`\n=== ${extraction.job_title ?? "(no title)"} at ${extraction.company_name ?? "(no company)"} ===`);
  console.log(`  Seniority: ${extraction.seniority ?? "-"}  City: ${extraction.city ?? "-"}`);
  console.log(`  Skills: ${extraction.must_have_skills.join(", ") || "(none)"}`);
  console.log(`  Confidence: ${validation.confidence}  Missing: ${validation.missing.join(", ") || "-"}`);

  if (enrichment) {
    console.log(`  Search: ${enrichment.boolean_search}`);
    const band = enrichment.salary_band;
    console.log(band ? `  Salary: €${band.lower.toLocaleString()}-€${band.upper.toLocaleString()}` : "  Salary: -");
  }
  if (error) console.log(`  Error: ${error}`);
}

console.log("\n✓ Sample run complete");
