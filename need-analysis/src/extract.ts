import { parseRawInput } from "./raw-input.ts";
import { extractJobTitle, detectSeniority } from "./role-extract.ts";
import { extractCompanyName } from "./company-extract.ts";
import { extractSkills } from "./skills-extract.ts";
import { extractCity } from "./utils/parse-location.ts";
import { extractIndustry } from "./utils/normalize-industry.ts";
import { loadDataFile } from "./utils/data-files.ts";
import { buildKeywordTable } from "./utils/keyword-table.ts";
import { logger } from "./utils/logger.ts";
import {
  normalizeText,
  isBulletLine,
  stripBullet,
  splitSentences,
  dedupeCaseInsensitive,
} from "./utils/text.ts";
import type {
  ContractType,
  EmploymentType,
  ExtractionResult,
  RawInputLike,
  VocabularyEntry,
} from "./utils/types.ts";

// ── Vocabulary tables ────────────────────────────────────────────────

const employmentTable = buildKeywordTable<EmploymentType>([
  { value: "full_time", terms: ["Vollzeit", "full-time", "full time", "fulltime"] },
  { value: "part_time", terms: ["Teilzeit", "part-time", "part time", "parttime"] },
  { value: "working_student", terms: ["Werkstudent", "Werkstudentin", "working student"] },
  { value: "intern", terms: ["Praktikum", "Praktikant", "Praktikantin", "internship", "intern"] },
  { value: "contractor", terms: ["freelance", "freelancer", "freiberuflich", "contractor"] },
]);

const contractTable = buildKeywordTable<ContractType>([
  { value: "permanent", terms: ["unbefristet", "unbefristete", "permanent", "Festanstellung"] },
  { value: "fixed_term", terms: ["befristet", "befristete", "fixed-term", "fixed term", "temporary"] },
]);

const languageTable = buildKeywordTable(
  loadDataFile<VocabularyEntry[]>("languages.json").map((language) => ({
    value: language.name,
    terms: [language.name, ...language.aliases],
  }))
);

// ── Patterns ─────────────────────────────────────────────────────────

const LANGUAGE_CONTEXT =
  /fluent|fluency|proficien|native|kenntnisse|verhandlungssicher|fließend|language|sprache|spoken|written|mother tongue|muttersprach/i;

const DEPARTMENT_LABEL = /^(?:department|abteilung|team|bereich)\s*(?::|\s[-–]\s)\s*(.+)$/i;

const CONTACT_LABEL =
  /^(?:contact person|contact|ansprechpartner(?:in)?|ihr ansprechpartner|kontakt|kontaktperson)\s*(?::|\s[-–]\s)\s*(.+)$/i;

const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;

const PHONE_PATTERN = /(?<![\p{L}])(?:tel(?:efon)?|phone|mobil|mobile)\.?\s*:?\s*(\+?\d[\d\s\/()-]{5,}\d)/iu;

const START_IMMEDIATE =
  /ab\s+sofort|asap|a\.s\.a\.p\.|zum\s+nächstmöglichen\s+zeitpunkt|so\s+bald\s+wie\s+möglich|immediately/i;

const START_DATE =
  /(?:start|beginn|eintritt|startdatum|starting date|start date)\s*:?\s*(?:ab|am|on|from)?\s*(\d{4}-\d{2}-\d{2}|\d{1,2}\.\d{1,2}\.\d{4}|\d{1,2}\/\d{1,2}\/\d{4})/i;

const RESPONSIBILITY_HEADINGS = [
  "responsibilities",
  "your responsibilities",
  "key responsibilities",
  "your tasks",
  "tasks",
  "what you will do",
  "what you'll do",
  "your role",
  "aufgaben",
  "deine aufgaben",
  "ihre aufgaben",
  "dein aufgabengebiet",
  "ihr aufgabengebiet",
  "was dich erwartet",
  "was sie erwartet",
];

// Headings that close a responsibilities section
const OTHER_HEADINGS = [
  "requirements",
  "your profile",
  "qualifications",
  "what you bring",
  "skills",
  "what we offer",
  "benefits",
  "about us",
  "anforderungen",
  "dein profil",
  "ihr profil",
  "was du mitbringst",
  "was sie mitbringen",
  "wir bieten",
  "das bieten wir",
  "unser angebot",
  "über uns",
  "kontakt",
  "contact",
];

// ── Field extractors ─────────────────────────────────────────────────

function isHeading(line: string, headings: readonly string[]): boolean {
  if (!line || isBulletLine(line)) return false;
  const key = line
    .replace(/^#+\s*/, "")
    .replace(/[:!]+$/, "")
    .trim()
    .toLowerCase();
  if (key.length > 40) return false;
  return headings.some((heading) => key === heading || key.startsWith(`${heading} `));
}

/**
 * Lines under a responsibilities heading, bullet markers stripped. The
 * section ends at the next known heading, or at a blank line once at
 * least one item has been collected.
 */
export function extractResponsibilities(lines: readonly string[]): string[] {
  const items: string[] = [];
  let capturing = false;

  for (const line of lines) {
    if (isHeading(line, RESPONSIBILITY_HEADINGS)) {
      if (items.length > 0) break;
      capturing = true;
      continue;
    }
    if (!capturing) continue;
    if (isHeading(line, OTHER_HEADINGS)) break;
    if (!line) {
      if (items.length > 0) break;
      continue;
    }
    const item = isBulletLine(line) ? stripBullet(line) : line;
    if (item) items.push(item);
  }

  return items;
}

/** Languages named in sentences that talk about language skills. */
export function extractLanguages(text: string): string[] {
  const found: string[] = [];
  for (const sentence of splitSentences(text)) {
    if (!LANGUAGE_CONTEXT.test(sentence)) continue;
    for (const match of languageTable.matchAll(sentence)) {
      found.push(match.value);
    }
  }
  return dedupeCaseInsensitive(found);
}

function toIsoDate(raw: string): string | null {
  let year: number;
  let month: number;
  let day: number;

  const iso = /^(\d{4})-(\d{2})-(\d{2})$/.exec(raw);
  const dotted = /^(\d{1,2})[./](\d{1,2})[./](\d{4})$/.exec(raw);
  if (iso) {
    [year, month, day] = [Number(iso[1]), Number(iso[2]), Number(iso[3])];
  } else if (dotted) {
    [day, month, year] = [Number(dotted[1]), Number(dotted[2]), Number(dotted[3])];
  } else {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date.toISOString().slice(0, 10);
}

/** "ASAP" for immediate starts, an ISO date for a dated start, else null. */
export function extractStartDate(text: string): string | null {
  if (START_IMMEDIATE.test(text)) return "ASAP";
  const match = START_DATE.exec(text);
  if (!match) return null;
  return toIsoDate(match[1]) ?? match[1];
}

function labeledValue(lines: readonly string[], pattern: RegExp): string | null {
  for (const line of lines) {
    const match = pattern.exec(line);
    if (match && match[1].trim()) return match[1].trim();
  }
  return null;
}

interface ContactFields {
  contact_name: string | null;
  contact_email: string | null;
  contact_phone: string | null;
}

export function extractContact(lines: readonly string[], text: string): ContactFields {
  const email = EMAIL_PATTERN.exec(text)?.[0] ?? null;
  const phone = PHONE_PATTERN.exec(text)?.[1].replace(/\s+/g, " ").trim() ?? null;

  let name: string | null = null;
  const labeled = labeledValue(lines, CONTACT_LABEL);
  if (labeled) {
    const candidate = labeled
      .replace(EMAIL_PATTERN, "")
      .split(/[,;(|]|\s[-–]\s/)[0]
      .trim();
    // A label followed only by a phone number or address is not a name
    if (/\p{L}/u.test(candidate) && !PHONE_PATTERN.test(candidate)) {
      name = candidate;
    }
  }

  return { contact_name: name, contact_email: email, contact_phone: phone };
}

// ── Public API ───────────────────────────────────────────────────────

/**
 * Turn a raw job ad into best-guess field values. Deterministic: the same
 * input always yields the same result. Throws UnsupportedSourceKindError
 * for an unknown source kind and InvalidRawInputError for empty content.
 */
export function extract(input: RawInputLike): ExtractionResult {
  const raw = parseRawInput(input);
  logger.debug(`Extracting fields from ${raw.source_type} input (${raw.content.length} chars)`);

  // url/pdf/docx arrive as plain text converted upstream
  const text = normalizeText(raw.content);
  const lines = text.split("\n");

  const title = extractJobTitle(lines, text);
  const seniority =
    (title ? detectSeniority(title.rawTitle, true) : null) ?? detectSeniority(text);
  const contact = extractContact(lines, text);

  const result: ExtractionResult = {
    company_name: extractCompanyName(lines, title?.lineIndex ?? -1),
    job_title: title?.title ?? null,
    seniority,
    department: labeledValue(lines, DEPARTMENT_LABEL),
    industry: extractIndustry(lines, text),
    city: extractCity(lines, text),
    employment_type: employmentTable.matchFirst(text),
    contract_type: contractTable.matchFirst(text),
    start_date: extractStartDate(text),
    languages: Object.freeze(extractLanguages(text)),
    must_have_skills: Object.freeze(extractSkills(text)),
    responsibilities: Object.freeze(extractResponsibilities(lines)),
    ...contact,
  };

  logger.debug("Extraction complete", {
    job_title: result.job_title,
    company_name: result.company_name,
    skills: result.must_have_skills.length,
  });
  return Object.freeze(result);
}
