import { findCity } from "./utils/parse-location.ts";

// ── Patterns ─────────────────────────────────────────────────────────

const COMPANY_LABEL =
  /^(?:company|employer|unternehmen|unternehmensname|firma|arbeitgeber)\s*(?::|\s[-–]\s)\s*(.+)$/i;

const LEGAL_SUFFIX = "GmbH\\s*&\\s*Co\\.\\s*KG|GmbH|AG|SE|KG|UG|Inc\\.?|Ltd\\.?|LLC|Corp\\.?|PLC";

// One capitalized word, or a bare "&" inside names like "Müller & Söhne"
const NAME_WORD = "(?:[\\p{Lu}\\p{N}][\\p{L}\\p{N}&.'-]*|&)";

const SUFFIX_PATTERN = new RegExp(
  `((?:${NAME_WORD}\\s+){1,3})(${LEGAL_SUFFIX})(?![\\p{L}\\p{N}])`,
  "u"
);

const PLAIN_NAME = "[\\p{Lu}\\p{N}][\\p{L}\\p{N}&'-]*(?:\\s+[\\p{Lu}\\p{N}][\\p{L}\\p{N}&'-]*){0,2}";

const HIRING_VERB_PATTERN = new RegExp(
  `(${PLAIN_NAME})\\s+(?:sucht|is hiring|hires|stellt)(?![\\p{L}])`,
  "u"
);

const EMPLOYER_PREPOSITION_PATTERN = new RegExp(
  `(?:^|\\s)(?:bei|at|join|für)\\s+(${PLAIN_NAME})(?=[\\s,.!;:]|$)`,
  "u"
);

const LEADING_ARTICLE = /^(?:die|der|das|the)\s+/i;

const HEAD_LINES = 5;

// ── Helpers ──────────────────────────────────────────────────────────

/**
 * Line indices in scan order: the head of the ad, then the lines around
 * the title line, then everything else. Earlier lines win ties.
 */
export function scanOrder(lineCount: number, titleLine: number): number[] {
  const order: number[] = [];
  const push = (i: number) => {
    if (i >= 0 && i < lineCount && !order.includes(i)) order.push(i);
  };

  for (let i = 0; i < Math.min(HEAD_LINES, lineCount); i++) push(i);
  if (titleLine >= 0) {
    push(titleLine - 1);
    push(titleLine);
    push(titleLine + 1);
  }
  for (let i = 0; i < lineCount; i++) push(i);
  return order;
}

function cleanCompanyName(raw: string): string | null {
  const cleaned = raw.replace(/\s+/g, " ").trim().replace(LEADING_ARTICLE, "");
  if (cleaned.length < 2 || cleaned.length > 120) return null;
  return cleaned;
}

// ── Public API ───────────────────────────────────────────────────────

/**
 * Company name from a job ad. A "Company:" label is taken verbatim; then
 * names carrying a legal-entity suffix ("ACME AG"); then "X sucht" /
 * "at X" phrases near the top of the ad.
 */
export function extractCompanyName(lines: readonly string[], titleLine: number): string | null {
  for (const line of lines) {
    const labeled = COMPANY_LABEL.exec(line);
    if (labeled) {
      const name = cleanCompanyName(labeled[1]);
      if (name) return name;
    }
  }

  const order = scanOrder(lines.length, titleLine);

  for (const i of order) {
    const match = SUFFIX_PATTERN.exec(lines[i]);
    if (match) {
      const name = cleanCompanyName(`${match[1]}${match[2]}`);
      if (name) return name;
    }
  }

  for (const i of order) {
    const match = HIRING_VERB_PATTERN.exec(lines[i]);
    if (match) {
      const name = cleanCompanyName(match[1]);
      if (name) return name;
    }
  }

  // "bei Fragen ..." style false hits get likelier further down the ad
  const nearTop = order.filter((i) => i < HEAD_LINES || Math.abs(i - titleLine) <= 1);
  for (const i of nearTop) {
    const match = EMPLOYER_PREPOSITION_PATTERN.exec(lines[i]);
    if (!match) continue;
    const name = cleanCompanyName(match[1]);
    if (name && !findCity(name)) return name;
  }

  return null;
}
