import { isBulletLine, isCapitalized } from "./utils/text.ts";
import type { Seniority } from "./utils/types.ts";

// ── Seniority detection ──────────────────────────────────────────────

function bounded(source: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}])(?:${source})(?![\\p{L}\\p{N}])`, "iu");
}

interface SeniorityCue {
  pattern: RegExp;
  seniority: Seniority;
  // Words like "lead" or "intermediate" are too common in body text
  titleOnly: boolean;
}

const SENIORITY_CUES: SeniorityCue[] = [
  { pattern: bounded("senior|sr\\.?"), seniority: "Senior", titleOnly: false },
  { pattern: bounded("erfahrene[rn]?"), seniority: "Senior", titleOnly: true },
  { pattern: bounded("head\\s+of|teamleiter(?:in)?|teamleitung"), seniority: "Lead", titleOnly: false },
  { pattern: bounded("lead|principal|leitung"), seniority: "Lead", titleOnly: true },
  { pattern: bounded("junior|jr\\.?|berufseinsteiger(?:in)?|einsteiger(?:in)?|entry[- ]level"), seniority: "Junior", titleOnly: false },
  { pattern: bounded("mid[- ]level|medior"), seniority: "Mid", titleOnly: false },
  { pattern: bounded("mid|intermediate"), seniority: "Mid", titleOnly: true },
];

/**
 * Earliest seniority cue in the text. `inTitle` enables the cues that are
 * only trustworthy inside a job title.
 */
export function detectSeniority(text: string, inTitle = false): Seniority | null {
  let best: { index: number; seniority: Seniority } | null = null;
  for (const cue of SENIORITY_CUES) {
    if (cue.titleOnly && !inTitle) continue;
    const match = cue.pattern.exec(text);
    if (match && (best === null || match.index < best.index)) {
      best = { index: match.index, seniority: cue.seniority };
    }
  }
  return best ? best.seniority : null;
}

const STRIPPABLE_CUE = bounded("senior|sr\\.?|junior|jr\\.?|lead|principal|mid[- ]level|mid|medior|erfahrene[rn]?");

/**
 * Remove seniority words from a title. A cue in last position is part of
 * the role name ("Team Lead") and stays.
 */
export function stripSeniorityCues(title: string): string {
  const words = title.split(" ");
  const kept = words.filter(
    (word, i) => i === words.length - 1 || !STRIPPABLE_CUE.test(word)
  );
  const stripped = kept.join(" ").replace(/^[\s,/–-]+|[\s,/–-]+$/g, "");
  return stripped || title;
}

// ── Title detection ──────────────────────────────────────────────────

const TITLE_NOUNS = [
  "engineer", "ingenieur", "developer", "entwickler", "programmer", "programmierer",
  "manager", "analyst", "consultant", "berater", "scientist", "architect",
  "designer", "specialist", "spezialist", "owner", "leiter", "referent",
  "administrator", "controller", "recruiter", "accountant", "buchhalter",
  "sachbearbeiter", "officer", "coordinator", "koordinator", "assistant",
  "assistent", "technician", "techniker",
];

const TITLE_LABEL =
  /^(?:job\s?title|jobtitel|stellentitel|stellenbezeichnung|position|rolle|role|title)\s*(?::|\s[-–]\s)\s*(.+)$/i;

// Any "Label: value" line; those belong to other fields
const GENERIC_LABEL = /^[\p{L}][\p{L} ()/-]{1,30}:\s*\S/u;

const GENDER_MARKER =
  /\(?\b(?:m|w|f|d|x|div|gn)(?:\s*\/\s*(?:m|w|f|d|x|div|gn)){1,3}\b\)?|\(all genders\)|\(gn\)/giu;

const SEGMENT_BREAK =
  /\s+(?:at|bei|in|for|für|to|zur|zum|with|mit|using)\s+|\s+[|–-]\s+|[,;:!?]|\.(?:\s|$)/iu;

const CONNECTORS = new Set(["of", "&", "and", "und", "-"]);

const HIRING_PHRASE =
  /(?:wir suchen|we are looking for|we're looking for|we are hiring|looking for)\s+(?:dich als\s+|sie als\s+)?(?:eine[nr]?\s+|ein\s+|an?\s+)?([^\n.,;!?(]{3,80})/i;

const AS_PHRASE = /(?<![\p{L}])(?:als|as)\s+(?:eine[nr]?\s+|ein\s+|an?\s+)?(\p{Lu}[^\n.,;!?(]{3,80})/u;

const ARTICLE_PREFIX = /^(?:ein|eine|einen|einer|a|an|the)\s+/i;

export function cleanTitle(raw: string): string {
  return raw
    .replace(GENDER_MARKER, " ")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/^[-•*#\s]+/, "")
    .replace(ARTICLE_PREFIX, "")
    .replace(/[.,;:–—\s-]+$/, "")
    .trim();
}

function isTitleNoun(word: string): boolean {
  const letters = word.toLowerCase().replace(/[^\p{L}]/gu, "");
  return TITLE_NOUNS.some(
    (noun) => letters.endsWith(noun) || letters.endsWith(`${noun}in`) || letters.endsWith(`${noun}innen`)
  );
}

/** The capitalized noun phrase that ends at the first title noun. */
function titlePhraseFromLine(line: string): string | null {
  const segments = line.replace(GENDER_MARKER, " ").split(SEGMENT_BREAK);

  for (const segment of segments) {
    const words = segment.trim().split(/\s+/).filter(Boolean);
    const nounIndex = words.findIndex(isTitleNoun);
    if (nounIndex < 0) continue;

    let start = nounIndex;
    while (start > 0 && nounIndex - start < 5) {
      const prev = words[start - 1];
      const keep =
        isCapitalized(prev) || CONNECTORS.has(prev.toLowerCase()) || detectSeniority(prev, true) !== null;
      if (!keep) break;
      start--;
    }
    while (start < nounIndex && CONNECTORS.has(words[start].toLowerCase())) {
      start++;
    }

    const phrase = cleanTitle(words.slice(start, nounIndex + 1).join(" "));
    if (phrase) return phrase;
  }
  return null;
}

export interface TitleMatch {
  /** Title with seniority words removed. */
  title: string;
  /** Title as written, seniority words included. */
  rawTitle: string;
  /** Line the title came from; -1 for a phrase found across the text. */
  lineIndex: number;
}

function toMatch(rawTitle: string, lineIndex: number): TitleMatch | null {
  const cleaned = cleanTitle(rawTitle);
  if (!cleaned) return null;
  return { title: stripSeniorityCues(cleaned), rawTitle: cleaned, lineIndex };
}

/**
 * Find the advertised job title. Order: an explicit "Job title:" label,
 * then the first short line carrying a title noun, then hiring phrases
 * such as "wir suchen ..." or "as ...".
 */
export function extractJobTitle(lines: readonly string[], text: string): TitleMatch | null {
  for (let i = 0; i < lines.length; i++) {
    const labeled = TITLE_LABEL.exec(lines[i]);
    if (labeled) {
      const match = toMatch(labeled[1], i);
      if (match) return match;
    }
  }

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line.length < 4 || line.length > 120) continue;
    if (isBulletLine(line) || GENERIC_LABEL.test(line)) continue;
    const phrase = titlePhraseFromLine(line);
    if (phrase) {
      const match = toMatch(phrase, i);
      if (match) return match;
    }
  }

  for (const pattern of [HIRING_PHRASE, AS_PHRASE]) {
    const found = pattern.exec(text);
    if (!found) continue;
    const [firstSegment] = found[1].split(SEGMENT_BREAK);
    const match = toMatch(firstSegment, -1);
    if (match) return match;
  }

  return null;
}
