import { POSITIONAL_NAMING } from './config.js';
import type { CompanyMatch, ExtractedText, NamingConfig } from './types.js';

// Path separators, wildcards, quotes, angle brackets, pipe and control characters
const RESERVED_CHARS = /[\\/:*?"<>|\u0000-\u001f\u007f]+/g;

const DEFAULT_EXTENSION = '.pdf';

const countMatches = (value: string, pattern: RegExp): number => value.match(pattern)?.length ?? 0;

export const countLetters = (value: string): number => countMatches(value, /\p{L}/gu);

export const countDigits = (value: string): number => countMatches(value, /\p{Nd}/gu);

export const sanitizeFileName = (value: string, config: Readonly<NamingConfig> = POSITIONAL_NAMING): string => {
  if (!value) return "";
  const cased = config.uppercase ? value.toUpperCase() : value;
  return cased
    .replace(RESERVED_CHARS, config.substitute)
    .replace(/\s+/g, " ")
    .trim()
    .replace(/\.+$/, "")
    .trim();
};

/** Upper-cased, reserved characters blanked; the form company codes are matched in. */
const normalizeForLookup = (value: string): string =>
  value.toUpperCase().replace(RESERVED_CHARS, " ").replace(/\s+/g, " ").trim();

/**
 * Cuts `value` to at most `maxLength` characters, backing off to the last
 * word boundary inside the window when the cut would split a word.
 */
export const truncateAtWord = (value: string, maxLength: number): string => {
  if (value.length <= maxLength) return value.trimEnd();
  const window = value.slice(0, maxLength);
  if (/\s/.test(value.charAt(maxLength))) return window.trimEnd();
  const lastSpace = window.search(/\s\S*$/);
  return (lastSpace > 0 ? window.slice(0, lastSpace) : window).trimEnd();
};

export const splitUsableLines = (text: string, config: Readonly<NamingConfig> = POSITIONAL_NAMING): ExtractedText =>
  text
    .split(/\r\n|\r|\n/)
    .map(line => line.trim())
    .filter(line => line.length >= config.minLineLength);

const detectPositionalCompany = (lines: ExtractedText, config: Readonly<NamingConfig>): CompanyMatch | null => {
  for (const line of lines.slice(0, config.companyScanLines)) {
    const letters = countLetters(line);
    if (letters >= config.minCompanyLetters && letters > countDigits(line)) {
      return { name: line, sourceLine: line };
    }
  }
  return null;
};

/**
 * Lookup over the whole text, lines joined by single spaces so a name broken
 * across lines still matches. The source line is the line the match starts in.
 */
const detectLookupCompany = (lines: ExtractedText, config: Readonly<NamingConfig>): CompanyMatch => {
  const starts: number[] = [];
  const sources: string[] = [];
  let joined = "";
  for (const line of lines) {
    const normalized = normalizeForLookup(line);
    if (!normalized) continue;
    if (joined) joined += " ";
    starts.push(joined.length);
    sources.push(line);
    joined += normalized;
  }

  const sourceLineAt = (index: number): string => {
    let i = 0;
    while (i + 1 < starts.length && starts[i + 1] <= index) i++;
    return sources[i];
  };

  const sortedKeys = Object.keys(config.companyCodes).sort((a, b) => b.length - a.length);
  for (const key of sortedKeys) {
    const needle = normalizeForLookup(key);
    if (!needle) continue;
    const index = joined.indexOf(needle);
    if (index !== -1) {
      return { name: config.companyCodes[key], sourceLine: sourceLineAt(index) };
    }
  }

  const run = /\p{Lu}{3,}/u.exec(joined);
  if (run) {
    return { name: run[0], sourceLine: sourceLineAt(run.index) };
  }

  return { name: config.unknownCompany };
};

/** Picks the sender/company from the head of the document, or null when none qualifies. */
export const detectCompany = (lines: ExtractedText, config: Readonly<NamingConfig> = POSITIONAL_NAMING): CompanyMatch | null =>
  config.companyStrategy === 'lookup' ? detectLookupCompany(lines, config) : detectPositionalCompany(lines, config);

export const detectDescription = (
  lines: ExtractedText,
  company: CompanyMatch | null,
  config: Readonly<NamingConfig> = POSITIONAL_NAMING
): string => {
  for (const line of lines.slice(0, config.descriptionScanLines)) {
    if (company?.sourceLine !== undefined && line === company.sourceLine) continue;
    if (line.length >= config.minDescriptionLength) return line;
  }
  return "";
};

const normalizeExtension = (extension: string): string => {
  const cleaned = extension.replace(RESERVED_CHARS, "").replace(/\s+/g, "").trim();
  if (!cleaned || cleaned === ".") return DEFAULT_EXTENSION;
  return cleaned.startsWith(".") ? cleaned : `.${cleaned}`;
};

/**
 * Proposes a filename from the extracted text of a document.
 *
 * Falls back to the sanitized `fallbackBase` when the text carries neither a
 * company nor a description line. Always returns a non-empty name ending in
 * the (normalized) extension.
 */
export const proposeName = (
  text: string,
  fallbackBase: string,
  extension: string = DEFAULT_EXTENSION,
  config: Readonly<NamingConfig> = POSITIONAL_NAMING
): string => {
  const ext = normalizeExtension(extension);
  const fallback = () => `${sanitizeFileName(fallbackBase, config) || config.placeholderName}${ext}`;

  if (!text.trim()) return fallback();

  const lines = splitUsableLines(text, config);
  if (lines.length === 0) return fallback();

  const company = detectCompany(lines, config);
  const description = detectDescription(lines, company, config);

  // Case first: upper-casing can lengthen a string (ß becomes SS)
  const cased = (value: string) => (config.uppercase ? value.toUpperCase() : value);
  const companyPart = truncateAtWord(cased(company?.name ?? ""), config.maxCompanyLength);
  const descriptionPart = truncateAtWord(cased(description), config.maxDescriptionLength);
  if (!companyPart && !descriptionPart) return fallback();

  const composed = companyPart && descriptionPart ? `${companyPart} - ${descriptionPart}` : companyPart || descriptionPart;
  const base = sanitizeFileName(composed, config);
  return base ? `${base}${ext}` : fallback();
};

/**
 * Name heuristics bound to one naming configuration.
 */
export class NameHeuristics {
  constructor(readonly config: Readonly<NamingConfig> = POSITIONAL_NAMING) {}

  proposeName(text: string, fallbackBase: string, extension: string = DEFAULT_EXTENSION): string {
    return proposeName(text, fallbackBase, extension, this.config);
  }
}
