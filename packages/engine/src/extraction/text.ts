const PUNCTUATION: Array<[RegExp, string]> = [
  [/[\u2018\u2019\u201A\u201B\u2032\u00B4`]/g, "'"],
  [/[\u201C\u201D\u201E\u201F\u2033\u00AB\u00BB]/g, '"'],
  [/[\u2010-\u2015\u2212\uFE58\uFE63\uFF0D]/g, "-"],
  [/\u2026/g, "..."],
  [/[\uFF0C\u060C]/g, ","],
  [/[\u061F\uFF1F]/g, "?"],
  [/\uFF01/g, "!"],
  [/\u066B/g, "."],
  [/[\u00A0\u1680\u2000-\u200A\u202F\u205F\u3000]/g, " "],
  [/[\u200B-\u200D\u2060\uFEFF]/g, ""],
];

const EASTERN_DIGITS = /[\u0660-\u0669\u06F0-\u06F9]/g;

function westernDigit(digit: string): string {
  const code = digit.charCodeAt(0);
  const base = code >= 0x06f0 ? 0x06f0 : 0x0660;
  return String(code - base);
}

/**
 * Maps typographic punctuation, exotic spaces and Arabic-Indic digits to
 * their ASCII forms and collapses whitespace. Case is preserved so
 * addresses survive untouched.
 */
export function normalizeText(text: string): string {
  let out = text.normalize("NFC");
  for (const [pattern, replacement] of PUNCTUATION) {
    out = out.replace(pattern, replacement);
  }
  return out.replace(EASTERN_DIGITS, westernDigit).replace(/\s+/g, " ").trim();
}

/** Lowercased {@link normalizeText}, the form every keyword table is written in. */
export function normalizeForMatching(text: string): string {
  return normalizeText(text).toLowerCase();
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

const BOUNDARY_BEFORE = "(?<![\\p{L}\\p{N}])";
const BOUNDARY_AFTER = "(?![\\p{L}\\p{N}])";

/** Alternation of the phrases, longest first, for embedding in a larger pattern. */
export function alternation(phrases: readonly string[]): string {
  return [...phrases]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join("|");
}

const phraseCache = new Map<string, RegExp>();

export function phrasePattern(phrase: string): RegExp {
  let pattern = phraseCache.get(phrase);
  if (!pattern) {
    pattern = new RegExp(`${BOUNDARY_BEFORE}${escapeRegExp(phrase)}${BOUNDARY_AFTER}`, "u");
    phraseCache.set(phrase, pattern);
  }
  return pattern;
}

/** Whole-word containment: "log" is found in "show log" but not in "login". */
export function containsPhrase(text: string, phrase: string): boolean {
  return phrasePattern(phrase).test(text);
}

/** First phrase of the list (in list order) that the text contains. */
export function findPhrase(text: string, phrases: readonly string[]): string | undefined {
  return phrases.find((phrase) => containsPhrase(text, phrase));
}

export function countPhrases(text: string, phrases: readonly string[]): number {
  return phrases.reduce((total, phrase) => total + (containsPhrase(text, phrase) ? 1 : 0), 0);
}

/** Index just past the first occurrence of `phrase`, or -1. */
export function phraseEnd(text: string, phrase: string): number {
  const match = phrasePattern(phrase).exec(text);
  return match ? match.index + match[0].length : -1;
}

export function boundaryPattern(body: string, flags = "u"): RegExp {
  return new RegExp(`${BOUNDARY_BEFORE}(?:${body})${BOUNDARY_AFTER}`, flags);
}
