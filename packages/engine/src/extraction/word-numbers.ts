import { z } from "zod";
import numbersData from "../data/numbers.json" with { type: "json" };

const NumberWordsSchema = z.object({
  units: z.record(z.number()),
  scales: z.record(z.number()),
  fillers: z.array(z.string()),
  article: z.array(z.string()),
});

const WORDS = NumberWordsSchema.parse(numbersData);
const UNITS = new Map(Object.entries(WORDS.units));
const SCALES = new Map(Object.entries(WORDS.scales));
const FILLERS = new Set(WORDS.fillers);
const ARTICLES = new Set(WORDS.article);

const TOKEN = /[\p{L}\p{M}]+/gu;

interface Token {
  word: string;
  start: number;
  end: number;
}

export interface WordNumberMatch {
  value: number;
  start: number;
  end: number;
  hasScale: boolean;
}

function tokenize(text: string): Token[] {
  const spaced = text.replace(/(?<=\p{L})-(?=\p{L})/gu, " ");
  return [...spaced.matchAll(TOKEN)].map((m) => {
    const start = m.index ?? 0;
    return { word: m[0], start, end: start + m[0].length };
  });
}

function isNumberWord(word: string): boolean {
  return UNITS.has(word) || SCALES.has(word);
}

function evaluate(words: string[]): number {
  let total = 0;
  let current = 0;
  for (const word of words) {
    const unit = UNITS.get(word);
    if (unit !== undefined) {
      current += unit;
      continue;
    }
    const scale = SCALES.get(word);
    if (scale === undefined) continue;
    if (scale === 100) {
      current = (current || 1) * 100;
    } else {
      total += (current || 1) * scale;
      current = 0;
    }
  }
  return total + current;
}

/**
 * Finds spelled-out numbers ("two hundred", "a thousand", "dos mil").
 * A run stands on its own when it combines a scale word with another number
 * word or an article; otherwise `accept` must approve the text that follows
 * it, which keeps "the second one" from reading as 1.
 */
export function findWordNumber(
  text: string,
  accept: (rest: string) => boolean,
): WordNumberMatch | undefined {
  const tokens = tokenize(text);

  let i = 0;
  while (i < tokens.length) {
    const first = tokens[i];
    if (!first) break;

    const next = tokens[i + 1];
    const startsWithArticle =
      ARTICLES.has(first.word) && next !== undefined && SCALES.has(next.word) && adjacent(text, first, next);
    if (!isNumberWord(first.word) && !startsWithArticle) {
      i++;
      continue;
    }

    const words: string[] = [];
    let last = first;
    let j = i;
    if (startsWithArticle) j++;
    for (; j < tokens.length; j++) {
      const token = tokens[j];
      if (!token) break;
      if (j > i && !adjacent(text, last, token)) break;
      if (isNumberWord(token.word)) {
        words.push(token.word);
        last = token;
        continue;
      }
      const after = tokens[j + 1];
      if (FILLERS.has(token.word) && words.length > 0 && after && isNumberWord(after.word)) {
        last = token;
        continue;
      }
      break;
    }

    const hasScale = words.some((word) => SCALES.has(word));
    const standalone = hasScale && (words.length > 1 || startsWithArticle);
    const value = evaluate(words);
    if (value > 0 && (standalone || accept(text.slice(last.end)))) {
      return { value, start: first.start, end: last.end, hasScale };
    }
    i = Math.max(j, i + 1);
  }
  return undefined;
}

function adjacent(text: string, left: Token, right: Token): boolean {
  return /^\s+$/.test(text.slice(left.end, right.start));
}
