import { z } from "zod";
import { getLogger } from "@hodlchat/core";
import segmenterData from "../data/segmenter.json" with { type: "json" };
import { countPhrases, findPhrase, normalizeText } from "../extraction/text.js";

const logger = getLogger("segmenter");

const SegmenterLexiconSchema = z.object({
  walletKeywords: z.array(z.string()).min(1),
  actionKeywords: z.array(z.string()).min(1),
  connectors: z.array(z.string()).min(1),
});

const LEXICON = SegmenterLexiconSchema.parse(segmenterData);
const SENTENCE_BOUNDARY = /[.!?]\s+|;\s*/g;
const LEADING_NOISE = /^(?:[\s,;.!]+|(?:and|then|also|plus|y|et|puis|luego)\s+)+/iu;
const TRAILING_NOISE = /[\s,;]+$/u;
const MAX_DEPTH = 8;

function keywordCount(text: string): number {
  return countPhrases(text.toLowerCase(), LEXICON.walletKeywords);
}

export function qualifiesAsCommand(text: string): boolean {
  return keywordCount(text) > 0;
}

export function hasActionKeyword(text: string): boolean {
  return findPhrase(text.toLowerCase(), LEXICON.actionKeywords) !== undefined;
}

function clean(segment: string): string {
  return segment.replace(LEADING_NOISE, "").replace(TRAILING_NOISE, "").trim();
}

function splitAt(text: string, start: number, length: number, depth: number): string[] | undefined {
  const left = clean(text.slice(0, start));
  const right = clean(text.slice(start + length));
  if (!qualifiesAsCommand(left) || !qualifiesAsCommand(right)) return undefined;
  return [...splitRecursive(left, depth + 1), ...splitRecursive(right, depth + 1)];
}

function splitRecursive(text: string, depth: number): string[] {
  if (depth >= MAX_DEPTH) return [text];
  const lower = text.toLowerCase();

  for (const connector of LEXICON.connectors) {
    let index = lower.indexOf(connector);
    while (index !== -1) {
      const parts = splitAt(text, index, connector.length, depth);
      if (parts) return parts;
      index = lower.indexOf(connector, index + 1);
    }
  }

  for (const boundary of lower.matchAll(SENTENCE_BOUNDARY)) {
    const parts = splitAt(text, boundary.index ?? 0, boundary[0].length, depth);
    if (parts) return parts;
  }

  return [text];
}

/**
 * Splits a compound request into independently classifiable segments.
 * Both sides of a split must name a wallet operation. When any segment
 * asks for an action (send, receive...), only the first action segment
 * survives: informational asides and competing actions are dropped.
 */
export function splitIfCompound(text: string): string[] {
  const normalized = normalizeText(text);
  if (keywordCount(normalized) < 2 || normalized.toLowerCase().length !== normalized.length) {
    return [normalized];
  }

  const segments = splitRecursive(normalized, 0).filter((segment) => segment.length > 0);
  if (segments.length <= 1) return [normalized];

  const actions = segments.filter(hasActionKeyword);
  const result = actions.length > 0 ? actions.slice(0, 1) : segments;
  logger.debug({ segments: segments.length, kept: result.length }, "Compound message split");
  return result;
}
