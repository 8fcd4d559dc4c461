import { Decimal } from "decimal.js";
import { z } from "zod";
import { getLogger } from "@hodlchat/core";
import referencesData from "../data/references.json" with { type: "json" };
import type { WalletTransaction } from "../collaborators.js";
import {
  extractAddress,
  extractAmount,
  extractTxid,
  isAnaphoricHalf,
} from "../extraction/entity-extractor.js";
import { alternation, containsPhrase, findPhrase, normalizeForMatching } from "../extraction/text.js";
import { isSatsUnit } from "../extraction/units.js";
import type { AmountUnit, WalletIntent } from "../intent/types.js";
import type { MemoryView } from "../memory/conversation-memory.js";

const logger = getLogger("references");

const ReferenceLexiconSchema = z.object({
  address: z.array(z.string()),
  amount: z.array(z.string()),
  relative: z.array(z.object({ phrase: z.string(), factor: z.number().positive() })),
  feeWords: z.array(z.string()),
  ordinals: z.record(z.string(), z.number().int().positive()),
  ordinalNouns: z.array(z.string()),
  latest: z.array(z.string()),
  repeat: z.array(z.string()),
  correction: z.array(z.string()),
});

const LEXICON = ReferenceLexiconSchema.parse(referencesData);

const ORDINAL_PATTERN = new RegExp(
  `(?<![\\p{L}\\p{N}])(?:the\\s+|la\\s+|el\\s+|le\\s+)?(${alternation(Object.keys(LEXICON.ordinals))})\\s+(?:${alternation(LEXICON.ordinalNouns)})(?![\\p{L}\\p{N}])`,
  "u",
);
const HASH_INDEX = /(?:^|\s)#(\d{1,3})(?!\d)/u;

/** Corrections ending in a comma ("no,", "wait,") only count as an opening word. */
const LEADING_CORRECTIONS = LEXICON.correction.filter((phrase) => phrase.endsWith(","));
const INLINE_CORRECTIONS = LEXICON.correction.filter((phrase) => !phrase.endsWith(","));

export type ReferenceKind = "address" | "amount" | "relativeAmount" | "ordinal" | "repeat" | "correction";

export interface ResolvedReferences {
  address?: string;
  amount?: Decimal;
  unit?: AmountUnit;
  transaction?: WalletTransaction;
  /** Position in the last shown transaction list, newest first. */
  transactionIndex?: number;
  repeatIntent?: WalletIntent;
  isCorrection: boolean;
  kinds: ReferenceKind[];
}

function scaleAmount(amount: Decimal, factor: Decimal.Value, unit: AmountUnit | undefined): Decimal {
  const scaled = amount.times(factor);
  return isSatsUnit(unit) ? scaled.floor() : scaled.toDecimalPlaces(8, Decimal.ROUND_DOWN);
}

function ordinalIndex(text: string): number | undefined {
  if (findPhrase(text, LEXICON.latest)) return 0;
  const ordinal = ORDINAL_PATTERN.exec(text);
  if (ordinal?.[1]) {
    const position = LEXICON.ordinals[ordinal[1]];
    if (position !== undefined) return position - 1;
  }
  const hash = HASH_INDEX.exec(text);
  if (hash?.[1]) return Number.parseInt(hash[1], 10) - 1;
  return undefined;
}

/** Drops a scaled amount, for messages that are not about sending. */
export function withoutRelativeAmount(resolved: ResolvedReferences): ResolvedReferences {
  if (!resolved.kinds.includes("relativeAmount")) return resolved;
  const { amount: _amount, unit: _unit, ...rest } = resolved;
  return { ...rest, kinds: resolved.kinds.filter((kind) => kind !== "relativeAmount") };
}

export function isCorrectionPhrase(text: string): boolean {
  const lower = normalizeForMatching(text);
  return (
    LEADING_CORRECTIONS.some((phrase) => lower.startsWith(phrase)) ||
    findPhrase(lower, INLINE_CORRECTIONS) !== undefined
  );
}

/**
 * Maps references in `text` ("same address", "double it", "the second
 * one", "again") onto values remembered from earlier turns. A category
 * resolves only when memory actually holds something for it.
 */
export class ReferenceResolver {
  resolve(text: string, memory: MemoryView): ResolvedReferences {
    const lower = normalizeForMatching(text);
    const result: ResolvedReferences = { isCorrection: isCorrectionPhrase(lower), kinds: [] };
    if (result.isCorrection) result.kinds.push("correction");

    if (memory.lastAddress && findPhrase(lower, LEXICON.address)) {
      result.address = memory.lastAddress;
      result.kinds.push("address");
    }

    const last = memory.lastAmount;
    if (last) {
      if (findPhrase(lower, LEXICON.amount)) {
        result.amount = last.amount;
        if (last.unit) result.unit = last.unit;
        result.kinds.push("amount");
      } else {
        const factor = this.relativeFactor(lower);
        if (factor !== undefined && last.amount.greaterThan(0)) {
          result.amount = scaleAmount(last.amount, factor, last.unit);
          if (last.unit) result.unit = last.unit;
          result.kinds.push("relativeAmount");
        }
      }
    }

    const index = ordinalIndex(lower);
    if (index !== undefined) {
      const transaction = memory.lastShownTransactions[index];
      if (index >= 0 && transaction) {
        result.transaction = transaction;
        result.transactionIndex = index;
        result.kinds.push("ordinal");
      }
    }

    if (memory.lastUserIntent && findPhrase(lower, LEXICON.repeat)) {
      result.repeatIntent = memory.lastUserIntent;
      result.kinds.push("repeat");
    }

    if (result.kinds.length > 0) logger.debug({ kinds: result.kinds }, "References resolved");
    return result;
  }

  /**
   * Appends resolved values the text does not already state. Explicit
   * values always win, so enriching an enriched text changes nothing.
   */
  enrichWithReferences(text: string, resolved: ResolvedReferences): string {
    let enriched = text;
    if (resolved.address && !extractAddress(enriched)) {
      enriched = `${enriched} ${resolved.address}`;
    }
    if (resolved.amount && !extractAmount(enriched)) {
      const unit = isSatsUnit(resolved.unit) ? "sats" : "BTC";
      enriched = `${enriched} ${resolved.amount.toFixed()} ${unit}`;
    }
    if (resolved.transaction && !extractTxid(enriched)) {
      enriched = `${enriched} ${resolved.transaction.txid}`;
    }
    return enriched;
  }

  private relativeFactor(lower: string): Decimal.Value | undefined {
    if (findPhrase(lower, LEXICON.feeWords)) return undefined;
    if (isAnaphoricHalf(lower)) return "0.5";
    const rule = LEXICON.relative.find((candidate) => containsPhrase(lower, candidate.phrase));
    return rule ? String(rule.factor) : undefined;
  }
}
