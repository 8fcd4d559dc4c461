import type { Decimal } from "decimal.js";
import { getLogger } from "@hodlchat/core";
import { extractEntities } from "../extraction/entity-extractor.js";
import { containsPhrase, normalizeForMatching } from "../extraction/text.js";
import { MATCH_CONFIDENCE, isSentinelAmount } from "../intent/types.js";
import type { IntentOf, IntentScore, MatchStrength, ParsedEntity, WalletIntent } from "../intent/types.js";
import { isFuzzyMatch } from "./fuzzy.js";
import { DEFAULT_LEXICON } from "./lexicon.js";
import type { CategoryIntent, CompiledCategory } from "./lexicon.js";

const logger = getLogger("pattern-classifier");

const STRENGTH_RANK: Record<MatchStrength, number> = { weak: 1, strong: 2, exact: 3 };
const PREFIX_SEPARATORS = new Set([" ", ",", "!", ".", "?"]);
const EXPLAIN_TOPIC =
  /(?:what\s+(?:is|are)\s+(?:a\s+|an\s+|the\s+)?|explain\s+(?:me\s+)?(?:what\s+(?:is|are)\s+)?(?:a\s+|an\s+|the\s+)?|tell\s+me\s+about\s+(?:the\s+)?|teach\s+me\s+about\s+|learn\s+about\s+|how\s+does\s+(?:the\s+)?)(.+?)(?:\s+work)?[?.!]*$/u;

export interface CategoryMatch {
  intent: CategoryIntent;
  strength: MatchStrength;
  confidence: number;
  order: number;
  fuzzy: boolean;
}

export interface PatternClassifierOptions {
  categories?: CompiledCategory[];
  /** Quote currency for "how much is 0.1 btc" style conversions. */
  defaultCurrency?: string;
}

function stripTrailingPunctuation(text: string): string {
  const bare = text.replace(/[\s.!?,;:]+$/u, "").trim();
  return bare.length > 0 ? bare : text;
}

/**
 * Scores text against every lexicon category. Stateless: the same text
 * always yields the same ranking.
 */
export class PatternClassifier {
  private categories: CompiledCategory[];
  private defaultCurrency: string;

  constructor(options: PatternClassifierOptions = {}) {
    this.categories = options.categories ?? DEFAULT_LEXICON;
    this.defaultCurrency = options.defaultCurrency ?? "USD";
  }

  /** Category matches for already-normalized lowercase text, best first. */
  matchCategories(text: string): CategoryMatch[] {
    const bare = stripTrailingPunctuation(text);
    const matches: CategoryMatch[] = [];

    for (const category of this.categories) {
      const result = this.scoreCategory(category, text, bare);
      if (!result) continue;
      const base = MATCH_CONFIDENCE[result.strength];
      matches.push({
        intent: category.intent,
        strength: result.strength,
        confidence: Math.min(MATCH_CONFIDENCE.exact, round(base + category.bonus)),
        order: category.order,
        fuzzy: result.fuzzy,
      });
    }

    return matches.sort((a, b) => b.confidence - a.confidence || a.order - b.order);
  }

  /** Ranked intent scores for raw text. Categories whose intent cannot be built are skipped. */
  scoredMatch(text: string, entities: ParsedEntity = extractEntities(text)): IntentScore[] {
    const normalized = normalizeForMatching(text);
    const scores: IntentScore[] = [];
    for (const match of this.matchCategories(normalized)) {
      const intent = this.buildIntent(match.intent, entities, normalized);
      if (!intent) continue;
      scores.push({
        intent,
        confidence: match.confidence,
        source: match.fuzzy ? "fuzzy" : "pattern",
      });
    }
    logger.debug(
      { top: scores[0]?.intent.type, confidence: scores[0]?.confidence, candidates: scores.length },
      "Pattern match",
    );
    return scores;
  }

  buildIntent(type: CategoryIntent, entities: ParsedEntity, text: string): WalletIntent | undefined {
    switch (type) {
      case "send": {
        const intent: IntentOf<"send"> = { type: "send" };
        if (entities.amount) intent.amount = entities.amount;
        if (entities.unit) intent.unit = entities.unit;
        if (entities.address) intent.address = entities.address;
        if (entities.feeLevel) intent.feeLevel = entities.feeLevel;
        if (entities.feeRate !== undefined) intent.feeRate = entities.feeRate;
        return intent;
      }
      case "convertAmount":
        return this.buildConversion(entities);
      case "history":
        return entities.count !== undefined ? { type, count: entities.count } : { type };
      case "price":
        return entities.currency ? { type, currency: entities.currency } : { type };
      case "bumpFee":
        return entities.txid ? { type, txid: entities.txid } : { type };
      case "explain": {
        const topic = EXPLAIN_TOPIC.exec(text)?.[1]?.trim();
        return topic ? { type, topic } : { type };
      }
      case "confirmAction":
      case "cancelAction":
      case "newAddress":
      case "receive":
      case "exportHistory":
      case "hideBalance":
      case "showBalance":
      case "refreshWallet":
      case "balance":
      case "feeEstimate":
      case "walletHealth":
      case "utxoList":
      case "networkStatus":
      case "about":
      case "settings":
      case "help":
      case "greeting":
        return { type };
    }
  }

  private buildConversion(entities: ParsedEntity): WalletIntent | undefined {
    const amount: Decimal | undefined = entities.amount;
    if (!amount || isSentinelAmount(amount)) return undefined;
    if (entities.currency && !entities.unit) {
      return { type: "convertAmount", amount, currency: entities.currency };
    }
    return {
      type: "convertAmount",
      amount,
      currency: entities.currency ?? this.defaultCurrency,
      unit: entities.unit ?? "btc",
    };
  }

  /**
   * Best guess for text nothing matched: the first category with a fuzzy
   * keyword close to any word of the text.
   */
  fuzzyGuess(text: string): CategoryIntent | undefined {
    const tokens = normalizeForMatching(text)
      .split(/[^\p{L}\p{N}]+/u)
      .filter((token) => token.length >= 4);
    for (const category of this.categories) {
      if (tokens.some((token) => category.fuzzy.some((keyword) => isFuzzyMatch(token, keyword)))) {
        return category.intent;
      }
    }
    return undefined;
  }

  private scoreCategory(
    category: CompiledCategory,
    text: string,
    bare: string,
  ): { strength: MatchStrength; fuzzy: boolean } | undefined {
    if (category.exclude.some((phrase) => containsPhrase(text, phrase))) return undefined;
    if (category.requiresNumber && !/\d/.test(text)) return undefined;

    if (category.match === "prefix") {
      const strength = this.scorePrefix(category, text, bare);
      return strength ? { strength, fuzzy: false } : undefined;
    }

    if (category.exact.includes(bare) || category.keywords.includes(bare)) {
      return { strength: "exact", fuzzy: false };
    }
    if (
      category.strong.some((phrase) => containsPhrase(text, phrase)) ||
      category.regexes.some((regex) => regex.test(text))
    ) {
      return { strength: "strong", fuzzy: false };
    }
    if (category.keywords.some((keyword) => containsPhrase(text, keyword))) {
      return { strength: category.strongByDefault ? "strong" : "weak", fuzzy: false };
    }
    if (!bare.includes(" ") && category.fuzzy.some((keyword) => isFuzzyMatch(bare, keyword))) {
      return { strength: "weak", fuzzy: true };
    }
    return undefined;
  }

  /**
   * Prefix categories (confirm, cancel, greeting) match the whole text or
   * its opening words. An opening match followed by a request that stands
   * on its own ("ok, what's my balance") drops to the weak tier.
   */
  private scorePrefix(category: CompiledCategory, text: string, bare: string): MatchStrength | undefined {
    let best: MatchStrength | undefined;
    for (const keyword of category.keywords) {
      if (bare === keyword) return "exact";
      if (!text.startsWith(keyword)) continue;
      const next = text.charAt(keyword.length);
      if (!PREFIX_SEPARATORS.has(next)) continue;
      const remainder = text.slice(keyword.length).replace(/^[\s,!.?]+/u, "");
      const strength: MatchStrength = this.standsAlone(remainder) ? "weak" : "strong";
      if (!best || STRENGTH_RANK[strength] > STRENGTH_RANK[best]) best = strength;
    }
    if (category.emoji.some((emoji) => text.includes(emoji))) {
      if (!best || STRENGTH_RANK[best] < STRENGTH_RANK.strong) best = "strong";
    }
    return best;
  }

  private standsAlone(remainder: string): boolean {
    if (remainder.length === 0) return false;
    const bare = stripTrailingPunctuation(remainder);
    return this.categories.some((category) => {
      if (category.match === "prefix") return false;
      const result = this.scoreCategory(category, remainder, bare);
      return result !== undefined && result.strength !== "weak";
    });
  }
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}
