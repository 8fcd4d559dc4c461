import { getLogger } from "@hodlchat/core";
import { findAddresses } from "../extraction/address-validator.js";
import { parseBip21 } from "../extraction/bip21.js";
import { bareCurrency } from "../extraction/currency.js";
import { extractEntities } from "../extraction/entity-extractor.js";
import { normalizeForMatching } from "../extraction/text.js";
import { MATCH_CONFIDENCE, isSentinelAmount } from "../intent/types.js";
import type { IntentOf, IntentScore, IntentType, ParsedEntity, WalletIntent } from "../intent/types.js";
import { analyzeMeaning, isEvaluationQuestion, isSocialPositive } from "../meaning/sentence-meaning.js";
import type { Emotion, SentenceMeaning } from "../meaning/sentence-meaning.js";
import type { ResolvedReferences } from "../references/reference-resolver.js";
import type { CategoryIntent } from "./lexicon.js";
import { PatternClassifier } from "./pattern-classifier.js";

const logger = getLogger("classifier");

const SATS_FOLLOW_UP = /^(?:in\s+)?(?:sats|satoshis|sat)[?.!]*$/u;
const TXID_ONLY = /^[0-9a-f]{64}$/u;
const MAX_FILLER_WORDS = 3;

const EMOTION_INTENTS: Record<Exclude<Emotion, "neutral">, WalletIntent> = {
  gratitude: { type: "greeting" },
  affirmation: { type: "greeting" },
  excitement: { type: "greeting" },
  humor: { type: "greeting" },
  frustration: { type: "help" },
  confusion: { type: "help" },
  sadness: { type: "help" },
};

export interface ClassificationContext {
  references?: ResolvedReferences;
  /** Intent of the previous user turn, for follow-ups such as "in euros?". */
  previousIntent?: WalletIntent;
  /** A send is being gathered or confirmed. */
  sendInFlight?: boolean;
}

export interface ClassificationResult {
  /** The segment that was classified. */
  text: string;
  top: IntentScore;
  /** Every candidate above the threshold, best first. */
  scores: IntentScore[];
  entities: ParsedEntity;
  meaning: SentenceMeaning;
  /** Closest category when the result is unknown. */
  guess?: CategoryIntent;
}

export interface IntentClassifierOptions {
  patterns?: PatternClassifier;
  minConfidence?: number;
  defaultCurrency?: string;
}

function sendFromEntities(entities: ParsedEntity): IntentOf<"send"> {
  const intent: IntentOf<"send"> = { type: "send" };
  if (entities.amount && !(entities.currency && !entities.unit)) intent.amount = entities.amount;
  if (entities.unit) intent.unit = entities.unit;
  if (entities.address) intent.address = entities.address;
  if (entities.feeLevel) intent.feeLevel = entities.feeLevel;
  if (entities.feeRate !== undefined) intent.feeRate = entities.feeRate;
  return intent;
}

/** Words left once every address and txid is removed. */
function fillerWords(text: string, literals: string[]): number {
  let rest = text;
  for (const literal of literals) rest = rest.split(literal).join(" ");
  return rest.split(/[^\p{L}\p{N}]+/u).filter((word) => word.length > 0).length;
}

/**
 * Turns one segment into a ranked list of intents. Pattern matches come
 * first; when none clears the threshold the fallbacks run in a fixed
 * order, ending in `unknown`.
 */
export class IntentClassifier {
  private patterns: PatternClassifier;
  private minConfidence: number;

  constructor(options: IntentClassifierOptions = {}) {
    this.patterns = options.patterns ?? new PatternClassifier({ defaultCurrency: options.defaultCurrency });
    this.minConfidence = options.minConfidence ?? MATCH_CONFIDENCE.weak;
  }

  classify(text: string, context: ClassificationContext = {}): ClassificationResult {
    const entities = extractEntities(text);
    const meaning = analyzeMeaning(text);
    const lower = normalizeForMatching(text);
    let scores = this.patterns
      .scoredMatch(text, entities)
      .filter((score) => score.confidence >= this.minConfidence);

    scores = this.applyCorrection(scores, entities, context);
    scores = this.applyRepeat(scores, context);

    if (scores.length === 0) {
      const fallback = this.fallback(text, lower, entities, context);
      if (fallback) scores = [fallback];
    }

    const top: IntentScore = scores[0] ?? {
      intent: { type: "unknown", rawText: text },
      confidence: 0,
      source: "fallback",
    };
    const result: ClassificationResult = { text, top, scores, entities, meaning };
    if (top.intent.type === "unknown") {
      const guess = this.patterns.fuzzyGuess(text);
      if (guess) result.guess = guess;
    }

    logger.debug(
      { intent: top.intent.type, confidence: top.confidence, source: top.source, sentence: meaning.type },
      "Segment classified",
    );
    return result;
  }

  /**
   * "no, 0.02" or "actually make it bc1q..." mid-send is a fresh value for
   * the draft, not a cancellation.
   */
  private applyCorrection(
    scores: IntentScore[],
    entities: ParsedEntity,
    context: ClassificationContext,
  ): IntentScore[] {
    if (!context.references?.isCorrection || !context.sendInFlight) return scores;
    if (!entities.amount && !entities.address && !entities.feeLevel) return scores;
    const top = scores[0];
    const overridable: IntentType[] = ["send", "cancelAction", "confirmAction"];
    if (top && !overridable.includes(top.intent.type)) return scores;
    const correction: IntentScore = {
      intent: sendFromEntities(entities),
      confidence: Math.max(MATCH_CONFIDENCE.strong, top?.confidence ?? 0),
      source: "correction",
    };
    return [correction, ...scores.filter((score) => score.intent.type !== "send")];
  }

  private applyRepeat(scores: IntentScore[], context: ClassificationContext): IntentScore[] {
    const repeat = context.references?.repeatIntent;
    if (!repeat) return scores;
    const top = scores[0];
    const bareSameType = top !== undefined && top.intent.type === repeat.type && Object.keys(top.intent).length === 1;
    const weakConfirm = top !== undefined && top.intent.type === "confirmAction" && top.confidence < MATCH_CONFIDENCE.exact;
    if (top && !bareSameType && !weakConfirm) return scores;
    const score: IntentScore = { intent: repeat, confidence: MATCH_CONFIDENCE.strong, source: "repeat" };
    return [score, ...scores.filter((candidate) => candidate !== top)];
  }

  private fallback(
    text: string,
    lower: string,
    entities: ParsedEntity,
    context: ClassificationContext,
  ): IntentScore | undefined {
    const strong = MATCH_CONFIDENCE.strong;
    const weak = MATCH_CONFIDENCE.weak;
    const references = context.references;

    const followUp = this.followUp(lower, context.previousIntent);
    if (followUp) return { intent: followUp, confidence: strong, source: "followUp" };

    if (references?.repeatIntent) {
      return { intent: references.repeatIntent, confidence: strong, source: "repeat" };
    }

    if (entities.address && fillerWords(text, this.literals(text)) <= MAX_FILLER_WORDS) {
      return { intent: sendFromEntities(entities), confidence: strong, source: "entity" };
    }

    if (entities.txid && TXID_ONLY.test(lower.replace(/[?.!\s]+$/u, ""))) {
      return { intent: { type: "transactionDetail", txid: entities.txid }, confidence: strong, source: "entity" };
    }

    const fiatAmount = entities.currency !== undefined && !entities.unit && !isSentinelAmount(entities.amount);
    if (entities.amount && entities.currency && fiatAmount && !context.sendInFlight) {
      return {
        intent: { type: "convertAmount", amount: entities.amount, currency: entities.currency },
        confidence: strong,
        source: "entity",
      };
    }

    if (references?.transaction) {
      return {
        intent: { type: "transactionDetail", txid: references.transaction.txid },
        confidence: strong,
        source: "reference",
      };
    }

    if (references?.address || references?.amount) {
      return { intent: sendFromEntities(entities), confidence: strong, source: "reference" };
    }

    if (isSocialPositive(lower)) {
      return { intent: { type: "greeting" }, confidence: weak, source: "social" };
    }

    const emotion = analyzeMeaning(lower).emotion;
    if (emotion !== "neutral") {
      return { intent: EMOTION_INTENTS[emotion], confidence: weak, source: "emotion" };
    }

    return undefined;
  }

  private literals(text: string): string[] {
    const literals = findAddresses(text).map((info) => info.address);
    const uri = parseBip21(text)?.uri;
    return uri ? [uri, ...literals] : literals;
  }

  private followUp(lower: string, previous: WalletIntent | undefined): WalletIntent | undefined {
    if (!previous) return undefined;
    if (previous.type === "price" || previous.type === "balance") {
      const currency = bareCurrency(lower);
      if (currency) return { type: "price", currency };
    }
    if (previous.type === "balance") {
      if (SATS_FOLLOW_UP.test(lower) || isEvaluationQuestion(lower)) return { type: "balance" };
    }
    return undefined;
  }
}
