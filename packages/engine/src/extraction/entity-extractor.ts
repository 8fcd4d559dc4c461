import { Decimal } from "decimal.js";
import { getLogger } from "@hodlchat/core";
import { ALL_AMOUNT, HALF_AMOUNT } from "../intent/types.js";
import type { AmountUnit, FeeLevel, ParsedEntity } from "../intent/types.js";
import { findAddresses } from "./address-validator.js";
import type { AddressInfo } from "./address-validator.js";
import { parseBip21 } from "./bip21.js";
import type { Bip21Payment } from "./bip21.js";
import {
  AMOUNT_SUFFIXES,
  CURRENCY_SYMBOLS,
  ENTITY_TABLES,
  currencyForName,
  currencyForSymbol,
  feeKeywords,
  findContextCurrency,
  findCurrencyMention,
  unitForWord,
} from "./currency.js";
import { alternation, findPhrase, normalizeText, phrasePattern } from "./text.js";
import { MAX_BTC, MAX_SATS, isSatsUnit } from "./units.js";
import { findWordNumber } from "./word-numbers.js";

const logger = getLogger("entity-extractor");

export interface AmountMatch {
  amount: Decimal;
  unit?: AmountUnit;
  /** Set for fiat amounts ("$100", "50 euros"). */
  currency?: string;
}

export interface FeeMatch {
  feeLevel: FeeLevel;
  feeRate?: number;
}

const SATS_PROMOTION_THRESHOLD = 1000;
const MAX_COUNT = 500;
const MAX_FEE_RATE = 10_000;

const NUMBER = String.raw`\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:[.,]\d+)?|\.\d+`;
const MULTIPLIER = String.raw`(?:\s*([km])(?!\p{L}))?`;

const SYMBOL_PREFIXED = new RegExp(`(${CURRENCY_SYMBOLS})\\s?(${NUMBER})${MULTIPLIER}`, "gu");
const SYMBOL_SUFFIXED = new RegExp(`(${NUMBER})${MULTIPLIER}\\s?(${CURRENCY_SYMBOLS})`, "gu");
const BARE_NUMBER = new RegExp(
  `(${NUMBER})${MULTIPLIER}(?:\\s*(${AMOUNT_SUFFIXES})(?!\\p{L}))?`,
  "gu",
);
const LEADING_SUFFIX = new RegExp(`^\\s*(${AMOUNT_SUFFIXES})(?!\\p{L})`, "u");
const HALF_ANAPHORA = new RegExp(`^\\s*(?:${alternation(ENTITY_TABLES.halfAnaphora)})(?![\\p{L}\\p{N}])`, "u");

const TXID = /(?<![a-fA-F0-9])[a-fA-F0-9]{64}(?![a-fA-F0-9])/;
const COUNT =
  /(?<!\p{L})(?:last|show|recent|top|past|previous|latest|first)\s+(\d+)(?![\d.])|(?<![\d.])(\d+)\s+(?:transactions?|txs?|transfers?|payments?)(?!\p{L})/u;
const CUSTOM_FEE_RATE =
  /(\d+(?:\.\d+)?)\s*(?:(?:sats?|satoshis?)\s*(?:\/|per\s+)\s*v?b(?:ytes?)?|s\/v?b)(?!\p{L})/u;
const FEE_RATE_PHRASE =
  /(?<!\p{L})fee(?:\s+rate)?\s+(?:of\s+|to\s+|at\s+)?(\d+(?:\.\d+)?)(?![\d.]|\s*(?:btc|bitcoin|sats?|satoshis?|%|[$€£]))/u;
const ORDINAL_REFERENCE = /#\d+/g;
const PERCENTAGE = /\d+(?:\.\d+)?\s*%/g;

function parseNumber(raw: string): { value: Decimal; integer: boolean } | undefined {
  let cleaned = raw;
  if (/^\d{1,3}(?:,\d{3})+(?:\.\d+)?$/.test(raw) && !raw.startsWith("0,")) {
    cleaned = raw.replace(/,/g, "");
  } else if (/^\d+,\d+$/.test(raw)) {
    cleaned = raw.replace(",", ".");
  }
  if (!/^(?:\d+(?:\.\d+)?|\.\d+)$/.test(cleaned)) return undefined;
  return { value: new Decimal(cleaned), integer: !cleaned.includes(".") };
}

function applyMultiplier(value: Decimal, multiplier: string | undefined): Decimal {
  if (multiplier === "k") return value.times(1_000);
  if (multiplier === "m") return value.times(1_000_000);
  return value;
}

function suffixInfo(word: string | undefined): { unit?: AmountUnit; currency?: string } {
  if (!word) return {};
  const unit = unitForWord(word);
  if (unit) return { unit };
  const currency = currencyForName(word);
  return currency ? { currency } : {};
}

function withinBounds(match: AmountMatch): boolean {
  if (match.amount.lessThanOrEqualTo(0)) return false;
  if (match.currency && !match.unit) return true;
  return match.amount.lessThanOrEqualTo(isSatsUnit(match.unit) ? MAX_SATS : MAX_BTC);
}

/**
 * Builds the amount, promoting a bare integer of 1000 or more to sats
 * unless a fiat currency is mentioned anywhere in the text.
 */
function finalizeAmount(
  text: string,
  value: Decimal,
  integer: boolean,
  suffix: { unit?: AmountUnit; currency?: string },
): AmountMatch | undefined {
  const match: AmountMatch = { amount: value, ...suffix };
  if (
    !match.unit &&
    !match.currency &&
    integer &&
    value.greaterThanOrEqualTo(SATS_PROMOTION_THRESHOLD) &&
    findCurrencyMention(text) === undefined
  ) {
    match.unit = "sats";
  }
  return withinBounds(match) ? match : undefined;
}

function isWordChar(char: string | undefined): boolean {
  return char !== undefined && /[\p{L}\p{N}]/u.test(char);
}

function sentinelAmount(text: string): AmountMatch | undefined {
  if (findPhrase(text, ENTITY_TABLES.allWords)) {
    return { amount: new Decimal(ALL_AMOUNT) };
  }
  for (const word of ENTITY_TABLES.halfWords) {
    const pattern = phrasePattern(word);
    const found = pattern.exec(text);
    if (!found) continue;
    const rest = text.slice(found.index + found[0].length);
    if (!HALF_ANAPHORA.test(rest)) return { amount: new Decimal(HALF_AMOUNT) };
  }
  return undefined;
}

/** True when "half" points back at an earlier amount ("half that") rather than the balance. */
export function isAnaphoricHalf(text: string): boolean {
  const lower = normalizeText(text).toLowerCase();
  return ENTITY_TABLES.halfWords.some((word) => {
    const found = phrasePattern(word).exec(lower);
    return found !== null && HALF_ANAPHORA.test(lower.slice(found.index + found[0].length));
  });
}

function wordNumberAmount(text: string): AmountMatch | undefined {
  const found = findWordNumber(text, (rest) => LEADING_SUFFIX.test(rest));
  if (!found) return undefined;
  const suffix = LEADING_SUFFIX.exec(text.slice(found.end));
  return finalizeAmount(
    text,
    new Decimal(found.value),
    Number.isInteger(found.value),
    suffixInfo(suffix?.[1]),
  );
}

function symbolAmount(text: string): AmountMatch | undefined {
  for (const m of text.matchAll(SYMBOL_PREFIXED)) {
    const parsed = parseNumber(m[2] ?? "");
    const currency = currencyForSymbol(m[1] ?? "");
    if (!parsed || !currency) continue;
    const match: AmountMatch = { amount: applyMultiplier(parsed.value, m[3]), currency };
    if (withinBounds(match)) return match;
  }
  for (const m of text.matchAll(SYMBOL_SUFFIXED)) {
    const parsed = parseNumber(m[1] ?? "");
    const currency = currencyForSymbol(m[3] ?? "");
    if (!parsed || !currency || isWordChar(text[(m.index ?? 0) - 1])) continue;
    const match: AmountMatch = { amount: applyMultiplier(parsed.value, m[2]), currency };
    if (withinBounds(match)) return match;
  }
  return undefined;
}

function bareAmount(text: string): AmountMatch | undefined {
  for (const m of text.matchAll(BARE_NUMBER)) {
    const start = m.index ?? 0;
    const before = text[start - 1];
    const after = text[start + m[0].length];
    if (isWordChar(before) || before === "." || before === "," || before === "#") continue;
    if (isWordChar(after)) continue;

    const parsed = parseNumber(m[1] ?? "");
    if (!parsed) continue;
    const value = applyMultiplier(parsed.value, m[2]);
    const match = finalizeAmount(text, value, parsed.integer || m[2] !== undefined, suffixInfo(m[3]));
    if (match) return match;
  }
  return undefined;
}

function amountFromMasked(text: string): AmountMatch | undefined {
  return sentinelAmount(text) ?? wordNumberAmount(text) ?? symbolAmount(text) ?? bareAmount(text);
}

/** Blanks out spans that look numeric but are not amounts. */
function maskNonAmounts(lower: string, literals: string[]): string {
  let masked = lower;
  for (const literal of literals) {
    masked = masked.split(literal.toLowerCase()).join(" ");
  }
  return masked
    .replace(new RegExp(COUNT.source, "gu"), " ")
    .replace(new RegExp(CUSTOM_FEE_RATE.source, "gu"), " ")
    .replace(new RegExp(FEE_RATE_PHRASE.source, "gu"), " ")
    .replace(ORDINAL_REFERENCE, " ")
    .replace(PERCENTAGE, " ");
}

export function extractAddress(text: string): string | undefined {
  const normalized = normalizeText(text);
  return parseBip21(normalized)?.address ?? findAddresses(normalized)[0]?.address;
}

export function extractTxid(text: string): string | undefined {
  return TXID.exec(text)?.[0].toLowerCase();
}

export function extractCount(text: string): number | undefined {
  const match = COUNT.exec(normalizeText(text).toLowerCase());
  if (!match) return undefined;
  const count = Number.parseInt(match[1] ?? match[2] ?? "", 10);
  return Number.isInteger(count) && count > 0 && count <= MAX_COUNT ? count : undefined;
}

export function extractFeeLevel(text: string): FeeMatch | undefined {
  const lower = normalizeText(text).toLowerCase();
  const custom = CUSTOM_FEE_RATE.exec(lower) ?? FEE_RATE_PHRASE.exec(lower);
  if (custom) {
    const rate = Number.parseFloat(custom[1] ?? "");
    if (rate > 0 && rate <= MAX_FEE_RATE) return { feeLevel: "custom", feeRate: rate };
  }
  for (const level of ["fast", "medium", "slow"] as const) {
    if (findPhrase(lower, feeKeywords(level))) return { feeLevel: level };
  }
  return undefined;
}

function locateAmount(
  normalized: string,
  bip21: Bip21Payment | undefined,
  addresses: AddressInfo[],
  txid: string | undefined,
): AmountMatch | undefined {
  if (bip21?.amount) return { amount: bip21.amount, unit: "btc" };
  const literals = addresses.map((info) => info.address);
  if (txid) literals.push(txid);
  if (bip21) literals.push(bip21.uri);
  return amountFromMasked(maskNonAmounts(normalized.toLowerCase(), literals));
}

/** Amount only, with addresses, txids, counts and fee rates masked out first. */
export function extractAmount(text: string): AmountMatch | undefined {
  const normalized = normalizeText(text);
  return locateAmount(normalized, parseBip21(normalized), findAddresses(normalized), extractTxid(normalized));
}

export function extractCurrency(text: string): string | undefined {
  const lower = normalizeText(text).toLowerCase();
  return findContextCurrency(lower) ?? findCurrencyMention(lower);
}

export function extractEntities(text: string): ParsedEntity {
  const normalized = normalizeText(text);
  const lower = normalized.toLowerCase();
  const entity: ParsedEntity = {};

  const bip21 = parseBip21(normalized);
  const addresses = findAddresses(normalized);
  const address = bip21?.address ?? addresses[0]?.address;
  if (address) entity.address = address;

  const txid = extractTxid(normalized);
  if (txid) entity.txid = txid;

  const count = extractCount(normalized);
  if (count !== undefined) entity.count = count;

  const fee = extractFeeLevel(normalized);
  if (fee) {
    entity.feeLevel = fee.feeLevel;
    if (fee.feeRate !== undefined) entity.feeRate = fee.feeRate;
  }

  const amount = locateAmount(normalized, bip21, addresses, txid);
  if (amount) {
    entity.amount = amount.amount;
    if (amount.unit) entity.unit = amount.unit;
  }

  const currency =
    amount?.currency ?? findContextCurrency(lower) ?? (amount ? undefined : findCurrencyMention(lower));
  if (currency) entity.currency = currency;

  logger.debug(
    {
      amount: entity.amount?.toString(),
      unit: entity.unit,
      hasAddress: entity.address !== undefined,
      count: entity.count,
      feeLevel: entity.feeLevel,
      currency: entity.currency,
    },
    "Entities extracted",
  );
  return entity;
}
