import { z } from "zod";
import type { AmountUnit, FeeLevel } from "../intent/types.js";
import entitiesData from "../data/entities.json" with { type: "json" };
import { alternation, boundaryPattern } from "./text.js";

const EntityTablesSchema = z.object({
  currencies: z.array(
    z.object({
      code: z.string().regex(/^[A-Z]{3}$/),
      symbols: z.array(z.string()),
      names: z.array(z.string()),
    }),
  ),
  units: z.object({
    btc: z.array(z.string()),
    sats: z.array(z.string()),
    satoshis: z.array(z.string()),
  }),
  allWords: z.array(z.string()),
  halfWords: z.array(z.string()),
  halfAnaphora: z.array(z.string()),
  feeLevels: z.object({
    fast: z.array(z.string()),
    medium: z.array(z.string()),
    slow: z.array(z.string()),
  }),
});

export const ENTITY_TABLES = EntityTablesSchema.parse(entitiesData);

const symbolToCode = new Map<string, string>();
const nameToCode = new Map<string, string>();
for (const currency of ENTITY_TABLES.currencies) {
  for (const symbol of currency.symbols) symbolToCode.set(symbol, currency.code);
  for (const name of currency.names) nameToCode.set(name, currency.code);
  nameToCode.set(currency.code.toLowerCase(), currency.code);
}

const unitByWord = new Map<string, AmountUnit>();
for (const unit of ["btc", "sats", "satoshis"] as const) {
  for (const word of ENTITY_TABLES.units[unit]) unitByWord.set(word, unit);
}

/** Regex source matching any currency symbol, longest first. */
export const CURRENCY_SYMBOLS = alternation([...symbolToCode.keys()]);

/** Regex source matching any unit word, currency name or lowercase code. */
export const AMOUNT_SUFFIXES = alternation([...unitByWord.keys(), ...nameToCode.keys()]);

const CURRENCY_WORDS = alternation([...nameToCode.keys()]);
const CONTEXT_CURRENCY = new RegExp(
  `(?<![\\p{L}\\p{N}])(?:in|to|into|as|en|a|à|بال)\\s+(${CURRENCY_WORDS})(?![\\p{L}\\p{N}])`,
  "u",
);
const CURRENCY_MENTION = boundaryPattern(CURRENCY_WORDS);
const SYMBOL_MENTION = new RegExp(`(?:${CURRENCY_SYMBOLS})\\s?\\d`, "u");
const BARE_CURRENCY = new RegExp(
  `^(?:(?:in|to|and|what about|how about)\\s+)?(${CURRENCY_WORDS})$`,
  "u",
);

export function currencyForSymbol(symbol: string): string | undefined {
  return symbolToCode.get(symbol.toLowerCase());
}

export function currencyForName(word: string): string | undefined {
  return nameToCode.get(word.toLowerCase());
}

export function unitForWord(word: string): AmountUnit | undefined {
  return unitByWord.get(word.toLowerCase());
}

/** A currency named in context ("in euros", "to USD"). Expects lowercase text. */
export function findContextCurrency(text: string): string | undefined {
  const match = CONTEXT_CURRENCY.exec(text);
  return match?.[1] ? currencyForName(match[1]) : undefined;
}

/** Any currency named, coded or attached as a symbol anywhere in the text. */
export function findCurrencyMention(text: string): string | undefined {
  const named = CURRENCY_MENTION.exec(text);
  if (named) return currencyForName(named[0]);
  const symbol = SYMBOL_MENTION.exec(text);
  if (symbol) return currencyForSymbol(symbol[0].replace(/\s?\d$/, ""));
  return undefined;
}

/** True when the whole text is only a currency word or code, e.g. "euros" or "in gbp". */
export function bareCurrency(text: string): string | undefined {
  const trimmed = text.replace(/[?.!]+$/, "").trim();
  const match = BARE_CURRENCY.exec(trimmed);
  return match?.[1] ? currencyForName(match[1]) : undefined;
}

export function feeKeywords(level: Exclude<FeeLevel, "custom">): readonly string[] {
  return ENTITY_TABLES.feeLevels[level];
}
