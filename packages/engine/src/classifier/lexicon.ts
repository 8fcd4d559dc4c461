import { z } from "zod";
import lexiconData from "../data/lexicon.json" with { type: "json" };
import type { IntentType } from "../intent/types.js";

/** Intents that a lexicon category can produce directly. */
export const CATEGORY_INTENTS = [
  "confirmAction",
  "cancelAction",
  "send",
  "convertAmount",
  "newAddress",
  "receive",
  "bumpFee",
  "exportHistory",
  "hideBalance",
  "showBalance",
  "refreshWallet",
  "balance",
  "history",
  "price",
  "feeEstimate",
  "walletHealth",
  "utxoList",
  "networkStatus",
  "explain",
  "about",
  "settings",
  "help",
  "greeting",
] as const satisfies readonly IntentType[];

export type CategoryIntent = (typeof CATEGORY_INTENTS)[number];

const CategorySchema = z.object({
  intent: z.enum(CATEGORY_INTENTS),
  match: z.enum(["prefix", "keywords"]),
  keywords: z.array(z.string().min(1)),
  exact: z.array(z.string()).default([]),
  strong: z.array(z.string()).default([]),
  patterns: z.array(z.string()).default([]),
  fuzzy: z.array(z.string()).default([]),
  exclude: z.array(z.string()).default([]),
  emoji: z.array(z.string()).default([]),
  requiresNumber: z.boolean().default(false),
  strongByDefault: z.boolean().default(false),
  bonus: z.number().min(0).max(0.1).default(0),
});

const LexiconSchema = z.object({
  categories: z.array(CategorySchema).min(1),
});

export type CategoryDefinition = z.infer<typeof CategorySchema>;

export interface CompiledCategory extends CategoryDefinition {
  /** Position in evaluation order, used as the tie-break. */
  order: number;
  regexes: RegExp[];
}

export function compileLexicon(input: unknown): CompiledCategory[] {
  const lexicon = LexiconSchema.parse(input);
  return lexicon.categories.map((category, order) => ({
    ...category,
    order,
    regexes: category.patterns.map((source) => new RegExp(source, "iu")),
  }));
}

export const DEFAULT_LEXICON = compileLexicon(lexiconData);
