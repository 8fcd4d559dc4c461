import { z } from "zod";
import tipsData from "../data/tips.json" with { type: "json" };
import type { IntentType } from "../intent/types.js";
import { pick } from "./rng.js";
import type { RandomSource } from "./rng.js";

const TipCatalogSchema = z
  .object({
    /** Plain answers per tip. */
    every: z.number().int().positive(),
    fallback: z.string(),
    intents: z.record(z.string(), z.string()),
    categories: z.record(z.string(), z.array(z.string()).min(2)),
  })
  .superRefine((catalog, ctx) => {
    const categories = [catalog.fallback, ...Object.values(catalog.intents)];
    for (const category of categories) {
      if (!(category in catalog.categories)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["categories", category], message: "Unknown tip category" });
      }
    }
  });

export type TipCatalog = z.infer<typeof TipCatalogSchema>;

export const DEFAULT_TIPS: TipCatalog = TipCatalogSchema.parse(tipsData);

/**
 * Command-discovery tips for one conversation. Every `every`-th plain
 * answer earns a tip about a command related to what the user just did,
 * never the same tip twice in a row.
 */
export class TipsEngine {
  private answersSinceTip = 0;
  private lastTip?: string;

  constructor(
    private random: RandomSource,
    private catalog: TipCatalog = DEFAULT_TIPS,
  ) {}

  /** Counts one plain answer to `intent` and returns a tip when one is due. */
  next(intent: IntentType): string | undefined {
    this.answersSinceTip += 1;
    if (this.answersSinceTip < this.catalog.every) return undefined;

    const category = this.catalog.intents[intent] ?? this.catalog.fallback;
    const candidates = (this.catalog.categories[category] ?? []).filter((tip) => tip !== this.lastTip);
    if (candidates.length === 0) return undefined;

    this.answersSinceTip = 0;
    this.lastTip = pick(candidates, this.random);
    return this.lastTip;
  }

  reset(): void {
    this.answersSinceTip = 0;
    this.lastTip = undefined;
  }
}
