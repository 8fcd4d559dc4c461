import { z } from "zod";
import responsesData from "../data/responses.json" with { type: "json" };
import knowledgeData from "../data/knowledge.json" with { type: "json" };
import { findPhrase, normalizeForMatching } from "../extraction/text.js";
import { render } from "./formatting.js";
import { pick } from "./rng.js";
import type { RandomSource } from "./rng.js";

const RESPONSE_KEYS = [
  "greeting",
  "greetingSocial",
  "greetingEmotion",
  "helpEmotion",
  "help",
  "about",
  "settings",
  "unknown",
  "unknownNoGuess",
  "cancelled",
  "nothingToCancel",
  "nothingToConfirm",
  "cancelRefused",
  "duplicateConfirm",
  "askAddress",
  "askAddressWithAmount",
  "askAmount",
  "confirmSend",
  "modifiedFee",
  "modifiedAmount",
  "modifiedAddress",
  "broadcasting",
  "completed",
  "failed",
  "hintInsufficientFunds",
  "hintInsufficientFundsUnknown",
  "hintNetworkFailure",
  "hintSigningFailure",
  "broadcastUnknown",
  "unconfirmedBlocksSend",
  "unconfirmedCleared",
  "unconfirmedSettled",
  "testnetRejected",
  "invalidAmount",
  "resumeAddress",
  "resumeAmount",
  "resumeConfirm",
  "resumeProcessing",
  "resumeUnconfirmed",
  "repromptAddress",
  "repromptAmount",
  "repromptConfirm",
  "balance",
  "balanceFiat",
  "balanceSats",
  "balancePending",
  "balanceHidden",
  "hideBalance",
  "showBalance",
  "receive",
  "newAddress",
  "history",
  "historyEmpty",
  "price",
  "priceWithBalance",
  "priceUnavailable",
  "fees",
  "feesUnavailable",
  "convertToFiat",
  "convertToBtc",
  "convertUnavailable",
  "transactionDetail",
  "transactionNotFound",
  "walletHealth",
  "exportHistory",
  "utxoList",
  "bumpFee",
  "bumpFeeMissing",
  "networkStatus",
  "networkUnknown",
  "refresh",
  "explainUnknown",
  "recoveryPhrase",
  "receiveUnavailable",
  "bumpFeeUnsupported",
  "tip",
] as const;

export type ResponseKey = (typeof RESPONSE_KEYS)[number];

const KNOWN_KEYS: ReadonlySet<string> = new Set(RESPONSE_KEYS);
const VARIANTS = ["brief", "emoji"] as const;

export type ResponseVariant = (typeof VARIANTS)[number];

/** How a reply should read for this user; see replyStyleFor. */
export interface ReplyStyle {
  brief: boolean;
  emoji: boolean;
}

export const STANDARD_STYLE: ReplyStyle = { brief: false, emoji: false };

// Optional "<key>.brief" / "<key>.emoji" pools sit beside the base pool.
const ResponsePoolsSchema = z
  .record(z.string(), z.array(z.string()).min(1))
  .superRefine((pools, ctx) => {
    for (const key of RESPONSE_KEYS) {
      if (!(key in pools)) ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: "Missing phrasing pool" });
    }
    for (const name of Object.keys(pools)) {
      const [base, variant, ...rest] = name.split(".");
      const known = KNOWN_KEYS.has(base) && (variant === undefined || VARIANTS.some((v) => v === variant));
      if (!known || rest.length > 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [name], message: "Unknown phrasing pool" });
      }
    }
  });

const KnowledgeSchema = z.object({
  topics: z.array(z.object({ id: z.string(), aliases: z.array(z.string()).min(1), answer: z.string() })),
});

export type PhrasingPools = z.infer<typeof ResponsePoolsSchema>;

export const DEFAULT_PHRASINGS: PhrasingPools = ResponsePoolsSchema.parse(responsesData);
const KNOWLEDGE = KnowledgeSchema.parse(knowledgeData);

/**
 * Picks a phrasing from a pool and fills its placeholders. Selection goes
 * through the injected random source so a seeded run is reproducible.
 * A styled picker prefers the brief or emoji variant of a pool when the
 * data has one.
 */
export class ResponsePicker {
  constructor(
    private random: RandomSource,
    private pools: PhrasingPools = DEFAULT_PHRASINGS,
    readonly style: ReplyStyle = STANDARD_STYLE,
  ) {}

  styled(style: ReplyStyle): ResponsePicker {
    return new ResponsePicker(this.random, this.pools, style);
  }

  say(key: ResponseKey, values: Record<string, string | number> = {}): string {
    return render(pick(this.poolFor(key), this.random), values);
  }

  private poolFor(key: ResponseKey): string[] {
    const { brief, emoji } = this.style;
    const variant = (brief ? this.pools[`${key}.brief`] : undefined) ?? (emoji ? this.pools[`${key}.emoji`] : undefined);
    return variant ?? this.pools[key];
  }
}

function matchTopic(text: string): string | undefined {
  const lower = normalizeForMatching(text);
  // General topics come first in the table, so the last hit is the most specific.
  const hits = KNOWLEDGE.topics.filter((topic) => findPhrase(lower, topic.aliases) !== undefined);
  return hits.length > 0 ? hits[hits.length - 1].answer : undefined;
}

/** Answer for an explain request, matched on the topic, then on the whole text. */
export function lookupKnowledge(topic: string | undefined, text: string): string | undefined {
  return (topic ? matchTopic(topic) : undefined) ?? matchTopic(text);
}
