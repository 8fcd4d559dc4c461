import { Decimal } from "decimal.js";
import { z } from "zod";
import { errorMessage, getLogger } from "@hodlchat/core";
import type { ShownData } from "./conversation-memory.js";

const logger = getLogger("memory");

// decimal.js serializes through toJSON, exponent included ("1e-8").
const btc = z
  .string()
  .regex(/^-?\d+(?:\.\d+)?(?:e[+-]?\d+)?$/i)
  .transform((value) => new Decimal(value));

const TransactionSchema = z.object({
  txid: z.string(),
  direction: z.enum(["sent", "received"]),
  amount: btc,
  confirmations: z.number().int(),
  timestamp: z.number(),
  address: z.string().optional(),
});

const ShownSchema = z.object({
  balance: btc.optional(),
  fiatBalance: z.object({ amount: btc, currency: z.string() }).optional(),
  transactions: z.array(TransactionSchema).optional(),
  feeEstimates: z.object({ slow: z.number(), medium: z.number(), fast: z.number() }).optional(),
  receiveAddress: z.string().optional(),
  pendingSend: z
    .object({
      address: z.string(),
      amount: btc,
      fee: btc,
      feeRate: z.number(),
      feeLevel: z.enum(["slow", "medium", "fast", "custom"]),
      estimatedMinutes: z.number(),
    })
    .optional(),
  sentTransaction: z.object({ txid: z.string(), address: z.string(), amount: btc }).optional(),
});

/** JSON stored beside an assistant message; undefined when nothing was shown. */
export function encodeShown(shown: ShownData): string | undefined {
  if (Object.values(shown).every((value) => value === undefined)) return undefined;
  return JSON.stringify(shown);
}

/** Reverses encodeShown. A payload that no longer parses restores nothing. */
export function decodeShown(payload: string): ShownData {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch (err) {
    logger.warn({ err: errorMessage(err) }, "Stored shown payload is not JSON");
    return {};
  }
  const parsed = ShownSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn({ issues: parsed.error.issues.length }, "Stored shown payload does not match");
    return {};
  }
  return parsed.data;
}
