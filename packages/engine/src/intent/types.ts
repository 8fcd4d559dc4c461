import { Decimal } from "decimal.js";

export type AmountUnit = "btc" | "sats" | "satoshis";

export type FeeLevel = "slow" | "medium" | "fast" | "custom";

/** Sentinel amounts carried by {@link ParsedEntity.amount}. */
export const ALL_AMOUNT = -1;
export const HALF_AMOUNT = -0.5;

export interface ParsedEntity {
  /** Positive amount, or one of the sentinels `-1` (whole balance) / `-0.5` (half of it). */
  amount?: Decimal;
  unit?: AmountUnit;
  address?: string;
  txid?: string;
  count?: number;
  feeLevel?: FeeLevel;
  /** sat/vB, only set with feeLevel "custom". */
  feeRate?: number;
  /** ISO-4217 code. When set without a unit the amount is a fiat amount. */
  currency?: string;
}

export type WalletIntent =
  | {
      type: "send";
      amount?: Decimal;
      unit?: AmountUnit;
      address?: string;
      feeLevel?: FeeLevel;
      feeRate?: number;
    }
  | { type: "receive" }
  | { type: "balance" }
  | { type: "history"; count?: number }
  | { type: "feeEstimate" }
  | { type: "price"; currency?: string }
  | { type: "convertAmount"; amount: Decimal; currency: string; unit?: AmountUnit }
  | { type: "transactionDetail"; txid: string }
  | { type: "newAddress" }
  | { type: "walletHealth" }
  | { type: "exportHistory" }
  | { type: "utxoList" }
  | { type: "bumpFee"; txid?: string }
  | { type: "networkStatus" }
  | { type: "settings" }
  | { type: "help" }
  | { type: "about" }
  | { type: "confirmAction" }
  | { type: "cancelAction" }
  | { type: "hideBalance" }
  | { type: "showBalance" }
  | { type: "refreshWallet" }
  | { type: "greeting" }
  | { type: "explain"; topic?: string }
  | { type: "unknown"; rawText: string };

export type IntentType = WalletIntent["type"];

export type IntentOf<T extends IntentType> = Extract<WalletIntent, { type: T }>;

export type MatchStrength = "exact" | "strong" | "weak";

export const MATCH_CONFIDENCE: Record<MatchStrength, number> = {
  exact: 0.95,
  strong: 0.85,
  weak: 0.7,
};

export type ScoreSource =
  | "pattern"
  | "fuzzy"
  | "followUp"
  | "repeat"
  | "entity"
  | "reference"
  | "correction"
  | "social"
  | "emotion"
  | "fallback";

export interface IntentScore {
  intent: WalletIntent;
  confidence: number;
  source: ScoreSource;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

/** Structural equality over every field of the variant. */
export function intentsEqual(a: WalletIntent, b: WalletIntent): boolean {
  if (a.type !== b.type) return false;
  const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
  const left = new Map<string, unknown>(Object.entries(a));
  const right = new Map<string, unknown>(Object.entries(b));
  for (const key of keys) {
    const x = left.get(key);
    const y = right.get(key);
    if (Decimal.isDecimal(x) || Decimal.isDecimal(y)) {
      if (!Decimal.isDecimal(x) || !Decimal.isDecimal(y) || !x.equals(y)) return false;
      continue;
    }
    if (x !== y) return false;
  }
  return true;
}

/** True for the two sentinel amounts. */
export function isSentinelAmount(amount: Decimal | undefined): boolean {
  return amount !== undefined && (amount.equals(ALL_AMOUNT) || amount.equals(HALF_AMOUNT));
}
