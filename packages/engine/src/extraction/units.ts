import { Decimal } from "decimal.js";
import type { AmountUnit } from "../intent/types.js";

export const SATS_PER_BTC = 100_000_000;
export const MAX_BTC = new Decimal(21_000_000);
export const MAX_SATS = MAX_BTC.times(SATS_PER_BTC);

export function isSatsUnit(unit: AmountUnit | undefined): boolean {
  return unit === "sats" || unit === "satoshis";
}

/** Canonical BTC value, truncated to whole satoshis. A missing unit means BTC. */
export function toBtc(amount: Decimal, unit: AmountUnit | undefined): Decimal {
  const btc = isSatsUnit(unit) ? amount.dividedBy(SATS_PER_BTC) : amount;
  return btc.toDecimalPlaces(8, Decimal.ROUND_DOWN);
}

export function btcToSats(btc: Decimal): number {
  return btc.times(SATS_PER_BTC).floor().toNumber();
}

export function satsToBtc(sats: number): Decimal {
  return new Decimal(sats).dividedBy(SATS_PER_BTC);
}
