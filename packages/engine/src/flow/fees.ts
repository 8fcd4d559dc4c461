import { Decimal } from "decimal.js";
import type { FeeEstimates } from "../collaborators.js";
import type { FeeLevel } from "../intent/types.js";
import { SATS_PER_BTC } from "../extraction/units.js";

export const DEFAULT_FEE_RATES: FeeEstimates = { slow: 8, medium: 20, fast: 40 };

/** Typical single-input, two-output segwit spend. */
export const ESTIMATED_TX_VBYTES = 140;

const LEVEL_MINUTES: Record<Exclude<FeeLevel, "custom">, number> = {
  fast: 10,
  medium: 20,
  slow: 60,
};

const LEVEL_ORDER: readonly Exclude<FeeLevel, "custom">[] = ["slow", "medium", "fast"];

export function feeRateFor(level: FeeLevel, estimates: FeeEstimates, customRate?: number): number {
  if (level === "custom") return customRate ?? estimates.medium;
  return estimates[level];
}

/** Absolute fee in BTC, rounded up to the next satoshi. */
export function feeForRate(feeRate: number): Decimal {
  return new Decimal(feeRate)
    .times(ESTIMATED_TX_VBYTES)
    .dividedBy(SATS_PER_BTC)
    .toDecimalPlaces(8, Decimal.ROUND_UP);
}

/** Confirmation estimate; custom rates are placed against the live levels. */
export function estimatedMinutes(level: FeeLevel, feeRate: number, estimates: FeeEstimates): number {
  if (level !== "custom") return LEVEL_MINUTES[level];
  if (feeRate >= estimates.fast) return LEVEL_MINUTES.fast;
  if (feeRate >= estimates.medium) return LEVEL_MINUTES.medium;
  if (feeRate >= estimates.slow) return LEVEL_MINUTES.slow;
  return 120;
}

/**
 * Moves one urgency level up or down. A custom rate moves to the nearest
 * level beyond it. Undefined when there is nothing further in that direction.
 */
export function stepFeeLevel(
  level: FeeLevel,
  direction: 1 | -1,
  feeRate?: number,
  estimates: FeeEstimates = DEFAULT_FEE_RATES,
): Exclude<FeeLevel, "custom"> | undefined {
  if (level === "custom") {
    const rate = feeRate ?? estimates.medium;
    const candidates = direction === 1 ? LEVEL_ORDER : [...LEVEL_ORDER].reverse();
    return candidates.find((candidate) =>
      direction === 1 ? estimates[candidate] > rate : estimates[candidate] < rate,
    );
  }
  return LEVEL_ORDER[LEVEL_ORDER.indexOf(level) + direction];
}
