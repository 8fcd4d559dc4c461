import type { Decimal } from "decimal.js";
import type { FeeLevel } from "../intent/types.js";

/** A send being assembled across turns. Amounts are canonical BTC. */
export interface SendDraft {
  amount?: Decimal;
  address?: string;
  feeLevel: FeeLevel;
  /** sat/vB, set when the user named a custom rate. */
  feeRate?: number;
}

export interface PendingTransaction {
  address: string;
  amount: Decimal;
  /** Absolute fee in BTC. */
  fee: Decimal;
  /** sat/vB */
  feeRate: number;
  feeLevel: FeeLevel;
  estimatedMinutes: number;
}

export type FlowState =
  | { kind: "idle" }
  | { kind: "awaitingAddress"; draft: SendDraft }
  | { kind: "awaitingAmount"; draft: SendDraft }
  | { kind: "awaitingConfirmation"; pending: PendingTransaction }
  | { kind: "processing"; pending: PendingTransaction }
  | { kind: "completed"; txid: string }
  | { kind: "error"; reason: string }
  /** The broadcaster never answered: the transaction may or may not be out. */
  | { kind: "unconfirmed"; pending: PendingTransaction; reason: string };

export type FlowStateKind = FlowState["kind"];

export const IDLE: FlowState = { kind: "idle" };

/**
 * Allowed transitions. Once a draft is processing the broadcast has been
 * handed off, so only an outcome may follow. An unconfirmed send leaves
 * only when the history shows it or the user dismisses it.
 */
export const ALLOWED_TRANSITIONS: Record<FlowStateKind, readonly FlowStateKind[]> = {
  idle: ["idle", "awaitingAddress", "awaitingAmount", "awaitingConfirmation", "error"],
  awaitingAddress: ["idle", "awaitingAddress", "awaitingAmount", "awaitingConfirmation", "error"],
  awaitingAmount: ["idle", "awaitingAddress", "awaitingAmount", "awaitingConfirmation", "error"],
  awaitingConfirmation: [
    "idle",
    "awaitingAddress",
    "awaitingAmount",
    "awaitingConfirmation",
    "processing",
    "error",
  ],
  processing: ["completed", "error", "unconfirmed"],
  completed: ["idle", "awaitingAddress", "awaitingAmount", "awaitingConfirmation", "error"],
  error: ["idle", "awaitingAddress", "awaitingAmount", "awaitingConfirmation", "error"],
  unconfirmed: ["idle", "completed", "unconfirmed"],
};

export class FlowTransitionError extends Error {
  constructor(
    readonly from: FlowStateKind,
    readonly to: FlowStateKind,
  ) {
    super(`Illegal flow transition ${from} -> ${to}`);
    this.name = "FlowTransitionError";
  }
}

export function canTransition(from: FlowStateKind, to: FlowStateKind): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: FlowStateKind, to: FlowStateKind): void {
  if (!canTransition(from, to)) throw new FlowTransitionError(from, to);
}

/** True while a send is being gathered, confirmed or broadcast. */
export function isSendInFlight(state: FlowState): boolean {
  return (
    state.kind === "awaitingAddress" ||
    state.kind === "awaitingAmount" ||
    state.kind === "awaitingConfirmation" ||
    state.kind === "processing"
  );
}
