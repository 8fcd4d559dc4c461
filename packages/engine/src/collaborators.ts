import type { Decimal } from "decimal.js";
import { classifyError, errorMessage } from "@hodlchat/core";

// ─── Wallet State ───────────────────────────────────────────

export type TransactionDirection = "sent" | "received";

export interface WalletTransaction {
  txid: string;
  direction: TransactionDirection;
  /** BTC, always positive. */
  amount: Decimal;
  confirmations: number;
  /** Unix timestamp (ms). */
  timestamp: number;
  address?: string;
}

/** sat/vB per urgency level. */
export interface FeeEstimates {
  slow: number;
  medium: number;
  fast: number;
}

export interface WalletSnapshot {
  /** Confirmed balance in BTC. */
  balance: Decimal;
  pendingBalance: Decimal;
  utxoCount: number;
  feeEstimates?: FeeEstimates;
  receiveAddress?: string;
  /** Newest first. */
  transactions: WalletTransaction[];
  /** Fiat price of one BTC keyed by ISO-4217 code, when the host already knows it. */
  fiatRates?: Record<string, number>;
  network?: "mainnet" | "testnet";
}

export interface WalletStateProvider {
  getSnapshot(): WalletSnapshot | Promise<WalletSnapshot>;
}

// ─── Market Data ────────────────────────────────────────────

export interface PriceService {
  getPrice(currency: string, signal: AbortSignal): Promise<Decimal>;
}

export interface FeeService {
  getFeeEstimates(signal: AbortSignal): Promise<FeeEstimates>;
}

// ─── Signing / Broadcast ────────────────────────────────────

export type BroadcastFailureKind = "insufficientFunds" | "signingFailure" | "networkFailure";

export interface BroadcastRequest {
  destination: string;
  amountSats: number;
  /** sat/vB */
  feeRate: number;
}

export type BroadcastResult =
  | { ok: true; txid: string }
  | { ok: false; error: { kind: BroadcastFailureKind; message: string } };

export interface TransactionBroadcaster {
  broadcast(request: BroadcastRequest, signal: AbortSignal): Promise<BroadcastResult>;
  bumpFee?(request: { txid: string; feeRate: number }, signal: AbortSignal): Promise<BroadcastResult>;
}

export class BroadcastError extends Error {
  constructor(
    readonly kind: BroadcastFailureKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "BroadcastError";
  }
}

/**
 * True when a thrown broadcaster error leaves the outcome open: a timeout
 * or a dropped connection may have come after the node took the
 * transaction. A BroadcastError is the broadcaster's own verdict.
 */
export function isUnknownBroadcastOutcome(err: unknown): boolean {
  if (err instanceof BroadcastError) return false;
  return classifyError(err) === "transient";
}

/**
 * Folds a thrown broadcaster error into the typed failure shape. Transient
 * errors become network failures and anything else a signing problem.
 * A spend checks isUnknownBroadcastOutcome first.
 */
export function toBroadcastFailure(err: unknown): { kind: BroadcastFailureKind; message: string } {
  if (err instanceof BroadcastError) return { kind: err.kind, message: err.message };
  const kind: BroadcastFailureKind =
    classifyError(err) === "transient" ? "networkFailure" : "signingFailure";
  return { kind, message: errorMessage(err) };
}

// ─── Addresses ──────────────────────────────────────────────

export interface AddressProvider {
  nextAddress(): string | Promise<string>;
}

/** Everything the engine talks to outside its own process. */
export interface Collaborators {
  wallet: WalletStateProvider;
  prices?: PriceService;
  fees?: FeeService;
  broadcaster: TransactionBroadcaster;
  addresses?: AddressProvider;
}
