import { Decimal } from "decimal.js";
import { emitHook, getLogger } from "@hodlchat/core";
import type { FeeEstimates, WalletTransaction } from "../collaborators.js";
import type { ClassificationResult } from "../classifier/intent-classifier.js";
import { isTestnetAddress } from "../extraction/address-validator.js";
import { toBtc } from "../extraction/units.js";
import { ALL_AMOUNT, HALF_AMOUNT } from "../intent/types.js";
import type { AmountUnit, FeeLevel, IntentOf, ParsedEntity, WalletIntent } from "../intent/types.js";
import type { MeaningModifier, SentenceMeaning } from "../meaning/sentence-meaning.js";
import { truncateAddress } from "../dispatch/formatting.js";
import { DEFAULT_FEE_RATES, estimatedMinutes, feeForRate, feeRateFor, stepFeeLevel } from "./fees.js";
import { FlowTransitionError, IDLE, assertTransition, isSendInFlight } from "./flow-state.js";
import type { FlowState, PendingTransaction, SendDraft } from "./flow-state.js";

const logger = getLogger("flow");

export const TESTNET_REJECTED = "Testnet addresses are not supported";
export const NON_POSITIVE_AMOUNT = "Amount must be greater than zero";

export type ModifiedField = "fee" | "amount" | "address";

export type FlowAction =
  | {
      kind: "advanceFlow";
      state: FlowState;
      previous: FlowState;
      /** The same question is asked again. */
      reprompt?: boolean;
      /** A second confirmation arrived while the first was being broadcast. */
      duplicate?: boolean;
      /** Cancel arrived after the broadcast was handed off. */
      refused?: boolean;
      cancelled?: boolean;
    }
  | { kind: "modifyFlow"; field: ModifiedField; state: FlowState; previous: PendingTransaction; pending: PendingTransaction }
  | { kind: "pauseAndHandle"; intent: WalletIntent; resume: FlowState }
  | { kind: "handleNormally"; intent: WalletIntent };

/** Wallet facts the controller needs to price and size a draft. */
export interface FlowContext {
  balance: Decimal;
  feeEstimates?: FeeEstimates;
  /** Fiat price of one BTC by currency code. */
  fiatRates?: Record<string, number>;
}

export interface SettledSend {
  txid: string;
  address: string;
  amount: Decimal;
}

type AmountResolution = { ok: true; amount: Decimal } | { ok: false; reason?: string };

/**
 * Send-flow state machine for one conversation. It owns the draft from
 * the first "send" until the broadcast outcome is reported, and hands
 * the draft to the broadcaster at most once.
 */
export class FlowController {
  private current: FlowState = IDLE;
  private broadcastClaimed = false;

  get state(): FlowState {
    return this.current;
  }

  decide(result: ClassificationResult, context: FlowContext): FlowAction {
    const intent = result.top.intent;
    const state = this.current;

    if (intent.type === "cancelAction") return this.cancel(intent);
    if (intent.type === "confirmAction") return this.confirm(intent);

    if (state.kind === "processing") {
      return { kind: "pauseAndHandle", intent, resume: state };
    }

    if (state.kind === "unconfirmed") {
      // No new send until the last one is accounted for.
      if (intent.type === "send") return { kind: "advanceFlow", state, previous: state };
      return { kind: "pauseAndHandle", intent, resume: state };
    }

    if (state.kind === "awaitingAddress" || state.kind === "awaitingAmount" || state.kind === "awaitingConfirmation") {
      return this.decideInFlow(result, context);
    }

    if (state.kind === "completed" || state.kind === "error") {
      this.transition(IDLE);
    }

    if (intent.type === "send") return this.startSend(intent, result.entities, context);
    return { kind: "handleNormally", intent };
  }

  /** Hands out the pending transaction once per confirmation. */
  claimBroadcast(): PendingTransaction | undefined {
    if (this.current.kind !== "processing" || this.broadcastClaimed) return undefined;
    this.broadcastClaimed = true;
    return this.current.pending;
  }

  markCompleted(txid: string): void {
    this.transition({ kind: "completed", txid });
    this.broadcastClaimed = false;
  }

  markError(reason: string): void {
    this.transition({ kind: "error", reason });
    this.broadcastClaimed = false;
  }

  /** The broadcaster did not answer; the draft is kept until its fate is known. */
  markUnconfirmed(reason: string): void {
    const state = this.current;
    if (state.kind !== "processing") throw new FlowTransitionError(state.kind, "unconfirmed");
    this.transition({ kind: "unconfirmed", pending: state.pending, reason });
    this.broadcastClaimed = false;
  }

  /**
   * Settles an unconfirmed send against the wallet history: a sent
   * transaction with the same amount (and address, when the wallet reports
   * one) completes it. Returns the settled send.
   */
  reconcile(transactions: readonly WalletTransaction[]): SettledSend | undefined {
    const state = this.current;
    if (state.kind !== "unconfirmed") return undefined;
    const { pending } = state;
    const match = transactions.find(
      (tx) =>
        tx.direction === "sent" &&
        tx.amount.equals(pending.amount) &&
        (tx.address === undefined || tx.address === pending.address),
    );
    if (!match) return undefined;
    this.transition({ kind: "completed", txid: match.txid });
    emitHook("tx", "reconciled", { address: truncateAddress(pending.address), txid: match.txid });
    logger.info({ txid: match.txid }, "Unconfirmed send found in history");
    return { txid: match.txid, address: pending.address, amount: pending.amount };
  }

  /** Drops any draft without transition checks; used when a conversation is cleared. */
  reset(): void {
    this.current = IDLE;
    this.broadcastClaimed = false;
  }

  // ─── Confirmation / Cancellation ──────────────────────────

  private cancel(intent: WalletIntent): FlowAction {
    const state = this.current;
    if (state.kind === "processing") {
      return { kind: "advanceFlow", state, previous: state, refused: true };
    }
    if (isSendInFlight(state) || state.kind === "error" || state.kind === "unconfirmed") {
      this.transition(IDLE);
      return { kind: "advanceFlow", state: IDLE, previous: state, cancelled: true };
    }
    if (state.kind === "completed") this.transition(IDLE);
    return { kind: "handleNormally", intent };
  }

  private confirm(intent: WalletIntent): FlowAction {
    const state = this.current;
    switch (state.kind) {
      case "awaitingConfirmation": {
        const next: FlowState = { kind: "processing", pending: state.pending };
        this.transition(next);
        return { kind: "advanceFlow", state: next, previous: state };
      }
      case "processing":
        emitHook("tx", "duplicate_confirm", { address: truncateAddress(state.pending.address) });
        return { kind: "advanceFlow", state, previous: state, duplicate: true };
      case "unconfirmed":
        return { kind: "advanceFlow", state, previous: state };
      case "awaitingAddress":
      case "awaitingAmount":
        return { kind: "advanceFlow", state, previous: state, reprompt: true };
      case "completed":
      case "error":
        this.transition(IDLE);
        return { kind: "handleNormally", intent };
      case "idle":
        return { kind: "handleNormally", intent };
    }
  }

  // ─── Starting a Send ──────────────────────────────────────

  private startSend(intent: IntentOf<"send">, entities: ParsedEntity, context: FlowContext): FlowAction {
    const previous = this.current;
    const draft: SendDraft = { feeLevel: intent.feeLevel ?? "medium" };
    if (intent.feeRate !== undefined) draft.feeRate = intent.feeRate;

    if (intent.address) {
      if (isTestnetAddress(intent.address)) return this.fail(TESTNET_REJECTED, previous);
      draft.address = intent.address;
    }

    if (intent.amount) {
      const resolved = this.resolveAmount(intent.amount, intent.unit, fiatCurrency(entities), draft, context);
      if (!resolved.ok) {
        if (resolved.reason) return this.fail(resolved.reason, previous);
      } else {
        draft.amount = resolved.amount;
      }
    }

    const next = this.nextState(draft, context);
    this.transition(next);
    return { kind: "advanceFlow", state: next, previous };
  }

  // ─── Inside a Flow ────────────────────────────────────────

  private decideInFlow(result: ClassificationResult, context: FlowContext): FlowAction {
    const state = this.current;
    const intent = result.top.intent;
    const entities = result.entities;
    const reprompt: FlowAction = { kind: "advanceFlow", state, previous: state, reprompt: true };

    if (intent.type === "send") {
      const complete = intent.amount !== undefined && intent.address !== undefined;
      if (complete && result.top.source !== "correction") {
        return this.startSend(intent, entities, context);
      }
      return this.mergeIntoDraft(intent, entities, context);
    }

    if (state.kind === "awaitingConfirmation" && result.meaning.modifier) {
      return this.applyModifier(result.meaning, context);
    }

    if (intent.type === "help" || (intent.type === "unknown" && intent.rawText.trim() === "?")) {
      return reprompt;
    }
    if (result.meaning.hesitation) return reprompt;

    if (intent.type === "unknown") {
      if (state.kind === "awaitingAddress" && entities.address) {
        return this.mergeIntoDraft({ type: "send", address: entities.address }, entities, context);
      }
      if ((state.kind === "awaitingAmount" || state.kind === "awaitingConfirmation") && entities.amount) {
        const fill: IntentOf<"send"> = { type: "send", amount: entities.amount };
        if (entities.unit) fill.unit = entities.unit;
        return this.mergeIntoDraft(fill, entities, context);
      }
    }

    if (state.kind === "awaitingConfirmation" && entities.feeLevel) {
      if (intent.type === "unknown" || intent.type === "feeEstimate" || intent.type === "bumpFee") {
        return this.changeFee(entities.feeLevel, entities.feeRate, context);
      }
    }

    if (intent.type !== "unknown") {
      emitHook("flow", "paused", { state: state.kind, intent: intent.type });
      return { kind: "pauseAndHandle", intent, resume: state };
    }
    return reprompt;
  }

  private currentDraft(): SendDraft {
    const state = this.current;
    switch (state.kind) {
      case "awaitingAddress":
      case "awaitingAmount":
        return { ...state.draft };
      case "awaitingConfirmation":
      case "processing": {
        const { address, amount, feeLevel, feeRate } = state.pending;
        return { address, amount, feeLevel, feeRate };
      }
      default:
        return { feeLevel: "medium" };
    }
  }

  private mergeIntoDraft(intent: IntentOf<"send">, entities: ParsedEntity, context: FlowContext): FlowAction {
    const state = this.current;
    const draft = this.currentDraft();
    let changed: ModifiedField | undefined;

    if (intent.address && intent.address !== draft.address) {
      if (isTestnetAddress(intent.address)) return this.fail(TESTNET_REJECTED, state);
      draft.address = intent.address;
      changed = "address";
    }

    if (intent.feeLevel) {
      draft.feeLevel = intent.feeLevel;
      draft.feeRate = intent.feeRate;
      changed = "fee";
    }

    if (intent.amount) {
      const resolved = this.resolveAmount(intent.amount, intent.unit, fiatCurrency(entities), draft, context);
      if (resolved.ok) {
        draft.amount = resolved.amount;
        changed = "amount";
      } else if (resolved.reason) {
        return this.fail(resolved.reason, state);
      }
    }

    if (!changed) return { kind: "advanceFlow", state, previous: state, reprompt: true };

    const next = this.nextState(draft, context);
    if (state.kind === "awaitingConfirmation" && next.kind === "awaitingConfirmation") {
      return this.modified(changed, state.pending, next);
    }
    this.transition(next);
    return { kind: "advanceFlow", state: next, previous: state };
  }

  private applyModifier(meaning: SentenceMeaning, context: FlowContext): FlowAction {
    const state = this.current;
    if (state.kind !== "awaitingConfirmation" || !meaning.modifier) {
      return { kind: "advanceFlow", state, previous: state, reprompt: true };
    }
    const modifier = meaning.modifier;
    const targetsFee =
      meaning.object === "fee" || (meaning.object === undefined && (modifier === "fastest" || modifier === "cheapest"));

    if (targetsFee) {
      const level = feeLevelFor(modifier, state.pending, context.feeEstimates ?? DEFAULT_FEE_RATES);
      if (!level) return { kind: "advanceFlow", state, previous: state, reprompt: true };
      return this.changeFee(level, undefined, context);
    }

    const draft = this.currentDraft();
    const amount = draft.amount ?? new Decimal(0);
    const fee = feeForRate(state.pending.feeRate);
    let next: Decimal;
    switch (modifier) {
      case "half":
        next = amount.dividedBy(2);
        break;
      case "double":
        next = amount.times(2);
        break;
      case "all":
        next = context.balance.minus(fee);
        break;
      case "increase":
      case "tooLittle":
        next = amount.times("1.1");
        break;
      case "decrease":
      case "tooMuch":
        next = amount.times("0.9");
        break;
      case "fastest":
      case "cheapest":
      case "enough":
        return { kind: "advanceFlow", state, previous: state, reprompt: true };
    }
    next = next.toDecimalPlaces(8, Decimal.ROUND_DOWN);
    if (next.lessThanOrEqualTo(0)) return this.fail(NON_POSITIVE_AMOUNT, state);
    draft.amount = next;
    return this.modified("amount", state.pending, this.nextState(draft, context));
  }

  private changeFee(level: FeeLevel, feeRate: number | undefined, context: FlowContext): FlowAction {
    const state = this.current;
    if (state.kind !== "awaitingConfirmation") {
      return { kind: "advanceFlow", state, previous: state, reprompt: true };
    }
    const draft = this.currentDraft();
    draft.feeLevel = level;
    draft.feeRate = level === "custom" ? feeRate : undefined;
    return this.modified("fee", state.pending, this.nextState(draft, context));
  }

  private modified(field: ModifiedField, previous: PendingTransaction, next: FlowState): FlowAction {
    this.transition(next);
    if (next.kind !== "awaitingConfirmation") {
      return { kind: "advanceFlow", state: next, previous: { kind: "awaitingConfirmation", pending: previous } };
    }
    emitHook("flow", "modified", { field });
    return { kind: "modifyFlow", field, state: next, previous, pending: next.pending };
  }

  // ─── Draft Arithmetic ─────────────────────────────────────

  private resolveAmount(
    amount: Decimal,
    unit: AmountUnit | undefined,
    currency: string | undefined,
    draft: SendDraft,
    context: FlowContext,
  ): AmountResolution {
    let btc: Decimal;
    if (amount.equals(ALL_AMOUNT)) {
      const estimates = context.feeEstimates ?? DEFAULT_FEE_RATES;
      btc = context.balance.minus(feeForRate(feeRateFor(draft.feeLevel, estimates, draft.feeRate)));
    } else if (amount.equals(HALF_AMOUNT)) {
      btc = context.balance.dividedBy(2).toDecimalPlaces(8, Decimal.ROUND_DOWN);
    } else if (currency) {
      const rate = context.fiatRates?.[currency];
      if (!rate || rate <= 0) return { ok: false };
      btc = amount.dividedBy(rate).toDecimalPlaces(8, Decimal.ROUND_DOWN);
    } else {
      btc = toBtc(amount, unit);
    }
    if (btc.lessThanOrEqualTo(0)) return { ok: false, reason: NON_POSITIVE_AMOUNT };
    return { ok: true, amount: btc };
  }

  private nextState(draft: SendDraft, context: FlowContext): FlowState {
    if (!draft.address) return { kind: "awaitingAddress", draft };
    if (!draft.amount) return { kind: "awaitingAmount", draft };
    return { kind: "awaitingConfirmation", pending: buildPending(draft.address, draft.amount, draft, context) };
  }

  private fail(reason: string, previous: FlowState): FlowAction {
    const next: FlowState = { kind: "error", reason };
    this.transition(next);
    return { kind: "advanceFlow", state: next, previous };
  }

  private transition(next: FlowState): void {
    const from = this.current.kind;
    assertTransition(from, next.kind);
    this.current = next;
    if (from !== next.kind) {
      logger.debug({ from, to: next.kind }, "Flow transition");
      emitHook("flow", "transition", { from, to: next.kind });
    }
  }
}

export function buildPending(address: string, amount: Decimal, draft: SendDraft, context: FlowContext): PendingTransaction {
  const estimates = context.feeEstimates ?? DEFAULT_FEE_RATES;
  const feeRate = feeRateFor(draft.feeLevel, estimates, draft.feeRate);
  return {
    address,
    amount,
    fee: feeForRate(feeRate),
    feeRate,
    feeLevel: draft.feeLevel,
    estimatedMinutes: estimatedMinutes(draft.feeLevel, feeRate, estimates),
  };
}

/** Custom rates step against the live estimates the draft was priced with. */
function feeLevelFor(modifier: MeaningModifier, pending: PendingTransaction, estimates: FeeEstimates): FeeLevel | undefined {
  switch (modifier) {
    case "fastest":
      return "fast";
    case "cheapest":
      return "slow";
    case "increase":
    case "double":
    case "tooLittle":
      return stepFeeLevel(pending.feeLevel, 1, pending.feeRate, estimates);
    case "decrease":
    case "half":
    case "tooMuch":
      return stepFeeLevel(pending.feeLevel, -1, pending.feeRate, estimates);
    case "all":
    case "enough":
      return undefined;
  }
}

/** Fiat currency of an amount that carries no BTC unit. */
function fiatCurrency(entities: ParsedEntity): string | undefined {
  return entities.currency && entities.amount && !entities.unit ? entities.currency : undefined;
}
