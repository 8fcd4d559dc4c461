import { Decimal } from "decimal.js";
import { callCollaborator, emitHook, errorMessage, getLogger, withTimeout } from "@hodlchat/core";
import type {
  BroadcastFailureKind,
  BroadcastResult,
  Collaborators,
  FeeEstimates,
  WalletSnapshot,
  WalletTransaction,
} from "../collaborators.js";
import { isUnknownBroadcastOutcome, toBroadcastFailure } from "../collaborators.js";
import type { ClassificationResult } from "../classifier/intent-classifier.js";
import type { CategoryIntent } from "../classifier/lexicon.js";
import { btcToSats, isSatsUnit, toBtc } from "../extraction/units.js";
import type { FlowAction, FlowController } from "../flow/flow-controller.js";
import { NON_POSITIVE_AMOUNT, TESTNET_REJECTED } from "../flow/flow-controller.js";
import type { FlowState, PendingTransaction } from "../flow/flow-state.js";
import { isSendInFlight } from "../flow/flow-state.js";
import { assertNever } from "../intent/types.js";
import type { IntentOf, WalletIntent } from "../intent/types.js";
import type { ConversationMemory, ShownData } from "../memory/conversation-memory.js";
import { formatBtc, formatFiat, truncateAddress } from "./formatting.js";
import { ResponsePicker, lookupKnowledge } from "./responses.js";
import type { ReplyStyle, ResponseKey } from "./responses.js";

const logger = getLogger("dispatch");

const DEFAULT_HISTORY_COUNT = 5;
const SATS_WORD = /(?<![\p{L}])(?:sats?|satoshis)(?![\p{L}])/u;
const CSV_HEADER = "txid,direction,amount_btc,confirmations,timestamp";

const GUESS_LABELS: Record<CategoryIntent, string> = {
  confirmAction: "to confirm",
  cancelAction: "to cancel",
  send: "to send bitcoin",
  convertAmount: "to convert an amount",
  newAddress: "a new address",
  receive: "your receiving address",
  bumpFee: "to speed up a transaction",
  exportHistory: "to export your history",
  hideBalance: "to hide your balance",
  showBalance: "to show your balance",
  refreshWallet: "to refresh the wallet",
  balance: "your balance",
  history: "your transaction history",
  price: "the bitcoin price",
  feeEstimate: "current fees",
  walletHealth: "a wallet health check",
  utxoList: "your UTXOs",
  networkStatus: "the network status",
  explain: "an explanation",
  about: "to know about this wallet",
  settings: "settings",
  help: "help",
  greeting: "to say hi",
};

export type ResponseKind = "reply" | "prompt" | "confirmation" | "completed" | "error" | "security";

export interface Attachment {
  filename: string;
  contentType: string;
  content: string;
}

export interface ResponseDirective {
  kind: ResponseKind;
  text: string;
  /** What the reply put in front of the user, for memory. */
  shown?: ShownData;
  /** Draft awaiting confirmation, when the reply asks for one. */
  pending?: PendingTransaction;
  attachment?: Attachment;
}

/** Per-conversation display switches. */
export interface ConversationPreferences {
  balanceHidden: boolean;
}

export interface DispatchContext {
  snapshot: WalletSnapshot;
  memory: ConversationMemory;
  flow: FlowController;
  preferences: ConversationPreferences;
  previousIntent?: WalletIntent;
}

export interface MeaningDispatcherOptions {
  collaborators: Collaborators;
  responses: ResponsePicker;
  defaultCurrency: string;
  timeoutMs: number;
  maxAttempts: number;
}

function direction(tx: WalletTransaction): string {
  return tx.direction === "sent" ? "Sent" : "Received";
}

function csvLine(tx: WalletTransaction): string {
  return [tx.txid, tx.direction, formatBtc(tx.amount), tx.confirmations, new Date(tx.timestamp).toISOString()].join(",");
}

/**
 * Turns a classified segment and the flow controller's decision into a
 * reply, calling collaborators where the answer needs outside data.
 * Price and fee lookups that fail degrade to an "unavailable" reply.
 */
export class MeaningDispatcher {
  private collaborators: Collaborators;
  private responses: ResponsePicker;
  private defaultCurrency: string;
  private timeoutMs: number;
  private maxAttempts: number;

  constructor(private options: MeaningDispatcherOptions) {
    this.collaborators = options.collaborators;
    this.responses = options.responses;
    this.defaultCurrency = options.defaultCurrency;
    this.timeoutMs = options.timeoutMs;
    this.maxAttempts = options.maxAttempts;
  }

  /** Same dispatcher, phrasing replies in the given style. */
  styled(style: ReplyStyle): MeaningDispatcher {
    return new MeaningDispatcher({ ...this.options, responses: this.responses.styled(style) });
  }

  async resolve(classified: ClassificationResult, action: FlowAction, ctx: DispatchContext): Promise<ResponseDirective> {
    switch (action.kind) {
      case "advanceFlow":
        return this.advance(action, ctx);
      case "modifyFlow": {
        const field: ResponseKey =
          action.field === "fee" ? "modifiedFee" : action.field === "amount" ? "modifiedAmount" : "modifiedAddress";
        const pending = action.pending;
        const text = `${this.responses.say(field, this.pendingValues(pending))} ${this.confirmText(pending)}`;
        return { kind: "confirmation", text, pending, shown: { pendingSend: pending } };
      }
      case "pauseAndHandle": {
        const answer = await this.answer(action.intent, classified, ctx);
        const resume = this.resumeHint(action.resume);
        return { ...answer, text: resume ? `${answer.text}\n\n${resume}` : answer.text };
      }
      case "handleNormally":
        return this.answer(action.intent, classified, ctx);
      default:
        return assertNever(action);
    }
  }

  // ─── Flow Replies ─────────────────────────────────────────

  private async advance(action: Extract<FlowAction, { kind: "advanceFlow" }>, ctx: DispatchContext): Promise<ResponseDirective> {
    if (action.refused) return this.reply("cancelRefused");
    if (action.duplicate) return this.reply("duplicateConfirm");
    if (action.cancelled) {
      return this.reply(action.previous.kind === "unconfirmed" ? "unconfirmedCleared" : "cancelled");
    }

    const state = action.state;
    switch (state.kind) {
      case "awaitingAddress": {
        if (action.reprompt) return this.prompt("repromptAddress");
        const amount = state.draft.amount;
        return amount
          ? this.prompt("askAddressWithAmount", { amount: formatBtc(amount) })
          : this.prompt("askAddress");
      }
      case "awaitingAmount": {
        const address = truncateAddress(state.draft.address ?? "");
        return this.prompt(action.reprompt ? "repromptAmount" : "askAmount", { address });
      }
      case "awaitingConfirmation": {
        const pending = state.pending;
        const text = action.reprompt
          ? this.responses.say("repromptConfirm", this.pendingValues(pending))
          : this.confirmText(pending);
        return { kind: "confirmation", text, pending, shown: { pendingSend: pending } };
      }
      case "processing":
        return this.broadcast(ctx);
      case "error":
        if (state.reason === TESTNET_REJECTED) return this.failure("testnetRejected");
        if (state.reason === NON_POSITIVE_AMOUNT) return this.failure("invalidAmount");
        return this.failure("failed", { reason: state.reason });
      case "unconfirmed":
        return {
          kind: "reply",
          text: this.responses.say("unconfirmedBlocksSend", this.pendingValues(state.pending)),
          shown: { pendingSend: state.pending },
        };
      case "idle":
      case "completed":
        return this.reply("nothingToCancel");
    }
  }

  private async broadcast(ctx: DispatchContext): Promise<ResponseDirective> {
    const pending = ctx.flow.claimBroadcast();
    if (!pending) return this.reply("duplicateConfirm");

    const request = { destination: pending.address, amountSats: btcToSats(pending.amount), feeRate: pending.feeRate };
    const logged = { address: truncateAddress(pending.address), amountSats: request.amountSats, feeRate: pending.feeRate };
    emitHook("tx", "before_broadcast", logged);

    let result: BroadcastResult;
    try {
      // Never retried: a second attempt could spend twice.
      result = await withTimeout("broadcaster", this.timeoutMs, (signal) =>
        this.collaborators.broadcaster.broadcast(request, signal),
      );
    } catch (err) {
      if (isUnknownBroadcastOutcome(err)) return this.unconfirmed(ctx, pending, logged, errorMessage(err));
      result = { ok: false, error: toBroadcastFailure(err) };
    }

    if (result.ok) {
      ctx.flow.markCompleted(result.txid);
      emitHook("tx", "after_broadcast", { ...logged, txid: result.txid });
      logger.info({ ...logged, txid: result.txid }, "Transaction broadcast");
      return {
        kind: "completed",
        text: this.responses.say("completed", { txid: result.txid }),
        shown: { sentTransaction: { txid: result.txid, address: pending.address, amount: pending.amount } },
      };
    }

    const { kind, message } = result.error;
    ctx.flow.markError(message);
    emitHook("tx", "failed", { ...logged, kind, reason: message });
    logger.warn({ ...logged, kind, reason: message }, "Broadcast failed");
    const text = `${this.responses.say("failed", { reason: message })} ${this.failureHint(kind, ctx)}`;
    return { kind: "error", text };
  }

  /** Keeps the draft: nothing may be re-sent until the history accounts for it. */
  private unconfirmed(
    ctx: DispatchContext,
    pending: PendingTransaction,
    logged: Record<string, string | number>,
    reason: string,
  ): ResponseDirective {
    ctx.flow.markUnconfirmed(reason);
    emitHook("tx", "unconfirmed", { ...logged, reason });
    logger.warn({ ...logged, reason }, "Broadcast outcome unknown");
    return {
      kind: "error",
      text: this.responses.say("broadcastUnknown", this.pendingValues(pending)),
      shown: { pendingSend: pending },
    };
  }

  private failureHint(kind: BroadcastFailureKind, ctx: DispatchContext): string {
    switch (kind) {
      case "insufficientFunds": {
        const balance = ctx.memory.lastShownBalance;
        return balance
          ? this.responses.say("hintInsufficientFunds", { balance: formatBtc(balance) })
          : this.responses.say("hintInsufficientFundsUnknown");
      }
      case "networkFailure":
        return this.responses.say("hintNetworkFailure");
      case "signingFailure":
        return this.responses.say("hintSigningFailure");
    }
  }

  private confirmText(pending: PendingTransaction): string {
    return this.responses.say("confirmSend", this.pendingValues(pending));
  }

  private pendingValues(pending: PendingTransaction): Record<string, string | number> {
    return {
      amount: formatBtc(pending.amount),
      address: truncateAddress(pending.address),
      fee: formatBtc(pending.fee),
      feeRate: pending.feeRate,
      minutes: pending.estimatedMinutes,
    };
  }

  private resumeHint(state: FlowState): string | undefined {
    switch (state.kind) {
      case "awaitingAddress":
        return this.responses.say("resumeAddress");
      case "awaitingAmount":
        return this.responses.say("resumeAmount", { address: truncateAddress(state.draft.address ?? "") });
      case "awaitingConfirmation":
        return this.responses.say("resumeConfirm", this.pendingValues(state.pending));
      case "processing":
        return this.responses.say("resumeProcessing");
      case "unconfirmed":
        return this.responses.say("resumeUnconfirmed", this.pendingValues(state.pending));
      default:
        return undefined;
    }
  }

  // ─── Standalone Answers ───────────────────────────────────

  private async answer(intent: WalletIntent, classified: ClassificationResult, ctx: DispatchContext): Promise<ResponseDirective> {
    const { snapshot } = ctx;
    switch (intent.type) {
      case "send":
        return this.prompt("askAddress");
      case "receive": {
        const address = snapshot.receiveAddress ?? (await this.nextAddress());
        if (!address) return this.failure("receiveUnavailable");
        return { kind: "reply", text: this.responses.say("receive", { address }), shown: { receiveAddress: address } };
      }
      case "newAddress": {
        const address = (await this.nextAddress()) ?? snapshot.receiveAddress;
        if (!address) return this.failure("receiveUnavailable");
        return { kind: "reply", text: this.responses.say("newAddress", { address }), shown: { receiveAddress: address } };
      }
      case "balance":
        return this.balance(ctx, SATS_WORD.test(classified.text.toLowerCase()));
      case "history":
        return this.history(intent.count ?? DEFAULT_HISTORY_COUNT, snapshot);
      case "feeEstimate": {
        const fees = await this.feeEstimates(snapshot);
        if (!fees) return this.failure("feesUnavailable");
        return { kind: "reply", text: this.responses.say("fees", { ...fees }), shown: { feeEstimates: fees } };
      }
      case "price":
        return this.price(intent.currency ?? this.defaultCurrency, classified, ctx);
      case "convertAmount":
        return this.convert(intent, snapshot);
      case "transactionDetail": {
        const tx =
          snapshot.transactions.find((candidate) => candidate.txid === intent.txid) ??
          ctx.memory.lastShownTransactions.find((candidate) => candidate.txid === intent.txid);
        if (!tx) return this.failure("transactionNotFound");
        return this.reply("transactionDetail", {
          direction: direction(tx),
          amount: formatBtc(tx.amount),
          confirmations: tx.confirmations,
          txid: tx.txid,
        });
      }
      case "walletHealth": {
        const pendingText = snapshot.pendingBalance.greaterThan(0)
          ? this.responses.say("balancePending", { pending: formatBtc(snapshot.pendingBalance) })
          : "Nothing pending.";
        return this.reply("walletHealth", { btc: formatBtc(snapshot.balance), utxos: snapshot.utxoCount, pendingText });
      }
      case "exportHistory": {
        const lines = [CSV_HEADER, ...snapshot.transactions.map(csvLine)];
        return {
          kind: "reply",
          text: this.responses.say("exportHistory", { count: snapshot.transactions.length }),
          attachment: { filename: "transactions.csv", contentType: "text/csv", content: `${lines.join("\n")}\n` },
        };
      }
      case "utxoList":
        return this.reply("utxoList", { utxos: snapshot.utxoCount });
      case "bumpFee":
        return this.bumpFee(intent.txid ?? ctx.memory.lastSentTx?.txid, snapshot);
      case "networkStatus": {
        const fees = await this.feeEstimates(snapshot);
        return fees ? this.reply("networkStatus", { medium: fees.medium }) : this.failure("networkUnknown");
      }
      case "settings":
        return this.reply("settings");
      case "help":
        return classified.top.source === "emotion"
          ? { kind: "reply", text: `${this.responses.say("helpEmotion")} ${this.responses.say("help")}` }
          : this.reply("help");
      case "about":
        return this.reply("about");
      case "confirmAction":
        return this.reply("nothingToConfirm");
      case "cancelAction":
        return this.reply("nothingToCancel");
      case "hideBalance":
        ctx.preferences.balanceHidden = true;
        return this.reply("hideBalance");
      case "showBalance":
        ctx.preferences.balanceHidden = false;
        return this.reply("showBalance");
      case "refreshWallet":
        return { kind: "reply", text: this.responses.say("refresh", { btc: formatBtc(snapshot.balance) }), shown: { balance: snapshot.balance } };
      case "greeting": {
        const key: ResponseKey =
          classified.top.source === "social" ? "greetingSocial" : classified.top.source === "emotion" ? "greetingEmotion" : "greeting";
        return this.reply(key);
      }
      case "explain": {
        const answer = lookupKnowledge(intent.topic, classified.text);
        return answer ? { kind: "reply", text: answer } : this.reply("explainUnknown");
      }
      case "unknown":
        return this.unknown(intent.rawText, classified, ctx);
      default:
        return assertNever(intent);
    }
  }

  /** Mid-send, anything unrecognized is a bad value for the field being asked for. */
  private unknown(text: string, classified: ClassificationResult, ctx: DispatchContext): ResponseDirective {
    const state = ctx.flow.state;
    if (isSendInFlight(state)) {
      switch (state.kind) {
        case "awaitingAddress":
          return this.prompt("repromptAddress");
        case "awaitingAmount":
          return this.prompt("repromptAmount");
        case "awaitingConfirmation":
          return {
            kind: "confirmation",
            text: this.responses.say("repromptConfirm", this.pendingValues(state.pending)),
            pending: state.pending,
          };
        case "processing":
          return this.reply("resumeProcessing");
      }
    }
    if (classified.guess) {
      return this.reply("unknown", { text, guess: GUESS_LABELS[classified.guess] });
    }
    return this.reply("unknownNoGuess", { text });
  }

  private balance(ctx: DispatchContext, inSats: boolean): ResponseDirective {
    const { snapshot } = ctx;
    if (ctx.preferences.balanceHidden) return this.reply("balanceHidden");
    let text = inSats
      ? this.responses.say("balanceSats", { sats: btcToSats(snapshot.balance) })
      : this.responses.say("balance", { btc: formatBtc(snapshot.balance) });
    if (snapshot.pendingBalance.greaterThan(0)) {
      text += ` ${this.responses.say("balancePending", { pending: formatBtc(snapshot.pendingBalance) })}`;
    }
    return { kind: "reply", text, shown: { balance: snapshot.balance } };
  }

  private history(count: number, snapshot: WalletSnapshot): ResponseDirective {
    const transactions = snapshot.transactions.slice(0, count);
    if (transactions.length === 0) return this.reply("historyEmpty");
    const lines = transactions.map(
      (tx, index) => `${index + 1}. ${direction(tx)} ${formatBtc(tx.amount)} BTC (${tx.confirmations} conf) ${tx.txid.slice(0, 8)}`,
    );
    const text = [this.responses.say("history", { count: transactions.length }), ...lines].join("\n");
    return { kind: "reply", text, shown: { transactions } };
  }

  private async price(currency: string, classified: ClassificationResult, ctx: DispatchContext): Promise<ResponseDirective> {
    const price = await this.lookupPrice(currency, ctx.snapshot);
    if (!price) return this.failure("priceUnavailable");

    const valuesBalance = classified.top.source === "followUp" && ctx.previousIntent?.type === "balance";
    if (valuesBalance && !ctx.preferences.balanceHidden) {
      const value = ctx.snapshot.balance.times(price);
      return {
        kind: "reply",
        text: this.responses.say("priceWithBalance", {
          price: formatFiat(price),
          currency,
          btc: formatBtc(ctx.snapshot.balance),
          value: formatFiat(value),
        }),
        shown: { balance: ctx.snapshot.balance, fiatBalance: { amount: value, currency } },
      };
    }
    return this.reply("price", { price: formatFiat(price), currency });
  }

  private async convert(intent: IntentOf<"convertAmount">, snapshot: WalletSnapshot): Promise<ResponseDirective> {
    const price = await this.lookupPrice(intent.currency, snapshot);
    if (!price) return this.failure("convertUnavailable");

    if (intent.unit) {
      const btc = toBtc(intent.amount, intent.unit);
      return this.reply("convertToFiat", {
        amount: isSatsUnit(intent.unit) ? intent.amount.toFixed() : formatBtc(intent.amount),
        unit: isSatsUnit(intent.unit) ? "sats" : "BTC",
        value: formatFiat(btc.times(price)),
        currency: intent.currency,
      });
    }
    return this.reply("convertToBtc", {
      amount: formatFiat(intent.amount),
      currency: intent.currency,
      value: formatBtc(intent.amount.dividedBy(price)),
    });
  }

  private async bumpFee(txid: string | undefined, snapshot: WalletSnapshot): Promise<ResponseDirective> {
    if (!txid) return this.prompt("bumpFeeMissing");
    const broadcaster = this.collaborators.broadcaster;
    if (!broadcaster.bumpFee) return this.failure("bumpFeeUnsupported");
    const bump = broadcaster.bumpFee.bind(broadcaster);

    const fees = await this.feeEstimates(snapshot);
    const feeRate = fees?.fast ?? 0;
    if (feeRate <= 0) return this.failure("feesUnavailable");

    let result: BroadcastResult;
    try {
      result = await withTimeout("broadcaster", this.timeoutMs, (signal) => bump({ txid, feeRate }, signal));
    } catch (err) {
      result = { ok: false, error: toBroadcastFailure(err) };
    }
    if (!result.ok) return this.failure("failed", { reason: result.error.message });
    return this.reply("bumpFee", { txid: result.txid });
  }

  // ─── Collaborators ────────────────────────────────────────

  private call<T>(collaborator: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return callCollaborator(collaborator, fn, { timeoutMs: this.timeoutMs, maxAttempts: this.maxAttempts });
  }

  private async lookupPrice(currency: string, snapshot: WalletSnapshot): Promise<Decimal | undefined> {
    const prices = this.collaborators.prices;
    if (prices) {
      try {
        return await this.call("prices", (signal) => prices.getPrice(currency, signal));
      } catch (err) {
        logger.warn({ currency, err: errorMessage(err) }, "Price lookup failed");
      }
    }
    const rate = snapshot.fiatRates?.[currency];
    return rate && rate > 0 ? new Decimal(rate) : undefined;
  }

  async feeEstimates(snapshot: WalletSnapshot): Promise<FeeEstimates | undefined> {
    const fees = this.collaborators.fees;
    if (fees) {
      try {
        return await this.call("fees", (signal) => fees.getFeeEstimates(signal));
      } catch (err) {
        logger.warn({ err: errorMessage(err) }, "Fee estimate lookup failed");
      }
    }
    return snapshot.feeEstimates;
  }

  private async nextAddress(): Promise<string | undefined> {
    const provider = this.collaborators.addresses;
    if (!provider) return undefined;
    try {
      return await provider.nextAddress();
    } catch (err) {
      logger.warn({ err: errorMessage(err) }, "Address provider failed");
      return undefined;
    }
  }

  // ─── Helpers ──────────────────────────────────────────────

  private reply(key: ResponseKey, values: Record<string, string | number> = {}): ResponseDirective {
    return { kind: "reply", text: this.responses.say(key, values) };
  }

  private prompt(key: ResponseKey, values: Record<string, string | number> = {}): ResponseDirective {
    return { kind: "prompt", text: this.responses.say(key, values) };
  }

  private failure(key: ResponseKey, values: Record<string, string | number> = {}): ResponseDirective {
    return { kind: "error", text: this.responses.say(key, values) };
  }
}
