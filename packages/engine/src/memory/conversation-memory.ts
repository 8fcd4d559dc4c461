import type { Decimal } from "decimal.js";
import { getLogger } from "@hodlchat/core";
import type { MessageRole } from "@hodlchat/core";
import type { FeeEstimates, WalletTransaction } from "../collaborators.js";
import type { FlowState, PendingTransaction } from "../flow/flow-state.js";
import { IDLE } from "../flow/flow-state.js";
import type { AmountUnit, FeeLevel, IntentType, ParsedEntity, WalletIntent } from "../intent/types.js";
import { isSentinelAmount } from "../intent/types.js";
import { detectLanguage } from "../meaning/sentence-meaning.js";
import type { DetectedLanguage } from "../meaning/sentence-meaning.js";

const logger = getLogger("memory");

const EMOJI = /\p{Extended_Pictographic}/u;

/** Intents that "do it again" may replay. */
const REPEATABLE: ReadonlySet<IntentType> = new Set<IntentType>([
  "send",
  "receive",
  "balance",
  "history",
  "feeEstimate",
  "price",
  "convertAmount",
  "transactionDetail",
  "newAddress",
  "walletHealth",
  "exportHistory",
  "utxoList",
  "bumpFee",
  "networkStatus",
  "refreshWallet",
  "explain",
]);

export interface ConversationTurn {
  readonly role: MessageRole;
  readonly text: string;
  readonly intent?: WalletIntent;
  readonly entities: Readonly<ParsedEntity>;
  readonly timestamp: number;
}

export interface RememberedAmount {
  amount: Decimal;
  unit?: AmountUnit;
}

export interface SentTransaction {
  txid: string;
  address: string;
  amount: Decimal;
}

export interface FiatValue {
  amount: Decimal;
  currency: string;
}

/** What an assistant reply put in front of the user. */
export interface ShownData {
  balance?: Decimal;
  fiatBalance?: FiatValue;
  transactions?: WalletTransaction[];
  feeEstimates?: FeeEstimates;
  receiveAddress?: string;
  pendingSend?: PendingTransaction;
  sentTransaction?: SentTransaction;
}

export interface BehaviorSignals {
  /** Share of user turns containing at least one emoji, 0..1. */
  emojiUsage: number;
  language: DetectedLanguage;
  averageMessageLength: number;
  messageCount: number;
}

/** Read-only projection handed to the reference resolver and classifier. */
export interface MemoryView {
  readonly lastAddress?: string;
  readonly lastAmount?: RememberedAmount;
  readonly lastTxid?: string;
  readonly lastShownTransactions: readonly WalletTransaction[];
  readonly lastUserIntent?: WalletIntent;
  readonly previousUserIntent?: WalletIntent;
}

interface MemoryFields {
  turns: ConversationTurn[];
  lastAddress?: string;
  lastAmount?: RememberedAmount;
  lastTxid?: string;
  lastFeeLevel?: FeeLevel;
  lastShownBalance?: Decimal;
  lastShownFiatBalance?: FiatValue;
  lastShownTransactions: WalletTransaction[];
  lastShownFeeEstimates?: FeeEstimates;
  lastShownReceiveAddress?: string;
  lastSentTx?: SentTransaction;
  lastUserIntent?: WalletIntent;
  previousUserIntent?: WalletIntent;
  flowState: FlowState;
  behavior: BehaviorSignals;
  emojiTurns: number;
  userTurns: number;
  turnsSinceLastSend?: number;
}

function emptyFields(): MemoryFields {
  return {
    turns: [],
    lastShownTransactions: [],
    flowState: IDLE,
    behavior: { emojiUsage: 0, language: "en", averageMessageLength: 0, messageCount: 0 },
    emojiTurns: 0,
    userTurns: 0,
  };
}

/**
 * Per-conversation turn log plus the "last mentioned / last shown"
 * projections the pipeline reads. Remembered values are only ever
 * replaced by newer ones, never cleared by a turn that does not mention
 * them.
 */
export class ConversationMemory implements MemoryView {
  private fields: MemoryFields = emptyFields();

  get turns(): readonly ConversationTurn[] {
    return this.fields.turns;
  }
  get lastAddress(): string | undefined {
    return this.fields.lastAddress;
  }
  get lastAmount(): RememberedAmount | undefined {
    return this.fields.lastAmount;
  }
  get lastTxid(): string | undefined {
    return this.fields.lastTxid;
  }
  get lastFeeLevel(): FeeLevel | undefined {
    return this.fields.lastFeeLevel;
  }
  get lastShownBalance(): Decimal | undefined {
    return this.fields.lastShownBalance;
  }
  get lastShownFiatBalance(): FiatValue | undefined {
    return this.fields.lastShownFiatBalance;
  }
  get lastShownTransactions(): readonly WalletTransaction[] {
    return this.fields.lastShownTransactions;
  }
  get lastShownFeeEstimates(): FeeEstimates | undefined {
    return this.fields.lastShownFeeEstimates;
  }
  get lastShownReceiveAddress(): string | undefined {
    return this.fields.lastShownReceiveAddress;
  }
  get lastSentTx(): SentTransaction | undefined {
    return this.fields.lastSentTx;
  }
  get lastUserIntent(): WalletIntent | undefined {
    return this.fields.lastUserIntent;
  }
  get previousUserIntent(): WalletIntent | undefined {
    return this.fields.previousUserIntent;
  }
  get flowState(): FlowState {
    return this.fields.flowState;
  }
  get behavior(): Readonly<BehaviorSignals> {
    return this.fields.behavior;
  }
  get turnsSinceLastSend(): number | undefined {
    return this.fields.turnsSinceLastSend;
  }

  /** Intent of the most recent user turn, repeatable or not. */
  get lastClassifiedIntent(): WalletIntent | undefined {
    for (let i = this.fields.turns.length - 1; i >= 0; i--) {
      const turn = this.fields.turns[i];
      if (turn.role === "user") return turn.intent;
    }
    return undefined;
  }

  recordUserMessage(text: string, intent: WalletIntent | undefined, entities: ParsedEntity): void {
    const f = this.fields;
    const turn: ConversationTurn = { role: "user", text, intent, entities: { ...entities }, timestamp: Date.now() };
    f.turns.push(Object.freeze(turn));

    if (entities.address) f.lastAddress = entities.address;
    if (entities.amount && !isSentinelAmount(entities.amount) && !entities.currency) {
      f.lastAmount = entities.unit ? { amount: entities.amount, unit: entities.unit } : { amount: entities.amount };
    }
    if (entities.txid) f.lastTxid = entities.txid;
    if (entities.feeLevel) f.lastFeeLevel = entities.feeLevel;

    if (intent && REPEATABLE.has(intent.type)) {
      f.previousUserIntent = f.lastUserIntent;
      f.lastUserIntent = intent;
    }

    this.updateBehavior(text);
    if (f.turnsSinceLastSend !== undefined) f.turnsSinceLastSend += 1;
  }

  recordAIResponse(text: string, shown: ShownData = {}): void {
    const f = this.fields;
    const turn: ConversationTurn = { role: "assistant", text, entities: {}, timestamp: Date.now() };
    f.turns.push(Object.freeze(turn));

    if (shown.balance) f.lastShownBalance = shown.balance;
    if (shown.fiatBalance) f.lastShownFiatBalance = shown.fiatBalance;
    if (shown.transactions) f.lastShownTransactions = [...shown.transactions];
    if (shown.feeEstimates) f.lastShownFeeEstimates = shown.feeEstimates;
    if (shown.receiveAddress) {
      f.lastShownReceiveAddress = shown.receiveAddress;
      f.lastAddress = shown.receiveAddress;
    }
    if (shown.pendingSend) {
      f.lastAddress = shown.pendingSend.address;
      f.lastAmount = { amount: shown.pendingSend.amount, unit: "btc" };
    }
    if (shown.sentTransaction) {
      const sent = shown.sentTransaction;
      f.lastSentTx = sent;
      f.lastTxid = sent.txid;
      f.lastAddress = sent.address;
      f.lastAmount = { amount: sent.amount, unit: "btc" };
      f.lastUserIntent = { type: "send", amount: sent.amount, unit: "btc", address: sent.address };
      f.turnsSinceLastSend = 0;
    }
  }

  setFlowState(state: FlowState): void {
    this.fields.flowState = state;
  }

  reset(): void {
    this.fields = emptyFields();
    logger.debug("Conversation memory reset");
  }

  private updateBehavior(text: string): void {
    const f = this.fields;
    f.userTurns += 1;
    if (EMOJI.test(text)) f.emojiTurns += 1;
    const previousAverage = f.behavior.averageMessageLength;
    f.behavior = {
      emojiUsage: f.emojiTurns / f.userTurns,
      language: detectLanguage(text, f.behavior.language),
      averageMessageLength: previousAverage + (text.length - previousAverage) / f.userTurns,
      messageCount: f.userTurns,
    };
  }
}
