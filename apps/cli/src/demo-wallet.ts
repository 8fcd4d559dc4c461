import { createHash } from "node:crypto";
import { Decimal } from "decimal.js";
import { CollaboratorError, getLogger } from "@hodlchat/core";
import {
  DEFAULT_FEE_RATES,
  feeForRate,
  satsToBtc,
  type AddressProvider,
  type BroadcastRequest,
  type BroadcastResult,
  type Collaborators,
  type FeeEstimates,
  type FeeService,
  type PriceService,
  type TransactionBroadcaster,
  type WalletSnapshot,
  type WalletStateProvider,
  type WalletTransaction,
} from "@hodlchat/engine";

const logger = getLogger("demo-wallet");

const HOUR_MS = 60 * 60 * 1000;

export const DEMO_PRICES: Record<string, number> = {
  USD: 62_000,
  EUR: 57_000,
  GBP: 49_000,
  JPY: 9_300_000,
  CHF: 55_000,
};

export interface DemoWalletOptions {
  balance?: Decimal;
  feeEstimates?: FeeEstimates;
  prices?: Record<string, number>;
  receiveAddresses?: string[];
  transactions?: WalletTransaction[];
  /** Fixes the clock for the seeded history; defaults to now. */
  now?: number;
}

function defaultTransactions(now: number): WalletTransaction[] {
  return [
    {
      txid: "c3".repeat(32),
      direction: "sent",
      amount: new Decimal("0.0021"),
      confirmations: 14,
      timestamp: now - 26 * HOUR_MS,
      address: "3J98t1WpEZ73CNmQviecrnyiWrnqRhWNLy",
    },
    {
      txid: "a7".repeat(32),
      direction: "received",
      amount: new Decimal("0.05"),
      confirmations: 210,
      timestamp: now - 9 * 24 * HOUR_MS,
    },
  ];
}

/**
 * In-process wallet for the terminal chat. Sends move the balance and show
 * up in history, so a session behaves like a real one without a node.
 */
export class DemoWallet implements WalletStateProvider, TransactionBroadcaster, AddressProvider {
  private balance: Decimal;
  private transactions: WalletTransaction[];
  private receiveAddresses: string[];
  private nextReceive = 0;
  private broadcasts = 0;
  readonly feeEstimates: FeeEstimates;

  constructor(options: DemoWalletOptions = {}) {
    const now = options.now ?? Date.now();
    this.balance = options.balance ?? new Decimal("0.0479");
    this.feeEstimates = options.feeEstimates ?? DEFAULT_FEE_RATES;
    this.transactions = options.transactions ?? defaultTransactions(now);
    this.receiveAddresses = options.receiveAddresses ?? [
      "bc1qar0srrr7xfkvy5l643lydnw9re59gtzzwf5mdq",
      "bc1p5d7rjq7g6rdk2yhzks9smlaqtedr4dekq08ge8ztwac72sfr9rusxg3297",
    ];
  }

  getSnapshot(): WalletSnapshot {
    return {
      balance: this.balance,
      pendingBalance: new Decimal(0),
      utxoCount: this.transactions.filter((tx) => tx.direction === "received").length,
      feeEstimates: this.feeEstimates,
      receiveAddress: this.receiveAddresses[this.nextReceive % this.receiveAddresses.length],
      transactions: [...this.transactions],
      network: "mainnet",
    };
  }

  nextAddress(): string {
    this.nextReceive += 1;
    return this.receiveAddresses[this.nextReceive % this.receiveAddresses.length];
  }

  async broadcast(request: BroadcastRequest, signal: AbortSignal): Promise<BroadcastResult> {
    signal.throwIfAborted();
    const amount = satsToBtc(request.amountSats);
    const fee = feeForRate(request.feeRate);
    if (amount.plus(fee).greaterThan(this.balance)) {
      return {
        ok: false,
        error: { kind: "insufficientFunds", message: `needs ${amount.plus(fee).toString()} BTC` },
      };
    }

    this.broadcasts += 1;
    const txid = createHash("sha256")
      .update(`${request.destination}:${request.amountSats}:${request.feeRate}:${this.broadcasts}`)
      .digest("hex");
    this.balance = this.balance.minus(amount).minus(fee);
    this.transactions.unshift({
      txid,
      direction: "sent",
      amount,
      confirmations: 0,
      timestamp: Date.now(),
      address: request.destination,
    });
    logger.info({ txid, amountSats: request.amountSats, feeRate: request.feeRate }, "Demo transaction broadcast");
    return { ok: true, txid };
  }
}

export class DemoPriceService implements PriceService {
  constructor(private prices: Record<string, number> = DEMO_PRICES) {}

  async getPrice(currency: string, signal: AbortSignal): Promise<Decimal> {
    signal.throwIfAborted();
    const price = this.prices[currency.toUpperCase()];
    if (price === undefined) {
      throw new CollaboratorError("prices", `No price for ${currency}`, "UNKNOWN_CURRENCY");
    }
    return new Decimal(price);
  }
}

export class DemoFeeService implements FeeService {
  constructor(private wallet: DemoWallet) {}

  async getFeeEstimates(signal: AbortSignal): Promise<FeeEstimates> {
    signal.throwIfAborted();
    return this.wallet.feeEstimates;
  }
}

export function createDemoCollaborators(options: DemoWalletOptions = {}): Collaborators {
  const wallet = new DemoWallet(options);
  return {
    wallet,
    broadcaster: wallet,
    addresses: wallet,
    prices: new DemoPriceService(options.prices),
    fees: new DemoFeeService(wallet),
  };
}
