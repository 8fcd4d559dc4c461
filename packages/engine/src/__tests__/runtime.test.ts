import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { Decimal } from "decimal.js";
import { clearHooks, registerHook } from "@hodlchat/core";
import type { HookEvent } from "@hodlchat/core";
import type {
  BroadcastRequest,
  BroadcastResult,
  Collaborators,
  WalletSnapshot,
  WalletTransaction,
} from "../collaborators.js";
import { BroadcastError } from "../collaborators.js";
import { runMigrations } from "../memory/database.js";
import { REDACTED_MESSAGE, SqliteConversationStore } from "../memory/conversation-store.js";
import { ConversationRuntime } from "../runtime.js";
import type { RuntimeOptions } from "../runtime.js";
import { LEGACY, SEGWIT, TXID_A, TXID_B } from "./fixtures.js";

const SENT_TXID = "f".repeat(64);
const CONFIRM_TEXT =
  'Send 0.01 BTC to 1BoatSLR…ETtpyT? Network fee 0.000014 BTC (10 sat/vB, about 20 min). Reply "yes" to confirm or "cancel".';

function snapshot(overrides: Partial<WalletSnapshot> = {}): WalletSnapshot {
  return {
    balance: new Decimal("0.5"),
    pendingBalance: new Decimal(0),
    utxoCount: 3,
    feeEstimates: { slow: 5, medium: 10, fast: 25 },
    receiveAddress: SEGWIT,
    transactions: [
      { txid: TXID_A, direction: "received", amount: new Decimal("0.1"), confirmations: 6, timestamp: 1_700_000_000_000 },
      { txid: TXID_B, direction: "sent", amount: new Decimal("0.05"), confirmations: 2, timestamp: 1_699_000_000_000 },
    ],
    ...overrides,
  };
}

function fakes() {
  const getSnapshot = vi.fn(async (): Promise<WalletSnapshot> => snapshot());
  const getPrice = vi.fn(async (_currency: string, _signal: AbortSignal) => new Decimal(60_000));
  const broadcast = vi.fn(
    async (_request: BroadcastRequest, _signal: AbortSignal): Promise<BroadcastResult> => ({ ok: true, txid: SENT_TXID }),
  );
  const collaborators: Collaborators = {
    wallet: { getSnapshot },
    prices: { getPrice },
    broadcaster: { broadcast },
  };
  return { collaborators, getSnapshot, getPrice, broadcast };
}

function runtime(collaborators: Collaborators, extra: Partial<RuntimeOptions> = {}): ConversationRuntime {
  // Always the first phrasing, so replies can be asserted exactly.
  return new ConversationRuntime({ collaborators, random: () => 0, ...extra });
}

describe("ConversationRuntime", () => {
  let f: ReturnType<typeof fakes>;
  let engine: ConversationRuntime;

  beforeEach(() => {
    f = fakes();
    engine = runtime(f.collaborators);
  });

  afterEach(() => {
    clearHooks();
  });

  it("answers a balance question", async () => {
    const reply = await engine.handleMessage("c1", "what's my balance");
    expect(reply).toMatchObject({ text: "You have 0.5 BTC.", kind: "reply", intent: "balance", flowState: "idle" });
    expect(engine.memoryOf("c1").lastShownBalance?.toString()).toBe("0.5");
  });

  it("reports the balance in sats when asked", async () => {
    await engine.handleMessage("c1", "what's my balance");
    const reply = await engine.handleMessage("c1", "in sats");
    expect(reply.text).toBe("You have 50000000 sats.");
  });

  it("walks a send through confirmation and broadcast", async () => {
    const draft = await engine.handleMessage("c1", `send 0.01 btc to ${LEGACY}`);
    expect(draft).toMatchObject({ text: CONFIRM_TEXT, kind: "confirmation", flowState: "awaitingConfirmation" });
    expect(draft.pending?.amount.toString()).toBe("0.01");

    const sent = await engine.handleMessage("c1", "yes");
    expect(sent).toMatchObject({ text: `Sent! Transaction id: ${SENT_TXID}`, kind: "completed", flowState: "completed" });
    expect(f.broadcast).toHaveBeenCalledTimes(1);
    expect(f.broadcast.mock.calls[0]?.[0]).toEqual({ destination: LEGACY, amountSats: 1_000_000, feeRate: 10 });
    expect(engine.memoryOf("c1").lastSentTx?.txid).toBe(SENT_TXID);
  });

  it("broadcasts once when confirmations race", async () => {
    await engine.handleMessage("c1", `send 0.01 btc to ${LEGACY}`);
    const [first, second] = await Promise.all([
      engine.handleMessage("c1", "yes"),
      engine.handleMessage("c1", "yes"),
    ]);
    expect(f.broadcast).toHaveBeenCalledTimes(1);
    expect(first.kind).toBe("completed");
    expect(second.text).toBe("There's nothing waiting for confirmation.");
  });

  it("reports a failed broadcast and drops the draft", async () => {
    f.broadcast.mockResolvedValueOnce({ ok: false, error: { kind: "networkFailure", message: "peer unreachable" } });
    await engine.handleMessage("c1", `send 0.01 btc to ${LEGACY}`);
    const reply = await engine.handleMessage("c1", "yes");
    expect(reply).toMatchObject({
      text: "The send failed: peer unreachable Nothing was sent. Send it again when you're ready.",
      kind: "error",
      flowState: "error",
    });
  });

  it("treats a thrown broadcaster error as a failure of its kind", async () => {
    f.broadcast.mockRejectedValueOnce(new BroadcastError("insufficientFunds", "not enough funds"));
    await engine.handleMessage("c1", "what's my balance");
    await engine.handleMessage("c1", `send 0.01 btc to ${LEGACY}`);
    const reply = await engine.handleMessage("c1", "yes");
    expect(reply.text).toBe(
      "The send failed: not enough funds Your last known balance is 0.5 BTC. Start a new send with a smaller amount.",
    );
  });

  it("cancels a pending send", async () => {
    await engine.handleMessage("c1", `send 0.01 btc to ${LEGACY}`);
    const reply = await engine.handleMessage("c1", "cancel");
    expect(reply).toMatchObject({ text: "Cancelled. Nothing was sent.", flowState: "idle" });
    expect(f.broadcast).not.toHaveBeenCalled();
  });

  it("answers a side question and reminds about the pending send", async () => {
    await engine.handleMessage("c1", `send 0.01 btc to ${LEGACY}`);
    const reply = await engine.handleMessage("c1", "what's the price?");
    expect(reply.text).toBe(
      'Bitcoin is at 60,000.00 USD.\n\nYour send of 0.01 BTC to 1BoatSLR…ETtpyT is still waiting. Say "yes" or "cancel".',
    );
    expect(reply.flowState).toBe("awaitingConfirmation");
  });

  it("values the balance on a currency follow-up", async () => {
    await engine.handleMessage("c1", "what's my balance");
    const reply = await engine.handleMessage("c1", "in euros?");
    expect(reply.text).toBe("Bitcoin is at 60,000.00 EUR. Your 0.5 BTC is worth about 30,000.00 EUR.");
    expect(f.getPrice).toHaveBeenCalledWith("EUR", expect.any(AbortSignal));
  });

  it("answers both halves of a compound question", async () => {
    const reply = await engine.handleMessage("c1", "what's my balance and show me the price");
    expect(reply.text).toBe("You have 0.5 BTC.\n\nBitcoin is at 60,000.00 USD.");
  });

  it("lists history and resolves an ordinal reference", async () => {
    const history = await engine.handleMessage("c1", "show my transactions");
    expect(history.text).toBe(
      [
        "Your last 2 transactions:",
        "1. Received 0.1 BTC (6 conf) aaaaaaaa",
        "2. Sent 0.05 BTC (2 conf) b1b1b1b1",
      ].join("\n"),
    );
    const detail = await engine.handleMessage("c1", "the second one");
    expect(detail.intent).toBe("transactionDetail");
    expect(detail.text).toBe(`Sent 0.05 BTC, 2 confirmations. Id ${TXID_B}`);
  });

  it("exports history as a CSV attachment", async () => {
    const reply = await engine.handleMessage("c1", "export history");
    expect(reply.text).toBe("Exported 2 transactions as CSV.");
    expect(reply.attachments).toHaveLength(1);
    expect(reply.attachments[0]?.filename).toBe("transactions.csv");
    expect(reply.attachments[0]?.content.split("\n")[1]).toBe(
      `${TXID_A},received,0.1,6,2023-11-14T22:13:20.000Z`,
    );
  });

  it("hides the balance until asked to show it", async () => {
    await engine.handleMessage("c1", "hide my balance");
    const hidden = await engine.handleMessage("c1", "what's my balance");
    expect(hidden.text).toBe('Your balance is hidden. Say "show balance" to reveal it.');
  });

  it("blocks a recovery phrase before anything else", async () => {
    const events: HookEvent[] = [];
    registerHook("security", (event) => {
      events.push(event);
    });
    const reply = await engine.handleMessage(
      "c1",
      "abandon ability able about above absent absorb abstract absurd abuse access accident",
    );
    expect(reply.kind).toBe("security");
    expect(reply.text.startsWith("That looks like a recovery phrase.")).toBe(true);
    expect(f.getSnapshot).not.toHaveBeenCalled();
    expect(events.map((event) => event.key)).toEqual(["security:recovery_phrase_blocked"]);
    expect(engine.memoryOf("c1").turns).toEqual([]);
  });

  it("degrades when the wallet snapshot is unavailable", async () => {
    f.getSnapshot.mockRejectedValueOnce(new Error("node offline"));
    const reply = await engine.handleMessage("c1", "what's my balance");
    expect(reply).toMatchObject({ text: "I can't reach the network right now.", kind: "error", intent: "unknown" });
  });

  it("falls back to the snapshot rate when the price service fails", async () => {
    f.getPrice.mockRejectedValue(new Error("bad request"));
    engine = runtime(
      {
        ...f.collaborators,
        wallet: { getSnapshot: () => snapshot({ fiatRates: { USD: 40_000 } }) },
      },
      { collaboratorMaxAttempts: 1 },
    );
    const reply = await engine.handleMessage("c1", "what's the bitcoin price");
    expect(reply.text).toBe("Bitcoin is at 40,000.00 USD.");
  });

  it("repeats a completed send for 'do it again'", async () => {
    await engine.handleMessage("c1", `send 0.01 btc to ${LEGACY}`);
    await engine.handleMessage("c1", "yes");
    const again = await engine.handleMessage("c1", "do it again");
    expect(again).toMatchObject({ text: CONFIRM_TEXT, flowState: "awaitingConfirmation" });
  });

  it("does not scale the last send for a non-send question", async () => {
    await engine.handleMessage("c1", `send 0.01 btc to ${LEGACY}`);
    await engine.handleMessage("c1", "yes");

    const explained = await engine.handleMessage("c1", "tell me about segwit a bit more");
    expect(explained.intent).toBe("explain");
    expect(engine.memoryOf("c1").lastAmount?.amount.toString()).toBe("0.01");

    const again = await engine.handleMessage("c1", "send the same amount to the same address");
    expect(again).toMatchObject({ text: CONFIRM_TEXT, flowState: "awaitingConfirmation" });
  });
});

describe("ConversationRuntime when the broadcast outcome is unknown", () => {
  const UNKNOWN_TEXT =
    "The broadcaster stopped answering, so I can't tell whether your send of 0.01 BTC to 1BoatSLR…ETtpyT went out. " +
    'It may have been sent. Check your history before you try again, or say "cancel" to drop it.';

  let f: ReturnType<typeof fakes>;
  let engine: ConversationRuntime;

  beforeEach(async () => {
    f = fakes();
    f.broadcast.mockImplementationOnce(() => new Promise<BroadcastResult>(() => {}));
    engine = runtime(f.collaborators, { collaboratorTimeoutMs: 30 });
    await engine.handleMessage("c1", `send 0.01 btc to ${LEGACY}`);
  });

  afterEach(() => {
    clearHooks();
  });

  it("warns that the send may have gone out when the broadcaster times out", async () => {
    const events: string[] = [];
    registerHook("tx", (event) => {
      events.push(event.key);
    });

    const reply = await engine.handleMessage("c1", "yes");

    expect(reply).toMatchObject({ text: UNKNOWN_TEXT, kind: "error", flowState: "unconfirmed" });
    expect(events).toEqual(["tx:before_broadcast", "tx:unconfirmed"]);
  });

  it("treats a dropped connection the same way", async () => {
    f.broadcast.mockReset();
    f.broadcast.mockRejectedValueOnce(Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }));
    const reply = await engine.handleMessage("c1", "yes");
    expect(reply).toMatchObject({ text: UNKNOWN_TEXT, flowState: "unconfirmed" });
  });

  it("refuses a new send until the last one is accounted for", async () => {
    await engine.handleMessage("c1", "yes");
    const reply = await engine.handleMessage("c1", `send 0.01 btc to ${LEGACY}`);
    expect(reply).toMatchObject({
      text:
        'Your last send of 0.01 BTC to 1BoatSLR…ETtpyT may already be out. Check your history first, or say "cancel" to drop it before starting another.',
      flowState: "unconfirmed",
    });
    expect(f.broadcast).toHaveBeenCalledTimes(1);
  });

  it("reminds about the send after a side question", async () => {
    await engine.handleMessage("c1", "yes");
    const reply = await engine.handleMessage("c1", "what's the price?");
    expect(reply.text).toBe(
      "Bitcoin is at 60,000.00 USD.\n\nYour send of 0.01 BTC to 1BoatSLR…ETtpyT may have gone out. Check your history before sending again.",
    );
  });

  it("stops tracking the send on cancel", async () => {
    await engine.handleMessage("c1", "yes");
    const reply = await engine.handleMessage("c1", "cancel");
    expect(reply).toMatchObject({
      text: "Okay, I stopped tracking that send. If it went out it will still show up in your history.",
      flowState: "idle",
    });
  });

  it("settles the send once it shows up in the history", async () => {
    await engine.handleMessage("c1", "yes");
    const sent: WalletTransaction = {
      txid: SENT_TXID,
      direction: "sent",
      amount: new Decimal("0.01"),
      confirmations: 0,
      timestamp: 1_700_000_100_000,
      address: LEGACY,
    };
    f.getSnapshot.mockResolvedValue(snapshot({ transactions: [sent, ...snapshot().transactions] }));

    const reply = await engine.handleMessage("c1", "what's my balance");

    expect(reply.text).toBe(
      `Your earlier send of 0.01 BTC to 1BoatSLR…ETtpyT did go out. Transaction id: ${SENT_TXID}\n\nYou have 0.5 BTC.`,
    );
    expect(reply.flowState).toBe("idle");
    expect(engine.memoryOf("c1").lastSentTx?.txid).toBe(SENT_TXID);
  });
});

describe("ConversationRuntime reply style", () => {
  afterEach(() => {
    clearHooks();
  });

  it("adds a tip to every third plain answer", async () => {
    const engine = runtime(fakes().collaborators, { tips: true });
    await engine.handleMessage("c1", "what's my balance");
    const second = await engine.handleMessage("c1", "what's my balance");
    const third = await engine.handleMessage("c1", "what's my balance");

    expect(second.text).toBe("You have 0.5 BTC.");
    expect(third.text).toBe('You have 0.5 BTC.\n\nTip: Say "hide my balance" to keep it off the screen.');
  });

  it("leaves tips out unless turned on", async () => {
    const engine = runtime(fakes().collaborators);
    await engine.handleMessage("c1", "what's my balance");
    await engine.handleMessage("c1", "what's my balance");
    const third = await engine.handleMessage("c1", "what's my balance");
    expect(third.text).toBe("You have 0.5 BTC.");
  });

  it("answers a terse user briefly", async () => {
    const engine = runtime(fakes().collaborators, { tips: true });
    await engine.handleMessage("c1", "balance");
    await engine.handleMessage("c1", "balance");
    const reply = await engine.handleMessage("c1", "help");
    expect(reply.text).toBe('Balance, history, send, receive, fees, price, convert. Try "balance".');
  });

  it("answers an emoji user with emoji", async () => {
    const engine = runtime(fakes().collaborators);
    await engine.handleMessage("c1", "what's my balance 🙂");
    await engine.handleMessage("c1", "what's the price 🙂");
    const reply = await engine.handleMessage("c1", "hello");
    expect(reply.text).toBe("Hey! 👋 What can I do for your wallet today?");
  });
});

describe("ConversationRuntime with a store", () => {
  function memoryStore(): SqliteConversationStore {
    const db = new Database(":memory:");
    runMigrations(db);
    return new SqliteConversationStore(db);
  }

  it("persists both sides of every exchange", async () => {
    const store = memoryStore();
    const engine = runtime(fakes().collaborators, { store });
    const conversation = engine.createConversation();
    await engine.handleMessage(conversation.id, "what's my balance");

    const messages = store.messages(conversation.id);
    expect(messages.map((message) => [message.role, message.content, message.intentType])).toEqual([
      ["user", "what's my balance", "balance"],
      ["assistant", "You have 0.5 BTC.", undefined],
    ]);
    expect(store.get(conversation.id)?.title).toBe("what's my balance");
  });

  it("stores a placeholder instead of a recovery phrase", async () => {
    const store = memoryStore();
    const engine = runtime(fakes().collaborators, { store });
    await engine.handleMessage(
      "c9",
      "1. abandon 2. ability 3. able 4. about 5. above 6. absent 7. absorb 8. abstract 9. absurd 10. abuse 11. access 12. accident",
    );
    const messages = store.messages("c9");
    expect(messages[0]?.content).toBe(REDACTED_MESSAGE);
    expect(store.get("c9")?.title).toBe("New conversation");
  });

  it("rebuilds memory when a stored conversation is reopened", async () => {
    const store = memoryStore();
    const first = runtime(fakes().collaborators, { store });
    const { id } = first.createConversation();
    await first.handleMessage(id, `send 0.01 btc to ${LEGACY}`);
    await first.handleMessage(id, "what's my balance");

    const second = runtime(fakes().collaborators, { store });
    expect(second.openConversation(id)?.id).toBe(id);
    const memory = second.memoryOf(id);
    expect(memory.lastAddress).toBe(LEGACY);
    expect(memory.lastUserIntent).toEqual({ type: "balance" });
    expect(memory.flowState).toEqual({ kind: "idle" });
  });

  it("restores what was shown when a stored conversation is reopened", async () => {
    const store = memoryStore();
    const first = runtime(fakes().collaborators, { store });
    const { id } = first.createConversation();
    await first.handleMessage(id, "show my transactions");

    const second = runtime(fakes().collaborators, { store });
    second.openConversation(id);
    const shown = second.memoryOf(id).lastShownTransactions;
    expect(shown.map((tx) => tx.txid)).toEqual([TXID_A, TXID_B]);
    expect(shown[1]?.amount.toString()).toBe("0.05");

    const detail = await second.handleMessage(id, "the second one");
    expect(detail.text).toBe(`Sent 0.05 BTC, 2 confirmations. Id ${TXID_B}`);
  });

  it("returns undefined for an unknown conversation", () => {
    const engine = runtime(fakes().collaborators, { store: memoryStore() });
    expect(engine.openConversation("missing")).toBeUndefined();
  });
});
