import { describe, it, expect, beforeEach } from "vitest";
import Database from "better-sqlite3";
import { Decimal } from "decimal.js";
import { z } from "zod";
import { runMigrations } from "../memory/database.js";
import { decodeShown, encodeShown } from "../memory/shown-codec.js";
import {
  DEFAULT_TITLE,
  REDACTED_MESSAGE,
  SqliteConversationStore,
  autoTitle,
} from "../memory/conversation-store.js";

describe("autoTitle", () => {
  it("keeps short messages whole", () => {
    expect(autoTitle("  what's   my balance ")).toBe("what's my balance");
  });

  it("cuts long messages at a word boundary", () => {
    expect(autoTitle("please send a little bit of bitcoin to my friend over there")).toBe(
      "please send a little bit of bitcoin to...",
    );
  });

  it("falls back to the default title for blank text", () => {
    expect(autoTitle("   ")).toBe(DEFAULT_TITLE);
  });
});

describe("SqliteConversationStore", () => {
  let db: Database.Database;
  let store: SqliteConversationStore;

  beforeEach(() => {
    db = new Database(":memory:");
    db.pragma("foreign_keys = ON");
    runMigrations(db);
    store = new SqliteConversationStore(db);
  });

  it("creates conversations with the default title", () => {
    const created = store.create({ id: "conv-1" });
    expect(created).toMatchObject({ id: "conv-1", title: DEFAULT_TITLE, messageCount: 0 });
    expect(store.get("conv-1")?.id).toBe("conv-1");
    expect(store.get("missing")).toBeUndefined();
  });

  it("appends messages in order and titles from the first user message", () => {
    store.create({ id: "conv-1" });
    const first = store.append("conv-1", { role: "user", content: "show my history", intentType: "history" });
    store.append("conv-1", { role: "assistant", content: "Your last 2 transactions:" });
    store.append("conv-1", { role: "user", content: "thanks" });

    expect(first).toMatchObject({ conversationId: "conv-1", role: "user", intentType: "history" });
    expect(store.messages("conv-1").map((message) => message.content)).toEqual([
      "show my history",
      "Your last 2 transactions:",
      "thanks",
    ]);
    expect(store.get("conv-1")).toMatchObject({ title: "show my history", messageCount: 3 });
  });

  it("keeps what an assistant reply showed", () => {
    store.create({ id: "conv-1" });
    store.append("conv-1", { role: "user", content: "history" });
    store.append("conv-1", { role: "assistant", content: "Your last transaction:", shown: '{"receiveAddress":"x"}' });

    expect(store.messages("conv-1").map((message) => message.shown)).toEqual([undefined, '{"receiveAddress":"x"}']);
  });

  it("does not retitle a named conversation", () => {
    store.create({ id: "conv-1", title: "Rent" });
    store.append("conv-1", { role: "user", content: "send rent" });
    expect(store.get("conv-1")?.title).toBe("Rent");
  });

  it("never uses the redaction placeholder as a title", () => {
    store.create({ id: "conv-1" });
    store.append("conv-1", { role: "user", content: REDACTED_MESSAGE });
    expect(store.get("conv-1")?.title).toBe(DEFAULT_TITLE);
  });

  it("renames and rejects blank titles", () => {
    store.create({ id: "conv-1" });
    expect(store.rename("conv-1", "  Savings  ")).toBe(true);
    expect(store.get("conv-1")?.title).toBe("Savings");
    expect(store.rename("conv-1", "   ")).toBe(false);
    expect(store.rename("missing", "x")).toBe(false);
  });

  it("deletes a conversation with its messages", () => {
    store.create({ id: "conv-1" });
    store.append("conv-1", { role: "user", content: "hi" });
    expect(store.delete("conv-1")).toBe(true);
    expect(store.messages("conv-1")).toEqual([]);
    expect(store.delete("conv-1")).toBe(false);
  });

  it("lists the most recently created first when timestamps tie", () => {
    store.create({ id: "a" });
    store.create({ id: "b" });
    expect(store.list().map((conversation) => conversation.id)).toEqual(["b", "a"]);
  });
});

describe("runMigrations", () => {
  it("adds the shown column to an older messages table", () => {
    const db = new Database(":memory:");
    db.exec(`
      CREATE TABLE messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        conversation_id TEXT NOT NULL,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        intent_type TEXT,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );
    `);

    runMigrations(db);
    runMigrations(db);

    const columns = z.array(z.object({ name: z.string() })).parse(db.pragma("table_info(messages)"));
    expect(columns.filter((column) => column.name === "shown")).toHaveLength(1);
  });
});

describe("shown codec", () => {
  it("restores amounts and transactions as they were shown", () => {
    const payload = encodeShown({
      balance: new Decimal("0.00000001"),
      transactions: [
        { txid: "a".repeat(64), direction: "sent", amount: new Decimal("0.05"), confirmations: 3, timestamp: 1_700_000_000 },
      ],
    });
    expect(payload).toBeDefined();

    const restored = decodeShown(payload ?? "");
    expect(restored.balance?.toString()).toBe("1e-8");
    expect(restored.transactions?.[0].amount.toString()).toBe("0.05");
    expect(restored.transactions?.[0].direction).toBe("sent");
  });

  it("stores nothing for an empty reply", () => {
    expect(encodeShown({ balance: undefined })).toBeUndefined();
  });

  it("restores nothing from a damaged payload", () => {
    expect(decodeShown("{not json")).toEqual({});
    expect(decodeShown('{"balance":"lots"}')).toEqual({});
  });
});
