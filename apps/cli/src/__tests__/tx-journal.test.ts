import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, readFileSync, existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { clearHooks, createHookEvent, getRegisteredHookKeys, triggerHook } from "@hodlchat/core";
import { JOURNAL_FILE, installTxJournal, journalLine } from "../tx-journal.js";

afterEach(() => {
  clearHooks();
});

function tempDir(): string {
  return mkdtempSync(join(tmpdir(), "hodlchat-journal-"));
}

describe("journalLine", () => {
  it("flattens the event data next to its key and time", () => {
    const event = { ...createHookEvent("tx", "unconfirmed", { amount: "0.01", reason: "timed out" }), timestamp: 0 };
    expect(journalLine(event)).toBe(
      '{"at":"1970-01-01T00:00:00.000Z","event":"tx:unconfirmed","amount":"0.01","reason":"timed out"}',
    );
  });
});

describe("installTxJournal", () => {
  it("appends every tx event to the journal file", async () => {
    const dir = tempDir();
    installTxJournal(dir);

    await triggerHook(createHookEvent("tx", "before_broadcast", { amount: "0.01" }));
    await triggerHook(createHookEvent("tx", "unconfirmed", { amount: "0.01", reason: "timed out" }));

    const lines = readFileSync(join(dir, JOURNAL_FILE), "utf8").trim().split("\n");
    expect(lines.map((line) => JSON.parse(line).event)).toEqual(["tx:before_broadcast", "tx:unconfirmed"]);
  });

  it("ignores events of other categories", async () => {
    const dir = tempDir();
    installTxJournal(dir);

    await triggerHook(createHookEvent("flow", "transition", { from: "idle", to: "confirming" }));

    expect(existsSync(join(dir, JOURNAL_FILE))).toBe(false);
  });

  it("stops writing once uninstalled", async () => {
    const dir = tempDir();
    const uninstall = installTxJournal(dir);
    expect(getRegisteredHookKeys()).toEqual(["tx"]);

    uninstall();
    await triggerHook(createHookEvent("tx", "failed", { reason: "rejected" }));

    expect(getRegisteredHookKeys()).toEqual([]);
    expect(existsSync(join(dir, JOURNAL_FILE))).toBe(false);
  });
});
