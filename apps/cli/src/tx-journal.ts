import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { getLogger, registerHook, unregisterHook, type HookEvent, type HookHandler } from "@hodlchat/core";

const logger = getLogger("tx-journal");

export const JOURNAL_FILE = "tx-journal.jsonl";

// Actions the user may need to follow up on by hand.
const WARN_ACTIONS = new Set(["failed", "unconfirmed", "duplicate_confirm"]);

export function journalLine(event: HookEvent): string {
  return JSON.stringify({ at: new Date(event.timestamp).toISOString(), event: event.key, ...event.data });
}

/**
 * Subscribes to every `tx` hook event. Each one is logged and appended to
 * `<dataDir>/tx-journal.jsonl`, so a broadcast left unconfirmed can be
 * checked after the chat ends. Returns the unsubscribe function.
 */
export function installTxJournal(dataDir: string): () => void {
  mkdirSync(dataDir, { recursive: true });
  const path = join(dataDir, JOURNAL_FILE);

  const handler: HookHandler = (event) => {
    appendFileSync(path, `${journalLine(event)}\n`);
    if (WARN_ACTIONS.has(event.action)) {
      logger.warn({ event: event.key, ...event.data }, "Transaction needs attention");
    } else {
      logger.info({ event: event.key, ...event.data }, "Transaction event");
    }
  };

  registerHook("tx", handler);
  return () => unregisterHook("tx", handler);
}
