#!/usr/bin/env node
import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { createInterface } from "node:readline/promises";
import { Command, InvalidArgumentError } from "commander";
import {
  createHookEvent,
  createLogger,
  getLogger,
  getRegisteredHookKeys,
  installUnhandledRejectionHandler,
  loadConfig,
  triggerHook,
  waitForDrain,
  type Config,
} from "@hodlchat/core";
import {
  ConversationRuntime,
  SqliteConversationStore,
  closeDatabase,
  getDatabase,
  type Attachment,
} from "@hodlchat/engine";
import { ChatSession, HELP_TEXT } from "./chat-session.js";
import { createDemoCollaborators } from "./demo-wallet.js";
import { shutdownStep } from "./shutdown.js";
import { installTxJournal } from "./tx-journal.js";

interface ChatOptions {
  conversation?: string;
  seed?: number;
  persist: boolean;
}

function parseSeed(value: string): number {
  const seed = Number(value);
  if (!Number.isInteger(seed)) throw new InvalidArgumentError("Seed must be an integer.");
  return seed;
}

function buildRuntime(config: Config, options: { seed?: number; persist: boolean }): ConversationRuntime {
  const persist = options.persist && config.persistConversations;
  return new ConversationRuntime({
    collaborators: createDemoCollaborators(),
    store: persist ? new SqliteConversationStore(getDatabase(config.dataDir)) : undefined,
    defaultCurrency: config.defaultCurrency,
    minIntentConfidence: config.minIntentConfidence,
    collaboratorTimeoutMs: config.collaboratorTimeoutMs,
    collaboratorMaxAttempts: config.collaboratorMaxAttempts,
    responseSeed: options.seed ?? config.responseSeed,
    tips: config.tipsEnabled,
  });
}

function saveAttachments(dataDir: string, attachments: Attachment[]): string[] {
  if (attachments.length === 0) return [];
  const dir = join(dataDir, "exports");
  mkdirSync(dir, { recursive: true });
  return attachments.map((attachment) => {
    const path = join(dir, attachment.filename);
    writeFileSync(path, attachment.content);
    return path;
  });
}

async function chat(options: ChatOptions): Promise<void> {
  const config = loadConfig();
  createLogger(config.logLevel);
  const logger = getLogger("cli");
  installUnhandledRejectionHandler();

  const runtime = buildRuntime(config, options);
  const opened = options.conversation ? runtime.openConversation(options.conversation) : undefined;
  if (options.conversation && !opened) {
    console.error(`No conversation ${options.conversation}, starting a new one.`);
  }
  const session = new ChatSession(runtime, opened?.id ?? runtime.createConversation().id);
  const uninstallJournal = installTxJournal(config.dataDir);

  void triggerHook(createHookEvent("lifecycle", "startup", { conversationId: session.currentConversation }));
  logger.info({ conversationId: session.currentConversation, hooks: getRegisteredHookKeys() }, "Chat started");

  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: "you> " });
  let shuttingDown = false;

  const shutdown = async (reason: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    await triggerHook(createHookEvent("lifecycle", "shutdown", { reason }));
    await shutdownStep("drain conversation lanes", async () => {
      const { drained } = await waitForDrain(5_000);
      if (!drained) logger.warn("Lanes did not drain, closing anyway");
    }, 6_000);
    await shutdownStep("close tx journal", uninstallJournal, 1_000);
    await shutdownStep("close database", () => closeDatabase(), 2_000);
    rl.close();
  };

  rl.on("SIGINT", () => {
    shutdown("SIGINT").catch((err: unknown) => logger.error({ err }, "Shutdown failed"));
  });

  console.log(`\n  hodlchat (demo wallet). Type /help for commands.\n`);
  rl.prompt();

  for await (const line of rl) {
    const result = await session.handleLine(line);
    for (const text of result.lines) console.log(`wallet> ${text}`);
    for (const path of saveAttachments(config.dataDir, result.attachments ?? [])) {
      console.log(`        saved ${path}`);
    }
    if (result.exit) {
      await shutdown("quit");
      break;
    }
    rl.prompt();
  }

  await shutdown("input closed");
}

function listConversations(): void {
  const config = loadConfig();
  createLogger(config.logLevel);
  const store = new SqliteConversationStore(getDatabase(config.dataDir));
  const conversations = store.list();
  if (conversations.length === 0) {
    console.log("No stored conversations.");
  }
  for (const c of conversations) {
    console.log(`${c.id}  ${c.updatedAt}  ${c.title}  (${c.messageCount} messages)`);
  }
  closeDatabase();
}

const program = new Command();

program
  .name("hodlchat")
  .description("Chat with a Bitcoin wallet in plain language")
  .version("0.1.0")
  .addHelpText("after", `\nInside a chat:\n${HELP_TEXT}`);

program
  .command("chat", { isDefault: true })
  .description("Start an interactive chat against the demo wallet")
  .option("-c, --conversation <id>", "resume a stored conversation")
  .option("-s, --seed <n>", "seed for reproducible phrasing", parseSeed)
  .option("--no-persist", "keep the conversation in memory only")
  .action(async (options: ChatOptions) => {
    await chat(options);
  });

program
  .command("conversations")
  .description("List stored conversations")
  .action(() => {
    listConversations();
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
