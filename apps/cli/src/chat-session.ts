import type { ConversationRuntime, EngineReply, Attachment } from "@hodlchat/engine";

export interface LineResult {
  lines: string[];
  exit?: boolean;
  attachments?: Attachment[];
}

export const HELP_TEXT = [
  "Talk to your wallet in plain words, e.g. \"what's my balance\" or \"send 0.001 btc to bc1q...\".",
  "Commands:",
  "  /new [title]      start a new conversation",
  "  /list             list stored conversations",
  "  /open <id>        switch to a stored conversation",
  "  /rename <title>   rename the current conversation",
  "  /delete <id>      delete a stored conversation",
  "  /reset            forget the current conversation's context",
  "  /quit             leave",
].join("\n");

/**
 * Terminal front end for one runtime. Slash commands manage conversations;
 * every other line goes to the engine as a user message.
 */
export class ChatSession {
  constructor(
    private runtime: ConversationRuntime,
    private conversationId: string,
  ) {}

  get currentConversation(): string {
    return this.conversationId;
  }

  async handleLine(raw: string): Promise<LineResult> {
    const line = raw.trim();
    if (!line) return { lines: [] };
    if (line.startsWith("/")) return this.command(line);

    const reply: EngineReply = await this.runtime.handleMessage(this.conversationId, line);
    const lines = [reply.text];
    for (const attachment of reply.attachments) {
      lines.push(`[attachment: ${attachment.filename}]`);
    }
    return { lines, attachments: reply.attachments };
  }

  private command(line: string): LineResult {
    const [name, ...rest] = line.slice(1).split(/\s+/);
    const arg = rest.join(" ").trim();

    switch (name.toLowerCase()) {
      case "help":
        return { lines: [HELP_TEXT] };

      case "quit":
      case "exit":
        return { lines: ["Bye."], exit: true };

      case "new": {
        const created = this.runtime.createConversation(arg || undefined);
        this.conversationId = created.id;
        return { lines: [`Started "${created.title}" (${created.id}).`] };
      }

      case "list": {
        const conversations = this.runtime.listConversations();
        if (conversations.length === 0) return { lines: ["No stored conversations."] };
        return {
          lines: conversations.map(
            (c) => `${c.id === this.conversationId ? "*" : " "} ${c.id}  ${c.title}  (${c.messageCount} messages)`,
          ),
        };
      }

      case "open": {
        if (!arg) return { lines: ["Usage: /open <id>"] };
        const opened = this.runtime.openConversation(arg);
        if (!opened) return { lines: [`No conversation ${arg}.`] };
        this.conversationId = opened.id;
        return { lines: [`Opened "${opened.title}".`] };
      }

      case "rename": {
        if (!arg) return { lines: ["Usage: /rename <title>"] };
        return {
          lines: [this.runtime.renameConversation(this.conversationId, arg) ? `Renamed to "${arg}".` : "Nothing to rename."],
        };
      }

      case "delete": {
        if (!arg) return { lines: ["Usage: /delete <id>"] };
        if (arg === this.conversationId) return { lines: ["Switch away before deleting the current conversation."] };
        return { lines: [this.runtime.deleteConversation(arg) ? `Deleted ${arg}.` : `No conversation ${arg}.`] };
      }

      case "reset":
        this.runtime.resetConversation(this.conversationId);
        return { lines: ["Context cleared."] };

      default:
        return { lines: [`Unknown command /${name}. Try /help.`] };
    }
  }
}
