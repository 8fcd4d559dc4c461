// ─── Conversation Records ───────────────────────────────────

export type MessageRole = "user" | "assistant";

/**
 * Append-only record handed to persistence after each turn.
 * `intentType` is the classified intent for user turns, or "error" for
 * assistant turns that reported a failure.
 */
export interface MessageRecord {
  role: MessageRole;
  content: string;
  intentType?: string;
  /** JSON of what an assistant reply displayed, so a replay can restore it. */
  shown?: string;
}

export interface PersistedMessage extends MessageRecord {
  id: number;
  conversationId: string;
  createdAt: string;
}

export interface ConversationSummary {
  id: string;
  title: string;
  createdAt: string;
  updatedAt: string;
  messageCount: number;
}

// ─── Inbound Messages ───────────────────────────────────────

export interface IncomingMessage {
  conversationId: string;
  text: string;
  receivedAt: number;
}
