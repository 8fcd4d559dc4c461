import { randomUUID } from "node:crypto";
import type Database from "better-sqlite3";
import { emitHook, getLogger } from "@hodlchat/core";
import type { ConversationSummary, MessageRecord, MessageRole, PersistedMessage } from "@hodlchat/core";

const logger = getLogger("conversation-store");

export const DEFAULT_TITLE = "New conversation";
export const REDACTED_MESSAGE = "[Message redacted — contained sensitive data]";
const MAX_TITLE_LENGTH = 40;

/** Append-only message log grouped into named conversations. */
export interface ConversationStore {
  create(options?: { id?: string; title?: string }): ConversationSummary;
  get(id: string): ConversationSummary | undefined;
  list(): ConversationSummary[];
  rename(id: string, title: string): boolean;
  delete(id: string): boolean;
  append(conversationId: string, record: MessageRecord): PersistedMessage;
  messages(conversationId: string): PersistedMessage[];
}

/** First user message cut at a word boundary, with an ellipsis when shortened. */
export function autoTitle(text: string): string {
  const flat = text.replace(/\s+/g, " ").trim();
  if (flat.length <= MAX_TITLE_LENGTH) return flat || DEFAULT_TITLE;
  const cut = flat.slice(0, MAX_TITLE_LENGTH);
  const lastSpace = cut.lastIndexOf(" ");
  const head = lastSpace > 0 ? cut.slice(0, lastSpace) : cut;
  return `${head.trimEnd()}...`;
}

interface ConversationRow {
  id: string;
  title: string;
  createdAt: string;
  updatedAt: string;
  messageCount: number;
}

interface MessageRow {
  id: number;
  conversationId: string;
  role: MessageRole;
  content: string;
  intentType: string | null;
  shown: string | null;
  createdAt: string;
}

const SUMMARY_COLUMNS = `c.id, c.title, c.created_at as createdAt, c.updated_at as updatedAt,
  (SELECT COUNT(*) FROM messages m WHERE m.conversation_id = c.id) as messageCount`;

function toMessage(row: MessageRow): PersistedMessage {
  const message: PersistedMessage = {
    id: row.id,
    conversationId: row.conversationId,
    role: row.role,
    content: row.content,
    createdAt: row.createdAt,
  };
  if (row.intentType !== null) message.intentType = row.intentType;
  if (row.shown !== null) message.shown = row.shown;
  return message;
}

export class SqliteConversationStore implements ConversationStore {
  private insertConversationStmt: Database.Statement<[string, string]>;
  private selectConversationStmt: Database.Statement<[string], ConversationRow>;
  private listStmt: Database.Statement<[], ConversationRow>;
  private renameStmt: Database.Statement<[string, string]>;
  private deleteStmt: Database.Statement<[string]>;
  private insertMessageStmt: Database.Statement<[string, MessageRole, string, string | null, string | null], MessageRow>;
  private touchStmt: Database.Statement<[string]>;
  private messagesStmt: Database.Statement<[string], MessageRow>;
  private userCountStmt: Database.Statement<[string], { count: number }>;

  constructor(private db: Database.Database) {
    this.insertConversationStmt = db.prepare<[string, string]>("INSERT INTO conversations (id, title) VALUES (?, ?)");
    this.selectConversationStmt = db.prepare<[string], ConversationRow>(`SELECT ${SUMMARY_COLUMNS} FROM conversations c WHERE c.id = ?`);
    this.listStmt = db.prepare<[], ConversationRow>(`SELECT ${SUMMARY_COLUMNS} FROM conversations c ORDER BY c.updated_at DESC, c.rowid DESC`);
    this.renameStmt = db.prepare<[string, string]>(
      "UPDATE conversations SET title = ?, updated_at = datetime('now') WHERE id = ?",
    );
    this.deleteStmt = db.prepare<[string]>("DELETE FROM conversations WHERE id = ?");
    this.insertMessageStmt = db.prepare<[string, MessageRole, string, string | null, string | null], MessageRow>(
      `INSERT INTO messages (conversation_id, role, content, intent_type, shown) VALUES (?, ?, ?, ?, ?)
       RETURNING id, conversation_id as conversationId, role, content, intent_type as intentType, shown, created_at as createdAt`,
    );
    this.touchStmt = db.prepare<[string]>("UPDATE conversations SET updated_at = datetime('now') WHERE id = ?");
    this.messagesStmt = db.prepare<[string], MessageRow>(
      `SELECT id, conversation_id as conversationId, role, content, intent_type as intentType, shown, created_at as createdAt
       FROM messages WHERE conversation_id = ? ORDER BY id ASC`,
    );
    this.userCountStmt = db.prepare<[string], { count: number }>(
      "SELECT COUNT(*) as count FROM messages WHERE conversation_id = ? AND role = 'user'",
    );
  }

  create(options: { id?: string; title?: string } = {}): ConversationSummary {
    const id = options.id ?? randomUUID();
    this.insertConversationStmt.run(id, options.title ?? DEFAULT_TITLE);
    const created = this.selectConversationStmt.get(id);
    if (!created) throw new Error(`Conversation ${id} was not stored`);
    logger.debug({ conversationId: id }, "Conversation created");
    emitHook("conversation", "created", { conversationId: id });
    return created;
  }

  get(id: string): ConversationSummary | undefined {
    return this.selectConversationStmt.get(id);
  }

  list(): ConversationSummary[] {
    return this.listStmt.all();
  }

  rename(id: string, title: string): boolean {
    const trimmed = title.trim();
    if (!trimmed) return false;
    return this.renameStmt.run(trimmed, id).changes > 0;
  }

  delete(id: string): boolean {
    const removed = this.deleteStmt.run(id).changes > 0;
    if (removed) logger.info({ conversationId: id }, "Conversation deleted");
    return removed;
  }

  /**
   * Appends one message. The first user message names a conversation that
   * still carries the default title.
   */
  append(conversationId: string, record: MessageRecord): PersistedMessage {
    const write = this.db.transaction((): MessageRow => {
      const firstUserMessage =
        record.role === "user" && (this.userCountStmt.get(conversationId)?.count ?? 0) === 0;
      const row = this.insertMessageStmt.get(
        conversationId,
        record.role,
        record.content,
        record.intentType ?? null,
        record.shown ?? null,
      );
      if (!row) throw new Error(`Message for ${conversationId} was not stored`);
      const current = this.selectConversationStmt.get(conversationId);
      if (firstUserMessage && current?.title === DEFAULT_TITLE && record.content !== REDACTED_MESSAGE) {
        this.renameStmt.run(autoTitle(record.content), conversationId);
      } else {
        this.touchStmt.run(conversationId);
      }
      return row;
    });
    return toMessage(write());
  }

  messages(conversationId: string): PersistedMessage[] {
    return this.messagesStmt.all(conversationId).map(toMessage);
  }
}
