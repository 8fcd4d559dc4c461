import Database from "better-sqlite3";
import { z } from "zod";
import { join } from "node:path";
import { mkdirSync } from "node:fs";
import { getLogger } from "@hodlchat/core";

const logger = getLogger("database");

let db: Database.Database | null = null;

export function getDatabase(dataDir: string): Database.Database {
  if (db) return db;

  mkdirSync(dataDir, { recursive: true });
  const dbPath = join(dataDir, "hodlchat.sqlite");

  db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  runMigrations(db);
  logger.info({ path: dbPath }, "Database initialized");

  return db;
}

export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS conversations (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      updated_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS messages (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      conversation_id TEXT NOT NULL REFERENCES conversations(id) ON DELETE CASCADE,
      role TEXT NOT NULL CHECK(role IN ('user', 'assistant')),
      content TEXT NOT NULL,
      intent_type TEXT,
      shown TEXT,
      created_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_messages_conversation
      ON messages(conversation_id, id);
  `);

  // Databases created before the column existed.
  addColumnIfMissing(db, "messages", "shown", "TEXT");

  logger.debug("Database migrations applied");
}

const TableInfoSchema = z.array(z.object({ name: z.string() }));

function addColumnIfMissing(db: Database.Database, table: string, column: string, definition: string): void {
  const columns = TableInfoSchema.parse(db.pragma(`table_info(${table})`));
  if (columns.some((candidate) => candidate.name === column)) return;
  db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
  logger.info({ table, column }, "Added missing column");
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
