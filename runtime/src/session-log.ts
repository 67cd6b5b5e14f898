import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";

export type MessageRole = "user" | "assistant";

export interface StoredMessage {
  id: number;
  sessionId: string;
  role: MessageRole;
  content: string;
  createdAt: number;
}

/**
 * Append-only per-session message log. The router only ever reads the
 * recent window and appends; deletion is a whole-session operation.
 */
export interface SessionLog {
  getRecentMessages(sessionId: string, limit: number): StoredMessage[];
  appendMessage(sessionId: string, role: MessageRole, content: string): StoredMessage;
  clearSession(sessionId: string): number;
}

interface MessageRow {
  id: number;
  session_id: string;
  role: string;
  content: string;
  created_at: number;
}

export class ConversationLog implements SessionLog {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.initializeSchema();
  }

  getRecentMessages(sessionId: string, limit: number): StoredMessage[] {
    const boundedLimit = Math.max(1, Math.min(500, Math.floor(limit)));
    const rows = this.db
      .prepare<[string, number], MessageRow>(
        `SELECT id, session_id, role, content, created_at FROM messages
         WHERE session_id = ?
         ORDER BY id DESC
         LIMIT ?`,
      )
      .all(sessionId, boundedLimit);

    return rows.reverse().map(rowToMessage);
  }

  appendMessage(sessionId: string, role: MessageRole, content: string): StoredMessage {
    const createdAt = Date.now();
    const result = this.db
      .prepare(
        `INSERT INTO messages (session_id, role, content, created_at) VALUES (?, ?, ?, ?)`,
      )
      .run(sessionId, role, content, createdAt);

    return {
      id: Number(result.lastInsertRowid),
      sessionId,
      role,
      content,
      createdAt,
    };
  }

  clearSession(sessionId: string): number {
    const result = this.db
      .prepare(`DELETE FROM messages WHERE session_id = ?`)
      .run(sessionId);
    return result.changes;
  }

  close(): void {
    this.db.close();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_messages_session ON messages(session_id, id DESC);
    `);
  }
}

function rowToMessage(row: MessageRow): StoredMessage {
  return {
    id: row.id,
    sessionId: row.session_id,
    role: row.role === "assistant" ? "assistant" : "user",
    content: row.content,
    createdAt: row.created_at,
  };
}
