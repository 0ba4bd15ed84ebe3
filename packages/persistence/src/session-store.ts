import { z } from "zod";
import {
  ConciergeError,
  isConciergeError,
  type ChatMessage,
  type MessageRole,
  type Session,
  type SessionId,
  type SessionStore,
  type ToolCall,
} from "@concierge/types";
import { JsonObjectSchema, parseJson } from "@concierge/core";
import { openDatabase, type SqliteDatabase } from "./database.js";
import { validateTranscript } from "./transcript.js";

const ToolCallsSchema = z.array(
  z.object({
    id: z.string(),
    name: z.string(),
    arguments: JsonObjectSchema,
  })
);

/**
 * SQLite-backed implementation of SessionStore.
 *
 * `messages` is an append-only ledger ordered by `seq`; a session's history
 * is rebuilt from it on every load. One `append` call is one transaction, so
 * a turn is either fully stored or not at all.
 */
export class SQLiteSessionStore implements SessionStore {
  private readonly db: SqliteDatabase;
  private readonly ownsDb: boolean;

  constructor(dbOrPath: SqliteDatabase | string) {
    this.ownsDb = typeof dbOrPath === "string";
    this.db = typeof dbOrPath === "string" ? openDatabase(dbOrPath) : dbOrPath;
    this.migrate();
  }

  /** Run schema migrations. Idempotent. */
  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id          TEXT PRIMARY KEY,
        created_at  TEXT NOT NULL,
        updated_at  TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS messages (
        session_id   TEXT NOT NULL,
        seq          INTEGER NOT NULL,
        role         TEXT NOT NULL,
        content      TEXT NOT NULL,
        tool_calls   TEXT,
        tool_call_id TEXT,
        name         TEXT,
        timestamp    TEXT NOT NULL,
        PRIMARY KEY (session_id, seq),
        FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
      );
    `);
  }

  async loadOrCreate(id: SessionId): Promise<Session> {
    return this.guard("load", id, () => {
      const now = new Date().toISOString();
      this.db
        .prepare<[string, string, string]>(
          "INSERT OR IGNORE INTO sessions (id, created_at, updated_at) VALUES (?, ?, ?)"
        )
        .run(id, now, now);
      return this.read(id) ?? this.missing(id);
    });
  }

  async get(id: SessionId): Promise<Session | undefined> {
    return this.guard("load", id, () => this.read(id));
  }

  async append(id: SessionId, messages: ReadonlyArray<ChatMessage>): Promise<Session> {
    return this.guard("append", id, () => {
      const now = new Date().toISOString();

      const run = this.db.transaction(() => {
        this.db
          .prepare<[string, string, string]>(
            "INSERT OR IGNORE INTO sessions (id, created_at, updated_at) VALUES (?, ?, ?)"
          )
          .run(id, now, now);

        const existing = this.readHistory(id);
        validateTranscript(existing, messages);

        const insert = this.db.prepare<
          [string, number, string, string, string | null, string | null, string | null, string]
        >(`
          INSERT INTO messages (session_id, seq, role, content, tool_calls, tool_call_id, name, timestamp)
          VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        `);

        messages.forEach((msg, i) => {
          insert.run(
            id,
            existing.length + i,
            msg.role,
            msg.content,
            msg.toolCalls && msg.toolCalls.length > 0 ? JSON.stringify(msg.toolCalls) : null,
            msg.toolCallId ?? null,
            msg.name ?? null,
            msg.timestamp ?? now
          );
        });

        this.db
          .prepare<[string, string]>("UPDATE sessions SET updated_at = ? WHERE id = ?")
          .run(now, id);
      });

      run();
      return this.read(id) ?? this.missing(id);
    });
  }

  async delete(id: SessionId): Promise<void> {
    return this.guard("delete", id, () => {
      this.db.transaction(() => {
        this.db.prepare<[string]>("DELETE FROM messages WHERE session_id = ?").run(id);
        this.db.prepare<[string]>("DELETE FROM sessions WHERE id = ?").run(id);
      })();
    });
  }

  /** Close the database connection if this store opened it. */
  close(): void {
    if (this.ownsDb) this.db.close();
  }

  private read(id: SessionId): Session | undefined {
    const row = this.db
      .prepare<[string], SessionRow>("SELECT * FROM sessions WHERE id = ?")
      .get(id);
    if (!row) return undefined;

    return {
      id,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      history: this.readHistory(id),
    };
  }

  private readHistory(id: SessionId): ChatMessage[] {
    const rows = this.db
      .prepare<[string], MessageRow>(
        "SELECT * FROM messages WHERE session_id = ? ORDER BY seq ASC"
      )
      .all(id);
    return rows.map(toMessage);
  }

  private missing(id: SessionId): never {
    throw new ConciergeError("STORAGE_FAILURE", `Session ${id} vanished during write`);
  }

  /** Map driver errors to STORAGE_FAILURE; protocol errors pass through. */
  private guard<T>(op: string, id: SessionId, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (isConciergeError(err)) throw err;
      throw new ConciergeError("STORAGE_FAILURE", `Session ${op} failed for ${id}`, {
        cause: err,
        details: { sessionId: id, op },
      });
    }
  }
}

function toMessage(row: MessageRow): ChatMessage {
  const toolCalls: ToolCall[] | undefined = row.tool_calls
    ? ToolCallsSchema.parse(parseJson(row.tool_calls))
    : undefined;

  return {
    role: toRole(row.role),
    content: row.content,
    timestamp: row.timestamp,
    ...(toolCalls ? { toolCalls } : {}),
    ...(row.tool_call_id !== null ? { toolCallId: row.tool_call_id } : {}),
    ...(row.name !== null ? { name: row.name } : {}),
  };
}

function toRole(role: string): MessageRole {
  switch (role) {
    case "user":
    case "assistant":
    case "system":
    case "tool":
      return role;
    default:
      throw new ConciergeError("STORAGE_FAILURE", `Stored message has unknown role "${role}"`);
  }
}

// ─── Internal row types ─────────────────────────────────────────────

interface SessionRow {
  id: string;
  created_at: string;
  updated_at: string;
}

interface MessageRow {
  session_id: string;
  seq: number;
  role: string;
  content: string;
  tool_calls: string | null;
  tool_call_id: string | null;
  name: string | null;
  timestamp: string;
}
