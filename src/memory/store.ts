import Database from "better-sqlite3";
import { TURN_ROLES } from "./types.js";
import type { ConversationKey, ConversationStore, ConversationTurn, TurnRole } from "./types.js";

interface TurnRow {
  role: string;
  content: string;
  tokensUsed: number | null;
  createdAt: string;
}

function isTurnRole(value: string): value is TurnRole {
  return TURN_ROLES.some((role) => role === value);
}

// ============================================
// SQLITE CONVERSATION STORE
// ============================================
export class SqliteConversationStore implements ConversationStore {
  private db: Database.Database;

  constructor(dbPath: string = "conversations.db") {
    this.db = new Database(dbPath);
    this.initializeSchema();
  }

  // ============================================
  // DATABASE INITIALIZATION
  // ============================================
  private initializeSchema(): void {
    this.db.pragma("journal_mode = WAL");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conversation_turns (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        agent_id TEXT NOT NULL,
        user_id TEXT NOT NULL,
        role TEXT NOT NULL CHECK(role IN ('user', 'agent')),
        content TEXT NOT NULL,
        tokens_used INTEGER,
        created_at TEXT NOT NULL
      )
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_turns_conversation
      ON conversation_turns(agent_id, user_id, id);
    `);
  }

  // ============================================
  // TURN OPERATIONS
  // ============================================

  /**
   * Insert a turn and trim the conversation to `retention` rows in one transaction.
   */
  append(key: ConversationKey, turn: ConversationTurn, retention: number): void {
    const insert = this.db.prepare(`
      INSERT INTO conversation_turns (agent_id, user_id, role, content, tokens_used, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    const trim = this.db.prepare(`
      DELETE FROM conversation_turns
      WHERE agent_id = ? AND user_id = ? AND id NOT IN (
        SELECT id FROM conversation_turns
        WHERE agent_id = ? AND user_id = ?
        ORDER BY id DESC
        LIMIT ?
      )
    `);

    const appendTurn = this.db.transaction(() => {
      insert.run(
        key.agentId,
        key.userId,
        turn.role,
        turn.content,
        turn.tokensUsed ?? null,
        turn.timestamp.toISOString()
      );
      trim.run(key.agentId, key.userId, key.agentId, key.userId, retention);
    });
    appendTurn();
  }

  /**
   * Most recent `limit` turns, oldest first
   */
  read(key: ConversationKey, limit: number): ConversationTurn[] {
    if (limit <= 0) return [];

    const stmt = this.db.prepare(`
      SELECT role, content, tokensUsed, createdAt FROM (
        SELECT id, role, content, tokens_used AS tokensUsed, created_at AS createdAt
        FROM conversation_turns
        WHERE agent_id = ? AND user_id = ?
        ORDER BY id DESC
        LIMIT ?
      )
      ORDER BY id ASC
    `);

    const rows = stmt.all(key.agentId, key.userId, limit) as TurnRow[];
    return rows.map((row) => {
      if (!isTurnRole(row.role)) {
        throw new Error(`Unexpected turn role in store: ${row.role}`);
      }
      const turn: ConversationTurn = {
        role: row.role,
        content: row.content,
        timestamp: new Date(row.createdAt),
      };
      if (row.tokensUsed !== null) turn.tokensUsed = row.tokensUsed;
      return turn;
    });
  }

  count(key: ConversationKey): number {
    const row = this.db
      .prepare(`SELECT COUNT(*) AS total FROM conversation_turns WHERE agent_id = ? AND user_id = ?`)
      .get(key.agentId, key.userId) as { total: number } | undefined;
    return row?.total ?? 0;
  }

  clear(key: ConversationKey): boolean {
    const result = this.db
      .prepare(`DELETE FROM conversation_turns WHERE agent_id = ? AND user_id = ?`)
      .run(key.agentId, key.userId);
    return result.changes > 0;
  }

  keys(): ConversationKey[] {
    const rows = this.db
      .prepare(`
        SELECT agent_id AS agentId, user_id AS userId
        FROM conversation_turns
        GROUP BY agent_id, user_id
        ORDER BY MIN(id) ASC
      `)
      .all() as ConversationKey[];
    return rows.map((row) => ({ agentId: row.agentId, userId: row.userId }));
  }

  // ============================================
  // CLEANUP
  // ============================================

  /**
   * Close the database connection
   */
  close(): void {
    this.db.close();
  }
}
