import { InvalidInputError } from "../errors/app-error.js";
import { InMemoryConversationStore } from "./in-memory-store.js";
import { TURN_ROLES } from "./types.js";
import type {
  ConversationKey,
  ConversationStore,
  ConversationSummary,
  ConversationTurn,
  MemoryStats,
  TurnRole,
} from "./types.js";

export const DEFAULT_RETENTION = 20;

export interface ConversationMemoryOptions {
  retention?: number; // turns kept per conversation, oldest evicted first
  store?: ConversationStore;
  now?: () => Date;
}

// ============================================
// CONVERSATION MEMORY
// ============================================

/**
 * Bounded, append-only turn log per (agent, user) pair.
 */
export class ConversationMemory {
  readonly retention: number;
  private store: ConversationStore;
  private now: () => Date;

  constructor(options: ConversationMemoryOptions = {}) {
    const retention = options.retention ?? DEFAULT_RETENTION;
    if (!Number.isInteger(retention) || retention < 1) {
      throw new RangeError(`Retention must be a positive integer, got ${retention}`);
    }
    this.retention = retention;
    this.store = options.store ?? new InMemoryConversationStore();
    this.now = options.now ?? (() => new Date());
  }

  append(
    agentId: string,
    userId: string,
    role: TurnRole,
    content: string,
    tokensUsed?: number
  ): void {
    if (!TURN_ROLES.includes(role)) {
      throw new InvalidInputError(`Unknown turn role: ${String(role)}`);
    }
    if (content.trim().length === 0) {
      throw new InvalidInputError("Turn content cannot be empty");
    }

    const turn: ConversationTurn = { role, content, timestamp: this.now() };
    if (tokensUsed !== undefined) turn.tokensUsed = tokensUsed;

    this.store.append({ agentId, userId }, turn, this.retention);
  }

  /**
   * Up to `limit` most recent turns, oldest first. Never mutates.
   */
  recent(agentId: string, userId: string, limit: number): ConversationTurn[] {
    return this.store.read({ agentId, userId }, Math.min(Math.max(0, Math.floor(limit)), this.retention));
  }

  clear(agentId: string, userId: string): boolean {
    return this.store.clear({ agentId, userId });
  }

  summary(agentId: string, userId: string): ConversationSummary {
    const turns = this.store.read({ agentId, userId }, this.retention);
    const summary: ConversationSummary = { agentId, userId, messageCount: turns.length };

    const first = turns[0];
    const last = turns[turns.length - 1];
    if (first) summary.conversationStarted = first.timestamp;
    if (last) summary.lastInteraction = last.timestamp;

    return summary;
  }

  /**
   * Conversation keys in creation order, optionally narrowed by agent and/or user.
   */
  conversations(filter: Partial<ConversationKey> = {}): ConversationKey[] {
    return this.store
      .keys()
      .filter(
        (key) =>
          (filter.agentId === undefined || key.agentId === filter.agentId) &&
          (filter.userId === undefined || key.userId === filter.userId)
      );
  }

  stats(): MemoryStats {
    const keys = this.store.keys();
    return {
      totalConversations: keys.length,
      activeUsers: new Set(keys.map((key) => key.userId)).size,
      totalTurns: keys.reduce((sum, key) => sum + this.store.count(key), 0),
    };
  }

  close(): void {
    this.store.close();
  }
}
