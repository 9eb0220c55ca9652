import type { ConversationKey, ConversationStore, ConversationTurn } from "./types.js";

export function conversationKeyId(key: ConversationKey): string {
  return JSON.stringify([key.agentId, key.userId]);
}

function copyTurn(turn: ConversationTurn): ConversationTurn {
  return { ...turn, timestamp: new Date(turn.timestamp.getTime()) };
}

// ============================================
// IN-PROCESS CONVERSATION STORE
// ============================================

/**
 * Bounded per-key turn arrays that live for the lifetime of the process.
 */
export class InMemoryConversationStore implements ConversationStore {
  private conversations = new Map<string, { key: ConversationKey; turns: ConversationTurn[] }>();

  append(key: ConversationKey, turn: ConversationTurn, retention: number): void {
    const id = conversationKeyId(key);
    let entry = this.conversations.get(id);
    if (!entry) {
      entry = { key: { agentId: key.agentId, userId: key.userId }, turns: [] };
      this.conversations.set(id, entry);
    }

    entry.turns.push(copyTurn(turn));
    if (entry.turns.length > retention) {
      entry.turns.splice(0, entry.turns.length - retention);
    }
  }

  read(key: ConversationKey, limit: number): ConversationTurn[] {
    const turns = this.conversations.get(conversationKeyId(key))?.turns ?? [];
    if (limit <= 0) return [];
    return turns.slice(-limit).map(copyTurn);
  }

  count(key: ConversationKey): number {
    return this.conversations.get(conversationKeyId(key))?.turns.length ?? 0;
  }

  clear(key: ConversationKey): boolean {
    return this.conversations.delete(conversationKeyId(key));
  }

  keys(): ConversationKey[] {
    return [...this.conversations.values()].map((entry) => ({ ...entry.key }));
  }

  close(): void {
    this.conversations.clear();
  }
}
