// ============================================
// CONVERSATION MEMORY TYPES
// ============================================

export type TurnRole = "user" | "agent";

export const TURN_ROLES: readonly TurnRole[] = ["user", "agent"];

export interface ConversationTurn {
  role: TurnRole;
  content: string;
  timestamp: Date;
  tokensUsed?: number;
}

export interface ConversationKey {
  agentId: string;
  userId: string;
}

export interface ConversationSummary {
  agentId: string;
  userId: string;
  messageCount: number;
  conversationStarted?: Date;
  lastInteraction?: Date;
}

export interface MemoryStats {
  totalConversations: number;
  activeUsers: number;
  totalTurns: number;
}

/**
 * Backing storage for conversation turns. Implementations keep turns in
 * insertion order and drop the oldest ones past `retention`.
 */
export interface ConversationStore {
  append(key: ConversationKey, turn: ConversationTurn, retention: number): void;
  read(key: ConversationKey, limit: number): ConversationTurn[];
  count(key: ConversationKey): number;
  clear(key: ConversationKey): boolean;
  keys(): ConversationKey[];
  close(): void;
}
