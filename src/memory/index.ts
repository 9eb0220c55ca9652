// ============================================
// MEMORY MODULE EXPORTS
// ============================================
export { ConversationMemory, DEFAULT_RETENTION } from "./conversation-memory.js";
export type { ConversationMemoryOptions } from "./conversation-memory.js";
export { InMemoryConversationStore, conversationKeyId } from "./in-memory-store.js";
export { SqliteConversationStore } from "./store.js";
export { TURN_ROLES } from "./types.js";
export type {
  ConversationKey,
  ConversationStore,
  ConversationSummary,
  ConversationTurn,
  MemoryStats,
  TurnRole,
} from "./types.js";
