// ============================================
// ROUTER MODULE EXPORTS
// ============================================
export { AgentRouter, DEFAULT_ROUTER_SETTINGS } from "./agent-router.js";
export type { AgentRouterDependencies, RouterCapabilities, RouterStats } from "./agent-router.js";
export { failureEnvelope, statusForError, INTERNAL_ERROR_MESSAGE } from "./envelope.js";
export { KeyedLock } from "./keyed-lock.js";
export type {
  AgentInfo,
  ChatFailureResponse,
  ChatRequest,
  ChatResponse,
  ChatSuccessResponse,
  RequestState,
  RouterSettings,
} from "./types.js";
