import type { AgentStatus, Tone } from "../agents/types.js";

// ============================================
// CHAT ENVELOPES
// ============================================

export interface ChatRequest {
  user_id: string;
  message: string;
  context?: Record<string, unknown>;
}

export interface ChatSuccessResponse {
  success: true;
  agent_id: string;
  user_id: string;
  response: string;
  personality: string;
  business_domain: string;
  timestamp: string;
  tokens_used: number; // 0 when the provider reports no usage
}

export interface ChatFailureResponse {
  success: false;
  agent_id?: string;
  user_id?: string;
  error: string;
  timestamp: string;
  available_agents?: string[];
}

export type ChatResponse = ChatSuccessResponse | ChatFailureResponse;

// ============================================
// ROUTER CONFIGURATION
// ============================================

export interface RouterSettings {
  historyWindow: number; // turns sent to the model as context
  maxMessageLength: number;
  maxOutputTokens: number;
  logMessageContent: boolean; // include message previews in logs
}

export type RequestState =
  | "received"
  | "validated"
  | "composed"
  | "dispatched"
  | "completed"
  | "failed";

export interface AgentInfo {
  agent_id: string;
  personality: string;
  business_domain: string;
  status: AgentStatus;
  traits: string[];
  tone: Tone;
  specializations: string[];
  example_use_cases: string[];
  processing_notification: string;
}
