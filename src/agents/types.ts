import type { LLMMessage } from "../llm/types.js";

// ============================================
// PERSONALITY CONFIGURATION
// ============================================

export type Tone = "professional" | "enthusiastic" | "warm" | "formal";

export interface Personality {
  key: string;
  traits: readonly string[];    // ordered, rendered as written
  tone: Tone;
  style: string;                // "structured" | "expressive" | "conversational"
  temperature: number;          // sampling temperature for this voice
  promptFragment: string;       // injected into the role preamble
  processingNotification: string;
}

// ============================================
// BUSINESS RULES
// ============================================

export interface RuleInsights {
  category: string;
  signals: Record<string, string>;  // e.g. { riskLevel: "medium" }
  topics: string[];
  recommendations: string[];
  escalate: boolean;
}

export interface BusinessRuleSet {
  key: string;
  domainDescription: string;
  specializations: readonly string[];
  promptFragment: string;
  exampleUseCases: readonly string[];
  evaluate(message: string): RuleInsights;
}

// ============================================
// AGENT DEFINITION
// ============================================

export type AgentStatus = "active" | "disabled";

export interface AgentDefinition {
  readonly agentId: string;
  readonly personalityKey: string;
  readonly domainKey: string;
  readonly status: AgentStatus;
}

/**
 * An agent definition resolved against both registries.
 */
export interface ResolvedAgent {
  definition: AgentDefinition;
  personality: Personality;
  businessRules: BusinessRuleSet;
}

// ============================================
// PROMPT COMPOSITION
// ============================================

export interface CompletionRequest {
  systemPrompt: string;
  messages: LLMMessage[];
  maxTokens: number;
  temperature: number;
}
