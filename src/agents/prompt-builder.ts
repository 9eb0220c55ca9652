import { InvalidInputError } from "../errors/app-error.js";
import type { LLMMessage } from "../llm/types.js";
import type { ConversationTurn } from "../memory/types.js";
import type { BusinessRuleSet, CompletionRequest, Personality, RuleInsights, Tone } from "./types.js";

export const DEFAULT_MAX_MESSAGE_LENGTH = 4000;

export const TONE_DIRECTIVES: Readonly<Record<Tone, string>> = {
  professional: "Respond in a professional, evidence-based manner.",
  enthusiastic: "Respond in an enthusiastic, exploratory manner.",
  warm: "Respond in a warm, supportive and encouraging manner.",
  formal: "Respond in a formal, concise and results-oriented manner.",
};

export interface ComposeInput {
  agentId: string;
  personality: Personality;
  businessRules: BusinessRuleSet;
  history: readonly ConversationTurn[];
  userMessage: string;
  maxOutputTokens: number;
  maxMessageLength?: number;
  insights?: RuleInsights;
  context?: Record<string, unknown>;
}

// ============================================
// VALIDATION
// ============================================

/**
 * Reject empty (or whitespace-only) and over-length messages.
 */
export function validateUserMessage(
  message: string,
  maxLength: number = DEFAULT_MAX_MESSAGE_LENGTH
): void {
  if (message.trim().length === 0) {
    throw new InvalidInputError("Message cannot be empty");
  }
  // Length in code points, so an emoji counts once
  const length = Array.from(message).length;
  if (length > maxLength) {
    throw new InvalidInputError(`Message exceeds maximum length of ${maxLength} characters`, {
      length,
      maxLength,
    });
  }
}

// ============================================
// SYSTEM PROMPT
// ============================================

/**
 * Role preamble, business specialization and tone directive, always in that order.
 */
export function buildSystemPrompt(
  agentId: string,
  personality: Personality,
  businessRules: BusinessRuleSet
): string {
  return `
## Role
You are ${agentId}, an AI assistant.
Personality: ${personality.key}
Traits: ${formatTraitsList(personality.traits)}
Tone: ${personality.tone}
${personality.promptFragment.trim()}

## Business Specialization
${businessRules.domainDescription.trim()}
You specialize in:
${formatAsList(businessRules.specializations)}
${businessRules.promptFragment.trim()}

## Response Style
${TONE_DIRECTIVES[personality.tone]}
`.trim();
}

// ============================================
// CONTEXT INJECTION (per-request additions)
// ============================================
export function buildContextInjection(
  insights?: RuleInsights,
  context?: Record<string, unknown>
): string | undefined {
  const parts: string[] = [];

  if (insights) {
    const lines = [`## Request Analysis`, `Category: ${insights.category}`];
    for (const [name, value] of Object.entries(insights.signals)) {
      lines.push(`- ${name}: ${value}`);
    }
    if (insights.topics.length > 0) {
      lines.push(`Detected topics: ${insights.topics.join(", ")}`);
    }
    if (insights.recommendations.length > 0) {
      lines.push("Consider:", formatAsList(insights.recommendations));
    }
    if (insights.escalate) {
      lines.push("This request may need escalation to a human specialist. Say so in your answer.");
    }
    parts.push(lines.join("\n"));
  }

  if (context && Object.keys(context).length > 0) {
    parts.push(`## Additional Context\n${JSON.stringify(context, null, 2)}`);
  }

  return parts.length > 0 ? parts.join("\n\n") : undefined;
}

// ============================================
// FULL PROMPT ASSEMBLY
// ============================================
export function composePrompt(input: ComposeInput): CompletionRequest {
  validateUserMessage(input.userMessage, input.maxMessageLength);

  const basePrompt = buildSystemPrompt(input.agentId, input.personality, input.businessRules);
  const contextInjection = buildContextInjection(input.insights, input.context);
  const systemPrompt = contextInjection ? `${basePrompt}\n\n${contextInjection}` : basePrompt;

  const messages: LLMMessage[] = input.history.map((turn): LLMMessage => ({
    role: turn.role === "agent" ? "assistant" : "user",
    content: turn.content,
  }));
  messages.push({ role: "user", content: input.userMessage });

  return {
    systemPrompt,
    messages,
    maxTokens: input.maxOutputTokens,
    temperature: input.personality.temperature,
  };
}

// ============================================
// HELPERS
// ============================================
function formatTraitsList(traits: readonly string[]): string {
  if (traits.length === 0) return "";
  if (traits.length === 1) return traits[0] || "";
  if (traits.length === 2) return `${traits[0]} and ${traits[1]}`;

  const allButLast = traits.slice(0, -1).join(", ");
  const last = traits[traits.length - 1];
  return `${allButLast}, and ${last}`;
}

function formatAsList(items: readonly string[]): string {
  return items.map((item) => `- ${item}`).join("\n");
}
