import { ConfigurationError } from "../errors/app-error.js";
import type { BusinessRuleRegistry } from "./business-rules/index.js";
import type { PersonalityRegistry } from "./personalities/index.js";
import type { AgentDefinition, AgentStatus, ResolvedAgent } from "./types.js";

/**
 * Create an immutable agent definition pairing a personality with a business domain.
 */
export function createAgent(
  agentId: string,
  personalityKey: string,
  domainKey: string,
  status: AgentStatus = "active"
): AgentDefinition {
  if (!agentId.trim()) {
    throw new ConfigurationError("Agent id cannot be empty");
  }
  return Object.freeze({ agentId, personalityKey, domainKey, status });
}

export const defaultAgents: readonly AgentDefinition[] = [
  createAgent("agent_alpha", "analytical", "financial_advisor"),
  createAgent("agent_beta", "creative", "content_creator"),
];

/**
 * Resolve a definition against both registries. Unknown keys are configuration errors.
 */
export function resolveAgent(
  definition: AgentDefinition,
  personalities: PersonalityRegistry,
  businessRules: BusinessRuleRegistry
): ResolvedAgent {
  if (!personalities.has(definition.personalityKey)) {
    throw new ConfigurationError(
      `Agent ${definition.agentId} references unknown personality ${definition.personalityKey}`,
      { agentId: definition.agentId, available: personalities.keys() }
    );
  }
  if (!businessRules.has(definition.domainKey)) {
    throw new ConfigurationError(
      `Agent ${definition.agentId} references unknown business domain ${definition.domainKey}`,
      { agentId: definition.agentId, available: businessRules.keys() }
    );
  }

  return {
    definition,
    personality: personalities.get(definition.personalityKey),
    businessRules: businessRules.get(definition.domainKey),
  };
}
