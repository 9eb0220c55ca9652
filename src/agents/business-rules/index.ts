import { ConfigurationError, NotFoundError } from "../../errors/app-error.js";
import type { BusinessRuleSet } from "../types.js";
import { contentCreatorRules } from "./content-creator.js";
import { financialAdvisorRules } from "./financial-advisor.js";
import { generalAssistantRules } from "./general-assistant.js";
import { technicalSupportRules } from "./technical-support.js";

export { contentCreatorRules, financialAdvisorRules, generalAssistantRules, technicalSupportRules };
export { extractSeoKeywords } from "./content-creator.js";

export const builtInBusinessRules: readonly BusinessRuleSet[] = [
  financialAdvisorRules,
  contentCreatorRules,
  technicalSupportRules,
  generalAssistantRules,
];

// ============================================
// BUSINESS RULE REGISTRY
// ============================================

/**
 * Read-only lookup from domain key to business rule set, fixed at construction.
 */
export class BusinessRuleRegistry {
  private readonly ruleSets: ReadonlyMap<string, BusinessRuleSet>;

  constructor(ruleSets: readonly BusinessRuleSet[] = builtInBusinessRules) {
    const entries = new Map<string, BusinessRuleSet>();
    for (const ruleSet of ruleSets) {
      if (entries.has(ruleSet.key)) {
        throw new ConfigurationError(`Duplicate business domain key: ${ruleSet.key}`);
      }
      entries.set(ruleSet.key, Object.freeze({ ...ruleSet }));
    }
    this.ruleSets = entries;
  }

  get(key: string): BusinessRuleSet {
    const ruleSet = this.ruleSets.get(key);
    if (!ruleSet) {
      throw new NotFoundError(`Business domain ${key} not found`, { key, available: this.keys() });
    }
    return ruleSet;
  }

  has(key: string): boolean {
    return this.ruleSets.has(key);
  }

  keys(): string[] {
    return [...this.ruleSets.keys()];
  }
}
