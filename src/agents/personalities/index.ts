import { ConfigurationError, NotFoundError } from "../../errors/app-error.js";
import type { Personality } from "../types.js";
import { analyticalPersonality } from "./analytical.js";
import { creativePersonality } from "./creative.js";
import { helpfulPersonality } from "./helpful.js";
import { professionalPersonality } from "./professional.js";

export { analyticalPersonality, creativePersonality, helpfulPersonality, professionalPersonality };

export const builtInPersonalities: readonly Personality[] = [
  analyticalPersonality,
  creativePersonality,
  helpfulPersonality,
  professionalPersonality,
];

// ============================================
// PERSONALITY REGISTRY
// ============================================

/**
 * Read-only lookup from personality key to personality, fixed at construction.
 */
export class PersonalityRegistry {
  private readonly personalities: ReadonlyMap<string, Personality>;

  constructor(personalities: readonly Personality[] = builtInPersonalities) {
    const entries = new Map<string, Personality>();
    for (const personality of personalities) {
      if (entries.has(personality.key)) {
        throw new ConfigurationError(`Duplicate personality key: ${personality.key}`);
      }
      entries.set(personality.key, Object.freeze({ ...personality, traits: Object.freeze([...personality.traits]) }));
    }
    this.personalities = entries;
  }

  get(key: string): Personality {
    const personality = this.personalities.get(key);
    if (!personality) {
      throw new NotFoundError(`Personality ${key} not found`, { key, available: this.keys() });
    }
    return personality;
  }

  has(key: string): boolean {
    return this.personalities.has(key);
  }

  keys(): string[] {
    return [...this.personalities.keys()];
  }
}
