import { describe, it, expect } from "vitest";
import { financialAdvisorRules, contentCreatorRules } from "../src/agents/business-rules/index.js";
import { analyticalPersonality, creativePersonality } from "../src/agents/personalities/index.js";
import {
  TONE_DIRECTIVES,
  buildContextInjection,
  buildSystemPrompt,
  composePrompt,
  validateUserMessage,
} from "../src/agents/prompt-builder.js";
import { InvalidInputError } from "../src/errors/index.js";
import type { ConversationTurn } from "../src/memory/types.js";

const baseInput = {
  agentId: "agent_alpha",
  personality: analyticalPersonality,
  businessRules: financialAdvisorRules,
  history: [],
  maxOutputTokens: 1000,
};

describe("validateUserMessage", () => {
  it("rejects empty and whitespace-only messages", () => {
    expect(() => validateUserMessage("")).toThrow("Message cannot be empty");
    expect(() => validateUserMessage("   \n\t")).toThrow(InvalidInputError);
  });

  it("accepts exactly the maximum length and rejects one more", () => {
    expect(() => validateUserMessage("a".repeat(4000))).not.toThrow();
    expect(() => validateUserMessage("a".repeat(4001))).toThrow(
      "Message exceeds maximum length of 4000 characters"
    );
  });

  it("counts astral-plane characters once", () => {
    expect(() => validateUserMessage("😀".repeat(2001), 4000)).not.toThrow();
    expect(() => validateUserMessage("😀".repeat(4000), 4000)).not.toThrow();
    expect(() => validateUserMessage("😀".repeat(4001), 4000)).toThrow(
      "Message exceeds maximum length of 4000 characters"
    );
  });

  it("reports the length in characters", () => {
    try {
      validateUserMessage("😀".repeat(5), 4);
      expect.unreachable("validation should fail");
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error).toHaveProperty("details", { length: 5, maxLength: 4 });
    }
  });

  it("honours a custom limit", () => {
    expect(() => validateUserMessage("hello", 4)).toThrow("Message exceeds maximum length of 4 characters");
  });
});

describe("buildSystemPrompt", () => {
  const prompt = buildSystemPrompt("agent_alpha", analyticalPersonality, financialAdvisorRules);

  it("orders role, business specialization and tone directive", () => {
    const role = prompt.indexOf("## Role");
    const business = prompt.indexOf("## Business Specialization");
    const style = prompt.indexOf("## Response Style");
    expect(role).toBe(0);
    expect(business).toBeGreaterThan(role);
    expect(style).toBeGreaterThan(business);
  });

  it("renders the role preamble", () => {
    expect(prompt).toContain("You are agent_alpha, an AI assistant.\nPersonality: analytical\n");
    expect(prompt).toContain(
      "Traits: data-driven decision making, logical reasoning, systematic approach, evidence-based conclusions, and statistical analysis focus"
    );
    expect(prompt).toContain("Tone: professional");
  });

  it("lists specializations", () => {
    expect(prompt).toContain("You specialize in:\n- portfolio analysis and optimization\n- risk assessment and management");
  });

  it("ends with the tone directive", () => {
    expect(prompt.endsWith(`## Response Style\n${TONE_DIRECTIVES.professional}`)).toBe(true);
  });

  it("uses the directive for the personality's tone", () => {
    const creative = buildSystemPrompt("agent_beta", creativePersonality, contentCreatorRules);
    expect(creative.endsWith("Respond in an enthusiastic, exploratory manner.")).toBe(true);
  });
});

describe("buildContextInjection", () => {
  it("returns undefined without insights or context", () => {
    expect(buildContextInjection()).toBeUndefined();
    expect(buildContextInjection(undefined, {})).toBeUndefined();
  });

  it("renders insights then context", () => {
    const injection = buildContextInjection(
      {
        category: "technical_support",
        signals: { issueType: "software", urgency: "high" },
        topics: ["software"],
        recommendations: ["Restart the application"],
        escalate: true,
      },
      { plan: "pro" }
    );
    expect(injection).toBe(
      [
        "## Request Analysis",
        "Category: technical_support",
        "- issueType: software",
        "- urgency: high",
        "Detected topics: software",
        "Consider:",
        "- Restart the application",
        "This request may need escalation to a human specialist. Say so in your answer.",
        "",
        "## Additional Context",
        "{",
        '  "plan": "pro"',
        "}",
      ].join("\n")
    );
  });
});

describe("composePrompt", () => {
  it("appends the user message after history, mapping agent turns to assistant", () => {
    const history: ConversationTurn[] = [
      { role: "user", content: "Hi", timestamp: new Date("2024-01-01T00:00:00Z") },
      { role: "agent", content: "Hello!", timestamp: new Date("2024-01-01T00:00:01Z") },
    ];
    const request = composePrompt({ ...baseInput, history, userMessage: "I have $10,000 to invest." });

    expect(request.messages).toEqual([
      { role: "user", content: "Hi" },
      { role: "assistant", content: "Hello!" },
      { role: "user", content: "I have $10,000 to invest." },
    ]);
    expect(request.temperature).toBe(0.3);
    expect(request.maxTokens).toBe(1000);
  });

  it("places the context injection after the tone directive", () => {
    const request = composePrompt({
      ...baseInput,
      userMessage: "Should I buy stocks?",
      context: { horizon: "10 years" },
    });
    expect(request.systemPrompt.indexOf("## Additional Context")).toBeGreaterThan(
      request.systemPrompt.indexOf("## Response Style")
    );
    expect(request.systemPrompt.endsWith('## Additional Context\n{\n  "horizon": "10 years"\n}')).toBe(true);
  });

  it("is deterministic for the same input", () => {
    const input = { ...baseInput, userMessage: "Plan my budget" };
    expect(composePrompt(input)).toEqual(composePrompt(input));
  });

  it("validates the user message", () => {
    expect(() => composePrompt({ ...baseInput, userMessage: "" })).toThrow("Message cannot be empty");
    expect(() => composePrompt({ ...baseInput, userMessage: "x".repeat(11), maxMessageLength: 10 })).toThrow(
      InvalidInputError
    );
  });
});
