import type { BusinessRuleSet, RuleInsights } from "../types.js";
import { containsAny } from "./matching.js";

const QUESTION_WORDS = ["what", "why", "how", "when", "where", "who", "which"];
const TASK_WORDS = ["help", "create", "make", "build", "generate", "write"];
const PROBLEM_WORDS = ["problem", "issue", "trouble", "fix", "solve", "error"];
const COMPLEX_INDICATORS = ["multiple", "various", "complex", "detailed", "comprehensive"];

const FOLLOW_UPS: Readonly<Record<string, readonly string[]>> = {
  question: [
    "Would you like more detailed information?",
    "Are there related topics you'd like to explore?",
    "Do you need help with implementation?",
  ],
  task: [
    "Would you like step-by-step guidance?",
    "Do you need help breaking this down further?",
    "Are there any constraints I should consider?",
  ],
  problem: [
    "Would you like alternative solutions?",
    "Do you need help prioritizing approaches?",
    "Are there any resources you'd like me to recommend?",
  ],
};

function classifyIntent(message: string): string {
  if (containsAny(message, QUESTION_WORDS)) return "question";
  if (containsAny(message, TASK_WORDS)) return "task";
  if (containsAny(message, PROBLEM_WORDS)) return "problem";
  return "general";
}

function assessComplexity(message: string): string {
  const wordCount = message.trim().split(/\s+/).length;
  if (wordCount > 50 || containsAny(message, COMPLEX_INDICATORS)) return "high";
  if (wordCount > 20) return "medium";
  return "low";
}

function evaluate(message: string): RuleInsights {
  const intent = classifyIntent(message);
  return {
    category: "general_assistance",
    signals: { intent, complexity: assessComplexity(message) },
    topics: [],
    recommendations: [...(FOLLOW_UPS[intent] ?? [])],
    escalate: false,
  };
}

export const generalAssistantRules: BusinessRuleSet = {
  key: "general_assistant",
  domainDescription:
    "You are a general purpose assistant. You adapt to user needs and provide comprehensive assistance across various topics.",
  specializations: [
    "information research and analysis",
    "task planning and organization",
    "problem-solving and decision support",
    "communication and writing assistance",
    "learning and explanation of concepts",
  ],
  promptFragment: "Ask a clarifying question when the request is ambiguous.",
  exampleUseCases: ["General assistance", "Question answering", "Problem solving"],
  evaluate,
};
