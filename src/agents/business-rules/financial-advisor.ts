import type { BusinessRuleSet, RuleInsights } from "../types.js";
import { containsAny, findTerms } from "./matching.js";

const FINANCIAL_TOPICS = [
  "investment", "portfolio", "stocks", "bonds", "retirement", "401k", "ira", "savings",
  "budget", "debt", "mortgage", "insurance", "tax", "planning", "fund", "dividend",
] as const;

const HIGH_RISK_TERMS = ["day trading", "cryptocurrency", "leverage", "margin", "options"];
const MEDIUM_RISK_TERMS = ["stocks", "mutual funds", "etf", "investment"];

function assessRisk(message: string): "high" | "medium" | "low" {
  if (containsAny(message, HIGH_RISK_TERMS)) return "high";
  if (containsAny(message, MEDIUM_RISK_TERMS)) return "medium";
  return "low";
}

function evaluate(message: string): RuleInsights {
  const topics = findTerms(message, FINANCIAL_TOPICS);
  const recommendations: string[] = [];

  if (topics.includes("investment") || topics.includes("portfolio")) {
    recommendations.push("Consider diversification across asset classes and risk tolerance alignment");
  }
  if (topics.includes("retirement")) {
    recommendations.push("Review contribution limits and employer matching opportunities");
  }
  if (topics.includes("debt")) {
    recommendations.push("Consider debt consolidation and payment prioritization strategies");
  }

  return {
    category: "financial_advice",
    signals: {
      riskLevel: assessRisk(message),
      compliance: "Not investment advice. Recommend consulting a qualified financial advisor.",
    },
    topics,
    recommendations,
    escalate: false,
  };
}

export const financialAdvisorRules: BusinessRuleSet = {
  key: "financial_advisor",
  domainDescription:
    "You are a financial advisory specialist. You help users make informed financial decisions based on their goals, risk tolerance and market conditions.",
  specializations: [
    "portfolio analysis and optimization",
    "risk assessment and management",
    "investment recommendations",
    "market analysis and trends",
    "financial planning and goal setting",
    "regulatory compliance and best practices",
  ],
  promptFragment:
    "Always remind the user that your answer is general information, not personalised investment advice.",
  exampleUseCases: [
    "Investment portfolio analysis",
    "Retirement planning advice",
    "Risk assessment consultation",
    "Market trend analysis",
    "Financial goal setting",
  ],
  evaluate,
};
