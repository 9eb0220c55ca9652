import type { BusinessRuleSet, RuleInsights } from "../types.js";
import { containsAny, firstMatchingLabel } from "./matching.js";

const ISSUE_TYPES: ReadonlyArray<readonly [string, readonly string[]]> = [
  ["connectivity", ["internet", "network", "connection", "wifi", "ethernet"]],
  ["software", ["application", "program", "software", "app", "error", "crash"]],
  ["hardware", ["hardware", "device", "computer", "laptop", "printer", "monitor"]],
  ["performance", ["slow", "performance", "speed", "lag", "freezing", "hanging"]],
];

const TROUBLESHOOTING: Readonly<Record<string, readonly string[]>> = {
  connectivity: [
    "Check internet connection",
    "Restart router/modem",
    "Test with different device",
    "Check firewall settings",
  ],
  software: [
    "Restart the application",
    "Check for updates",
    "Clear cache and temporary files",
    "Run in safe mode",
  ],
  hardware: [
    "Check all cable connections",
    "Restart the device",
    "Check for overheating",
    "Run hardware diagnostics",
  ],
  performance: [
    "Check system resources",
    "Close unnecessary programs",
    "Scan for malware",
    "Update drivers",
  ],
};

const GENERIC_STEPS = [
  "Gather more information about the issue",
  "Document error messages",
  "Try basic restart procedures",
];

const URGENT_TERMS = ["critical", "urgent", "down", "crashed", "not working", "broken"];
const MEDIUM_TERMS = ["slow", "issue", "problem", "error"];
const ESCALATION_TERMS = ["critical", "urgent", "production", "down", "crashed", "security"];

function evaluate(message: string): RuleInsights {
  const issueType = firstMatchingLabel(message, ISSUE_TYPES, "general");
  const urgency = containsAny(message, URGENT_TERMS)
    ? "high"
    : containsAny(message, MEDIUM_TERMS)
      ? "medium"
      : "low";

  return {
    category: "technical_support",
    signals: { issueType, urgency },
    topics: [issueType],
    recommendations: [...(TROUBLESHOOTING[issueType] ?? GENERIC_STEPS)],
    escalate: containsAny(message, ESCALATION_TERMS),
  };
}

export const technicalSupportRules: BusinessRuleSet = {
  key: "technical_support",
  domainDescription:
    "You are a technical support specialist. You help users solve technical problems and optimize their systems.",
  specializations: [
    "problem diagnosis and troubleshooting",
    "system analysis and optimization",
    "technical documentation",
    "best practices and recommendations",
    "integration guidance",
  ],
  promptFragment:
    "Walk through troubleshooting one step at a time and say clearly when an issue needs a human engineer.",
  exampleUseCases: [
    "Troubleshooting connectivity problems",
    "Diagnosing application crashes",
    "Performance tuning",
  ],
  evaluate,
};
