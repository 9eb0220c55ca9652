import type { BusinessRuleSet, RuleInsights } from "../types.js";
import { firstMatchingLabel } from "./matching.js";

const CONTENT_TYPES: ReadonlyArray<readonly [string, readonly string[]]> = [
  ["blog_post", ["blog", "article", "post", "write about"]],
  ["social_media", ["twitter", "facebook", "instagram", "social", "tweet"]],
  ["marketing", ["marketing", "advertisement", "campaign", "promotion", "sales"]],
  ["email", ["email", "newsletter", "subject line"]],
  ["script", ["script", "video", "presentation", "speech"]],
];

const AUDIENCES: ReadonlyArray<readonly [string, readonly string[]]> = [
  ["professionals", ["professional", "business", "corporate", "enterprise"]],
  ["consumers", ["customer", "consumer", "general public", "people"]],
  ["students", ["student", "education", "learning", "academic"]],
  ["technical", ["developer", "technical", "engineer"]],
];

const TONES: ReadonlyArray<readonly [string, readonly string[]]> = [
  ["formal", ["formal", "professional", "business"]],
  ["casual", ["casual", "friendly", "relaxed", "informal"]],
  ["persuasive", ["convince", "persuade", "sell", "promote"]],
  ["educational", ["explain", "teach", "inform", "educate"]],
];

const SUGGESTIONS: Readonly<Record<string, readonly string[]>> = {
  blog_post: [
    "Consider adding personal anecdotes for engagement",
    "Include relevant statistics and data points",
    "Add call-to-action at the end",
  ],
  social_media: [
    "Keep it concise and visually appealing",
    "Include relevant hashtags",
    "Consider platform-specific formatting",
  ],
  marketing: [
    "Focus on benefits over features",
    "Include social proof if available",
    "Create urgency or scarcity when appropriate",
  ],
};

const STOP_WORDS = new Set([
  "the", "is", "at", "which", "on", "a", "an", "and", "or", "but", "in",
  "with", "to", "for", "of", "as", "by", "that", "this", "what", "some",
]);

export function extractSeoKeywords(message: string, limit: number = 5): string[] {
  return message
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s-]/gu, " ")
    .split(/\s+/)
    .filter((word) => word.length > 3 && !STOP_WORDS.has(word))
    .slice(0, limit);
}

function evaluate(message: string): RuleInsights {
  const contentType = firstMatchingLabel(message, CONTENT_TYPES, "general_content");

  return {
    category: "content_creation",
    signals: {
      contentType,
      targetAudience: firstMatchingLabel(message, AUDIENCES, "general_audience"),
      desiredTone: firstMatchingLabel(message, TONES, "neutral"),
    },
    topics: extractSeoKeywords(message),
    recommendations: [...(SUGGESTIONS[contentType] ?? [])],
    escalate: false,
  };
}

export const contentCreatorRules: BusinessRuleSet = {
  key: "content_creator",
  domainDescription:
    "You are a content creation specialist. You help users create compelling, engaging content that resonates with their target audience.",
  specializations: [
    "content strategy and planning",
    "brand voice development",
    "SEO and content optimization",
    "social media strategy",
    "creative ideation and brainstorming",
    "audience engagement strategies",
  ],
  promptFragment: "Tailor every suggestion to the platform and audience the user names.",
  exampleUseCases: [
    "Social media content strategy",
    "Creative campaign ideation",
    "Brand storytelling",
    "Content optimization tips",
    "Audience engagement strategies",
  ],
  evaluate,
};
