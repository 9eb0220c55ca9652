import { readFileSync } from "node:fs";
import { loadEnvFile } from "node:process";
import { resolve } from "node:path";
import { z } from "zod";
import { createAgent, defaultAgents } from "../agents/agent-builder.js";
import type { AgentDefinition } from "../agents/types.js";
import { ConfigurationError } from "../errors/app-error.js";
import type { LLMProviderName } from "../llm/types.js";
import { LogLevel, parseLogLevel } from "../logger/index.js";

export type Env = Record<string, string | undefined>;

export interface Config {
  port: number;
  llmProvider: LLMProviderName;
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  geminiApiKey?: string;
  ollamaHostUrl?: string;
  modelName?: string;
  maxOutputTokens: number;
  providerTimeoutMs: number;
  providerMaxRetries: number;
  historyWindow: number;
  historyRetention: number;
  maxMessageLength: number;
  conversationDb?: string; // unset keeps conversations in process memory
  agents: readonly AgentDefinition[];
  logLevel: LogLevel;
  logDir: string;
  logMessageContent: boolean;
}

/**
 * Load `.env` from the working directory when present.
 */
export function loadDotEnv(path: string = resolve(process.cwd(), ".env")): boolean {
  try {
    loadEnvFile(path);
    return true;
  } catch (error) {
    if (typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

// ============================================
// ENVIRONMENT HELPERS
// ============================================

function getEnvVar(env: Env, key: string, defaultValue?: string): string {
  const value = env[key]?.trim() || defaultValue;
  if (value === undefined) {
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getOptionalEnvVar(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function getIntEnvVar(env: Env, key: string, defaultValue: number, min: number = 0): number {
  const raw = getEnvVar(env, key, String(defaultValue));
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function getBoolEnvVar(env: Env, key: string, defaultValue: boolean): boolean {
  const raw = getOptionalEnvVar(env, key);
  if (raw === undefined) return defaultValue;
  return ["true", "1", "yes"].includes(raw.toLowerCase());
}

const providerSchema = z.enum(["openai", "gemini", "ollama"]);

// ============================================
// AGENT DEFINITIONS FILE
// ============================================

const agentDefinitionSchema = z.object({
  agent_id: z.string().trim().min(1),
  personality: z.string().trim().min(1),
  domain: z.string().trim().min(1),
  status: z.enum(["active", "disabled"]).default("active"),
});

export const agentsFileSchema = z.array(agentDefinitionSchema).min(1);

/**
 * Parse agent definitions from JSON text, e.g.
 * `[{ "agent_id": "agent_alpha", "personality": "analytical", "domain": "financial_advisor" }]`.
 */
export function parseAgentDefinitions(json: string, source: string = "agents file"): AgentDefinition[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${source}`, {
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = agentsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid agent definitions in ${source}`, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return parsed.data.map((entry) =>
    createAgent(entry.agent_id, entry.personality, entry.domain, entry.status)
  );
}

export function loadAgentDefinitions(path: string): AgentDefinition[] {
  return parseAgentDefinitions(readFileSync(path, "utf8"), path);
}

// ============================================
// CONFIG LOADING
// ============================================

export function loadConfig(env: Env = process.env): Config {
  const provider = providerSchema.safeParse(getEnvVar(env, "LLM_PROVIDER", "openai").toLowerCase());
  if (!provider.success) {
    throw new ConfigurationError(
      `LLM_PROVIDER must be one of ${providerSchema.options.join(", ")}`
    );
  }

  const config: Config = {
    port: getIntEnvVar(env, "PORT", 3000, 1),
    llmProvider: provider.data,
    maxOutputTokens: getIntEnvVar(env, "MAX_OUTPUT_TOKENS", 1000, 1),
    providerTimeoutMs: getIntEnvVar(env, "PROVIDER_TIMEOUT_MS", 30000, 1),
    providerMaxRetries: getIntEnvVar(env, "PROVIDER_MAX_RETRIES", 1),
    historyWindow: getIntEnvVar(env, "HISTORY_WINDOW", 10),
    historyRetention: getIntEnvVar(env, "HISTORY_RETENTION", 20, 1),
    maxMessageLength: getIntEnvVar(env, "MAX_MESSAGE_LENGTH", 4000, 1),
    agents: defaultAgents,
    logLevel: parseLogLevel(getOptionalEnvVar(env, "LOG_LEVEL")),
    logDir: getEnvVar(env, "LOG_DIR", "logs"),
    logMessageContent: getBoolEnvVar(env, "LOG_MESSAGE_CONTENT", false),
  };

  const openaiApiKey = getOptionalEnvVar(env, "OPENAI_API_KEY");
  const openaiBaseUrl = getOptionalEnvVar(env, "OPENAI_BASE_URL");
  const geminiApiKey = getOptionalEnvVar(env, "GEMINI_API_KEY");
  const ollamaHostUrl = getOptionalEnvVar(env, "OLLAMA_HOST_URL");
  const modelName = getOptionalEnvVar(env, "MODEL_NAME");
  const conversationDb = getOptionalEnvVar(env, "CONVERSATION_DB");
  const agentsFile = getOptionalEnvVar(env, "AGENTS_FILE");

  if (openaiApiKey) config.openaiApiKey = openaiApiKey;
  if (openaiBaseUrl) config.openaiBaseUrl = openaiBaseUrl;
  if (geminiApiKey) config.geminiApiKey = geminiApiKey;
  if (ollamaHostUrl) config.ollamaHostUrl = ollamaHostUrl;
  if (modelName) config.modelName = modelName;
  if (conversationDb) config.conversationDb = conversationDb;
  if (agentsFile) config.agents = loadAgentDefinitions(agentsFile);

  if (config.llmProvider === "openai" && !config.openaiApiKey) {
    throw new ConfigurationError("OPENAI_API_KEY is required when LLM_PROVIDER is openai");
  }
  if (config.llmProvider === "gemini" && !config.geminiApiKey) {
    throw new ConfigurationError("GEMINI_API_KEY is required when LLM_PROVIDER is gemini");
  }

  return config;
}

/**
 * Config with secrets replaced, for startup logging.
 */
export function describeConfig(config: Config): Record<string, unknown> {
  return {
    port: config.port,
    llmProvider: config.llmProvider,
    modelName: config.modelName ?? "(provider default)",
    openaiApiKey: config.openaiApiKey ? "[set]" : "[unset]",
    geminiApiKey: config.geminiApiKey ? "[set]" : "[unset]",
    providerTimeoutMs: config.providerTimeoutMs,
    providerMaxRetries: config.providerMaxRetries,
    historyWindow: config.historyWindow,
    historyRetention: config.historyRetention,
    maxMessageLength: config.maxMessageLength,
    conversationStore: config.conversationDb ?? "memory",
    agents: config.agents.map((agent) => agent.agentId),
    logLevel: config.logLevel,
    logDir: config.logDir,
  };
}
