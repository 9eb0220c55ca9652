import type { Config } from "../config/config.js";
import type { Logger } from "../logger/index.js";
import { createGeminiClient } from "./gemini-client.js";
import { createOllamaClient } from "./ollama-client.js";
import { createOpenAIClient } from "./openai-client.js";
import { ResilientLLMClient } from "./resilient-client.js";
import type { LLMClient } from "./types.js";

export type ProviderConfig = Pick<
  Config,
  | "llmProvider"
  | "openaiApiKey"
  | "openaiBaseUrl"
  | "geminiApiKey"
  | "ollamaHostUrl"
  | "modelName"
  | "providerTimeoutMs"
  | "providerMaxRetries"
>;

function createProviderClient(config: ProviderConfig): LLMClient {
  switch (config.llmProvider) {
    case "openai":
      return createOpenAIClient(config.openaiApiKey, config.modelName, config.openaiBaseUrl);
    case "gemini":
      return createGeminiClient(config.geminiApiKey, config.modelName);
    case "ollama":
      return createOllamaClient(config.ollamaHostUrl, config.modelName);
  }
}

/**
 * Build the configured provider client, wrapped with the call timeout and
 * retry policy.
 */
export function createLLMClient(config: ProviderConfig, logger?: Logger): ResilientLLMClient {
  return new ResilientLLMClient(
    createProviderClient(config),
    { timeoutMs: config.providerTimeoutMs, maxRetries: config.providerMaxRetries },
    logger
  );
}
