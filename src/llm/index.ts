// ============================================
// LLM CLIENT EXPORTS
// ============================================
export { OpenAIClient, createOpenAIClient } from "./openai-client.js";
export { GeminiClient, createGeminiClient } from "./gemini-client.js";
export { OllamaClient, createOllamaClient } from "./ollama-client.js";
export { ResilientLLMClient, DEFAULT_CALL_POLICY } from "./resilient-client.js";
export type { CallPolicy } from "./resilient-client.js";
export { createLLMClient } from "./provider.js";
export type { ProviderConfig } from "./provider.js";
export {
  ProviderError,
  ProviderAuthError,
  ProviderRateLimitError,
  ProviderTimeoutError,
  ProviderUnknownError,
  classifyProviderError,
} from "./errors.js";
export type { ProviderErrorKind } from "./errors.js";
export type {
  LLMClient,
  LLMGenerateOptions,
  LLMGenerateResponse,
  LLMMessage,
  LLMProviderName,
  LLMUsage,
} from "./types.js";
