// ============================================
// LLM MESSAGE TYPES
// ============================================
export interface LLMMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface LLMGenerateOptions {
  systemPrompt: string;
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal; // Aborted by the call policy when the timeout elapses
}

export interface LLMUsage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}

export interface LLMGenerateResponse {
  content: string;
  finishReason?: string;
  usage?: LLMUsage;
}

export type LLMProviderName = "openai" | "gemini" | "ollama";

export interface LLMClient {
  readonly provider: string;
  generate(options: LLMGenerateOptions): Promise<LLMGenerateResponse>;
}
