import { classifyProviderError, ProviderUnknownError } from "./errors.js";
import type { LLMClient, LLMGenerateOptions, LLMGenerateResponse, LLMMessage } from "./types.js";

interface OllamaChatResponse {
  message?: { role?: string; content?: string };
  done?: boolean;
  done_reason?: string;
  prompt_eval_count?: number;
  eval_count?: number;
}

function isOllamaChatResponse(value: unknown): value is OllamaChatResponse {
  return typeof value === "object" && value !== null;
}

// ============================================
// OLLAMA CLIENT IMPLEMENTATION
// ============================================
export class OllamaClient implements LLMClient {
  readonly provider = "ollama";
  private baseUrl: string;
  private modelName: string;

  constructor(baseUrl: string = "http://localhost:11434", modelName: string = "llama3") {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.modelName = modelName;
  }

  /**
   * Generate a response from the Ollama chat API.
   * Non-2xx statuses and network failures are classified into provider errors.
   */
  async generate(options: LLMGenerateOptions): Promise<LLMGenerateResponse> {
    const { systemPrompt, messages, temperature = 0.7, maxTokens = 1000, signal } = options;

    const url = `${this.baseUrl}/api/chat`;
    const requestBody = {
      model: this.modelName,
      messages: this.convertMessagesToOllamaFormat(messages, systemPrompt),
      options: {
        temperature,
        num_predict: maxTokens, // Ollama uses num_predict instead of max_tokens
      },
      stream: false,
    };

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(requestBody),
        ...(signal ? { signal } : {}),
      });
    } catch (fetchError) {
      throw classifyProviderError(this.provider, fetchError);
    }

    if (!response.ok) {
      throw classifyProviderError(this.provider, { status: response.status });
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (jsonError) {
      throw new ProviderUnknownError(this.provider, { retryable: false, cause: jsonError });
    }

    if (!isOllamaChatResponse(data)) {
      throw new ProviderUnknownError(this.provider, { retryable: false });
    }
    return this.formatResponse(data);
  }

  /**
   * Ollama reports token usage as prompt_eval_count and eval_count.
   */
  private formatResponse(response: OllamaChatResponse): LLMGenerateResponse {
    const content = response.message?.content ?? "";

    const usage =
      response.prompt_eval_count !== undefined
        ? {
            promptTokens: response.prompt_eval_count,
            completionTokens: response.eval_count ?? 0,
            totalTokens: response.prompt_eval_count + (response.eval_count ?? 0),
          }
        : undefined;

    return {
      content,
      finishReason: response.done ? (response.done_reason ?? "stop") : "incomplete",
      ...(usage !== undefined ? { usage } : {}),
    };
  }

  private convertMessagesToOllamaFormat(
    messages: LLMMessage[],
    systemPrompt: string
  ): LLMMessage[] {
    const ollamaMessages: LLMMessage[] = [];

    if (systemPrompt) {
      ollamaMessages.push({ role: "system", content: systemPrompt });
    }
    for (const msg of messages) {
      if (msg.role === "system") continue;
      ollamaMessages.push({ role: msg.role, content: msg.content });
    }

    return ollamaMessages;
  }
}

// ============================================
// FACTORY FUNCTION
// ============================================

export function createOllamaClient(baseUrl?: string, modelName?: string): OllamaClient {
  return new OllamaClient(baseUrl || "http://localhost:11434", modelName || "llama3");
}
