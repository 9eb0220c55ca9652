import OpenAI from "openai";
import type { ChatCompletion, ChatCompletionMessageParam } from "openai/resources/chat/completions";
import { classifyProviderError } from "./errors.js";
import type { LLMClient, LLMGenerateOptions, LLMGenerateResponse, LLMMessage } from "./types.js";
import { ConfigurationError } from "../errors/app-error.js";

// ============================================
// OPENAI CLIENT IMPLEMENTATION
// ============================================
export class OpenAIClient implements LLMClient {
  readonly provider = "openai";
  private client: OpenAI;
  private modelName: string;

  constructor(apiKey: string, modelName: string = "gpt-4o", baseURL?: string) {
    if (!apiKey) {
      throw new ConfigurationError("API Key is required. Set OPENAI_API_KEY in your .env file.");
    }
    // Retries and timeouts are owned by ResilientLLMClient
    this.client = new OpenAI({
      apiKey,
      maxRetries: 0,
      ...(baseURL ? { baseURL } : {}),
    });
    this.modelName = modelName;
  }

  /**
   * Generate a chat completion. The system prompt is sent as the first message,
   * followed by the conversation in order.
   */
  async generate(options: LLMGenerateOptions): Promise<LLMGenerateResponse> {
    const { systemPrompt, messages, temperature = 0.7, maxTokens = 1000, signal } = options;

    let completion: ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: this.modelName,
          messages: this.convertMessages(messages, systemPrompt),
          max_tokens: maxTokens,
          temperature,
          presence_penalty: 0.1,
          frequency_penalty: 0.1,
        },
        signal ? { signal } : {}
      );
    } catch (error) {
      throw classifyProviderError(this.provider, error);
    }

    return this.formatResponse(completion);
  }

  private formatResponse(completion: ChatCompletion): LLMGenerateResponse {
    const choice = completion.choices[0];
    const usage = completion.usage
      ? {
          promptTokens: completion.usage.prompt_tokens,
          completionTokens: completion.usage.completion_tokens,
          totalTokens: completion.usage.total_tokens,
        }
      : undefined;

    return {
      content: choice?.message.content ?? "",
      ...(choice?.finish_reason ? { finishReason: choice.finish_reason } : {}),
      ...(usage !== undefined ? { usage } : {}),
    };
  }

  private convertMessages(messages: LLMMessage[], systemPrompt: string): ChatCompletionMessageParam[] {
    const converted: ChatCompletionMessageParam[] = [];
    if (systemPrompt) {
      converted.push({ role: "system", content: systemPrompt });
    }
    for (const msg of messages) {
      if (msg.role === "user") {
        converted.push({ role: "user", content: msg.content });
      } else if (msg.role === "assistant") {
        converted.push({ role: "assistant", content: msg.content });
      }
    }
    return converted;
  }
}

// ============================================
// FACTORY FUNCTION
// ============================================

export function createOpenAIClient(apiKey?: string, modelName?: string, baseURL?: string): OpenAIClient {
  if (!apiKey) {
    throw new ConfigurationError("OPENAI_API_KEY is required. Either pass it as an argument or set it in your .env file.");
  }
  return new OpenAIClient(apiKey, modelName, baseURL);
}
