import { GoogleGenerativeAI } from "@google/generative-ai";
import type { Content, GenerateContentResponse } from "@google/generative-ai";
import { classifyProviderError } from "./errors.js";
import type { LLMClient, LLMGenerateOptions, LLMGenerateResponse, LLMMessage } from "./types.js";
import { ConfigurationError } from "../errors/app-error.js";

// ============================================
// GEMINI CLIENT IMPLEMENTATION
// ============================================
export class GeminiClient implements LLMClient {
  readonly provider = "gemini";
  private genAI: GoogleGenerativeAI;
  private modelName: string;

  constructor(apiKey: string, modelName: string = "gemini-1.5-flash") {
    if (!apiKey) {
      throw new ConfigurationError("API Key is required. Set GEMINI_API_KEY in your .env file.");
    }
    this.genAI = new GoogleGenerativeAI(apiKey);
    this.modelName = modelName;
  }

  /**
   * Generate a response from the Gemini API using the provided messages and system prompt.
   * Earlier turns become chat history; the last user turn is sent as the new message.
   */
  async generate(options: LLMGenerateOptions): Promise<LLMGenerateResponse> {
    const { systemPrompt, messages, temperature = 0.7, maxTokens = 1000, signal } = options;

    const chatHistory = this.convertMessagesToGeminiFormat(messages);
    const lastMessage = chatHistory.pop();
    // Gemini rejects a history that opens with a model turn
    while (chatHistory[0]?.role === "model") {
      chatHistory.shift();
    }

    const model = this.genAI.getGenerativeModel({
      model: this.modelName,
      systemInstruction: systemPrompt,
      generationConfig: {
        temperature,
        maxOutputTokens: maxTokens,
      },
    });

    try {
      const chat = model.startChat({ history: chatHistory });
      const result = await chat.sendMessage(
        lastMessage?.parts[0]?.text ?? "",
        signal ? { signal } : {}
      );
      return this.formatResponse(result.response);
    } catch (error) {
      throw classifyProviderError(this.provider, error);
    }
  }

  /**
   * Extract text, finish reason and token usage from a Gemini response.
   */
  private formatResponse(response: GenerateContentResponse): LLMGenerateResponse {
    const text = (response.candidates?.[0]?.content.parts ?? [])
      .map((part) => part.text ?? "")
      .join("");

    const usage = response.usageMetadata
      ? {
          promptTokens: response.usageMetadata.promptTokenCount,
          completionTokens: response.usageMetadata.candidatesTokenCount,
          totalTokens: response.usageMetadata.totalTokenCount,
        }
      : undefined;

    const finishReason = response.candidates?.[0]?.finishReason;

    return {
      content: text,
      ...(finishReason ? { finishReason } : {}),
      ...(usage && { usage }),
    };
  }

  /**
   * Converts LLM messages to Gemini's chat format.
   * Maps "assistant" role to "model" role for Gemini API.
   */
  private convertMessagesToGeminiFormat(messages: LLMMessage[]): Content[] {
    const geminiHistory: Content[] = [];

    for (const msg of messages) {
      if (msg.role === "user") {
        geminiHistory.push({ role: "user", parts: [{ text: msg.content }] });
      } else if (msg.role === "assistant") {
        geminiHistory.push({ role: "model", parts: [{ text: msg.content }] });
      }
    }

    return geminiHistory;
  }
}

// ============================================
// FACTORY FUNCTION
// ============================================

/**
 * Create a Gemini client instance with API key and model configuration.
 */
export function createGeminiClient(apiKey?: string, modelName?: string): GeminiClient {
  if (!apiKey) {
    throw new ConfigurationError("GEMINI_API_KEY is required. Either pass it as an argument or set it in your .env file.");
  }
  return new GeminiClient(apiKey, modelName);
}
