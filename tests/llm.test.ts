import { describe, it, expect, vi, afterEach } from "vitest";
import {
  OllamaClient,
  ProviderAuthError,
  ProviderRateLimitError,
  ProviderTimeoutError,
  ProviderUnknownError,
  ResilientLLMClient,
  classifyProviderError,
  createLLMClient,
} from "../src/llm/index.js";
import type { LLMClient, LLMGenerateOptions, LLMGenerateResponse } from "../src/llm/index.js";
import { ConfigurationError } from "../src/errors/index.js";
import { createLogger } from "../src/logger/index.js";

const quietLogger = createLogger({ enableConsole: false, enableFile: false });

const request: LLMGenerateOptions = {
  systemPrompt: "You are agent_alpha, an AI assistant.",
  messages: [{ role: "user", content: "Hello" }],
  temperature: 0.3,
  maxTokens: 200,
};

/**
 * Provider stand-in that replays a script of outcomes, one per call.
 * "hang" never settles until the call is aborted.
 */
class ScriptedClient implements LLMClient {
  readonly provider = "scripted";
  calls = 0;
  signals: Array<AbortSignal | undefined> = [];

  constructor(private script: Array<LLMGenerateResponse | Error | { status: number } | "hang">) {}

  generate(options: LLMGenerateOptions): Promise<LLMGenerateResponse> {
    const step = this.script[Math.min(this.calls, this.script.length - 1)];
    this.calls++;
    this.signals.push(options.signal);

    if (step === "hang") {
      return new Promise((_resolve, reject) => {
        options.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
      });
    }
    if (step === undefined || step instanceof Error || !("content" in step)) {
      return Promise.reject(step);
    }
    return Promise.resolve(step);
  }
}

describe("classifyProviderError", () => {
  it.each([
    [{ status: 401 }, ProviderAuthError, false],
    [{ status: 403 }, ProviderAuthError, false],
    [{ status: 429 }, ProviderRateLimitError, false],
    [{ status: 408 }, ProviderTimeoutError, true],
    [{ status: 500 }, ProviderUnknownError, true],
    [{ status: 400 }, ProviderUnknownError, false],
  ])("classifies %j", (error, type, retryable) => {
    const classified = classifyProviderError("openai", error);
    expect(classified).toBeInstanceOf(type);
    expect(classified.retryable).toBe(retryable);
    expect(classified.provider).toBe("openai");
  });

  it("treats aborts as timeouts", () => {
    const abort = new Error("This operation was aborted");
    abort.name = "AbortError";
    expect(classifyProviderError("ollama", abort)).toBeInstanceOf(ProviderTimeoutError);
  });

  it("retries dropped connections but not unrecognised failures", () => {
    expect(classifyProviderError("ollama", new TypeError("fetch failed")).retryable).toBe(true);
    expect(classifyProviderError("ollama", new Error("socket hang up")).retryable).toBe(true);
    expect(classifyProviderError("ollama", new Error("bad things")).retryable).toBe(false);
  });

  it("uses fixed messages that carry no provider payload", () => {
    const classified = classifyProviderError("openai", {
      status: 401,
      message: "Incorrect API key provided: test-secret",
    });
    expect(classified.message).toBe("Provider authentication failed");
    expect(classified.statusCode).toBe(500);
  });

  it("returns provider errors unchanged", () => {
    const error = new ProviderRateLimitError("gemini");
    expect(classifyProviderError("gemini", error)).toBe(error);
  });
});

describe("ResilientLLMClient", () => {
  const reply: LLMGenerateResponse = {
    content: "Hi there",
    usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
  };

  it("passes successful responses through with an abort signal", async () => {
    const inner = new ScriptedClient([reply]);
    const client = new ResilientLLMClient(inner, { timeoutMs: 1000, maxRetries: 1 }, quietLogger);

    await expect(client.generate(request)).resolves.toEqual(reply);
    expect(inner.calls).toBe(1);
    expect(inner.signals[0]).toBeInstanceOf(AbortSignal);
    expect(client.provider).toBe("scripted");
  });

  it("raises ProviderTimeoutError once retries are spent", async () => {
    const inner = new ScriptedClient(["hang"]);
    const client = new ResilientLLMClient(inner, { timeoutMs: 20, maxRetries: 1 }, quietLogger);

    const error = await client.generate(request).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ProviderTimeoutError);
    expect(error).toHaveProperty("message", "Provider timeout: no response within 20ms");
    expect(inner.calls).toBe(2);
    expect(inner.signals.every((signal) => signal?.aborted === true)).toBe(true);
  });

  it("retries a transient failure once", async () => {
    const inner = new ScriptedClient([{ status: 503 }, reply]);
    const client = new ResilientLLMClient(inner, { timeoutMs: 1000, maxRetries: 1 }, quietLogger);

    await expect(client.generate(request)).resolves.toEqual(reply);
    expect(inner.calls).toBe(2);
  });

  it.each([
    [{ status: 401 }, ProviderAuthError],
    [{ status: 429 }, ProviderRateLimitError],
    [{ status: 400 }, ProviderUnknownError],
  ])("does not retry %j", async (failure, type) => {
    const inner = new ScriptedClient([failure, reply]);
    const client = new ResilientLLMClient(inner, { timeoutMs: 1000, maxRetries: 3 }, quietLogger);

    await expect(client.generate(request)).rejects.toBeInstanceOf(type);
    expect(inner.calls).toBe(1);
  });

  it("makes a single attempt when retries are disabled", async () => {
    const inner = new ScriptedClient([{ status: 502 }, reply]);
    const client = new ResilientLLMClient(inner, { timeoutMs: 1000, maxRetries: 0 }, quietLogger);

    await expect(client.generate(request)).rejects.toThrow("Provider request failed with status 502");
    expect(inner.calls).toBe(1);
  });
});

describe("OllamaClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the system prompt and turns to the chat endpoint", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      new Response(
        JSON.stringify({
          message: { role: "assistant", content: "Hi" },
          done: true,
          prompt_eval_count: 10,
          eval_count: 5,
        }),
        { status: 200 }
      )
    );
    vi.stubGlobal("fetch", fetchMock);

    const client = new OllamaClient("http://localhost:11434/", "llama3");
    const response = await client.generate(request);

    expect(response).toEqual({
      content: "Hi",
      finishReason: "stop",
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const call = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe("http://localhost:11434/api/chat");
    expect(JSON.parse(String(call?.[1]?.body))).toEqual({
      model: "llama3",
      messages: [
        { role: "system", content: "You are agent_alpha, an AI assistant." },
        { role: "user", content: "Hello" },
      ],
      options: { temperature: 0.3, num_predict: 200 },
      stream: false,
    });
  });

  it("classifies error statuses", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("boom", { status: 500 })));
    const client = new OllamaClient();

    const error = await client.generate(request).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ProviderUnknownError);
    expect(error).toHaveProperty("retryable", true);
    expect(error).toHaveProperty("message", "Provider request failed with status 500");
  });

  it("classifies network failures", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );
    const client = new OllamaClient();

    await expect(client.generate(request)).rejects.toHaveProperty("retryable", true);
  });
});

describe("createLLMClient", () => {
  const base = { providerTimeoutMs: 5000, providerMaxRetries: 1 };

  it("wraps the selected provider", () => {
    const client = createLLMClient({ ...base, llmProvider: "ollama" }, quietLogger);
    expect(client).toBeInstanceOf(ResilientLLMClient);
    expect(client.provider).toBe("ollama");
  });

  it("builds an OpenAI client when a key is set", () => {
    const client = createLLMClient({ ...base, llmProvider: "openai", openaiApiKey: "test-secret" }, quietLogger);
    expect(client.provider).toBe("openai");
  });

  it("requires API keys for hosted providers", () => {
    expect(() => createLLMClient({ ...base, llmProvider: "gemini" }, quietLogger)).toThrow(ConfigurationError);
    expect(() => createLLMClient({ ...base, llmProvider: "openai" }, quietLogger)).toThrow(
      "OPENAI_API_KEY is required"
    );
  });
});
