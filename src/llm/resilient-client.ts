import { getDefaultLogger } from "../logger/index.js";
import type { Logger } from "../logger/index.js";
import { classifyProviderError, ProviderTimeoutError } from "./errors.js";
import type { LLMClient, LLMGenerateOptions, LLMGenerateResponse } from "./types.js";

// ============================================
// CALL POLICY
// ============================================
export interface CallPolicy {
  timeoutMs: number;
  maxRetries: number; // Extra attempts after the first, only for retryable errors
}

export const DEFAULT_CALL_POLICY: CallPolicy = {
  timeoutMs: 30000,
  maxRetries: 1,
};

/**
 * Wraps a provider client with a per-attempt timeout and a bounded retry.
 * Non-retryable failures (auth, rate limit, other 4xx) are raised on the first attempt.
 */
export class ResilientLLMClient implements LLMClient {
  readonly provider: string;
  private inner: LLMClient;
  private policy: CallPolicy;
  private logger: Logger;

  constructor(inner: LLMClient, policy: Partial<CallPolicy> = {}, logger?: Logger) {
    this.inner = inner;
    this.provider = inner.provider;
    this.policy = { ...DEFAULT_CALL_POLICY, ...policy };
    this.logger = logger ?? getDefaultLogger();
  }

  async generate(options: LLMGenerateOptions): Promise<LLMGenerateResponse> {
    let attempt = 0;

    for (;;) {
      try {
        return await this.attempt(options);
      } catch (error) {
        const providerError = classifyProviderError(this.provider, error);
        if (!providerError.retryable || attempt >= this.policy.maxRetries) {
          throw providerError;
        }
        attempt++;
        this.logger.warn("Retrying provider call after transient failure", {
          provider: this.provider,
          attempt,
          errorKind: providerError.kind,
        });
      }
    }
  }

  private attempt(options: LLMGenerateOptions): Promise<LLMGenerateResponse> {
    const controller = new AbortController();
    const outerSignal = options.signal;
    const onOuterAbort = (): void => controller.abort();
    outerSignal?.addEventListener("abort", onOuterAbort, { once: true });

    return new Promise<LLMGenerateResponse>((resolve, reject) => {
      const timer = setTimeout(() => {
        controller.abort();
        reject(new ProviderTimeoutError(this.provider, this.policy.timeoutMs));
      }, this.policy.timeoutMs);

      const settle = (): void => {
        clearTimeout(timer);
        outerSignal?.removeEventListener("abort", onOuterAbort);
      };

      this.inner.generate({ ...options, signal: controller.signal }).then(
        (response) => {
          settle();
          resolve(response);
        },
        (error: unknown) => {
          settle();
          reject(error);
        }
      );
    });
  }
}
