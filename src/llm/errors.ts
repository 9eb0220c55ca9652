import { AppError } from "../errors/app-error.js";
import type { ErrorCode } from "../errors/app-error.js";

// ============================================
// PROVIDER ERRORS
// ============================================

export type ProviderErrorKind = "auth" | "rate_limit" | "timeout" | "unknown";

/**
 * Failure of an LLM provider call. Messages are fixed per kind so that
 * provider payloads and credentials never reach callers.
 */
export abstract class ProviderError extends AppError {
  abstract readonly kind: ProviderErrorKind;
  readonly provider: string;
  readonly retryable: boolean;
  readonly status: number | undefined;

  constructor(
    message: string,
    code: ErrorCode,
    options: { provider: string; retryable: boolean; status?: number; cause?: unknown }
  ) {
    super(message, code, 500, {
      provider: options.provider,
      ...(options.status !== undefined ? { status: options.status } : {}),
    });
    this.provider = options.provider;
    this.retryable = options.retryable;
    this.status = options.status;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class ProviderAuthError extends ProviderError {
  readonly kind = "auth";

  constructor(provider: string, status?: number, cause?: unknown) {
    super("Provider authentication failed", "PROVIDER_AUTH", {
      provider,
      retryable: false,
      ...(status !== undefined ? { status } : {}),
      cause,
    });
  }
}

export class ProviderRateLimitError extends ProviderError {
  readonly kind = "rate_limit";

  constructor(provider: string, cause?: unknown) {
    super("Provider rate limit exceeded, try again later", "PROVIDER_RATE_LIMIT", {
      provider,
      retryable: false,
      status: 429,
      cause,
    });
  }
}

export class ProviderTimeoutError extends ProviderError {
  readonly kind = "timeout";
  readonly timeoutMs: number | undefined;

  constructor(provider: string, timeoutMs?: number, cause?: unknown) {
    super(
      timeoutMs !== undefined
        ? `Provider timeout: no response within ${timeoutMs}ms`
        : "Provider timeout: no response received",
      "PROVIDER_TIMEOUT",
      { provider, retryable: true, cause }
    );
    this.timeoutMs = timeoutMs;
  }
}

export class ProviderUnknownError extends ProviderError {
  readonly kind = "unknown";

  constructor(
    provider: string,
    options: { retryable: boolean; status?: number; cause?: unknown }
  ) {
    super(
      options.status !== undefined
        ? `Provider request failed with status ${options.status}`
        : "Provider request failed",
      "PROVIDER_UNKNOWN",
      { provider, ...options }
    );
  }
}

// ============================================
// CLASSIFICATION
// ============================================

function readStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("status" in error && typeof error.status === "number") return error.status;
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  return undefined;
}

function readName(error: unknown): string {
  return error instanceof Error ? error.name : "";
}

function readMessage(error: unknown): string {
  return error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
}

const CONNECTION_HINTS = ["econnrefused", "econnreset", "enotfound", "fetch failed", "socket hang up", "network"];

/**
 * Map any error thrown by a provider SDK or fetch call onto the ProviderError family.
 * 4xx statuses are never retryable; 5xx, timeouts and dropped connections are.
 */
export function classifyProviderError(provider: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;

  const status = readStatus(error);
  const name = readName(error);
  const message = readMessage(error);

  if (status === 401 || status === 403) {
    return new ProviderAuthError(provider, status, error);
  }
  if (status === 429) {
    return new ProviderRateLimitError(provider, error);
  }
  if (
    status === 408 ||
    status === 504 ||
    name === "AbortError" ||
    name === "TimeoutError" ||
    name === "APIConnectionTimeoutError" ||
    message.includes("timeout") ||
    message.includes("timed out")
  ) {
    return new ProviderTimeoutError(provider, undefined, error);
  }
  if (status !== undefined) {
    return new ProviderUnknownError(provider, { retryable: status >= 500, status, cause: error });
  }
  if (name === "APIConnectionError" || CONNECTION_HINTS.some((hint) => message.includes(hint))) {
    return new ProviderUnknownError(provider, { retryable: true, cause: error });
  }
  return new ProviderUnknownError(provider, { retryable: false, cause: error });
}
