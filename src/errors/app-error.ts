// ============================================
// APPLICATION ERRORS
// ============================================

export type ErrorCode =
  | "BAD_REQUEST"
  | "NOT_FOUND"
  | "AGENT_NOT_FOUND"
  | "SYSTEM_NOT_READY"
  | "CONFIGURATION_ERROR"
  | "PROVIDER_AUTH"
  | "PROVIDER_RATE_LIMIT"
  | "PROVIDER_TIMEOUT"
  | "PROVIDER_UNKNOWN"
  | "INTERNAL_ERROR";

export interface SerializedError {
  errorType: string;
  code: ErrorCode;
  message: string;
  details: Record<string, unknown>;
}

/**
 * Base class for every error the service raises on purpose.
 * `statusCode` is the HTTP-equivalent status used by the API layer.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    statusCode: number,
    details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }

  toJSON(): SerializedError {
    return {
      errorType: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, "BAD_REQUEST", 400, details);
  }
}

/**
 * Raised by the prompt composer and conversation memory for malformed input.
 * Same 400 surface as BadRequestError.
 */
export class InvalidInputError extends BadRequestError {}

export class NotFoundError extends AppError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, "NOT_FOUND", 404, details);
  }
}

export class AgentNotFoundError extends AppError {
  readonly availableAgents: string[];

  constructor(agentId: string, availableAgents: string[]) {
    super(`Agent ${agentId} not found`, "AGENT_NOT_FOUND", 404, {
      agentId,
      availableAgents,
    });
    this.availableAgents = availableAgents;
  }
}

export class SystemNotReadyError extends AppError {
  constructor(message: string = "Agent system not initialized") {
    super(message, "SYSTEM_NOT_READY", 503);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, "CONFIGURATION_ERROR", 500, details);
  }
}

// ============================================
// HELPERS
// ============================================

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Normalise anything thrown into an Error instance for logging.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
