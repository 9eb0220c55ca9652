import { AgentNotFoundError, isAppError } from "../errors/app-error.js";
import type { ChatFailureResponse } from "./types.js";

export const INTERNAL_ERROR_MESSAGE = "Internal error while processing message";

/**
 * HTTP-equivalent status for anything the chat pipeline throws.
 */
export function statusForError(error: unknown): number {
  return isAppError(error) ? error.statusCode : 500;
}

/**
 * Failure envelope for callers. Only AppError messages are surfaced; anything
 * else is reported with a generic message.
 */
export function failureEnvelope(
  error: unknown,
  ids: { agentId?: string; userId?: string },
  timestamp: Date = new Date()
): ChatFailureResponse {
  const envelope: ChatFailureResponse = {
    success: false,
    error: isAppError(error) ? error.message : INTERNAL_ERROR_MESSAGE,
    timestamp: timestamp.toISOString(),
  };

  if (ids.agentId) envelope.agent_id = ids.agentId;
  if (ids.userId) envelope.user_id = ids.userId;
  if (error instanceof AgentNotFoundError) {
    envelope.available_agents = [...error.availableAgents];
  }

  return envelope;
}
