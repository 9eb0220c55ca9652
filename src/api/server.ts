import express from "express";
import type { NextFunction, Request, Response } from "express";
import cors from "cors";
import { z } from "zod";
import { BadRequestError, NotFoundError, isAppError, toError } from "../errors/app-error.js";
import { getDefaultLogger } from "../logger/index.js";
import type { Logger } from "../logger/index.js";
import { failureEnvelope, statusForError } from "../router/envelope.js";
import type { AgentRouter } from "../router/agent-router.js";
import type { ConversationSummary, ConversationTurn } from "../memory/types.js";

export interface AppOptions {
  logger?: Logger;
  serviceName?: string;
  version?: string;
  bodyLimit?: string;
}

// Field checks beyond type are left to the router so its messages reach the client.
export const chatRequestSchema = z.object({
  user_id: z.string({ required_error: "user_id is required", invalid_type_error: "user_id must be a string" }),
  message: z.string({ required_error: "message is required", invalid_type_error: "message must be a string" }),
  context: z.record(z.unknown()).optional(),
});

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(0).optional(),
});

function serializeTurn(turn: ConversationTurn): Record<string, unknown> {
  return {
    role: turn.role,
    content: turn.content,
    timestamp: turn.timestamp.toISOString(),
    ...(turn.tokensUsed !== undefined ? { tokens_used: turn.tokensUsed } : {}),
  };
}

function serializeSummary(summary: ConversationSummary): Record<string, unknown> {
  return {
    agent_id: summary.agentId,
    user_id: summary.userId,
    message_count: summary.messageCount,
    conversation_started: summary.conversationStarted?.toISOString() ?? null,
    last_interaction: summary.lastInteraction?.toISOString() ?? null,
  };
}

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  return issue ? issue.message : "Invalid request body";
}

function isBodyParseError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    error.type === "entity.parse.failed"
  );
}

// ============================================
// APP FACTORY
// ============================================

/**
 * Build the HTTP surface over an initialized (or initializing) router.
 */
export function createApp(router: AgentRouter, options: AppOptions = {}): express.Express {
  const logger = (options.logger ?? getDefaultLogger()).child({ component: "http" });
  const serviceName = options.serviceName ?? "agent-desk";
  const version = options.version ?? "1.0.0";

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: options.bodyLimit ?? "1mb" }));

  // Request logging
  app.use((req, res, next) => {
    const started = Date.now();
    res.on("finish", () => {
      logger.debug(`Request: ${req.method} ${req.originalUrl}`, {
        status: res.statusCode,
        durationMs: Date.now() - started,
      });
    });
    next();
  });

  // ============================================
  // SERVICE
  // ============================================

  app.get("/", (_req, res) => {
    res.json({
      service: serviceName,
      version,
      status: router.isReady() ? "running" : "starting",
      provider: router.provider,
      endpoints: {
        health: "GET /health",
        agents: "GET /agents",
        agent: "GET /agents/:agentId",
        chat: "POST /agents/:agentId/chat",
        conversation: "GET /agents/:agentId/conversations/:userId",
        clearConversation: "DELETE /agents/:agentId/conversations/:userId",
        userConversations: "GET /users/:userId/conversations",
        stats: "GET /system/stats",
      },
    });
  });

  app.get("/health", (_req, res) => {
    const ready = router.isReady();
    res.status(ready ? 200 : 503).json({
      status: ready ? "healthy" : "unavailable",
      agents: ready ? router.activeAgentIds().length : 0,
      timestamp: new Date().toISOString(),
    });
  });

  // ============================================
  // AGENTS
  // ============================================

  app.get("/agents", (_req, res, next) => {
    try {
      const agents = router.listAgents();
      res.json({ agents, total: agents.length });
    } catch (error) {
      next(error);
    }
  });

  app.get("/agents/:agentId", (req, res, next) => {
    try {
      res.json(router.getAgent(req.params.agentId));
    } catch (error) {
      next(error);
    }
  });

  app.post("/agents/:agentId/chat", async (req, res) => {
    const agentId = req.params.agentId;
    const parsed = chatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const error = new BadRequestError(firstIssue(parsed.error));
      res.status(400).json(failureEnvelope(error, { agentId }));
      return;
    }

    const request = {
      user_id: parsed.data.user_id,
      message: parsed.data.message,
      ...(parsed.data.context ? { context: parsed.data.context } : {}),
    };
    try {
      const result = await router.process(agentId, request);
      res.json(result);
    } catch (error) {
      res
        .status(statusForError(error))
        .json(failureEnvelope(error, { agentId, userId: request.user_id }));
    }
  });

  // ============================================
  // CONVERSATIONS
  // ============================================

  app.get("/agents/:agentId/conversations/:userId", (req, res, next) => {
    try {
      const query = historyQuerySchema.safeParse(req.query);
      if (!query.success) {
        throw new BadRequestError("limit must be a non-negative integer");
      }
      const { agentId, userId } = req.params;
      const { summary, turns } = router.conversation(agentId, userId, query.data.limit);
      res.json({ ...serializeSummary(summary), turns: turns.map(serializeTurn) });
    } catch (error) {
      next(error);
    }
  });

  app.delete("/agents/:agentId/conversations/:userId", async (req, res, next) => {
    try {
      const { agentId, userId } = req.params;
      const cleared = await router.clearConversation(agentId, userId);
      res.json({ success: true, agent_id: agentId, user_id: userId, cleared });
    } catch (error) {
      next(error);
    }
  });

  app.get("/users/:userId/conversations", (req, res, next) => {
    try {
      const userId = req.params.userId;
      const conversations = router.userConversations(userId).map(serializeSummary);
      res.json({ user_id: userId, conversations, total: conversations.length });
    } catch (error) {
      next(error);
    }
  });

  // ============================================
  // SYSTEM
  // ============================================

  app.get("/system/stats", (_req, res, next) => {
    try {
      res.json({
        ...router.stats(),
        provider: router.provider,
        capabilities: router.capabilities(),
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      next(error);
    }
  });

  app.use((req, res) => {
    const error = new NotFoundError(`Route ${req.method} ${req.path} not found`);
    res.status(404).json(failureEnvelope(error, {}));
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(error)) {
      res.status(400).json(failureEnvelope(new BadRequestError("Invalid JSON body"), {}));
      return;
    }

    const status = statusForError(error);
    if (!isAppError(error) || status >= 500) {
      logger.error(`Error in ${req.method} ${req.originalUrl}`, toError(error));
    }
    res.status(status).json(failureEnvelope(error, {}));
  });

  return app;
}
