import { resolveAgent } from "../agents/agent-builder.js";
import { BusinessRuleRegistry } from "../agents/business-rules/index.js";
import { PersonalityRegistry } from "../agents/personalities/index.js";
import { composePrompt, DEFAULT_MAX_MESSAGE_LENGTH, validateUserMessage } from "../agents/prompt-builder.js";
import type { AgentDefinition, ResolvedAgent } from "../agents/types.js";
import {
  AgentNotFoundError,
  BadRequestError,
  ConfigurationError,
  SystemNotReadyError,
  isAppError,
  toError,
} from "../errors/app-error.js";
import { ProviderError, ProviderUnknownError } from "../llm/errors.js";
import type { LLMClient } from "../llm/types.js";
import { getDefaultLogger } from "../logger/index.js";
import type { Logger } from "../logger/index.js";
import type { ConversationMemory } from "../memory/conversation-memory.js";
import { conversationKeyId } from "../memory/in-memory-store.js";
import type { ConversationSummary, ConversationTurn, MemoryStats } from "../memory/types.js";
import { RequestMetrics } from "../metrics/index.js";
import type { RequestMetricsSnapshot } from "../metrics/index.js";
import { failureEnvelope } from "./envelope.js";
import { KeyedLock } from "./keyed-lock.js";
import type {
  AgentInfo,
  ChatRequest,
  ChatResponse,
  ChatSuccessResponse,
  RequestState,
  RouterSettings,
} from "./types.js";

export const DEFAULT_ROUTER_SETTINGS: RouterSettings = {
  historyWindow: 10,
  maxMessageLength: DEFAULT_MAX_MESSAGE_LENGTH,
  maxOutputTokens: 1000,
  logMessageContent: false,
};

export interface AgentRouterDependencies {
  agents: readonly AgentDefinition[];
  memory: ConversationMemory;
  llmClient: LLMClient;
  personalities?: PersonalityRegistry;
  businessRules?: BusinessRuleRegistry;
  settings?: Partial<RouterSettings>;
  logger?: Logger;
  metrics?: RequestMetrics;
  now?: () => Date;
}

export interface RouterCapabilities {
  personality_types: string[];
  business_domains: string[];
  supported_features: string[];
}

export type RouterStats = MemoryStats & {
  agents: number;
  activeAgents: number;
  requests: RequestMetricsSnapshot;
};

const SUPPORTED_FEATURES = [
  "Real-time chat",
  "Context-aware responses",
  "Personality-based behavior",
  "Business domain expertise",
  "Conversation memory",
];

function errorKind(error: unknown): string {
  if (error instanceof ProviderError) return error.kind;
  return isAppError(error) ? error.code : "INTERNAL_ERROR";
}

function preview(message: string): string {
  return message.length > 100 ? `${message.slice(0, 100)}...` : message;
}

// ============================================
// AGENT ROUTER
// ============================================
export class AgentRouter {
  private definitions: readonly AgentDefinition[];
  private personalities: PersonalityRegistry;
  private businessRules: BusinessRuleRegistry;
  private memory: ConversationMemory;
  private llmClient: LLMClient;
  private settings: RouterSettings;
  private logger: Logger;
  private metrics: RequestMetrics;
  private now: () => Date;
  private agents = new Map<string, ResolvedAgent>();
  private lock = new KeyedLock();
  private ready: boolean = false;

  constructor(deps: AgentRouterDependencies) {
    this.definitions = deps.agents;
    this.personalities = deps.personalities ?? new PersonalityRegistry();
    this.businessRules = deps.businessRules ?? new BusinessRuleRegistry();
    this.memory = deps.memory;
    this.llmClient = deps.llmClient;
    this.settings = { ...DEFAULT_ROUTER_SETTINGS, ...deps.settings };
    this.logger = deps.logger ?? getDefaultLogger();
    this.metrics = deps.metrics ?? new RequestMetrics();
    this.now = deps.now ?? (() => new Date());
  }

  // ============================================
  // LIFECYCLE
  // ============================================

  /**
   * Resolve every agent definition against the registries. Until this succeeds,
   * chat requests fail with SystemNotReadyError.
   */
  initialize(): void {
    if (this.ready) return;

    const resolved = new Map<string, ResolvedAgent>();
    for (const definition of this.definitions) {
      if (resolved.has(definition.agentId)) {
        throw new ConfigurationError(`Duplicate agent id: ${definition.agentId}`);
      }
      resolved.set(definition.agentId, resolveAgent(definition, this.personalities, this.businessRules));
      this.logger.info("Created agent", {
        agentId: definition.agentId,
        personality: definition.personalityKey,
        businessDomain: definition.domainKey,
        status: definition.status,
      });
    }

    this.agents = resolved;
    this.ready = true;
    this.logger.info("Agent router initialized", {
      agents: resolved.size,
      provider: this.llmClient.provider,
      historyWindow: this.settings.historyWindow,
      retention: this.memory.retention,
    });
  }

  isReady(): boolean {
    return this.ready;
  }

  get provider(): string {
    return this.llmClient.provider;
  }

  // ============================================
  // CHAT PIPELINE
  // ============================================

  /**
   * Run one chat request and return an envelope. Never throws.
   */
  async chat(agentId: string, request: ChatRequest): Promise<ChatResponse> {
    try {
      return await this.process(agentId, request);
    } catch (error) {
      return failureEnvelope(error, { agentId, userId: request.user_id }, this.now());
    }
  }

  /**
   * Run one chat request, throwing typed errors on failure. Turns are appended
   * only after the provider has answered, user turn first.
   */
  async process(agentId: string, request: ChatRequest): Promise<ChatSuccessResponse> {
    const log = this.logger.child({ agentId, userId: request.user_id });
    const elapsed = this.metrics.startTimer();
    let state: RequestState = "received";
    const transition = (next: RequestState): void => {
      state = next;
      log.debug("Chat request state changed", { state });
    };

    if (this.settings.logMessageContent) {
      log.debug("Chat request received", { message: preview(request.message) });
    }

    try {
      const agent = this.validate(agentId, request);
      transition("validated");

      const userId = request.user_id;
      return await this.lock.run(conversationKeyId({ agentId, userId }), async () => {
        const history = this.memory.recent(agentId, userId, this.settings.historyWindow);
        const completion = composePrompt({
          agentId,
          personality: agent.personality,
          businessRules: agent.businessRules,
          history,
          userMessage: request.message,
          maxOutputTokens: this.settings.maxOutputTokens,
          maxMessageLength: this.settings.maxMessageLength,
          insights: agent.businessRules.evaluate(request.message),
          ...(request.context ? { context: request.context } : {}),
        });
        transition("composed");

        transition("dispatched");
        const result = await this.llmClient.generate({
          systemPrompt: completion.systemPrompt,
          messages: completion.messages,
          temperature: completion.temperature,
          maxTokens: completion.maxTokens,
        });
        if (result.content.trim().length === 0) {
          throw new ProviderUnknownError(this.llmClient.provider, { retryable: false });
        }

        const tokensUsed = result.usage?.totalTokens;
        this.memory.append(agentId, userId, "user", request.message);
        this.memory.append(agentId, userId, "agent", result.content, tokensUsed);
        transition("completed");
        this.metrics.record({ agentId, success: true, durationMs: elapsed() });

        log.info("Chat request completed", {
          personality: agent.personality.key,
          businessDomain: agent.businessRules.key,
          historyTurns: history.length,
          tokensUsed: tokensUsed ?? 0,
        });

        return {
          success: true,
          agent_id: agentId,
          user_id: userId,
          response: result.content,
          personality: agent.personality.key,
          business_domain: agent.businessRules.key,
          timestamp: this.now().toISOString(),
          tokens_used: tokensUsed ?? 0,
        };
      });
    } catch (error) {
      const failedAfter = state;
      transition("failed");
      this.metrics.record({
        ...(this.agents.has(agentId) ? { agentId } : {}),
        success: false,
        durationMs: elapsed(),
        errorKind: errorKind(error),
      });
      this.logFailure(log, error, failedAfter);
      throw error;
    }
  }

  private validate(agentId: string, request: ChatRequest): ResolvedAgent {
    if (!this.ready) {
      throw new SystemNotReadyError();
    }

    const agent = this.agents.get(agentId);
    if (!agent || agent.definition.status !== "active") {
      throw new AgentNotFoundError(agentId, this.activeAgentIds());
    }
    if (typeof request.user_id !== "string" || request.user_id.trim().length === 0) {
      throw new BadRequestError("User id cannot be empty");
    }
    if (typeof request.message !== "string") {
      throw new BadRequestError("Message must be a string");
    }
    validateUserMessage(request.message, this.settings.maxMessageLength);

    return agent;
  }

  private logFailure(log: Logger, error: unknown, failedAfter: RequestState): void {
    if (error instanceof ProviderError) {
      log.error("Provider call failed", toError(error), {
        errorKind: error.kind,
        provider: error.provider,
        ...(error.status !== undefined ? { status: error.status } : {}),
        failedAfter,
      });
    } else if (isAppError(error) && error.statusCode < 500) {
      log.warn("Chat request rejected", { errorKind: error.code, error: error.toJSON(), failedAfter });
    } else {
      log.error("Chat request failed", toError(error), {
        errorKind: errorKind(error),
        ...(isAppError(error) ? { error: error.toJSON() } : {}),
        failedAfter,
      });
    }
  }

  // ============================================
  // AGENT DIRECTORY
  // ============================================

  activeAgentIds(): string[] {
    return [...this.agents.values()]
      .filter((agent) => agent.definition.status === "active")
      .map((agent) => agent.definition.agentId);
  }

  listAgents(): AgentInfo[] {
    this.assertReady();
    return [...this.agents.values()].map((agent) => this.describe(agent));
  }

  getAgent(agentId: string): AgentInfo {
    this.assertReady();
    const agent = this.agents.get(agentId);
    if (!agent) {
      throw new AgentNotFoundError(agentId, this.activeAgentIds());
    }
    return this.describe(agent);
  }

  private describe(agent: ResolvedAgent): AgentInfo {
    return {
      agent_id: agent.definition.agentId,
      personality: agent.personality.key,
      business_domain: agent.businessRules.key,
      status: agent.definition.status,
      traits: [...agent.personality.traits],
      tone: agent.personality.tone,
      specializations: [...agent.businessRules.specializations],
      example_use_cases: [...agent.businessRules.exampleUseCases],
      processing_notification: agent.personality.processingNotification,
    };
  }

  // ============================================
  // CONVERSATION ADMINISTRATION
  // ============================================

  conversation(
    agentId: string,
    userId: string,
    limit: number = this.settings.historyWindow
  ): { summary: ConversationSummary; turns: ConversationTurn[] } {
    this.getAgent(agentId);
    return {
      summary: this.memory.summary(agentId, userId),
      turns: this.memory.recent(agentId, userId, limit),
    };
  }

  /**
   * Clear a conversation. Waits for any in-flight request on the same key.
   */
  async clearConversation(agentId: string, userId: string): Promise<boolean> {
    this.getAgent(agentId);
    return this.lock.run(conversationKeyId({ agentId, userId }), async () => {
      const cleared = this.memory.clear(agentId, userId);
      if (cleared) {
        this.logger.info("Cleared conversation history", { agentId, userId });
      }
      return cleared;
    });
  }

  /**
   * Summaries of every conversation a user has, across agents.
   */
  userConversations(userId: string): ConversationSummary[] {
    this.assertReady();
    return this.memory
      .conversations({ userId })
      .map((key) => this.memory.summary(key.agentId, key.userId));
  }

  stats(): RouterStats {
    this.assertReady();
    return {
      agents: this.agents.size,
      activeAgents: this.activeAgentIds().length,
      ...this.memory.stats(),
      requests: this.metrics.snapshot(),
    };
  }

  capabilities(): RouterCapabilities {
    return {
      personality_types: this.personalities.keys(),
      business_domains: this.businessRules.keys(),
      supported_features: [...SUPPORTED_FEATURES],
    };
  }

  private assertReady(): void {
    if (!this.ready) {
      throw new SystemNotReadyError();
    }
  }
}
