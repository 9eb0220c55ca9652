import type { Server } from "node:http";
import { createApp } from "./api/index.js";
import { describeConfig, loadConfig, loadDotEnv } from "./config/config.js";
import { toError } from "./errors/index.js";
import { createLLMClient } from "./llm/index.js";
import { createLogger, setDefaultLogger } from "./logger/index.js";
import type { AppLogger } from "./logger/index.js";
import { ConversationMemory, InMemoryConversationStore, SqliteConversationStore } from "./memory/index.js";
import type { ConversationStore } from "./memory/index.js";
import { AgentRouter } from "./router/index.js";

// ============================================
// MAIN FUNCTION
// ============================================
let logger: AppLogger | null = null;
let memory: ConversationMemory | null = null;
let server: Server | null = null;
let shuttingDown = false;

/**
 * Stop accepting requests, then release the conversation store and log files.
 */
async function cleanup(): Promise<void> {
  const activeServer = server;
  server = null;
  if (activeServer) {
    await new Promise<void>((resolve, reject) => {
      activeServer.close((error) => (error ? reject(error) : resolve()));
    });
  }
  if (memory) {
    memory.close();
    memory = null;
  }
  if (logger) {
    await logger.close();
  }
}

async function shutdown(signal: string, exitCode: number): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger?.info("Shutting down", { signal });
  try {
    await cleanup();
  } catch (error) {
    console.error("Error during cleanup:", error);
    exitCode = 1;
  }
  process.exit(exitCode);
}

// Register cleanup handlers for graceful shutdown
process.on("unhandledRejection", (reason) => {
  console.error("[Unhandled Rejection]", reason);
  void shutdown("unhandledRejection", 1);
});

process.on("uncaughtException", (error) => {
  console.error("[Uncaught Exception]", error);
  void shutdown("uncaughtException", 1);
});

process.on("SIGINT", () => {
  void shutdown("SIGINT", 0);
});

process.on("SIGTERM", () => {
  void shutdown("SIGTERM", 0);
});

/**
 * Application entry point: wire logger, store, provider and router, then serve HTTP.
 */
async function main(): Promise<void> {
  loadDotEnv();
  const config = loadConfig();

  // ============================================
  // INITIALIZE LOGGER
  // ============================================
  logger = createLogger({
    logDir: config.logDir,
    level: config.logLevel,
    enableConsole: true,
    enableFile: true,
  });
  await logger.initialize();
  setDefaultLogger(logger);

  logger.info("Application starting", describeConfig(config));

  // ============================================
  // INITIALIZE CONVERSATION MEMORY
  // ============================================
  let store: ConversationStore;
  if (config.conversationDb) {
    store = new SqliteConversationStore(config.conversationDb);
    logger.info("Conversation store opened", { path: config.conversationDb });
  } else {
    store = new InMemoryConversationStore();
  }
  memory = new ConversationMemory({ retention: config.historyRetention, store });

  // ============================================
  // INITIALIZE ROUTER
  // ============================================
  const router = new AgentRouter({
    agents: config.agents,
    memory,
    llmClient: createLLMClient(config, logger.child({ component: "llm" })),
    settings: {
      historyWindow: config.historyWindow,
      maxMessageLength: config.maxMessageLength,
      maxOutputTokens: config.maxOutputTokens,
      logMessageContent: config.logMessageContent,
    },
    logger: logger.child({ component: "router" }),
  });
  router.initialize();

  // ============================================
  // START HTTP SERVER
  // ============================================
  const app = createApp(router, { logger });
  const activeLogger = logger;
  server = app.listen(config.port, () => {
    activeLogger.info("Server listening", { port: config.port, provider: router.provider });
  });
}

// ============================================
// ENTRY POINT
// ============================================
main().catch((error: unknown) => {
  console.error("\n[FATAL] Failed to start:");
  console.error(error);
  logger?.error("Fatal error during startup", toError(error));
  void shutdown("startup", 1);
});
