import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { InvalidInputError } from "../src/errors/index.js";
import {
  ConversationMemory,
  InMemoryConversationStore,
  SqliteConversationStore,
} from "../src/memory/index.js";
import type { ConversationStore } from "../src/memory/index.js";

const storeFactories: Array<[string, () => ConversationStore]> = [
  ["in-memory store", () => new InMemoryConversationStore()],
  ["sqlite store", () => new SqliteConversationStore(":memory:")],
];

describe.each(storeFactories)("ConversationMemory with %s", (_name, createStore) => {
  let memory: ConversationMemory;
  let clock: number;

  beforeEach(() => {
    clock = Date.parse("2024-05-01T12:00:00.000Z");
    memory = new ConversationMemory({
      retention: 20,
      store: createStore(),
      now: () => new Date(clock++),
    });
  });

  afterEach(() => {
    memory.close();
  });

  it("returns an empty list for unknown conversations", () => {
    expect(memory.recent("agent_alpha", "nobody", 10)).toEqual([]);
  });

  it("keeps only the most recent turns past retention", () => {
    for (let i = 1; i <= 25; i++) {
      memory.append("agent_alpha", "user_1", i % 2 === 1 ? "user" : "agent", `turn ${i}`);
    }

    const turns = memory.recent("agent_alpha", "user_1", 20);
    expect(turns).toHaveLength(20);
    expect(turns[0]?.content).toBe("turn 6");
    expect(turns[19]?.content).toBe("turn 25");
  });

  it("returns the window oldest first", () => {
    for (let i = 1; i <= 8; i++) {
      memory.append("agent_alpha", "user_1", "user", `turn ${i}`);
    }
    expect(memory.recent("agent_alpha", "user_1", 5).map((turn) => turn.content)).toEqual([
      "turn 4",
      "turn 5",
      "turn 6",
      "turn 7",
      "turn 8",
    ]);
  });

  it("caps the window at retention and treats non-positive limits as empty", () => {
    for (let i = 1; i <= 22; i++) {
      memory.append("agent_alpha", "user_1", "user", `turn ${i}`);
    }
    expect(memory.recent("agent_alpha", "user_1", 100)).toHaveLength(20);
    expect(memory.recent("agent_alpha", "user_1", 0)).toEqual([]);
    expect(memory.recent("agent_alpha", "user_1", -3)).toEqual([]);
  });

  it("does not change state on read", () => {
    memory.append("agent_alpha", "user_1", "user", "hello");
    memory.append("agent_alpha", "user_1", "agent", "hi there", 42);

    const first = memory.recent("agent_alpha", "user_1", 10);
    const second = memory.recent("agent_alpha", "user_1", 10);
    expect(second).toEqual(first);
    expect(first[1]).toEqual({
      role: "agent",
      content: "hi there",
      timestamp: new Date(Date.parse("2024-05-01T12:00:00.001Z")),
      tokensUsed: 42,
    });
  });

  it("isolates conversations by agent and user", () => {
    memory.append("agent_alpha", "user_1", "user", "alpha one");
    memory.append("agent_beta", "user_1", "user", "beta one");
    memory.append("agent_alpha", "user_2", "user", "alpha two");

    expect(memory.recent("agent_alpha", "user_1", 10).map((turn) => turn.content)).toEqual(["alpha one"]);
    expect(memory.recent("agent_beta", "user_1", 10).map((turn) => turn.content)).toEqual(["beta one"]);
    expect(memory.recent("agent_alpha", "user_2", 10).map((turn) => turn.content)).toEqual(["alpha two"]);
  });

  it("clears one conversation only", () => {
    memory.append("agent_alpha", "user_1", "user", "hello");
    memory.append("agent_alpha", "user_2", "user", "hello");

    expect(memory.clear("agent_alpha", "user_1")).toBe(true);
    expect(memory.clear("agent_alpha", "user_1")).toBe(false);
    expect(memory.recent("agent_alpha", "user_1", 10)).toEqual([]);
    expect(memory.recent("agent_alpha", "user_2", 10)).toHaveLength(1);
  });

  it("rejects empty content without writing", () => {
    expect(() => memory.append("agent_alpha", "user_1", "user", "  ")).toThrow("Turn content cannot be empty");
    expect(() => memory.append("agent_alpha", "user_1", "agent", "")).toThrow(InvalidInputError);
    expect(memory.recent("agent_alpha", "user_1", 10)).toEqual([]);
  });

  it("summarizes a conversation", () => {
    memory.append("agent_alpha", "user_1", "user", "hello");
    memory.append("agent_alpha", "user_1", "agent", "hi");

    expect(memory.summary("agent_alpha", "user_1")).toEqual({
      agentId: "agent_alpha",
      userId: "user_1",
      messageCount: 2,
      conversationStarted: new Date(Date.parse("2024-05-01T12:00:00.000Z")),
      lastInteraction: new Date(Date.parse("2024-05-01T12:00:00.001Z")),
    });
    expect(memory.summary("agent_alpha", "user_9")).toEqual({
      agentId: "agent_alpha",
      userId: "user_9",
      messageCount: 0,
    });
  });

  it("reports stats and lists conversations", () => {
    memory.append("agent_alpha", "user_1", "user", "a");
    memory.append("agent_alpha", "user_1", "agent", "b");
    memory.append("agent_beta", "user_1", "user", "c");
    memory.append("agent_beta", "user_2", "user", "d");

    expect(memory.stats()).toEqual({ totalConversations: 3, activeUsers: 2, totalTurns: 4 });
    expect(memory.conversations({ agentId: "agent_beta" })).toEqual([
      { agentId: "agent_beta", userId: "user_1" },
      { agentId: "agent_beta", userId: "user_2" },
    ]);
    expect(memory.conversations({ userId: "user_1" })).toEqual([
      { agentId: "agent_alpha", userId: "user_1" },
      { agentId: "agent_beta", userId: "user_1" },
    ]);
  });
});

describe("ConversationMemory options", () => {
  it("defaults retention to 20", () => {
    expect(new ConversationMemory().retention).toBe(20);
  });

  it("rejects invalid retention", () => {
    expect(() => new ConversationMemory({ retention: 0 })).toThrow(RangeError);
    expect(() => new ConversationMemory({ retention: 2.5 })).toThrow(RangeError);
  });
});
