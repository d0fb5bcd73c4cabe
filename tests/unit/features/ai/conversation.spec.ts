// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/conversation`
 * Purpose: Verifies runtime assembly: servers opened up front, a tool round-trip through the assembled loop, and close.
 * Scope: openConversation over a scripted LLM and port-level fake connections.
 * Side-effects: none
 * Links: src/features/ai/conversation.ts
 * @public
 */

import {
  collectEvents,
  createConversation,
  createToolCall,
  createToolServer,
  createUserMessage,
  FakeClock,
  FakeConnection,
  ScriptedLlmService,
  TEST_MODEL,
  textResult,
  textSteps,
  tool,
} from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import { InMemoryPersistenceAdapter } from "@/adapters/server";
import { type AgentDeps, openConversation } from "@/features/ai/public";
import { makeNoopLogger } from "@/shared/observability";

function createDeps(llm: ScriptedLlmService, connections: FakeConnection[]): AgentDeps {
  const byId = new Map(connections.map((connection) => [connection.serverId, connection]));
  return {
    llm,
    clock: new FakeClock(),
    persistence: new InMemoryPersistenceAdapter(),
    createConnection: ({ server }) => {
      const connection = byId.get(server.id);
      if (!connection) throw new Error(`No fake connection for ${server.id}`);
      return connection;
    },
    log: makeNoopLogger(),
    defaultModel: TEST_MODEL,
    systemPrompt: "Be helpful",
    maxIterations: 5,
    samplingMaxIterations: 3,
    toolCallTimeoutMs: 5_000,
  };
}

describe("openConversation", () => {
  it("connects enabled servers and runs a tool round-trip", async () => {
    // Arrange
    const research = new FakeConnection("research", "Research", [tool("search")]);
    research.onCall = async () => textResult("3 results");
    const archive = new FakeConnection("archive", "Archive", [tool("lookup")]);
    const llm = new ScriptedLlmService([
      { toolCalls: [createToolCall("call_1", "search", { q: "relay" })] },
      { steps: textSteps("Found 3") },
    ]);
    const conversation = createConversation([createUserMessage("Search relay")], [
      "research",
      "archive",
    ]);

    // Act
    const runtime = await openConversation(createDeps(llm, [research, archive]), conversation, [
      createToolServer("research"),
      createToolServer("archive", { enabled: false }),
    ]);
    const handle = runtime.loop.run(conversation);
    await collectEvents(handle.events);
    const outcome = await handle.done;

    // Assert
    expect(runtime.report).toEqual({ connected: ["research"], failed: [] });
    expect(archive.connectCount).toBe(0);
    expect(outcome.status).toBe("complete");
    expect(research.calls.map((call) => [call.name, call.args])).toEqual([
      ["search", { q: "relay" }],
    ]);
    expect(conversation.messages.map((message) => message.role)).toEqual([
      "user",
      "assistant",
      "tool",
      "assistant",
    ]);
    expect(conversation.messages[3]).toMatchObject({ role: "assistant", content: "Found 3" });
    expect(llm.callLog[0]?.messages[0]).toEqual({ role: "system", content: "Be helpful" });
  });

  it("closes every connection on close", async () => {
    const research = new FakeConnection("research", "Research", [tool("search")]);
    const conversation = createConversation([createUserMessage()], ["research"]);
    const runtime = await openConversation(
      createDeps(new ScriptedLlmService(), [research]),
      conversation,
      [createToolServer("research")]
    );

    await runtime.close();

    expect(research.closed).toBe(true);
    expect(runtime.loop.isRunning).toBe(false);
  });
});
