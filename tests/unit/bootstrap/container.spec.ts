// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Unit tests for composition-root wiring: env-driven config, shared fetch override, connection factory and agent deps.
 * Scope: createContainer/getContainer/resolveAgentDeps with fake fetch and clock. Does NOT test adapter internals.
 * Invariants: process.env restored and container reset after each test.
 * Side-effects: process.env
 * Links: src/bootstrap/container.ts
 * @public
 */

import { createRouteFetch, createToolServer, FakeClock, json } from "@tests/_fakes";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  ChatCompletionsAdapter,
  InMemoryPersistenceAdapter,
  ToolProtocolClient,
} from "@/adapters/server";
import {
  createContainer,
  getContainer,
  resetContainer,
  resolveAgentDeps,
} from "@/bootstrap/container";
import { resetServerEnv } from "@/shared/env";

describe("bootstrap container", () => {
  let saved: NodeJS.ProcessEnv;

  beforeEach(() => {
    saved = process.env;
    process.env = {
      NODE_ENV: "test",
      LLM_BASE_URL: "https://llm.test",
      LLM_API_KEY: "test-secret",
      DEFAULT_MODEL: "openai/gpt-4o",
      SYSTEM_PROMPT: "Be brief",
      AGENT_MAX_ITERATIONS: "4",
      SAMPLING_MAX_ITERATIONS: "2",
      TOOL_CALL_TIMEOUT_MS: "5000",
    };
    resetServerEnv();
    resetContainer();
  });

  afterEach(() => {
    process.env = saved;
    resetServerEnv();
    resetContainer();
  });

  it("derives config from the environment", () => {
    const container = createContainer();

    expect(container.config).toEqual({
      defaultModel: "openai/gpt-4o",
      systemPrompt: "Be brief",
      maxIterations: 4,
      samplingMaxIterations: 2,
      toolCallTimeoutMs: 5000,
    });
    expect(container.llmService).toBeInstanceOf(ChatCompletionsAdapter);
    expect(container.persistence).toBeInstanceOf(InMemoryPersistenceAdapter);
  });

  it("sends LLM traffic through the overridden fetch with the configured key", async () => {
    const routes = createRouteFetch({
      "POST https://llm.test/v1/chat/completions": () =>
        json({ choices: [{ finish_reason: "stop", message: { content: "pong" } }] }),
    });
    const container = createContainer({ fetch: routes.fetch });

    const result = await container.llmService.completion({
      model: container.config.defaultModel,
      messages: [{ role: "user", content: "ping" }],
    });

    expect(result.content).toBe("pong");
    expect(routes.calls[0]?.headers.get("Authorization")).toBe("Bearer test-secret");
  });

  it("creates idle protocol clients that wait for connect before using a session", () => {
    const container = createContainer({ clock: new FakeClock() });

    const connection = container.createConnection({
      server: createToolServer("research", { oauthClientId: "research-client" }),
      resumeSessionId: "session-1",
      onSessionChange: async () => undefined,
    });

    expect(connection).toBeInstanceOf(ToolProtocolClient);
    expect(connection.serverId).toBe("research");
    expect(connection.serverName).toBe("research-name");
    expect(connection.state).toBe("disconnected");
    expect(connection.sessionId).toBeUndefined();
  });

  it("hands the agent feature the container's collaborators", () => {
    const clock = new FakeClock();
    const container = createContainer({ clock });

    const deps = resolveAgentDeps(container);

    expect(deps).toMatchObject({
      llm: container.llmService,
      clock,
      persistence: container.persistence,
      createConnection: container.createConnection,
      defaultModel: "openai/gpt-4o",
      systemPrompt: "Be brief",
      maxIterations: 4,
      samplingMaxIterations: 2,
      toolCallTimeoutMs: 5000,
    });
  });

  it("keeps one container per process until reset", () => {
    const first = getContainer();

    expect(getContainer()).toBe(first);
    resetContainer();
    expect(getContainer()).not.toBe(first);
  });
});
