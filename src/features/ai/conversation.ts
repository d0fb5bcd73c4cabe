// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/conversation`
 * Purpose: Assembles the per-conversation runtime: tool server registry, sampling processor and agentic loop.
 * Scope: Composition only. Receives ports and factories from the container; never constructs adapters.
 * Invariants:
 *   - One registry and one loop per conversation
 *   - Connections are opened before the runtime is returned; failures are reported, not thrown
 * Side-effects: IO (connects tool servers)
 * Links: bootstrap/container.ts, services/agentic-loop.ts
 * @public
 */

import type { Logger } from "pino";

import type { Conversation, ToolServer } from "@/core";
import type { Clock, LlmService, PersistencePort } from "@/ports";

import { AgenticLoop } from "./services/agentic-loop";
import { SamplingProcessor } from "./services/sampling-processor";
import {
  type OpenReport,
  type ToolServerConnectionFactory,
  ToolServerRegistry,
} from "./services/tool-server-registry";

export interface AgentDeps {
  readonly llm: LlmService;
  readonly clock: Clock;
  readonly persistence: PersistencePort;
  readonly createConnection: ToolServerConnectionFactory;
  readonly log: Logger;
  readonly defaultModel: string;
  readonly systemPrompt?: string;
  readonly maxIterations: number;
  readonly samplingMaxIterations: number;
  readonly toolCallTimeoutMs: number;
}

export interface ConversationRuntime {
  readonly registry: ToolServerRegistry;
  readonly loop: AgenticLoop;
  readonly report: OpenReport;
  close(): Promise<void>;
}

export async function openConversation(
  deps: AgentDeps,
  conversation: Conversation,
  servers: readonly ToolServer[]
): Promise<ConversationRuntime> {
  const log = deps.log.child({ conversationId: conversation.id });
  const registry = new ToolServerRegistry(
    { persistence: deps.persistence, createConnection: deps.createConnection, log },
    conversation
  );
  const sampling = new SamplingProcessor({
    llm: deps.llm,
    defaultModel: deps.defaultModel,
    maxIterations: deps.samplingMaxIterations,
    log,
  });
  const loop = new AgenticLoop({
    llm: deps.llm,
    registry,
    sampling,
    clock: deps.clock,
    log,
    maxIterations: deps.maxIterations,
    toolCallTimeoutMs: deps.toolCallTimeoutMs,
    ...(deps.systemPrompt !== undefined && { systemPrompt: deps.systemPrompt }),
  });

  const report = await registry.open(servers);
  return {
    registry,
    loop,
    report,
    async close() {
      loop.cancel();
      await registry.close();
    },
  };
}
