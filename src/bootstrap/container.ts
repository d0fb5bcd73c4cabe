// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Composition root: wires adapters to ports and hands features their dependencies.
 * Scope: Builds the LLM adapter, token lifecycle manager, persistence and the tool server connection factory. Does not hold conversations.
 * Invariants:
 *   - Single container instance per process; resetContainer() exists for tests
 *   - Only this module calls serverEnv(); everything else receives explicit options
 *   - Every tool server connection is registered with the token manager before it is created
 * Side-effects: IO (initializes logger and emits startup log on first access)
 * Links: features/ai/conversation.ts, shared/env/server.ts
 * @public
 */

import type { Logger } from "pino";

import {
  ChatCompletionsAdapter,
  InMemoryPersistenceAdapter,
  SystemClock,
  TokenLifecycleManager,
  ToolProtocolClient,
} from "@/adapters/server";
import type { AgentDeps, ToolServerConnectionFactory } from "@/features/ai/public";
import type { Clock, LlmService, PersistencePort } from "@/ports";
import { serverEnv } from "@/shared/env";
import { makeLogger } from "@/shared/observability";

export interface ContainerConfig {
  readonly defaultModel: string;
  readonly systemPrompt: string;
  readonly maxIterations: number;
  readonly samplingMaxIterations: number;
  readonly toolCallTimeoutMs: number;
}

export interface ContainerOverrides {
  /** Replaces global fetch for every outbound HTTP call (LLM, tool servers, OAuth) */
  readonly fetch?: typeof fetch;
  readonly persistence?: PersistencePort;
  readonly clock?: Clock;
}

export interface Container {
  log: Logger;
  config: ContainerConfig;
  llmService: LlmService;
  clock: Clock;
  persistence: PersistencePort;
  tokenManager: TokenLifecycleManager;
  createConnection: ToolServerConnectionFactory;
}

// Module-level singleton
let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - allows fresh container between test runs.
 */
export function resetContainer(): void {
  _container = null;
}

export function createContainer(overrides: ContainerOverrides = {}): Container {
  const env = serverEnv();
  const log = makeLogger({ service: env.SERVICE_NAME });
  const fetchOption = overrides.fetch ? { fetch: overrides.fetch } : {};

  // Startup log (no URLs/secrets)
  log.info(
    {
      env: env.NODE_ENV,
      logLevel: env.PINO_LOG_LEVEL,
      defaultModel: env.DEFAULT_MODEL,
      maxIterations: env.AGENT_MAX_ITERATIONS,
    },
    "container initialized"
  );

  const clock = overrides.clock ?? new SystemClock();
  const persistence = overrides.persistence ?? new InMemoryPersistenceAdapter();

  const llmService = new ChatCompletionsAdapter({
    baseUrl: env.LLM_BASE_URL,
    ...(env.LLM_API_KEY !== undefined && { apiKey: env.LLM_API_KEY }),
    connectTimeoutMs: env.LLM_CONNECT_TIMEOUT_MS,
    logger: log.child({ component: "ChatCompletionsAdapter" }),
    ...fetchOption,
  });

  const tokenManager = new TokenLifecycleManager({
    persistence,
    clock,
    clientId: env.OAUTH_CLIENT_ID,
    redirectUri: env.OAUTH_REDIRECT_URI,
    logger: log.child({ component: "TokenLifecycleManager" }),
    ...fetchOption,
  });

  const createConnection: ToolServerConnectionFactory = ({
    server,
    resumeSessionId,
    onSessionChange,
  }) => {
    tokenManager.registerServer(server.id, {
      url: server.url,
      ...(server.oauthClientId !== undefined && { clientId: server.oauthClientId }),
      ...(server.oauthClientSecret !== undefined && {
        clientSecret: server.oauthClientSecret,
      }),
    });
    return new ToolProtocolClient({
      server: {
        id: server.id,
        name: server.name,
        url: server.url,
        ...(server.headers !== undefined && { headers: server.headers }),
      },
      clientInfo: { name: env.SERVICE_NAME, version: "0.1.0" },
      tokenProvider: tokenManager,
      onSessionChange,
      defaultTimeoutMs: env.TOOL_CALL_TIMEOUT_MS,
      logger: log.child({ component: "ToolProtocolClient", serverId: server.id }),
      ...(resumeSessionId !== undefined && { resumeSessionId }),
      ...fetchOption,
    });
  };

  const config: ContainerConfig = {
    defaultModel: env.DEFAULT_MODEL,
    systemPrompt: env.SYSTEM_PROMPT,
    maxIterations: env.AGENT_MAX_ITERATIONS,
    samplingMaxIterations: env.SAMPLING_MAX_ITERATIONS,
    toolCallTimeoutMs: env.TOOL_CALL_TIMEOUT_MS,
  };

  return {
    log,
    config,
    llmService,
    clock,
    persistence,
    tokenManager,
    createConnection,
  };
}

/**
 * Resolves dependencies for the agent feature.
 * Returns the subset of Container a conversation runtime needs.
 */
export function resolveAgentDeps(container: Container = getContainer()): AgentDeps {
  return {
    llm: container.llmService,
    clock: container.clock,
    persistence: container.persistence,
    createConnection: container.createConnection,
    log: container.log,
    defaultModel: container.config.defaultModel,
    systemPrompt: container.config.systemPrompt,
    maxIterations: container.config.maxIterations,
    samplingMaxIterations: container.config.samplingMaxIterations,
    toolCallTimeoutMs: container.config.toolCallTimeoutMs,
  };
}
