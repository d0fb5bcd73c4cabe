// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `agent-relay`
 * Purpose: Package entry point for embedding the orchestration core.
 * Scope: Re-exports the container, feature API, domain types and adapters an embedder wires. Does not start anything.
 * Invariants: Named exports only, no export *
 * Side-effects: none
 * @public
 */

export {
  type AccessTokenProvider,
  type Clock,
  type LlmService,
  type PersistencePort,
  type ToolServerConnection,
  type ToolServerConnectionState,
} from "@/ports";
export {
  ChatCompletionsAdapter,
  type DiscoveredAuthorization,
  type DiscoveryResult,
  InMemoryPersistenceAdapter,
  SystemClock,
  TokenLifecycleManager,
  ToolProtocolClient,
} from "@/adapters/server";
export {
  type Container,
  type ContainerOverrides,
  createContainer,
  getContainer,
  resetContainer,
  resolveAgentDeps,
} from "@/bootstrap/container";
export type {
  Conversation,
  Message,
  OAuthStatus,
  TokenBundle,
  ToolDescriptor,
  ToolServer,
} from "@/core";
export {
  AgenticLoop,
  type AgentDeps,
  type ConversationRuntime,
  elicitationResponse,
  openConversation,
  parseElicitationForm,
  type RunHandle,
  type RunOutcome,
  submitElicitationForm,
} from "@/features/ai/public";
export {
  AuthRequiredError,
  ElicitationRequiredError,
  OAuthError,
  ProtocolError,
  ToolCallTimeoutError,
  TransportError,
} from "@/shared/errors";
export { EnvValidationError, serverEnv } from "@/shared/env";
