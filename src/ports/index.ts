// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hex entry file for port interfaces - canonical import surface.
 * Scope: Re-exports public port interfaces. Does not export implementations.
 * Invariants: Named exports only, no export *
 * Side-effects: none
 * Links: Used by features and adapters for port contracts
 * @public
 */

export type { Clock } from "./clock.port";
export type {
  ChatDeltaEvent,
  CompletionParams,
  LlmCompletionResult,
  LlmService,
  LlmToolChoice,
  LlmToolDefinition,
  LlmUsage,
  WireMessage,
} from "./llm.port";
export type { PersistencePort } from "./persistence.port";
export type {
  AccessTokenProvider,
  ElicitationRequestHandler,
  InboundOutcome,
  InboundRequestContext,
  JsonRpcId,
  SamplingRequestHandler,
  ServerNotification,
  ToolCallOptions,
  ToolServerConnection,
  ToolServerConnectionState,
  UnauthorizedHint,
} from "./tool-server.port";
