// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/public`
 * Purpose: Stable core entry point - explicit named exports to control public surface.
 * Scope: Re-exports only approved domain interfaces, prevents accidental creep/cycles.
 * Invariants: Named exports only, controlled public API surface
 * Side-effects: none
 * Links: Used by features, ports and adapters via \@/core alias
 * @public
 */

export type {
  OAuthStatus,
  PendingAuthorization,
  TokenBundle,
  TokenResponseFields,
} from "./auth/public";
export {
  canTransitionOAuthStatus,
  isPendingAuthorizationExpired,
  isTokenExpired,
  PENDING_AUTHORIZATION_TTL_MS,
  TOKEN_EXPIRY_SKEW_MS,
  tokenBundleFromResponse,
} from "./auth/public";
export type {
  AssistantMessage,
  Conversation,
  ElicitationMessage,
  ElicitationStatus,
  Message,
  MessageRole,
  MessageToolCall,
  NotificationMessage,
  ParsedToolArguments,
  SystemMessage,
  ToolResultMessage,
  UserMessage,
  WireMessage,
  WireToolCall,
} from "./chat/public";
export {
  assertToolCallIntegrity,
  ConversationStateError,
  formatNotificationContext,
  isConversationStateError,
  isJsonObject,
  parseToolArguments,
  toWireMessages,
  toWireToolCalls,
} from "./chat/public";
export type {
  OwnedTool,
  ToolCallResult,
  ToolContentBlock,
  ToolDescriptor,
  ToolServer,
} from "./servers/public";
export { aggregateTools, toolResultText } from "./servers/public";
