// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/chat/public`
 * Purpose: Public API for chat domain - allowed entry point for features.
 * Scope: Exposes conversation entities and wire materialization rules. Does not expose internal details.
 * Invariants: Only exports public domain API
 * Side-effects: none
 * @public
 */

export * from "./model";
export { ConversationStateError, isConversationStateError } from "./errors";
export {
  assertToolCallIntegrity,
  formatNotificationContext,
  isJsonObject,
  type ParsedToolArguments,
  parseToolArguments,
  toWireMessages,
  toWireToolCalls,
} from "./rules";
