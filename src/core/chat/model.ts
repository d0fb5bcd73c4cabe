// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/chat/model`
 * Purpose: Conversation and message entities, plus the chat-completions wire shapes they materialize into.
 * Scope: Pure domain types with optional timestamps. Does not handle I/O or time operations.
 * Invariants:
 *   - Message is a closed union on `role`; `elicitation` is local-only and never reaches the wire
 *   - Conversations grow by append; only the trailing assistant message is ever replaced
 * Side-effects: none
 * Notes: Timestamps are optional ISO strings set by the feature layer
 * Links: rules.ts (toWireMessages)
 * @public
 */

import type { AgentToolCall, ElicitationRequest } from "@agent-relay/ai-core";

/** Tool call declared by an assistant message. */
export type MessageToolCall = AgentToolCall;

interface MessageBase {
  readonly id: string;
  /** ISO 8601 string, optional - set by feature layer */
  readonly timestamp?: string;
}

export interface UserMessage extends MessageBase {
  readonly role: "user";
  readonly content: string;
}

export interface SystemMessage extends MessageBase {
  readonly role: "system";
  readonly content: string;
}

export interface AssistantMessage extends MessageBase {
  readonly role: "assistant";
  readonly content: string;
  readonly reasoning?: string;
  readonly toolCalls?: readonly MessageToolCall[];
}

export interface ToolResultMessage extends MessageBase {
  readonly role: "tool";
  /** Id of the assistant tool call this answers */
  readonly toolCallId: string;
  readonly toolName: string;
  readonly content: string;
  readonly isError?: boolean;
}

/** Server notification kept as context for the model. */
export interface NotificationMessage extends MessageBase {
  readonly role: "notification";
  readonly serverId: string;
  readonly serverName: string;
  readonly method: string;
  readonly params?: Record<string, unknown>;
}

export type ElicitationStatus = "pending" | "accepted" | "declined" | "cancelled";

/** Local-only UI card for an elicitation round. */
export interface ElicitationMessage extends MessageBase {
  readonly role: "elicitation";
  readonly serverId: string;
  readonly request: ElicitationRequest;
  readonly status: ElicitationStatus;
}

export type Message =
  | UserMessage
  | SystemMessage
  | AssistantMessage
  | ToolResultMessage
  | NotificationMessage
  | ElicitationMessage;

export type MessageRole = Message["role"];

export interface Conversation {
  readonly id: string;
  /** LLM model id, e.g. "openai/gpt-4o-mini" */
  model: string;
  /** Enabled tool servers; order decides name-collision tie-breaks */
  serverIds: readonly string[];
  messages: Message[];
}

// Chat-completions wire format

export interface WireToolCall {
  readonly id: string;
  readonly type: "function";
  readonly function: {
    readonly name: string;
    readonly arguments: string;
  };
}

export type WireMessage =
  | { readonly role: "system"; readonly content: string }
  | { readonly role: "user"; readonly content: string }
  | {
      readonly role: "assistant";
      readonly content: string | null;
      readonly tool_calls?: readonly WireToolCall[];
    }
  | {
      readonly role: "tool";
      readonly tool_call_id: string;
      readonly name?: string;
      readonly content: string;
    };
