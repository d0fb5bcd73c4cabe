// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@agent-relay/ai-core/events/agent-events`
 * Purpose: Event vocabulary emitted by the agentic loop, the sampling processor and the tool dispatcher.
 * Scope: Defines the AgentEvent union. Does NOT implement functions.
 * Invariants:
 *   - SINGLE_SOURCE_OF_TRUTH: consumers (UI, logger, tests) switch on `type` only
 *   - toolCallId is stable across tool_call_started → tool_call_finished
 *   - Exactly one terminal event per run: run_complete | run_max_iterations | run_cancelled | run_error
 *   - notification_flushed never appears between a run's first content_delta and its message_finalized
 * Side-effects: none (types only)
 * Links: features/ai/services/event-stream.ts
 * @public
 */

import type { AgentErrorCode } from "../execution/error-codes";
import type { ElicitationRequest } from "../protocol/elicitation";
import type { SamplingRequest } from "../protocol/sampling";
import type { AgentToolCall, ToolErrorCode } from "../tooling/types";

export interface RunStartedEvent {
  readonly type: "run_started";
  readonly runId: string;
  readonly conversationId: string;
  readonly model: string;
}

export interface ContentDeltaEvent {
  readonly type: "content_delta";
  readonly runId: string;
  readonly delta: string;
}

export interface ReasoningDeltaEvent {
  readonly type: "reasoning_delta";
  readonly runId: string;
  readonly delta: string;
}

/**
 * Assistant message appended to the conversation.
 * `cancelled` marks a message cut short by cancellation; its toolCalls are never dispatched.
 */
export interface MessageFinalizedEvent {
  readonly type: "message_finalized";
  readonly runId: string;
  readonly messageId: string;
  readonly content: string;
  readonly reasoning?: string;
  readonly toolCalls: readonly AgentToolCall[];
  readonly cancelled: boolean;
}

export interface ToolCallStartedEvent {
  readonly type: "tool_call_started";
  readonly toolCallId: string;
  readonly toolName: string;
  readonly serverId: string | undefined;
  readonly args: Record<string, unknown>;
}

export interface ToolCallFinishedEvent {
  readonly type: "tool_call_finished";
  readonly toolCallId: string;
  readonly toolName: string;
  readonly serverId: string | undefined;
  readonly content: string;
  readonly isError: boolean;
  readonly errorCode?: ToolErrorCode;
}

/** Server notification released after the streaming message it arrived during. */
export interface NotificationFlushedEvent {
  readonly type: "notification_flushed";
  readonly serverId: string;
  readonly serverName: string;
  readonly method: string;
  readonly params?: Record<string, unknown>;
}

export interface SamplingRequestPendingEvent {
  readonly type: "sampling_request_pending";
  /** Key to pass back when resolving (`<serverId>:<requestId>`) */
  readonly pendingKey: string;
  readonly serverId: string;
  readonly request: SamplingRequest;
}

export interface ElicitationRequestPendingEvent {
  readonly type: "elicitation_request_pending";
  readonly pendingKey: string;
  readonly serverId: string;
  readonly request: ElicitationRequest;
}

export interface RunCompleteEvent {
  readonly type: "run_complete";
  readonly runId: string;
  readonly iterations: number;
}

/** Not an error: the caller may start a new run to continue past the cap. */
export interface RunMaxIterationsEvent {
  readonly type: "run_max_iterations";
  readonly runId: string;
  readonly iterations: number;
}

export interface RunCancelledEvent {
  readonly type: "run_cancelled";
  readonly runId: string;
}

export interface RunErrorEvent {
  readonly type: "run_error";
  readonly runId: string;
  readonly code: AgentErrorCode;
  readonly message: string;
}

export interface AuthRequiredEvent {
  readonly type: "auth_required";
  readonly serverId: string;
  readonly reason?: string;
}

export type AgentEvent =
  | RunStartedEvent
  | ContentDeltaEvent
  | ReasoningDeltaEvent
  | MessageFinalizedEvent
  | ToolCallStartedEvent
  | ToolCallFinishedEvent
  | NotificationFlushedEvent
  | SamplingRequestPendingEvent
  | ElicitationRequestPendingEvent
  | RunCompleteEvent
  | RunMaxIterationsEvent
  | RunCancelledEvent
  | RunErrorEvent
  | AuthRequiredEvent;

export type AgentEventType = AgentEvent["type"];

export type EmitAgentEvent = (event: AgentEvent) => void;

const TERMINAL_EVENT_TYPES: ReadonlySet<AgentEventType> = new Set([
  "run_complete",
  "run_max_iterations",
  "run_cancelled",
  "run_error",
]);

export function isTerminalEvent(
  event: AgentEvent
): event is
  | RunCompleteEvent
  | RunMaxIterationsEvent
  | RunCancelledEvent
  | RunErrorEvent {
  return TERMINAL_EVENT_TYPES.has(event.type);
}
