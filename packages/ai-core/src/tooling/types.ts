// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@agent-relay/ai-core/tooling/types`
 * Purpose: Tool-call descriptors and outcomes shared by the agentic loop, the sampling processor and the dispatcher.
 * Scope: Type definitions only. Does NOT execute tools.
 * Invariants:
 *   - TOOLCALL_ID_STABLE: the model-issued id is carried unchanged from call to outcome
 *   - Arguments stay a JSON string until dispatch; parsing failures become outcomes, not throws
 * Side-effects: none
 * Links: tool-call-accumulator.ts, events/agent-events.ts
 * @public
 */

/** A complete tool call as declared by an assistant message. */
export interface AgentToolCall {
  readonly id: string;
  readonly name: string;
  /** JSON-encoded arguments object, exactly as produced by the model */
  readonly arguments: string;
}

/**
 * One streamed fragment of a tool call (chat-completions delta shape).
 * Fragments with the same index belong to the same call.
 */
export interface ToolCallDelta {
  readonly index: number;
  readonly id?: string;
  readonly type?: "function";
  readonly function?: {
    readonly name?: string;
    readonly arguments?: string;
  };
}

/**
 * Why a tool call produced a failed outcome.
 * Every code maps to a synthetic tool-result message the model can react to.
 */
export type ToolErrorCode =
  | "tool_not_found"
  | "invalid_arguments"
  | "timeout"
  | "auth_required"
  | "transport"
  | "protocol"
  | "user_declined"
  | "execution"
  | "aborted";

export interface ToolCallOutcome {
  readonly toolCallId: string;
  readonly toolName: string;
  /** Server that owned the tool; undefined when no server matched */
  readonly serverId: string | undefined;
  /** Text handed back to the model as the tool-result message */
  readonly content: string;
  readonly isError: boolean;
  readonly errorCode?: ToolErrorCode;
}
