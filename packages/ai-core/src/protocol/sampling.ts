// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@agent-relay/ai-core/protocol/sampling`
 * Purpose: Types for server-initiated `sampling/createMessage` requests and their results, plus the finish-reason table.
 * Scope: Shapes and the fixed finish-reason mapping. Does NOT call the LLM (see features/ai/services/sampling-processor).
 * Invariants:
 *   - FINISH_REASON_TABLE: stop→endTurn, length→maxTokens, tool_calls→toolUse, anything else→endTurn
 *   - A SamplingDecision is resolved exactly once per request
 * Side-effects: none
 * @public
 */

export type SamplingRole = "user" | "assistant";

export interface SamplingTextContent {
  readonly type: "text";
  readonly text: string;
}

export interface SamplingImageContent {
  readonly type: "image" | "audio";
  readonly data: string;
  readonly mimeType: string;
}

export interface SamplingToolUseContent {
  readonly type: "tool_use";
  readonly id: string;
  readonly name: string;
  readonly input: Record<string, unknown>;
}

export interface SamplingToolResultContent {
  readonly type: "tool_result";
  readonly toolUseId: string;
  readonly content: readonly SamplingContent[];
  readonly isError?: boolean;
}

export type SamplingContent =
  | SamplingTextContent
  | SamplingImageContent
  | SamplingToolUseContent
  | SamplingToolResultContent;

export interface SamplingMessage {
  readonly role: SamplingRole;
  readonly content: string | SamplingContent | readonly SamplingContent[];
}

export interface SamplingToolDefinition {
  readonly name: string;
  readonly description?: string;
  readonly inputSchema?: Record<string, unknown>;
}

/** `type` and `mode` are both accepted on the wire; `name` selects one tool. */
export interface SamplingToolChoice {
  readonly type?: string;
  readonly mode?: string;
  readonly name?: string;
}

export interface SamplingModelPreferences {
  readonly hints?: readonly { readonly name?: string }[];
  readonly costPriority?: number;
  readonly speedPriority?: number;
  readonly intelligencePriority?: number;
}

export interface SamplingRequest {
  readonly messages: readonly SamplingMessage[];
  readonly systemPrompt?: string;
  readonly maxTokens?: number;
  readonly temperature?: number;
  readonly stopSequences?: readonly string[];
  readonly modelPreferences?: SamplingModelPreferences;
  readonly tools?: readonly SamplingToolDefinition[];
  readonly toolChoice?: SamplingToolChoice;
}

/** JSON-RPC error code returned when the user rejects a sampling request */
export const SAMPLING_USER_REJECTED_CODE = -1;

export type SamplingStopReason = "endTurn" | "maxTokens" | "toolUse";

export interface SamplingResult {
  readonly role: "assistant";
  readonly content: SamplingTextContent | readonly SamplingToolUseContent[];
  readonly model: string;
  readonly stopReason: SamplingStopReason;
}

/**
 * Human-in-the-loop verdict for a pending sampling request.
 * `edit` replaces the request before it reaches the backend.
 */
export type SamplingDecision =
  | { readonly action: "approve" }
  | { readonly action: "edit"; readonly request: SamplingRequest }
  | { readonly action: "reject"; readonly reason?: string };

export function mapFinishReasonToStopReason(
  finishReason: string | null | undefined
): SamplingStopReason {
  switch (finishReason) {
    case "stop":
      return "endTurn";
    case "length":
      return "maxTokens";
    case "tool_calls":
      return "toolUse";
    default:
      return "endTurn";
  }
}
