// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@agent-relay/ai-core`
 * Purpose: Barrel export for executor-agnostic agent primitives.
 * Scope: Re-exports all public types from submodules. Does NOT implement logic.
 * Invariants: SINGLE_SOURCE_OF_TRUTH - these are the canonical definitions.
 * Side-effects: none
 * @public
 */

// Event types
export {
  type AgentEvent,
  type AgentEventType,
  type AuthRequiredEvent,
  type ContentDeltaEvent,
  type ElicitationRequestPendingEvent,
  type EmitAgentEvent,
  isTerminalEvent,
  type MessageFinalizedEvent,
  type NotificationFlushedEvent,
  type ReasoningDeltaEvent,
  type RunCancelledEvent,
  type RunCompleteEvent,
  type RunErrorEvent,
  type RunMaxIterationsEvent,
  type RunStartedEvent,
  type SamplingRequestPendingEvent,
  type ToolCallFinishedEvent,
  type ToolCallStartedEvent,
} from "./events/agent-events";
// Execution error codes
export {
  AGENT_ERROR_CODES,
  type AgentErrorCode,
  AgentExecutionError,
  isAgentErrorCode,
  isAgentExecutionError,
  normalizeErrorToAgentCode,
} from "./execution/error-codes";
// LLM error types (thrown by adapters, classified by normalizer)
export {
  classifyLlmErrorFromStatus,
  isLlmError,
  LlmError,
  type LlmErrorKind,
} from "./execution/llm-errors";
// Protocol shapes for server-initiated requests
export type {
  ElicitationAction,
  ElicitationContentValue,
  ElicitationMode,
  ElicitationRequest,
  ElicitationResponse,
} from "./protocol/elicitation";
export {
  mapFinishReasonToStopReason,
  SAMPLING_USER_REJECTED_CODE,
  type SamplingContent,
  type SamplingDecision,
  type SamplingImageContent,
  type SamplingMessage,
  type SamplingModelPreferences,
  type SamplingRequest,
  type SamplingResult,
  type SamplingRole,
  type SamplingStopReason,
  type SamplingTextContent,
  type SamplingToolChoice,
  type SamplingToolDefinition,
  type SamplingToolResultContent,
  type SamplingToolUseContent,
} from "./protocol/sampling";
// Tool-call accumulation
export { ToolCallAccumulator } from "./tooling/tool-call-accumulator";
// Tooling types
export type {
  AgentToolCall,
  ToolCallDelta,
  ToolCallOutcome,
  ToolErrorCode,
} from "./tooling/types";
