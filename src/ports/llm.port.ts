// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/llm.port`
 * Purpose: LLM backend abstraction (OpenAI-compatible chat completions) for the agentic loop and the sampling processor.
 * Scope: Streaming and non-streaming completion over already-materialized wire messages. Does not handle retries or tool execution.
 * Invariants:
 *   - Only depends on core wire types and ai-core primitives, no infrastructure concerns
 *   - `final` settles exactly once; an aborted stream rejects with LlmError(kind='aborted')
 *   - Tool-call deltas are forwarded raw; accumulation happens in the caller
 * Side-effects: none (interface only)
 * Links: adapters/server/ai/chat-completions.adapter.ts
 * @public
 */

import type { AgentToolCall, ToolCallDelta } from "@agent-relay/ai-core";

import type { WireMessage } from "@/core";

export type { WireMessage } from "@/core";

/**
 * Tool definition in OpenAI function-calling format.
 */
export interface LlmToolDefinition {
  readonly type: "function";
  readonly function: {
    readonly name: string;
    readonly description?: string;
    readonly parameters: Record<string, unknown>;
  };
}

/**
 * - "auto": LLM decides whether to use tools
 * - "none": Disable tool use
 * - "required": Force tool use
 * - {type:"function"}: Force a specific tool
 */
export type LlmToolChoice =
  | "auto"
  | "none"
  | "required"
  | { readonly type: "function"; readonly function: { readonly name: string } };

export interface CompletionParams {
  readonly messages: readonly WireMessage[];
  readonly model: string;
  readonly temperature?: number;
  readonly maxTokens?: number;
  readonly stopSequences?: readonly string[];
  readonly tools?: readonly LlmToolDefinition[];
  readonly toolChoice?: LlmToolChoice;
  readonly abortSignal?: AbortSignal;
}

export type ChatDeltaEvent =
  | { type: "text_delta"; delta: string }
  | { type: "reasoning_delta"; delta: string }
  | { type: "tool_call_delta"; delta: ToolCallDelta }
  | { type: "error"; error: string }
  | { type: "done" };

export interface LlmUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LlmCompletionResult {
  content: string;
  reasoning?: string;
  /** Complete tool calls (accumulated when streaming) */
  toolCalls: AgentToolCall[];
  finishReason?: "stop" | "length" | "tool_calls" | "content_filter" | string;
  usage?: LlmUsage;
  /** Model that actually served the request, when reported */
  resolvedModel?: string;
}

export interface LlmService {
  completion(params: CompletionParams): Promise<LlmCompletionResult>;

  completionStream(params: CompletionParams): Promise<{
    stream: AsyncIterable<ChatDeltaEvent>;
    final: Promise<LlmCompletionResult>;
  }>;
}
