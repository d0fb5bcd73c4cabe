// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/chat/rules`
 * Purpose: Pure rules for turning a conversation into the chat-completions message list.
 * Scope: Wire materialization, tool-call referential integrity, notification rendering. Does not handle I/O.
 * Invariants:
 *   - WIRE_SINGLE_CONVERSION: toWireMessages is the only place that decides which roles reach the model
 *   - LOCAL_ONLY_EXCLUDED: elicitation messages never appear on the wire
 *   - NOTIFICATIONS_AS_CONTEXT: every notification becomes a synthesized user message
 *   - TOOL_RESULT_INTEGRITY: every tool result answers a call declared by an earlier assistant message
 * Side-effects: none (throws ConversationStateError on integrity failure)
 * Links: model.ts, errors.ts
 * @public
 */

import { ConversationStateError } from "./errors";
import type {
  Message,
  MessageToolCall,
  NotificationMessage,
  WireMessage,
  WireToolCall,
} from "./model";

/**
 * Throws ConversationStateError when a tool result references a call id
 * no preceding assistant message declared, or answers the same id twice.
 */
export function assertToolCallIntegrity(messages: readonly Message[]): void {
  const declared = new Set<string>();
  const answered = new Set<string>();

  for (const message of messages) {
    if (message.role === "assistant") {
      for (const call of message.toolCalls ?? []) declared.add(call.id);
    } else if (message.role === "tool") {
      if (!declared.has(message.toolCallId)) {
        throw new ConversationStateError(
          `Tool result references undeclared tool call "${message.toolCallId}"`,
          message.id
        );
      }
      if (answered.has(message.toolCallId)) {
        throw new ConversationStateError(
          `Tool call "${message.toolCallId}" answered more than once`,
          message.id
        );
      }
      answered.add(message.toolCallId);
    }
  }
}

export function formatNotificationContext(message: NotificationMessage): string {
  const lines = [
    `[Notification from tool server "${message.serverName}"]`,
    `Method: ${message.method}`,
  ];
  if (message.params && Object.keys(message.params).length > 0) {
    lines.push(`Params: ${JSON.stringify(message.params)}`);
  }
  return lines.join("\n");
}

export function toWireToolCalls(
  calls: readonly MessageToolCall[]
): WireToolCall[] {
  return calls.map((call) => ({
    id: call.id,
    type: "function",
    function: { name: call.name, arguments: call.arguments },
  }));
}

/**
 * Materialize the LLM-facing history: system prompt first, then one wire
 * entry per LLM-visible message.
 */
export function toWireMessages(
  messages: readonly Message[],
  systemPrompt?: string
): WireMessage[] {
  assertToolCallIntegrity(messages);

  const wire: WireMessage[] = [];
  if (systemPrompt && systemPrompt.length > 0) {
    wire.push({ role: "system", content: systemPrompt });
  }

  for (const message of messages) {
    switch (message.role) {
      case "system":
        wire.push({ role: "system", content: message.content });
        break;
      case "user":
        wire.push({ role: "user", content: message.content });
        break;
      case "assistant":
        if (message.toolCalls && message.toolCalls.length > 0) {
          wire.push({
            role: "assistant",
            content: message.content.length > 0 ? message.content : null,
            tool_calls: toWireToolCalls(message.toolCalls),
          });
        } else {
          wire.push({ role: "assistant", content: message.content });
        }
        break;
      case "tool":
        wire.push({
          role: "tool",
          tool_call_id: message.toolCallId,
          name: message.toolName,
          content: message.content,
        });
        break;
      case "notification":
        wire.push({ role: "user", content: formatNotificationContext(message) });
        break;
      case "elicitation":
        break;
      default: {
        const exhaustive: never = message;
        throw new ConversationStateError(
          `Unknown message role: ${JSON.stringify(exhaustive)}`
        );
      }
    }
  }

  return wire;
}

export type ParsedToolArguments =
  | { readonly ok: true; readonly value: Record<string, unknown> }
  | { readonly ok: false; readonly error: string };

/** Parse a model-produced arguments string; only JSON objects are accepted. */
export function parseToolArguments(raw: string): ParsedToolArguments {
  const source = raw.trim().length > 0 ? raw : "{}";
  let parsed: unknown;
  try {
    parsed = JSON.parse(source);
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
  if (!isJsonObject(parsed)) {
    return { ok: false, error: "Tool arguments must be a JSON object" };
  }
  return { ok: true, value: parsed };
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
