// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/chat/rules`
 * Purpose: Verifies wire materialization, tool-call integrity and argument parsing.
 * Scope: Pure business logic testing. Does NOT test external dependencies or I/O.
 * Invariants: System prompt first; elicitation cards never reach the wire; notifications become user context.
 * Side-effects: none
 * Links: src/core/chat/rules.ts
 * @public
 */

import {
  createAssistantMessage,
  createToolCall,
  createToolResultMessage,
  createUserMessage,
} from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import {
  assertToolCallIntegrity,
  ConversationStateError,
  formatNotificationContext,
  type Message,
  parseToolArguments,
  toWireMessages,
} from "@/core";

describe("core/chat/rules", () => {
  describe("toWireMessages", () => {
    it("puts the system prompt first and maps each role", () => {
      const call = createToolCall("call_1", "search", { q: "cats" });
      const messages: Message[] = [
        createUserMessage("find cats"),
        createAssistantMessage("", [call]),
        createToolResultMessage("call_1", "search", "3 cats"),
        createAssistantMessage("Found 3 cats", undefined, "msg-final"),
      ];

      expect(toWireMessages(messages, "Be brief")).toEqual([
        { role: "system", content: "Be brief" },
        { role: "user", content: "find cats" },
        {
          role: "assistant",
          content: null,
          tool_calls: [
            {
              id: "call_1",
              type: "function",
              function: { name: "search", arguments: '{"q":"cats"}' },
            },
          ],
        },
        { role: "tool", tool_call_id: "call_1", name: "search", content: "3 cats" },
        { role: "assistant", content: "Found 3 cats" },
      ]);
    });

    it("skips elicitation cards and renders notifications as user context", () => {
      const messages: Message[] = [
        createUserMessage("hi"),
        {
          id: "card-1",
          role: "elicitation",
          serverId: "srv",
          request: { mode: "form", message: "Your name?" },
          status: "accepted",
        },
        {
          id: "note-1",
          role: "notification",
          serverId: "srv",
          serverName: "Weather",
          method: "notifications/message",
          params: { level: "info" },
        },
      ];

      expect(toWireMessages(messages)).toEqual([
        { role: "user", content: "hi" },
        {
          role: "user",
          content:
            '[Notification from tool server "Weather"]\nMethod: notifications/message\nParams: {"level":"info"}',
        },
      ]);
    });

    it("omits an empty system prompt", () => {
      expect(toWireMessages([createUserMessage("x")], "")).toEqual([
        { role: "user", content: "x" },
      ]);
    });
  });

  describe("assertToolCallIntegrity", () => {
    it("rejects a tool result for an undeclared call", () => {
      const messages: Message[] = [
        createUserMessage(),
        createToolResultMessage("call_missing", "search", "x"),
      ];

      expect(() => assertToolCallIntegrity(messages)).toThrow(ConversationStateError);
      expect(() => assertToolCallIntegrity(messages)).toThrow(
        'Tool result references undeclared tool call "call_missing"'
      );
    });

    it("rejects a call answered twice", () => {
      const messages: Message[] = [
        createAssistantMessage("", [createToolCall("call_1", "search")]),
        createToolResultMessage("call_1", "search", "a", "t1"),
        createToolResultMessage("call_1", "search", "b", "t2"),
      ];

      expect(() => assertToolCallIntegrity(messages)).toThrow(
        'Tool call "call_1" answered more than once'
      );
    });
  });

  describe("formatNotificationContext", () => {
    it("leaves out empty params", () => {
      expect(
        formatNotificationContext({
          id: "n",
          role: "notification",
          serverId: "s",
          serverName: "Files",
          method: "notifications/resources/updated",
          params: {},
        })
      ).toBe('[Notification from tool server "Files"]\nMethod: notifications/resources/updated');
    });
  });

  describe("parseToolArguments", () => {
    it("treats blank arguments as an empty object", () => {
      expect(parseToolArguments("  ")).toEqual({ ok: true, value: {} });
    });

    it("accepts JSON objects", () => {
      expect(parseToolArguments('{"city":"Oslo"}')).toEqual({
        ok: true,
        value: { city: "Oslo" },
      });
    });

    it("rejects non-object JSON", () => {
      expect(parseToolArguments("[1,2]")).toEqual({
        ok: false,
        error: "Tool arguments must be a JSON object",
      });
    });

    it("reports malformed JSON", () => {
      const parsed = parseToolArguments('{"city":');
      expect(parsed.ok).toBe(false);
    });
  });
});
