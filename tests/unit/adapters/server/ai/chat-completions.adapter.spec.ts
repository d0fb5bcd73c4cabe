// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/adapters/server/ai/chat-completions.adapter.spec`
 * Purpose: Unit tests for the chat-completions adapter: request shape, SSE decoding, tool-call accumulation and error classification.
 * Scope: ChatCompletionsAdapter over a route table fetch. Does not reach a real LLM backend.
 * Invariants: `final` settles once; provider errors in-stream reject `final` with a classified LlmError.
 * Side-effects: none
 * Links: src/adapters/server/ai/chat-completions.adapter.ts
 * @internal
 */

import { LlmError } from "@agent-relay/ai-core";
import { createRouteFetch, json, type RouteFetch, sse, TEST_MODEL } from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import { ChatCompletionsAdapter } from "@/adapters/server/ai/chat-completions.adapter";
import type { ChatDeltaEvent, CompletionParams } from "@/ports";
import { makeNoopLogger } from "@/shared/observability";

const ENDPOINT = "POST https://llm.test/v1/chat/completions";

const PARAMS: CompletionParams = {
  model: TEST_MODEL,
  messages: [
    { role: "system", content: "Be helpful" },
    { role: "user", content: "Weather in Oslo?" },
  ],
};

function createAdapter(routes: RouteFetch): ChatCompletionsAdapter {
  return new ChatCompletionsAdapter({
    baseUrl: "https://llm.test/",
    apiKey: "test-key",
    fetch: routes.fetch,
    logger: makeNoopLogger(),
  });
}

async function drain(
  stream: AsyncIterable<ChatDeltaEvent>,
  onEvent?: (event: ChatDeltaEvent) => void
): Promise<ChatDeltaEvent[]> {
  const events: ChatDeltaEvent[] = [];
  for await (const event of stream) {
    events.push(event);
    onEvent?.(event);
  }
  return events;
}

describe("ChatCompletionsAdapter", () => {
  describe("completionStream", () => {
    it("forwards deltas and accumulates the final result", async () => {
      // Arrange
      const routes = createRouteFetch({
        [ENDPOINT]: () =>
          sse([
            '{"model":"openai/gpt-4o-mini-2024-07-18","choices":[{"delta":{"content":"Hel"}}]}',
            '{"choices":[{"delta":{"content":"lo","reasoning":"think"}}]}',
            '{"choices":[{"delta":{"tool_calls":[{"index":0,"id":"call_1","function":{"name":"get_weather","arguments":"{\\"city\\""}}]}}]}',
            '{"choices":[{"delta":{"tool_calls":[{"index":0,"function":{"arguments":":\\"Oslo\\"}"}}]},"finish_reason":"tool_calls"}]}',
            '{"choices":[],"usage":{"prompt_tokens":10,"completion_tokens":5}}',
            "[DONE]",
          ]),
      });
      const adapter = createAdapter(routes);

      // Act
      const { stream, final } = await adapter.completionStream(PARAMS);
      const events = await drain(stream);

      // Assert
      expect(events).toEqual([
        { type: "text_delta", delta: "Hel" },
        { type: "text_delta", delta: "lo" },
        { type: "reasoning_delta", delta: "think" },
        {
          type: "tool_call_delta",
          delta: { index: 0, id: "call_1", function: { name: "get_weather", arguments: '{"city"' } },
        },
        { type: "tool_call_delta", delta: { index: 0, function: { arguments: ':"Oslo"}' } } },
        { type: "done" },
      ]);
      await expect(final).resolves.toEqual({
        content: "Hello",
        reasoning: "think",
        toolCalls: [{ id: "call_1", name: "get_weather", arguments: '{"city":"Oslo"}' }],
        finishReason: "tool_calls",
        usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
        resolvedModel: "openai/gpt-4o-mini-2024-07-18",
      });
    });

    it("sends a streaming request with usage reporting and credentials", async () => {
      const routes = createRouteFetch({ [ENDPOINT]: () => sse(["[DONE]"]) });
      const adapter = createAdapter(routes);

      const { stream } = await adapter.completionStream({
        ...PARAMS,
        tools: [
          {
            type: "function",
            function: { name: "get_weather", parameters: { type: "object" } },
          },
        ],
        toolChoice: "auto",
      });
      await drain(stream);

      const [call] = routes.calls;
      expect(call?.headers.get("Authorization")).toBe("Bearer test-key");
      expect(JSON.parse(call?.body ?? "{}")).toEqual({
        model: TEST_MODEL,
        messages: PARAMS.messages,
        tools: [{ type: "function", function: { name: "get_weather", parameters: { type: "object" } } }],
        tool_choice: "auto",
        stream: true,
        stream_options: { include_usage: true },
      });
    });

    it("skips malformed frames and resolves when the body ends without [DONE]", async () => {
      const routes = createRouteFetch({
        [ENDPOINT]: () => sse(["not json", '{"choices":"nope"}', '{"choices":[{"delta":{"content":"ok"}}]}']),
      });
      const adapter = createAdapter(routes);

      const { stream, final } = await adapter.completionStream(PARAMS);

      expect(await drain(stream)).toEqual([{ type: "text_delta", delta: "ok" }]);
      await expect(final).resolves.toEqual({
        content: "ok",
        toolCalls: [],
        resolvedModel: TEST_MODEL,
      });
    });

    it("turns an in-stream provider error into an error event and a classified rejection", async () => {
      const routes = createRouteFetch({
        [ENDPOINT]: () =>
          sse([
            '{"choices":[{"delta":{"content":"par"}}]}',
            '{"error":{"message":"overloaded","code":529}}',
            '{"choices":[{"delta":{"content":"never"}}]}',
          ]),
      });
      const adapter = createAdapter(routes);

      const { stream, final } = await adapter.completionStream(PARAMS);
      const failure = final.catch((error: unknown) => error);
      const events = await drain(stream);

      expect(events).toEqual([
        { type: "text_delta", delta: "par" },
        { type: "error", error: "LLM stream error: overloaded" },
      ]);
      const error = await failure;
      expect(error).toBeInstanceOf(LlmError);
      expect(error).toMatchObject({ kind: "provider_5xx", status: 529 });
    });

    it("rejects final as aborted when the caller aborts mid-stream", async () => {
      const routes = createRouteFetch({
        [ENDPOINT]: () =>
          sse(['{"choices":[{"delta":{"content":"a"}}]}', '{"choices":[{"delta":{"content":"b"}}]}']),
      });
      const adapter = createAdapter(routes);
      const controller = new AbortController();

      const { stream, final } = await adapter.completionStream({
        ...PARAMS,
        abortSignal: controller.signal,
      });
      const failure = final.catch((error: unknown) => error);
      await drain(stream, () => controller.abort());

      expect(await failure).toMatchObject({ kind: "aborted", message: "LLM stream aborted" });
    });

    it("classifies a non-2xx response before streaming", async () => {
      const routes = createRouteFetch({ [ENDPOINT]: () => json({ error: "slow down" }, 429) });
      const adapter = createAdapter(routes);

      await expect(adapter.completionStream(PARAMS)).rejects.toMatchObject({
        kind: "rate_limited",
        status: 429,
      });
    });
  });

  describe("completion", () => {
    it("maps a non-streaming response", async () => {
      const routes = createRouteFetch({
        [ENDPOINT]: () =>
          json({
            model: "openai/gpt-4o-mini-2024-07-18",
            choices: [
              {
                finish_reason: "tool_calls",
                message: {
                  content: null,
                  tool_calls: [
                    { id: "call_1", function: { name: "get_weather", arguments: '{"city":"Oslo"}' } },
                  ],
                },
              },
            ],
            usage: { prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 },
          }),
      });
      const adapter = createAdapter(routes);

      const result = await adapter.completion({
        ...PARAMS,
        maxTokens: 256,
        stopSequences: ["END"],
        temperature: 0,
      });

      expect(result).toEqual({
        content: "",
        toolCalls: [{ id: "call_1", name: "get_weather", arguments: '{"city":"Oslo"}' }],
        finishReason: "tool_calls",
        usage: { promptTokens: 3, completionTokens: 2, totalTokens: 5 },
        resolvedModel: "openai/gpt-4o-mini-2024-07-18",
      });
      expect(JSON.parse(routes.calls[0]?.body ?? "{}")).toEqual({
        model: TEST_MODEL,
        messages: PARAMS.messages,
        temperature: 0,
        max_tokens: 256,
        stop: ["END"],
      });
    });

    it("rejects a body without choices as malformed", async () => {
      const routes = createRouteFetch({ [ENDPOINT]: () => json({ choices: [] }) });
      const adapter = createAdapter(routes);

      await expect(adapter.completion(PARAMS)).rejects.toMatchObject({
        kind: "malformed_response",
      });
    });

    it("classifies server errors and network failures", async () => {
      const routes = createRouteFetch({ [ENDPOINT]: () => json({}, 502) });
      const adapter = createAdapter(routes);
      await expect(adapter.completion(PARAMS)).rejects.toMatchObject({
        kind: "provider_5xx",
        status: 502,
      });

      routes.route(ENDPOINT, () => {
        throw new TypeError("connection refused");
      });
      await expect(adapter.completion(PARAMS)).rejects.toMatchObject({
        kind: "unknown",
        message: "LLM network error: connection refused",
      });
    });
  });
});
