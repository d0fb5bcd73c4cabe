// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ai/chat-completions`
 * Purpose: LlmService over an OpenAI-compatible `/v1/chat/completions` endpoint (streaming and non-streaming).
 * Scope: HTTP + SSE decoding, tool-call accumulation, error classification. Does not retry or execute tools.
 * Invariants:
 *   - Never logs prompts, keys or chunks; bounded metadata only
 *   - Connect timeout bounds time-to-headers only, not the whole stream
 *   - `final` settles exactly once; aborted streams reject with LlmError(kind='aborted')
 *   - A body that ends without `[DONE]` still resolves `final`
 * Side-effects: IO (HTTP calls to the LLM backend)
 * Notes: SSE via eventsource-parser; chunks validated with zod and malformed chunks skipped.
 * Links: LlmService port, ToolCallAccumulator
 * @internal
 */

import {
  classifyLlmErrorFromStatus,
  LlmError,
  ToolCallAccumulator,
  type ToolCallDelta,
} from "@agent-relay/ai-core";
import {
  createParser,
  type EventSourceMessage,
  type EventSourceParser,
} from "eventsource-parser";
import { randomUUID } from "node:crypto";
import { z } from "zod";

import type {
  ChatDeltaEvent,
  CompletionParams,
  LlmCompletionResult,
  LlmService,
  LlmUsage,
} from "@/ports";
import { type Logger, makeLogger } from "@/shared/observability";

export interface ChatCompletionsAdapterConfig {
  /** Base URL without the `/v1/chat/completions` suffix */
  readonly baseUrl: string;
  readonly apiKey?: string;
  readonly connectTimeoutMs?: number;
  readonly completionTimeoutMs?: number;
  readonly fetch?: typeof fetch;
  readonly logger?: Logger;
}

const ToolCallDeltaSchema = z.object({
  index: z.number().int(),
  id: z.string().nullish(),
  function: z
    .object({
      name: z.string().nullish(),
      arguments: z.string().nullish(),
    })
    .nullish(),
});

const UsageSchema = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
  total_tokens: z.number().optional(),
});

const ProviderErrorSchema = z.union([
  z.string(),
  z.object({
    message: z.string().optional(),
    code: z.union([z.number(), z.string()]).optional(),
  }),
]);

const StreamChunkSchema = z.object({
  model: z.string().optional(),
  error: ProviderErrorSchema.optional(),
  usage: UsageSchema.nullish(),
  choices: z
    .array(
      z.object({
        finish_reason: z.string().nullish(),
        delta: z
          .object({
            content: z.string().nullish(),
            reasoning: z.string().nullish(),
            reasoning_content: z.string().nullish(),
            tool_calls: z.array(ToolCallDeltaSchema).nullish(),
          })
          .nullish(),
      })
    )
    .optional(),
});

const CompletionResponseSchema = z.object({
  model: z.string().optional(),
  usage: UsageSchema.nullish(),
  choices: z
    .array(
      z.object({
        finish_reason: z.string().nullish(),
        message: z.object({
          content: z.string().nullish(),
          reasoning: z.string().nullish(),
          reasoning_content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({
                  name: z.string(),
                  arguments: z.string(),
                }),
              })
            )
            .nullish(),
        }),
      })
    )
    .min(1),
});

/**
 * Create a deferred promise with resolve/reject callbacks.
 * Ensures promise settles exactly once.
 */
function defer<T>() {
  let settled = false;
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason?: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = (value) => {
      if (!settled) {
        settled = true;
        res(value);
      }
    };
    reject = (reason) => {
      if (!settled) {
        settled = true;
        rej(reason);
      }
    };
  });
  return {
    promise,
    resolve,
    reject,
    isSettled: () => settled,
  };
}

function toUsage(raw: z.infer<typeof UsageSchema>): LlmUsage {
  return {
    promptTokens: raw.prompt_tokens,
    completionTokens: raw.completion_tokens,
    totalTokens: raw.total_tokens ?? raw.prompt_tokens + raw.completion_tokens,
  };
}

function toToolCallDelta(raw: z.infer<typeof ToolCallDeltaSchema>): ToolCallDelta {
  const fn = raw.function;
  return {
    index: raw.index,
    ...(raw.id ? { id: raw.id } : {}),
    ...(fn
      ? {
          function: {
            ...(fn.name ? { name: fn.name } : {}),
            ...(fn.arguments ? { arguments: fn.arguments } : {}),
          },
        }
      : {}),
  };
}

function providerErrorMessage(error: z.infer<typeof ProviderErrorSchema>): {
  message: string;
  status: number | undefined;
} {
  if (typeof error === "string") return { message: error, status: undefined };
  return {
    message: error.message ?? "Provider error",
    status: typeof error.code === "number" ? error.code : undefined,
  };
}

export class ChatCompletionsAdapter implements LlmService {
  private readonly endpoint: string;
  private readonly fetchImpl: typeof fetch;
  private readonly log: Logger;
  private readonly connectTimeoutMs: number;
  private readonly completionTimeoutMs: number;

  constructor(private readonly config: ChatCompletionsAdapterConfig) {
    this.endpoint = `${config.baseUrl.replace(/\/+$/, "")}/v1/chat/completions`;
    this.fetchImpl = config.fetch ?? fetch;
    this.log =
      config.logger ?? makeLogger({ component: "ChatCompletionsAdapter" });
    this.connectTimeoutMs = config.connectTimeoutMs ?? 15_000;
    this.completionTimeoutMs = config.completionTimeoutMs ?? 120_000;
  }

  private buildBody(params: CompletionParams, stream: boolean) {
    return {
      model: params.model,
      messages: params.messages,
      ...(params.temperature !== undefined && { temperature: params.temperature }),
      ...(params.maxTokens !== undefined && { max_tokens: params.maxTokens }),
      ...(params.stopSequences &&
        params.stopSequences.length > 0 && { stop: params.stopSequences }),
      ...(params.tools &&
        params.tools.length > 0 && {
          tools: params.tools,
          ...(params.toolChoice !== undefined && {
            tool_choice: params.toolChoice,
          }),
        }),
      ...(stream && {
        stream: true,
        stream_options: { include_usage: true },
      }),
    };
  }

  private headers(): Record<string, string> {
    return {
      "Content-Type": "application/json",
      ...(this.config.apiKey
        ? { Authorization: `Bearer ${this.config.apiKey}` }
        : {}),
    };
  }

  async completion(params: CompletionParams): Promise<LlmCompletionResult> {
    const timeout = AbortSignal.timeout(this.completionTimeoutMs);
    const signal = params.abortSignal
      ? AbortSignal.any([timeout, params.abortSignal])
      : timeout;

    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: this.headers(),
        body: JSON.stringify(this.buildBody(params, false)),
        signal,
      });
    } catch (error) {
      if (error instanceof Error) {
        if (error.name === "TimeoutError") {
          throw new LlmError("LLM request timed out", "timeout", 408);
        }
        if (error.name === "AbortError") {
          throw new LlmError("LLM request aborted", "aborted");
        }
        throw new LlmError(`LLM network error: ${error.message}`, "unknown");
      }
      throw new LlmError("LLM completion failed: Unknown error", "unknown");
    }

    if (!response.ok) {
      throw new LlmError(
        `LLM API error: ${response.status} ${response.statusText}`,
        classifyLlmErrorFromStatus(response.status),
        response.status
      );
    }

    const parsed = CompletionResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new LlmError("Invalid completion response", "malformed_response");
    }

    const data = parsed.data;
    const [choice] = data.choices;
    if (!choice) {
      throw new LlmError("Completion response has no choices", "malformed_response");
    }
    const reasoning = choice.message.reasoning ?? choice.message.reasoning_content;

    const result: LlmCompletionResult = {
      content: choice.message.content ?? "",
      toolCalls: (choice.message.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments,
      })),
    };
    if (reasoning) result.reasoning = reasoning;
    if (choice.finish_reason) result.finishReason = choice.finish_reason;
    if (data.usage) result.usage = toUsage(data.usage);
    if (data.model) result.resolvedModel = data.model;

    this.log.info(
      {
        model: result.resolvedModel ?? params.model,
        finishReason: result.finishReason,
        toolCallCount: result.toolCalls.length,
        tokensUsed: result.usage?.totalTokens,
        contentLength: result.content.length,
      },
      "adapter.llm.completion_result"
    );

    return result;
  }

  async completionStream(params: CompletionParams): Promise<{
    stream: AsyncIterable<ChatDeltaEvent>;
    final: Promise<LlmCompletionResult>;
  }> {
    const log = this.log;
    const model = params.model;

    let response: Response;
    // Short timeout for connection/TTFB only (not entire stream duration)
    const connectCtl = new AbortController();
    let connectTimedOut = false;
    const connectTimer = setTimeout(() => {
      connectTimedOut = true;
      connectCtl.abort();
    }, this.connectTimeoutMs);

    try {
      const signal = params.abortSignal
        ? AbortSignal.any([connectCtl.signal, params.abortSignal])
        : connectCtl.signal;

      response = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: this.headers(),
        body: JSON.stringify(this.buildBody(params, true)),
        signal,
      });
    } catch (error) {
      if (connectTimedOut) {
        throw new LlmError("LLM stream connection timed out", "timeout", 408);
      }
      if (error instanceof Error) {
        if (error.name === "AbortError") {
          throw new LlmError("LLM stream aborted", "aborted");
        }
        throw new LlmError(`LLM stream init failed: ${error.message}`, "unknown");
      }
      throw new LlmError("LLM stream init failed: Unknown error", "unknown");
    } finally {
      clearTimeout(connectTimer);
    }

    if (!response.ok) {
      throw new LlmError(
        `LLM API error: ${response.status} ${response.statusText}`,
        classifyLlmErrorFromStatus(response.status),
        response.status
      );
    }

    const body = response.body;
    if (!body) {
      throw new LlmError("LLM response body is empty", "malformed_response");
    }

    const deferred = defer<LlmCompletionResult>();
    const abortSignal = params.abortSignal;

    const stream: AsyncIterable<ChatDeltaEvent> =
      (async function* (): AsyncGenerator<ChatDeltaEvent> {
        const reader = body.getReader();
        const decoder = new TextDecoder();
        const accumulator = new ToolCallAccumulator();
        let fullContent = "";
        let fullReasoning = "";
        let finalUsage: LlmUsage | undefined;
        let finishReason: string | undefined;
        let resolvedModel: string | undefined;
        let failed = false;

        const eventQueue: EventSourceMessage[] = [];
        const parser: EventSourceParser = createParser({
          onEvent(event: EventSourceMessage) {
            eventQueue.push(event);
          },
        });

        try {
          while (true) {
            const { done, value } = await reader.read();
            if (done) break;

            parser.feed(decoder.decode(value, { stream: true }));

            while (eventQueue.length > 0) {
              const event = eventQueue.shift();
              if (!event) break;
              const data = event.data;

              if (data === "[DONE]") {
                yield { type: "done" } as const;
                continue;
              }

              let json: unknown;
              try {
                json = JSON.parse(data);
              } catch (parseError) {
                // Transient SSE noise; keep streaming
                log.warn(
                  {
                    dataLength: data.length,
                    reason:
                      parseError instanceof Error ? parseError.message : "parse error",
                  },
                  "adapter.llm.malformed_sse_data"
                );
                continue;
              }

              const chunk = StreamChunkSchema.safeParse(json);
              if (!chunk.success) {
                log.warn({ dataLength: data.length }, "adapter.llm.unexpected_chunk");
                continue;
              }

              if (chunk.data.error !== undefined) {
                const { message, status } = providerErrorMessage(chunk.data.error);
                const errorText = `LLM stream error: ${message}`;
                failed = true;
                yield { type: "error", error: errorText } as const;
                deferred.reject(
                  new LlmError(
                    errorText,
                    status ? classifyLlmErrorFromStatus(status) : "unknown",
                    status
                  )
                );
                return;
              }

              if (chunk.data.model) resolvedModel = chunk.data.model;
              if (chunk.data.usage) finalUsage = toUsage(chunk.data.usage);

              const choice = chunk.data.choices?.[0];
              if (!choice) continue;
              if (choice.finish_reason) finishReason = choice.finish_reason;

              const delta = choice.delta;
              if (!delta) continue;

              if (delta.content) {
                fullContent += delta.content;
                yield { type: "text_delta", delta: delta.content } as const;
              }

              const reasoning = delta.reasoning ?? delta.reasoning_content;
              if (reasoning) {
                fullReasoning += reasoning;
                yield { type: "reasoning_delta", delta: reasoning } as const;
              }

              for (const raw of delta.tool_calls ?? []) {
                const toolDelta = toToolCallDelta(raw);
                accumulator.push(toolDelta);
                yield { type: "tool_call_delta", delta: toolDelta } as const;
              }
            }
          }
        } catch (error: unknown) {
          failed = true;
          if (
            (error instanceof Error && error.name === "AbortError") ||
            abortSignal?.aborted
          ) {
            deferred.reject(new LlmError("LLM stream aborted", "aborted"));
          } else {
            deferred.reject(error);
          }
          return;
        } finally {
          reader.releaseLock();

          if (!failed && !deferred.isSettled()) {
            if (abortSignal?.aborted) {
              deferred.reject(new LlmError("LLM stream aborted", "aborted"));
            } else {
              const result: LlmCompletionResult = {
                content: fullContent,
                toolCalls: accumulator.finish(() => `call_${randomUUID()}`),
              };
              if (fullReasoning) result.reasoning = fullReasoning;
              if (finishReason) result.finishReason = finishReason;
              if (finalUsage) result.usage = finalUsage;
              result.resolvedModel = resolvedModel ?? model;

              log.info(
                {
                  model: result.resolvedModel,
                  finishReason,
                  toolCallCount: result.toolCalls.length,
                  tokensUsed: finalUsage?.totalTokens,
                  contentLength: fullContent.length,
                },
                "adapter.llm.stream_result"
              );
              deferred.resolve(result);
            }
          }
        }
      })();

    return { stream, final: deferred.promise };
  }
}
