// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/services/sampling-processor`
 * Purpose: Answers a tool server's sampling/createMessage: human approval, format conversion, bounded tool loop, result shaping.
 * Scope: Non-streaming LLM calls on behalf of a server. Does not touch the conversation the request arrived during.
 * Invariants:
 *   - APPROVAL_FIRST: nothing reaches the backend before the user approves (or edits) the request
 *   - REJECT_IS_RPC_ERROR: rejection answers { code: -1, message: "User rejected sampling request" }
 *   - SAMPLING_ITERATION_CAP: at most maxIterations backend calls; tool calls on the last one go back as tool_use
 *   - Model choice: first hint naming a provider-qualified id ("a/b") → conversation model → default model
 * Side-effects: IO (LLM backend, tool calls through the injected executor)
 * Links: tool-dispatcher.ts, @agent-relay/ai-core protocol/sampling
 * @public
 */

import {
  type AgentToolCall,
  mapFinishReasonToStopReason,
  SAMPLING_USER_REJECTED_CODE,
  type SamplingContent,
  type SamplingDecision,
  type SamplingMessage,
  type SamplingRequest,
  type SamplingResult,
  type SamplingToolChoice,
  type SamplingToolDefinition,
  type SamplingToolUseContent,
  type ToolCallOutcome,
} from "@agent-relay/ai-core";
import type { Logger } from "pino";

import { parseToolArguments, toWireToolCalls, type WireMessage } from "@/core";
import type {
  InboundOutcome,
  LlmService,
  LlmToolChoice,
  LlmToolDefinition,
} from "@/ports";
import { isContractViolation } from "@/shared/errors";

export interface SamplingProcessorDeps {
  readonly llm: LlmService;
  readonly defaultModel: string;
  readonly maxIterations: number;
  readonly log: Logger;
}

export interface SamplingContext {
  readonly serverId: string;
  readonly conversationModel?: string;
  /** Resolves with the user's verdict on the request */
  readonly approve: (request: SamplingRequest) => Promise<SamplingDecision>;
  /** Runs tool calls the model makes while sampling; absent means they go back as tool_use */
  readonly executeTools?: (calls: readonly AgentToolCall[]) => Promise<ToolCallOutcome[]>;
  readonly signal?: AbortSignal;
}

export const SAMPLING_REJECTED_MESSAGE = "User rejected sampling request";

function isContentList(
  content: SamplingContent | readonly SamplingContent[]
): content is readonly SamplingContent[] {
  return Array.isArray(content);
}

function contentBlocks(content: SamplingMessage["content"]): readonly SamplingContent[] {
  if (typeof content === "string") return [{ type: "text", text: content }];
  return isContentList(content) ? content : [content];
}

function joinText(blocks: readonly SamplingContent[]): string {
  return blocks
    .flatMap((block) => (block.type === "text" ? [block.text] : []))
    .join("\n");
}

/** Protocol messages → chat-completions messages. Image and audio blocks are not forwarded. */
export function toSamplingWireMessages(request: SamplingRequest): WireMessage[] {
  const wire: WireMessage[] = [];
  if (request.systemPrompt !== undefined && request.systemPrompt.length > 0) {
    wire.push({ role: "system", content: request.systemPrompt });
  }

  for (const message of request.messages) {
    if (typeof message.content === "string") {
      wire.push(
        message.role === "assistant"
          ? { role: "assistant", content: message.content }
          : { role: "user", content: message.content }
      );
      continue;
    }
    const blocks = contentBlocks(message.content);
    const text = joinText(blocks);

    if (message.role === "assistant") {
      const toolUses = blocks.flatMap((block) => (block.type === "tool_use" ? [block] : []));
      if (toolUses.length > 0) {
        wire.push({
          role: "assistant",
          content: text.length > 0 ? text : null,
          tool_calls: toolUses.map((use) => ({
            id: use.id,
            type: "function",
            function: { name: use.name, arguments: JSON.stringify(use.input) },
          })),
        });
      } else {
        wire.push({ role: "assistant", content: text });
      }
      continue;
    }

    const toolResults = blocks.flatMap((block) => (block.type === "tool_result" ? [block] : []));
    for (const result of toolResults) {
      wire.push({
        role: "tool",
        tool_call_id: result.toolUseId,
        content: joinText(result.content),
      });
    }
    if (toolResults.length === 0 || text.length > 0) {
      wire.push({ role: "user", content: text });
    }
  }
  return wire;
}

export function toLlmTools(tools: readonly SamplingToolDefinition[]): LlmToolDefinition[] {
  return tools.map((tool): LlmToolDefinition => ({
    type: "function",
    function: {
      name: tool.name,
      ...(tool.description !== undefined && { description: tool.description }),
      parameters: tool.inputSchema ?? { type: "object", properties: {} },
    },
  }));
}

/** `type` wins over `mode`; a named tool always forces that function. */
export function toLlmToolChoice(choice: SamplingToolChoice | undefined): LlmToolChoice | undefined {
  if (!choice) return undefined;
  if (choice.name !== undefined && choice.name.length > 0) {
    return { type: "function", function: { name: choice.name } };
  }
  switch (choice.type ?? choice.mode) {
    case "auto":
      return "auto";
    case "none":
      return "none";
    case "required":
    case "any":
      return "required";
    default:
      return undefined;
  }
}

export function selectSamplingModel(
  request: SamplingRequest,
  conversationModel: string | undefined,
  defaultModel: string
): string {
  const hinted = request.modelPreferences?.hints?.find(
    (hint) => hint.name !== undefined && hint.name.includes("/")
  )?.name;
  return hinted ?? conversationModel ?? defaultModel;
}

function toolUseContent(calls: readonly AgentToolCall[]): SamplingToolUseContent[] {
  return calls.map((call) => {
    const parsed = parseToolArguments(call.arguments);
    return {
      type: "tool_use",
      id: call.id,
      name: call.name,
      input: parsed.ok ? parsed.value : {},
    };
  });
}

export class SamplingProcessor {
  constructor(private readonly deps: SamplingProcessorDeps) {}

  async process(
    request: SamplingRequest,
    ctx: SamplingContext
  ): Promise<InboundOutcome<SamplingResult>> {
    const log = this.deps.log.child({ serverId: ctx.serverId });
    const decision = await ctx.approve(request);
    if (decision.action === "reject") {
      log.info("agent.sampling.rejected");
      return { ok: false, code: SAMPLING_USER_REJECTED_CODE, message: SAMPLING_REJECTED_MESSAGE };
    }

    const effective = decision.action === "edit" ? decision.request : request;
    const result = await this.sample(effective, ctx);
    log.info(
      { model: result.model, stopReason: result.stopReason, edited: decision.action === "edit" },
      "agent.sampling.complete"
    );
    return { ok: true, result };
  }

  private async sample(request: SamplingRequest, ctx: SamplingContext): Promise<SamplingResult> {
    const model = selectSamplingModel(request, ctx.conversationModel, this.deps.defaultModel);
    const messages = toSamplingWireMessages(request);
    const tools = request.tools && request.tools.length > 0 ? toLlmTools(request.tools) : undefined;
    const toolChoice = tools ? toLlmToolChoice(request.toolChoice) : undefined;

    for (let iteration = 1; iteration <= this.deps.maxIterations; iteration++) {
      const completion = await this.deps.llm.completion({
        messages,
        model,
        ...(request.temperature !== undefined && { temperature: request.temperature }),
        ...(request.maxTokens !== undefined && { maxTokens: request.maxTokens }),
        ...(request.stopSequences !== undefined && { stopSequences: request.stopSequences }),
        ...(tools !== undefined && { tools }),
        ...(toolChoice !== undefined && { toolChoice }),
        ...(ctx.signal !== undefined && { abortSignal: ctx.signal }),
      });
      const servedBy = completion.resolvedModel ?? model;

      if (completion.toolCalls.length === 0) {
        return {
          role: "assistant",
          content: { type: "text", text: completion.content },
          model: servedBy,
          stopReason: mapFinishReasonToStopReason(completion.finishReason),
        };
      }

      if (iteration === this.deps.maxIterations || !ctx.executeTools) {
        return {
          role: "assistant",
          content: toolUseContent(completion.toolCalls),
          model: servedBy,
          stopReason: "toolUse",
        };
      }

      messages.push({
        role: "assistant",
        content: completion.content.length > 0 ? completion.content : null,
        tool_calls: toWireToolCalls(completion.toolCalls),
      });

      let outcomes: ToolCallOutcome[];
      try {
        outcomes = await ctx.executeTools(completion.toolCalls);
      } catch (error) {
        if (isContractViolation(error)) throw error;
        return {
          role: "assistant",
          content: {
            type: "text",
            text: `Error during tool execution: ${error instanceof Error ? error.message : String(error)}`,
          },
          model: servedBy,
          stopReason: "endTurn",
        };
      }
      for (const outcome of outcomes) {
        messages.push({
          role: "tool",
          tool_call_id: outcome.toolCallId,
          name: outcome.toolName,
          content: outcome.content,
        });
      }
    }

    // maxIterations < 1
    return { role: "assistant", content: { type: "text", text: "" }, model, stopReason: "endTurn" };
  }
}
