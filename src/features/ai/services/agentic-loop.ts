// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/services/agentic-loop`
 * Purpose: Drives one conversation turn: stream the model, execute its tool calls, feed results back, repeat until done.
 * Scope: Owns the run lifecycle, pending human decisions and notification buffering for one conversation. Does not render UI.
 * Invariants:
 *   - ONE_RUN_AT_A_TIME: run() while a run is active throws ContractViolationError
 *   - DISPATCH_IS_SYNC_POINT: all tool calls of an iteration settle before the next LLM request
 *   - RESULTS_IN_CALL_ORDER: tool results are appended in the assistant's declared order
 *   - ITERATION_CAP: at most maxIterations LLM requests, each followed by its dispatch; then run_max_iterations
 *   - CANCEL_KEEPS_PARTIAL: cancellation finalizes streamed text as one assistant message without tool calls
 *   - NOTIFICATIONS_AFTER_FINALIZE: notifications arriving mid-stream surface after message_finalized
 *   - EXACTLY_ONE_TERMINAL_EVENT: every run ends with one of run_complete | run_max_iterations | run_cancelled | run_error
 * Side-effects: IO (LLM backend, tool servers), mutates conversation.messages, emits AgentEvents
 * Links: event-stream.ts, tool-dispatcher.ts, sampling-processor.ts, tool-server-registry.ts, pending-requests.ts
 * @public
 */

import { randomUUID } from "node:crypto";

import {
  type AgentEvent,
  type AgentToolCall,
  type ElicitationRequest,
  type ElicitationResponse,
  LlmError,
  normalizeErrorToAgentCode,
  type SamplingDecision,
  type SamplingRequest,
  type SamplingResult,
  SAMPLING_USER_REJECTED_CODE,
  type ToolCallOutcome,
} from "@agent-relay/ai-core";
import type { Logger } from "pino";

import {
  type AssistantMessage,
  type Conversation,
  type ElicitationMessage,
  type ElicitationStatus,
  type Message,
  type NotificationMessage,
  type OwnedTool,
  toWireMessages,
} from "@/core";
import type {
  Clock,
  CompletionParams,
  InboundOutcome,
  InboundRequestContext,
  LlmService,
  LlmToolDefinition,
  ServerNotification,
} from "@/ports";
import { ContractViolationError } from "@/shared/errors";

import { AgentEventStream } from "./event-stream";
import { PendingRequestTable, pendingKey } from "./pending-requests";
import { SAMPLING_REJECTED_MESSAGE, type SamplingProcessor } from "./sampling-processor";
import { ToolDispatcher } from "./tool-dispatcher";
import type { ToolServerRegistry } from "./tool-server-registry";

/** Notification methods that are telemetry only and never become conversation context. */
const EVENT_ONLY_NOTIFICATIONS: ReadonlySet<string> = new Set([
  "notifications/progress",
  "notifications/tools/list_changed",
  "notifications/resources/list_changed",
  "notifications/cancelled",
]);

export interface AgenticLoopDeps {
  readonly llm: LlmService;
  readonly registry: ToolServerRegistry;
  readonly sampling: SamplingProcessor;
  readonly clock: Clock;
  readonly log: Logger;
  readonly maxIterations: number;
  readonly toolCallTimeoutMs: number;
  readonly systemPrompt?: string;
  readonly generateId?: () => string;
}

export type RunStatus = "complete" | "max_iterations" | "cancelled" | "error";

export interface RunOutcome {
  readonly runId: string;
  readonly status: RunStatus;
  readonly iterations: number;
}

export interface RunHandle {
  readonly runId: string;
  /** Events of this run, from run_started to the terminal event */
  readonly events: AsyncIterable<AgentEvent>;
  /** Settles when the run ends; never rejects */
  readonly done: Promise<RunOutcome>;
}

export interface RunOptions {
  readonly signal?: AbortSignal;
}

interface ActiveRun {
  readonly runId: string;
  readonly conversation: Conversation;
  readonly controller: AbortController;
  readonly stream: AgentEventStream;
  readonly log: Logger;
  /** Assistant tool calls appended but not yet answered */
  toolGroupOpen: boolean;
  /** Notification context waiting for the open tool group to close */
  readonly deferredContext: NotificationMessage[];
}

interface StreamedTurn {
  readonly content: string;
  readonly reasoning: string;
  readonly toolCalls: readonly AgentToolCall[];
  readonly cancelled: boolean;
}

function isGenericNotification(notification: ServerNotification): boolean {
  return !EVENT_ONLY_NOTIFICATIONS.has(notification.method);
}

function toLlmTools(owned: readonly OwnedTool[]): LlmToolDefinition[] {
  return owned.map(({ tool }): LlmToolDefinition => ({
    type: "function",
    function: {
      name: tool.name,
      ...(tool.description !== undefined && { description: tool.description }),
      parameters: tool.inputSchema,
    },
  }));
}

/** rejectAll() at cancel or run end, or a backend call aborted with the run */
function isRunTeardown(error: unknown): boolean {
  return error instanceof LlmError && error.kind === "aborted";
}

function elicitationStatus(response: ElicitationResponse): ElicitationStatus {
  switch (response.action) {
    case "accept":
      return "accepted";
    case "decline":
      return "declined";
    case "cancel":
      return "cancelled";
  }
}

export class AgenticLoop {
  private readonly generateId: () => string;
  private readonly samplingDecisions = new PendingRequestTable<SamplingDecision>();
  private readonly elicitationResponses = new PendingRequestTable<ElicitationResponse>();
  private active: ActiveRun | undefined;
  private localRequestSeq = 0;

  constructor(private readonly deps: AgenticLoopDeps) {
    this.generateId = deps.generateId ?? randomUUID;
  }

  get isRunning(): boolean {
    return this.active !== undefined;
  }

  run(conversation: Conversation, options: RunOptions = {}): RunHandle {
    if (this.active) {
      throw new ContractViolationError(
        `Conversation ${conversation.id} already has an active run`
      );
    }

    const runId = this.generateId();
    const log = this.deps.log.child({ runId, conversationId: conversation.id });
    const controller = new AbortController();
    if (options.signal) {
      const external = options.signal;
      if (external.aborted) controller.abort(external.reason);
      else external.addEventListener("abort", () => controller.abort(external.reason), { once: true });
    }

    const stream = new AgentEventStream(log, (notification) => {
      if (!isGenericNotification(notification)) return;
      const context: NotificationMessage = {
        id: this.generateId(),
        role: "notification",
        timestamp: this.deps.clock.now(),
        serverId: notification.serverId,
        serverName: notification.serverName,
        method: notification.method,
        ...(notification.params !== undefined && { params: notification.params }),
      };
      // tool results must directly follow the assistant message that declared them
      if (run.toolGroupOpen) run.deferredContext.push(context);
      else conversation.messages.push(context);
    });
    const events = stream.events();

    const run: ActiveRun = {
      runId,
      conversation,
      controller,
      stream,
      log,
      toolGroupOpen: false,
      deferredContext: [],
    };
    this.active = run;
    const unbind = this.deps.registry.bind({
      onSampling: (request, ctx) => this.handleSampling(run, request, ctx),
      onElicitation: (request, ctx) => this.elicit(run, ctx.serverId, request, ctx.requestId),
      onNotification: (notification) => stream.pushNotification(notification),
      onAuthRequired: (serverId, reason) =>
        stream.emit({ type: "auth_required", serverId, ...(reason !== undefined && { reason }) }),
    });

    const done = this.execute(run).finally(() => {
      unbind();
      const reason = new LlmError("Run ended", "aborted");
      this.samplingDecisions.rejectAll(reason);
      this.elicitationResponses.rejectAll(reason);
      stream.close();
      this.active = undefined;
    });

    return { runId, events, done };
  }

  /** Stop the active run. Streamed text so far is kept; nothing further is dispatched. */
  cancel(): void {
    const run = this.active;
    if (!run || run.controller.signal.aborted) return;
    run.log.info("agent.loop.cancel_requested");
    run.controller.abort();
    const reason = new LlmError("Run cancelled", "aborted");
    this.samplingDecisions.rejectAll(reason);
    this.elicitationResponses.rejectAll(reason);
  }

  resolveSampling(key: string, decision: SamplingDecision): void {
    this.samplingDecisions.resolve(key, decision);
  }

  resolveElicitation(key: string, response: ElicitationResponse): void {
    this.elicitationResponses.resolve(key, response);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Run body
  // ───────────────────────────────────────────────────────────────────────────

  private async execute(run: ActiveRun): Promise<RunOutcome> {
    const { runId, conversation, stream, log } = run;
    const signal = run.controller.signal;
    const dispatcher = new ToolDispatcher({
      tools: this.deps.registry,
      emit: (event) => stream.emit(event),
      log,
      toolCallTimeoutMs: this.deps.toolCallTimeoutMs,
      elicit: (serverId, request) => this.elicit(run, serverId, request),
    });

    stream.emit({
      type: "run_started",
      runId,
      conversationId: conversation.id,
      model: conversation.model,
    });
    let iterations = 0;

    try {
      while (true) {
        if (signal.aborted) return this.finish(run, "cancelled", iterations);
        if (iterations >= this.deps.maxIterations) {
          return this.finish(run, "max_iterations", iterations);
        }
        iterations += 1;

        const owned = await this.deps.registry.tools();
        const wire = toWireMessages(conversation.messages, this.deps.systemPrompt);
        log.debug(
          { iteration: iterations, messageCount: wire.length, toolCount: owned.length },
          "agent.loop.iteration"
        );

        stream.holdNotifications();
        const turn = await this.streamTurn(run, {
          messages: wire,
          model: conversation.model,
          ...(owned.length > 0 && { tools: toLlmTools(owned), toolChoice: "auto" as const }),
          abortSignal: signal,
        });
        if (turn.cancelled && turn.content.length === 0 && turn.reasoning.length === 0) {
          stream.releaseNotifications();
          return this.finish(run, "cancelled", iterations);
        }

        const assistant: AssistantMessage = {
          id: this.generateId(),
          role: "assistant",
          timestamp: this.deps.clock.now(),
          content: turn.content,
          ...(turn.reasoning.length > 0 && { reasoning: turn.reasoning }),
          ...(turn.toolCalls.length > 0 && { toolCalls: turn.toolCalls }),
        };
        conversation.messages.push(assistant);
        run.toolGroupOpen = turn.toolCalls.length > 0;
        stream.emit({
          type: "message_finalized",
          runId,
          messageId: assistant.id,
          content: assistant.content,
          ...(assistant.reasoning !== undefined && { reasoning: assistant.reasoning }),
          toolCalls: turn.toolCalls,
          cancelled: turn.cancelled,
        });
        stream.releaseNotifications();

        if (turn.cancelled) return this.finish(run, "cancelled", iterations);
        if (turn.toolCalls.length === 0) return this.finish(run, "complete", iterations);

        const outcomes = await dispatcher.dispatch(turn.toolCalls, { signal });
        this.appendToolResults(conversation, turn.toolCalls, outcomes);
        run.toolGroupOpen = false;
        conversation.messages.push(...run.deferredContext.splice(0));
      }
    } catch (error) {
      stream.releaseNotifications();
      if (signal.aborted) return this.finish(run, "cancelled", iterations);
      const code = normalizeErrorToAgentCode(error);
      const message = error instanceof Error ? error.message : String(error);
      log.error({ err: error, code, iterations }, "agent.loop.run_failed");
      stream.emit({ type: "run_error", runId, code, message });
      return { runId, status: "error", iterations };
    }
  }

  private finish(run: ActiveRun, status: Exclude<RunStatus, "error">, iterations: number): RunOutcome {
    switch (status) {
      case "complete":
        run.stream.emit({ type: "run_complete", runId: run.runId, iterations });
        break;
      case "max_iterations":
        run.stream.emit({ type: "run_max_iterations", runId: run.runId, iterations });
        break;
      case "cancelled":
        run.stream.emit({ type: "run_cancelled", runId: run.runId });
        break;
    }
    run.log.info({ status, iterations }, "agent.loop.run_finished");
    return { runId: run.runId, status, iterations };
  }

  /**
   * Stream one completion. On cancellation the partial text is returned with
   * no tool calls, so a half-declared call is never recorded.
   */
  private async streamTurn(
    run: ActiveRun,
    params: CompletionParams
  ): Promise<StreamedTurn> {
    const signal = run.controller.signal;
    const { stream: deltas, final } = await this.deps.llm.completionStream(params);
    let content = "";
    let reasoning = "";
    let streamError: string | undefined;

    try {
      for await (const delta of deltas) {
        switch (delta.type) {
          case "text_delta":
            content += delta.delta;
            run.stream.emit({ type: "content_delta", runId: run.runId, delta: delta.delta });
            break;
          case "reasoning_delta":
            reasoning += delta.delta;
            run.stream.emit({ type: "reasoning_delta", runId: run.runId, delta: delta.delta });
            break;
          case "error":
            streamError = delta.error;
            break;
          case "tool_call_delta":
          case "done":
            break;
        }
        if (signal.aborted) break;
      }
    } catch (error) {
      if (!signal.aborted) {
        this.observeSettlement(run, final);
        throw error;
      }
    }

    if (signal.aborted) {
      this.observeSettlement(run, final);
      return { content, reasoning, toolCalls: [], cancelled: true };
    }

    const result = await final;
    if (streamError !== undefined) throw new LlmError(streamError, "unknown");
    return {
      content,
      reasoning: reasoning.length > 0 ? reasoning : (result.reasoning ?? ""),
      toolCalls: result.toolCalls,
      cancelled: false,
    };
  }

  /** The final promise of an abandoned stream still settles; record how. */
  private observeSettlement(run: ActiveRun, final: Promise<unknown>): void {
    final.then(
      () => run.log.debug("agent.loop.abandoned_stream_settled"),
      (error: unknown) =>
        run.log.debug(
          { reason: error instanceof Error ? error.message : String(error) },
          "agent.loop.abandoned_stream_failed"
        )
    );
  }

  private appendToolResults(
    conversation: Conversation,
    calls: readonly AgentToolCall[],
    outcomes: readonly ToolCallOutcome[]
  ): void {
    const byId = new Map(outcomes.map((outcome) => [outcome.toolCallId, outcome]));
    for (const call of calls) {
      const outcome = byId.get(call.id);
      if (!outcome) {
        throw new ContractViolationError(`No outcome for tool call ${call.id}`);
      }
      conversation.messages.push({
        id: this.generateId(),
        role: "tool",
        timestamp: this.deps.clock.now(),
        toolCallId: outcome.toolCallId,
        toolName: outcome.toolName,
        content: outcome.content,
        ...(outcome.isError && { isError: true }),
      });
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Server-initiated requests
  // ───────────────────────────────────────────────────────────────────────────

  private async handleSampling(
    run: ActiveRun,
    request: SamplingRequest,
    ctx: InboundRequestContext
  ): Promise<InboundOutcome<SamplingResult>> {
    const key = pendingKey(ctx.serverId, ctx.requestId);
    const decision = this.samplingDecisions.register(key);
    run.stream.emit({
      type: "sampling_request_pending",
      pendingKey: key,
      serverId: ctx.serverId,
      request,
    });

    const dispatcher = new ToolDispatcher({
      tools: this.deps.registry,
      emit: (event) => run.stream.emit(event),
      log: run.log.child({ sampling: key }),
      toolCallTimeoutMs: this.deps.toolCallTimeoutMs,
      elicit: (serverId, elicitation) => this.elicit(run, serverId, elicitation),
    });
    try {
      return await this.deps.sampling.process(request, {
        serverId: ctx.serverId,
        conversationModel: run.conversation.model,
        approve: () => decision,
        executeTools: (calls) => dispatcher.dispatch(calls, { signal: run.controller.signal }),
        signal: run.controller.signal,
      });
    } catch (error) {
      if (!isRunTeardown(error)) throw error;
      // the server still waits on its request; answer it as a rejection
      run.log.info({ pendingKey: key }, "agent.loop.sampling_abandoned");
      return { ok: false, code: SAMPLING_USER_REJECTED_CODE, message: SAMPLING_REJECTED_MESSAGE };
    }
  }

  /**
   * One elicitation round: a local card in the conversation, a pending entry,
   * and the user's response. Dispatcher-originated rounds get a local id.
   */
  private async elicit(
    run: ActiveRun,
    serverId: string,
    request: ElicitationRequest,
    requestId?: string | number
  ): Promise<ElicitationResponse> {
    this.localRequestSeq += 1;
    const key = pendingKey(serverId, requestId ?? `local-${this.localRequestSeq}`);
    const card: ElicitationMessage = {
      id: this.generateId(),
      role: "elicitation",
      timestamp: this.deps.clock.now(),
      serverId,
      request,
      status: "pending",
    };
    run.conversation.messages.push(card);

    const response = this.elicitationResponses.register(key);
    run.stream.emit({ type: "elicitation_request_pending", pendingKey: key, serverId, request });

    let status: ElicitationStatus = "cancelled";
    try {
      const answer = await response;
      status = elicitationStatus(answer);
      return answer;
    } catch (error) {
      // a server-originated round is answered with cancel; local rounds propagate
      if (requestId === undefined || !isRunTeardown(error)) throw error;
      run.log.info({ pendingKey: key }, "agent.loop.elicitation_abandoned");
      return { action: "cancel" };
    } finally {
      this.replaceMessage(run.conversation, card.id, { ...card, status });
    }
  }

  private replaceMessage(conversation: Conversation, id: string, next: Message): void {
    const index = conversation.messages.findIndex((message) => message.id === id);
    if (index >= 0) conversation.messages[index] = next;
  }
}
