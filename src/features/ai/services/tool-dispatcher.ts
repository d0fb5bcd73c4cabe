// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/services/tool-dispatcher`
 * Purpose: Executes a batch of model tool calls against their owning servers and turns every failure into a tool-result outcome.
 * Scope: Shared by the agentic loop and the sampling processor. Does not append messages or talk to the LLM.
 * Invariants:
 *   - OUTCOMES_IN_CALL_ORDER: outcomes are returned in the order the calls were declared
 *   - ONE_OUTCOME_PER_CALL: every call yields exactly one outcome; only contract violations escape
 *   - STARTED_BEFORE_FINISHED: tool_call_started precedes tool_call_finished for each call
 *   - ELICITATION_ROUNDS_BOUNDED: at most 3 elicitation rounds per call before giving up
 * Side-effects: IO (tool server calls), emits AgentEvents
 * Links: tool-server-registry.ts, agentic-loop.ts, sampling-processor.ts
 * @public
 */

import type {
  AgentToolCall,
  ElicitationRequest,
  ElicitationResponse,
  EmitAgentEvent,
  ToolCallOutcome,
  ToolErrorCode,
} from "@agent-relay/ai-core";
import type { Logger } from "pino";

import { parseToolArguments, toolResultText } from "@/core";
import type { ToolServerConnection } from "@/ports";
import {
  AuthRequiredError,
  ElicitationRequiredError,
  isContractViolation,
  ProtocolError,
  ToolCallTimeoutError,
  TransportError,
} from "@/shared/errors";

export const MAX_ELICITATION_ROUNDS = 3;

export interface ToolResolver {
  resolve(toolName: string): ToolServerConnection | undefined;
}

export type ElicitFn = (
  serverId: string,
  request: ElicitationRequest
) => Promise<ElicitationResponse>;

export interface ToolDispatcherDeps {
  readonly tools: ToolResolver;
  readonly emit: EmitAgentEvent;
  readonly log: Logger;
  readonly toolCallTimeoutMs: number;
  /** Runs one elicitation round for ElicitationRequiredError; absent means none can be answered */
  readonly elicit?: ElicitFn;
}

export interface DispatchOptions {
  readonly signal?: AbortSignal;
}

type Failure = { readonly content: string; readonly errorCode: ToolErrorCode };

class ElicitationDeclined extends Error {
  constructor(readonly action: "decline" | "cancel") {
    super(`User ${action === "decline" ? "declined" : "cancelled"} the request`);
    this.name = "ElicitationDeclined";
  }
}

export class ToolDispatcher {
  constructor(private readonly deps: ToolDispatcherDeps) {}

  async dispatch(
    calls: readonly AgentToolCall[],
    options: DispatchOptions = {}
  ): Promise<ToolCallOutcome[]> {
    return Promise.all(calls.map((call) => this.dispatchOne(call, options)));
  }

  private async dispatchOne(
    call: AgentToolCall,
    options: DispatchOptions
  ): Promise<ToolCallOutcome> {
    const connection = this.deps.tools.resolve(call.name);
    const serverId = connection?.serverId;
    const parsedArgs = parseToolArguments(call.arguments);

    this.deps.emit({
      type: "tool_call_started",
      toolCallId: call.id,
      toolName: call.name,
      serverId,
      args: parsedArgs.ok ? parsedArgs.value : {},
    });

    let outcome: ToolCallOutcome;
    if (!connection) {
      outcome = this.failed(call, undefined, {
        content: `Tool not found: ${call.name}`,
        errorCode: "tool_not_found",
      });
    } else if (!parsedArgs.ok) {
      outcome = this.failed(call, connection.serverId, {
        content: `Invalid arguments for ${call.name}: ${parsedArgs.error}`,
        errorCode: "invalid_arguments",
      });
    } else {
      outcome = await this.execute(call, connection, parsedArgs.value, options);
    }

    this.deps.emit({
      type: "tool_call_finished",
      toolCallId: outcome.toolCallId,
      toolName: outcome.toolName,
      serverId: outcome.serverId,
      content: outcome.content,
      isError: outcome.isError,
      ...(outcome.errorCode !== undefined && { errorCode: outcome.errorCode }),
    });
    return outcome;
  }

  private async execute(
    call: AgentToolCall,
    connection: ToolServerConnection,
    args: Record<string, unknown>,
    options: DispatchOptions
  ): Promise<ToolCallOutcome> {
    const log = this.deps.log.child({ toolName: call.name, serverId: connection.serverId });
    const started = Date.now();

    for (let round = 0; ; round++) {
      try {
        const result = await connection.callTool(call.name, args, {
          timeoutMs: this.deps.toolCallTimeoutMs,
          ...(options.signal ? { signal: options.signal } : {}),
        });
        log.info(
          { durationMs: Date.now() - started, isError: result.isError, rounds: round },
          "agent.tool.call_complete"
        );
        return {
          toolCallId: call.id,
          toolName: call.name,
          serverId: connection.serverId,
          content: toolResultText(result),
          isError: result.isError,
        };
      } catch (error) {
        if (isContractViolation(error)) throw error;

        if (error instanceof ElicitationRequiredError && round < MAX_ELICITATION_ROUNDS) {
          try {
            await this.runElicitations(connection.serverId, error.elicitations);
            continue;
          } catch (elicitationError) {
            if (isContractViolation(elicitationError)) throw elicitationError;
            if (elicitationError instanceof ElicitationDeclined) {
              return this.failed(call, connection.serverId, {
                content: `${elicitationError.message} from ${connection.serverName}; tool ${call.name} was not run`,
                errorCode: "user_declined",
              });
            }
            return this.failed(
              call,
              connection.serverId,
              this.classify(elicitationError, connection, options.signal)
            );
          }
        }

        const failure = this.classify(error, connection, options.signal);
        log.warn(
          { durationMs: Date.now() - started, errorCode: failure.errorCode },
          "agent.tool.call_failed"
        );
        return this.failed(call, connection.serverId, failure);
      }
    }
  }

  private async runElicitations(
    serverId: string,
    elicitations: readonly ElicitationRequest[]
  ): Promise<void> {
    const elicit = this.deps.elicit;
    if (!elicit) throw new ElicitationDeclined("cancel");
    for (const request of elicitations) {
      const response = await elicit(serverId, request);
      if (response.action !== "accept") throw new ElicitationDeclined(response.action);
    }
  }

  private classify(
    error: unknown,
    connection: ToolServerConnection,
    signal: AbortSignal | undefined
  ): Failure {
    if (signal?.aborted) {
      return { content: "Tool call cancelled", errorCode: "aborted" };
    }
    if (error instanceof ToolCallTimeoutError) {
      return {
        content: `Tool call timed out after ${error.timeoutMs}ms`,
        errorCode: "timeout",
      };
    }
    if (error instanceof AuthRequiredError) {
      return {
        content: `Authorization required for tool server ${connection.serverName}`,
        errorCode: "auth_required",
      };
    }
    if (error instanceof ElicitationRequiredError) {
      return {
        content: `Tool server ${connection.serverName} still requires user input after ${MAX_ELICITATION_ROUNDS} attempts`,
        errorCode: "user_declined",
      };
    }
    if (error instanceof TransportError) {
      return { content: `Tool server unreachable: ${error.message}`, errorCode: "transport" };
    }
    if (error instanceof ProtocolError) {
      return { content: `Tool server error: ${error.message}`, errorCode: "protocol" };
    }
    return {
      content: `Error: ${error instanceof Error ? error.message : String(error)}`,
      errorCode: "execution",
    };
  }

  private failed(
    call: AgentToolCall,
    serverId: string | undefined,
    failure: Failure
  ): ToolCallOutcome {
    return {
      toolCallId: call.id,
      toolName: call.name,
      serverId,
      content: failure.content,
      isError: true,
      errorCode: failure.errorCode,
    };
  }
}
