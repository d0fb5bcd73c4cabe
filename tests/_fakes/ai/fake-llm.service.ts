// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/ai/fake-llm.service`
 * Purpose: Scripted LLM service for driving the agentic loop and the sampling processor turn by turn.
 * Scope: Plays back queued turns and logs every request. Does NOT test real LLM integration.
 * Invariants:
 *   - Turns are consumed in order; running out of turns throws
 *   - A `wait` step blocks the stream until its promise settles or the request is aborted
 *   - An aborted stream ends early and its `final` rejects with LlmError(kind='aborted')
 * Side-effects: none
 * Links: ports/llm.port.ts
 * @public
 */

import { type AgentToolCall, LlmError } from "@agent-relay/ai-core";

import type {
  ChatDeltaEvent,
  CompletionParams,
  LlmCompletionResult,
  LlmService,
} from "@/ports";

export type ScriptStep = ChatDeltaEvent | { type: "wait"; until: Promise<void> };

export interface ScriptedTurn {
  readonly steps?: readonly ScriptStep[];
  readonly toolCalls?: readonly AgentToolCall[];
  readonly finishReason?: string;
  readonly reasoning?: string;
  readonly resolvedModel?: string;
  /** Thrown from completion()/completionStream() before anything streams */
  readonly error?: Error;
}

/** Text deltas for each chunk, in order. */
export function textSteps(...chunks: string[]): ScriptStep[] {
  return chunks.map((delta) => ({ type: "text_delta", delta }));
}

function untilAborted(signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve) => {
    if (!signal) return;
    if (signal.aborted) resolve();
    else signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

function turnContent(steps: readonly ScriptStep[]): string {
  return steps.map((step) => (step.type === "text_delta" ? step.delta : "")).join("");
}

export class ScriptedLlmService implements LlmService {
  public readonly callLog: CompletionParams[] = [];
  private readonly turns: ScriptedTurn[];

  constructor(turns: readonly ScriptedTurn[] = []) {
    this.turns = [...turns];
  }

  enqueue(...turns: ScriptedTurn[]): void {
    this.turns.push(...turns);
  }

  get remainingTurns(): number {
    return this.turns.length;
  }

  private next(params: CompletionParams): ScriptedTurn {
    this.callLog.push(params);
    const turn = this.turns.shift();
    if (!turn) throw new Error(`No scripted turn left for call ${this.callLog.length}`);
    if (turn.error) throw turn.error;
    return turn;
  }

  private result(turn: ScriptedTurn, params: CompletionParams): LlmCompletionResult {
    const toolCalls = [...(turn.toolCalls ?? [])];
    return {
      content: turnContent(turn.steps ?? []),
      toolCalls,
      finishReason: turn.finishReason ?? (toolCalls.length > 0 ? "tool_calls" : "stop"),
      resolvedModel: turn.resolvedModel ?? params.model,
      ...(turn.reasoning !== undefined && { reasoning: turn.reasoning }),
    };
  }

  async completion(params: CompletionParams): Promise<LlmCompletionResult> {
    const turn = this.next(params);
    return this.result(turn, params);
  }

  async completionStream(params: CompletionParams): Promise<{
    stream: AsyncIterable<ChatDeltaEvent>;
    final: Promise<LlmCompletionResult>;
  }> {
    const turn = this.next(params);
    const signal = params.abortSignal;

    let settle: { resolve: (r: LlmCompletionResult) => void; reject: (e: unknown) => void } = {
      resolve: () => undefined,
      reject: () => undefined,
    };
    const final = new Promise<LlmCompletionResult>((resolve, reject) => {
      settle = { resolve, reject };
    });
    const finish = (): void => {
      if (signal?.aborted) settle.reject(new LlmError("Request aborted", "aborted"));
      else settle.resolve(this.result(turn, params));
    };

    const stream = (async function* (): AsyncGenerator<ChatDeltaEvent> {
      try {
        for (const step of turn.steps ?? []) {
          if (signal?.aborted) return;
          if (step.type === "wait") {
            await Promise.race([step.until, untilAborted(signal)]);
            continue;
          }
          yield step;
        }
        if (!signal?.aborted) yield { type: "done" };
      } finally {
        finish();
      }
    })();

    return { stream, final };
  }
}
