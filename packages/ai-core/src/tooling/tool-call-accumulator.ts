// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@agent-relay/ai-core/tooling/tool-call-accumulator`
 * Purpose: Folds streamed tool-call deltas into complete tool calls.
 * Scope: Pure accumulation keyed by delta index. Does NOT parse arguments or execute tools.
 * Invariants:
 *   - Calls are returned in ascending delta index order
 *   - Argument fragments are concatenated in arrival order
 *   - A slot that never received a name is dropped
 * Side-effects: none
 * @public
 */

import type { AgentToolCall, ToolCallDelta } from "./types";

interface Slot {
  id: string | undefined;
  name: string;
  arguments: string;
}

export class ToolCallAccumulator {
  private readonly slots = new Map<number, Slot>();

  push(delta: ToolCallDelta): void {
    let slot = this.slots.get(delta.index);
    if (!slot) {
      slot = { id: undefined, name: "", arguments: "" };
      this.slots.set(delta.index, slot);
    }
    if (delta.id) slot.id = delta.id;
    if (delta.function?.name) slot.name += delta.function.name;
    if (delta.function?.arguments) slot.arguments += delta.function.arguments;
  }

  get size(): number {
    return this.slots.size;
  }

  /**
   * Completed calls. Missing ids are filled from `generateId`; empty
   * argument strings become "{}".
   */
  finish(generateId: () => string): AgentToolCall[] {
    return [...this.slots.entries()]
      .sort(([a], [b]) => a - b)
      .filter(([, slot]) => slot.name.length > 0)
      .map(([, slot]) => ({
        id: slot.id ?? generateId(),
        name: slot.name,
        arguments: slot.arguments.length > 0 ? slot.arguments : "{}",
      }));
  }
}
