// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/ai/event-collector`
 * Purpose: Drains a run's event iterable into an array, with an optional hook per event.
 * Scope: Test helper. Does NOT filter or reorder events.
 * Side-effects: none
 * @public
 */

import type { AgentEvent, AgentEventType } from "@agent-relay/ai-core";

export async function collectEvents(
  events: AsyncIterable<AgentEvent>,
  onEvent?: (event: AgentEvent) => void | Promise<void>
): Promise<AgentEvent[]> {
  const seen: AgentEvent[] = [];
  for await (const event of events) {
    seen.push(event);
    if (onEvent) await onEvent(event);
  }
  return seen;
}

export function eventTypes(events: readonly AgentEvent[]): AgentEventType[] {
  return events.map((event) => event.type);
}

export function ofType<T extends AgentEventType>(
  events: readonly AgentEvent[],
  type: T
): Extract<AgentEvent, { type: T }>[] {
  return events.filter((event): event is Extract<AgentEvent, { type: T }> => event.type === type);
}
