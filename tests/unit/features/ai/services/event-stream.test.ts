// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/services/event-stream`
 * Purpose: Verifies event fanout order, close semantics and notification hold-back.
 * Scope: AgentEventStream in isolation.
 * Side-effects: none
 * Links: src/features/ai/services/event-stream.ts
 * @public
 */

import type { AgentEvent } from "@agent-relay/ai-core";
import { collectEvents, eventTypes } from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import { AgentEventStream } from "@/features/ai/services/event-stream";
import type { ServerNotification } from "@/ports";
import { makeNoopLogger } from "@/shared/observability";

const started: AgentEvent = { type: "run_started", runId: "run-1", conversationId: "conv-1", model: "m" };
const delta: AgentEvent = { type: "content_delta", runId: "run-1", delta: "Hi" };
const complete: AgentEvent = { type: "run_complete", runId: "run-1", iterations: 1 };

function notification(method: string): ServerNotification {
  return { serverId: "files", serverName: "Files", method };
}

describe("AgentEventStream", () => {
  it("delivers events in emit order and ends the iterator on close", async () => {
    const stream = new AgentEventStream(makeNoopLogger());
    const events = stream.events();

    stream.emit(started);
    stream.emit(delta);
    stream.emit(complete);
    stream.close();

    expect(await collectEvents(events)).toEqual([started, delta, complete]);
  });

  it("drops events emitted after close", async () => {
    const stream = new AgentEventStream(makeNoopLogger());
    const seen: AgentEvent[] = [];
    stream.subscribe((event) => seen.push(event));

    stream.close();
    stream.emit(delta);

    expect(seen).toEqual([]);
    expect(stream.isClosed).toBe(true);
  });

  it("keeps delivering when a listener throws", () => {
    const stream = new AgentEventStream(makeNoopLogger());
    const seen: AgentEvent[] = [];
    stream.subscribe(() => {
      throw new Error("listener bug");
    });
    stream.subscribe((event) => seen.push(event));

    stream.emit(delta);

    expect(seen).toEqual([delta]);
  });

  it("holds notifications until released, then flushes them oldest first", () => {
    const released: string[] = [];
    const stream = new AgentEventStream(makeNoopLogger(), (n) => released.push(n.method));
    const seen: AgentEvent[] = [];
    stream.subscribe((event) => seen.push(event));

    stream.holdNotifications();
    stream.pushNotification(notification("notifications/message"));
    stream.pushNotification(notification("notifications/progress"));
    expect(seen).toEqual([]);

    stream.emit(delta);
    const flushed = stream.releaseNotifications();

    expect(flushed.map((n) => n.method)).toEqual(["notifications/message", "notifications/progress"]);
    expect(released).toEqual(["notifications/message", "notifications/progress"]);
    expect(eventTypes(seen)).toEqual(["content_delta", "notification_flushed", "notification_flushed"]);
    expect(seen[1]).toEqual({
      type: "notification_flushed",
      serverId: "files",
      serverName: "Files",
      method: "notifications/message",
    });
  });

  it("passes notifications straight through when not holding", () => {
    const stream = new AgentEventStream(makeNoopLogger());
    const seen: AgentEvent[] = [];
    stream.subscribe((event) => seen.push(event));

    stream.pushNotification({ ...notification("notifications/message"), params: { level: "info" } });

    expect(seen).toEqual([
      {
        type: "notification_flushed",
        serverId: "files",
        serverName: "Files",
        method: "notifications/message",
        params: { level: "info" },
      },
    ]);
  });
});
