// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/services/event-stream`
 * Purpose: Per-run fanout of AgentEvents to listeners and async-iterable consumers, with notification hold-back.
 * Scope: Delivery and ordering only. Does not decide what a notification means for the conversation.
 * Invariants:
 *   - EMIT_ORDER: every consumer sees events in emit order
 *   - NOTIFICATIONS_HELD_WHILE_STREAMING: between holdNotifications() and releaseNotifications()
 *     server notifications are queued, then released in arrival order
 *   - Events emitted after close() are dropped
 *   - A throwing listener is logged and never breaks delivery to others
 * Side-effects: none (invokes listeners)
 * Links: agentic-loop.ts, @agent-relay/ai-core AgentEvent
 * @public
 */

import type { AgentEvent } from "@agent-relay/ai-core";
import type { Logger } from "pino";

import type { ServerNotification } from "@/ports";

export type AgentEventListener = (event: AgentEvent) => void;

interface QueueSubscriber {
  readonly queue: AgentEvent[];
  wake: (() => void) | null;
}

export class AgentEventStream {
  private readonly listeners = new Set<AgentEventListener>();
  private readonly subscribers = new Set<QueueSubscriber>();
  private readonly heldNotifications: ServerNotification[] = [];
  private holding = false;
  private closed = false;

  constructor(
    private readonly log: Logger,
    /** Called for each notification as it is released, before its event is emitted */
    private readonly onNotificationReleased?: (notification: ServerNotification) => void
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  subscribe(listener: AgentEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  emit(event: AgentEvent): void {
    if (this.closed) {
      this.log.debug({ type: event.type }, "agent.events.dropped_after_close");
      return;
    }
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.log.error({ err: error, type: event.type }, "agent.events.listener_failed");
      }
    }
    for (const subscriber of this.subscribers) {
      subscriber.queue.push(event);
      this.wake(subscriber);
    }
  }

  /**
   * Async view starting at the moment of the call (not at first `next()`).
   * Ends after close() once the queue is drained.
   */
  events(): AsyncIterable<AgentEvent> {
    const subscriber: QueueSubscriber = { queue: [], wake: null };
    this.subscribers.add(subscriber);

    return this.drain(subscriber);
  }

  private async *drain(subscriber: QueueSubscriber): AsyncGenerator<AgentEvent> {
    try {
      while (true) {
        while (subscriber.queue.length > 0) {
          const event = subscriber.queue.shift();
          if (event) yield event;
        }
        if (this.closed) return;
        await new Promise<void>((resolve) => {
          subscriber.wake = resolve;
        });
      }
    } finally {
      this.subscribers.delete(subscriber);
    }
  }

  holdNotifications(): void {
    this.holding = true;
  }

  pushNotification(notification: ServerNotification): void {
    if (this.holding) {
      this.heldNotifications.push(notification);
      return;
    }
    this.release(notification);
  }

  /** Stop holding and release everything queued, oldest first. */
  releaseNotifications(): ServerNotification[] {
    this.holding = false;
    const released = this.heldNotifications.splice(0);
    for (const notification of released) this.release(notification);
    return released;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.heldNotifications.length = 0;
    for (const subscriber of this.subscribers) this.wake(subscriber);
  }

  private release(notification: ServerNotification): void {
    this.onNotificationReleased?.(notification);
    this.emit({
      type: "notification_flushed",
      serverId: notification.serverId,
      serverName: notification.serverName,
      method: notification.method,
      ...(notification.params !== undefined && { params: notification.params }),
    });
  }

  private wake(subscriber: QueueSubscriber): void {
    const wake = subscriber.wake;
    subscriber.wake = null;
    wake?.();
  }
}
