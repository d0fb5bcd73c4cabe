// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/mcp/client-lock`
 * Purpose: Per-client serial lock that is re-entrant for work started inside the holder's async context.
 * Scope: FIFO serialization of exchanges on one tool server connection. Does not time out waiters.
 * Invariants:
 *   - SERIAL_PER_CLIENT: at most one top-level exchange chain runs at a time
 *   - REENTRANT_INBOUND: calls made from an inbound handler (sampling → tools/call) run immediately
 *     instead of queueing behind the exchange that is waiting on that handler
 * Side-effects: none
 * Notes: Holder identity travels through AsyncLocalStorage, the same way run context does elsewhere.
 * @internal
 */

import { AsyncLocalStorage } from "node:async_hooks";

export class SerialLock {
  private tail: Promise<void> = Promise.resolve();
  private readonly holder = new AsyncLocalStorage<symbol>();
  private readonly token = Symbol("serial-lock");

  get isHeldByCurrentContext(): boolean {
    return this.holder.getStore() === this.token;
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    if (this.isHeldByCurrentContext) return fn();

    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await this.holder.run(this.token, fn);
    } finally {
      release();
    }
  }
}

/**
 * Abortable deadline that can be paused, so time spent waiting on a human
 * (sampling approval, elicitation) does not count against a call's timeout.
 */
export class Deadline {
  private readonly controller = new AbortController();
  private timer: ReturnType<typeof setTimeout> | undefined;
  private remainingMs: number;
  private startedAt = 0;
  private _expired = false;
  private pauses = 0;

  constructor(readonly timeoutMs: number) {
    this.remainingMs = timeoutMs;
    this.start();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get expired(): boolean {
    return this._expired;
  }

  private start(): void {
    this.startedAt = Date.now();
    this.timer = setTimeout(() => {
      this._expired = true;
      this.controller.abort();
    }, this.remainingMs);
  }

  pause(): void {
    this.pauses += 1;
    if (this.pauses > 1 || this.timer === undefined) return;
    clearTimeout(this.timer);
    this.timer = undefined;
    this.remainingMs = Math.max(0, this.remainingMs - (Date.now() - this.startedAt));
  }

  resume(): void {
    if (this.pauses === 0) return;
    this.pauses -= 1;
    if (this.pauses === 0 && !this._expired && this.timer === undefined) this.start();
  }

  clear(): void {
    if (this.timer !== undefined) clearTimeout(this.timer);
    this.timer = undefined;
  }
}
