// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/services/pending-requests`
 * Purpose: Table of server-initiated requests awaiting a human decision (sampling approval, elicitation).
 * Scope: Keyed promises with exactly-once settlement. Does not talk to servers or emit events.
 * Invariants:
 *   - KEY_FORMAT: `<serverId>:<requestId>`
 *   - RESOLVE_EXACTLY_ONCE: a second resolve of the same key throws ContractViolationError
 *   - rejectAll() settles every open entry; later resolves of those keys also throw
 *   - SETTLED_HISTORY_BOUNDED: only the most recent settled keys are remembered for the "already resolved" message
 * Side-effects: none
 * Links: agentic-loop.ts
 * @public
 */

import type { JsonRpcId } from "@/ports";
import { ContractViolationError } from "@/shared/errors";

interface PendingEntry<T> {
  readonly resolve: (value: T) => void;
  readonly reject: (reason: unknown) => void;
}

export function pendingKey(serverId: string, requestId: JsonRpcId): string {
  return `${serverId}:${String(requestId)}`;
}

const DEFAULT_SETTLED_HISTORY = 256;

export interface PendingRequestTableOptions {
  readonly settledHistory?: number;
}

export class PendingRequestTable<T> {
  private readonly open = new Map<string, PendingEntry<T>>();
  private readonly settled = new Set<string>();
  private readonly settledHistory: number;

  constructor(options: PendingRequestTableOptions = {}) {
    this.settledHistory = options.settledHistory ?? DEFAULT_SETTLED_HISTORY;
  }

  get size(): number {
    return this.open.size;
  }

  has(key: string): boolean {
    return this.open.has(key);
  }

  register(key: string): Promise<T> {
    if (this.open.has(key)) {
      throw new ContractViolationError(`Pending request ${key} is already registered`);
    }
    this.settled.delete(key);
    return new Promise<T>((resolve, reject) => {
      this.open.set(key, { resolve, reject });
    });
  }

  resolve(key: string, value: T): void {
    this.settle(key).resolve(value);
  }

  reject(key: string, reason: unknown): void {
    this.settle(key).reject(reason);
  }

  rejectAll(reason: unknown): void {
    for (const key of [...this.open.keys()]) this.reject(key, reason);
  }

  private settle(key: string): PendingEntry<T> {
    const entry = this.open.get(key);
    if (!entry) {
      throw new ContractViolationError(
        this.settled.has(key)
          ? `Pending request ${key} was already resolved`
          : `No pending request ${key}`
      );
    }
    this.open.delete(key);
    this.remember(key);
    return entry;
  }

  private remember(key: string): void {
    this.settled.add(key);
    // Set iteration is insertion order, so the first key is the oldest
    for (const oldest of this.settled) {
      if (this.settled.size <= this.settledHistory) break;
      this.settled.delete(oldest);
    }
  }
}
