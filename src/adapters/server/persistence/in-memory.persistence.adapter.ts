// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/persistence/in-memory`
 * Purpose: Process-local PersistencePort for sessions and token bundles.
 * Scope: Map-backed storage. Does not survive restarts; embedders supply their own adapter for durable storage.
 * Invariants: Saving undefined deletes the entry; token bundles are stored as given (immutable values).
 * Side-effects: none (in-memory state only)
 * Links: Implements PersistencePort
 * @internal
 */

import type { TokenBundle } from "@/core";
import type { PersistencePort } from "@/ports";

export class InMemoryPersistenceAdapter implements PersistencePort {
  private readonly sessions = new Map<string, string>();
  private readonly tokens = new Map<string, TokenBundle>();

  private static sessionKey(conversationId: string, serverId: string): string {
    return `${conversationId}\u0000${serverId}`;
  }

  async loadSession(
    conversationId: string,
    serverId: string
  ): Promise<string | undefined> {
    return this.sessions.get(
      InMemoryPersistenceAdapter.sessionKey(conversationId, serverId)
    );
  }

  async saveSession(
    conversationId: string,
    serverId: string,
    sessionId: string | undefined
  ): Promise<void> {
    const key = InMemoryPersistenceAdapter.sessionKey(conversationId, serverId);
    if (sessionId === undefined) this.sessions.delete(key);
    else this.sessions.set(key, sessionId);
  }

  async loadTokens(serverId: string): Promise<TokenBundle | undefined> {
    return this.tokens.get(serverId);
  }

  async saveTokens(
    serverId: string,
    tokens: TokenBundle | undefined
  ): Promise<void> {
    if (tokens === undefined) this.tokens.delete(serverId);
    else this.tokens.set(serverId, tokens);
  }
}
