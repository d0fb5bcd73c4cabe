// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/persistence.port`
 * Purpose: Read/write contract for tool protocol sessions and OAuth token bundles.
 * Scope: Interface only. The storage engine behind it is the caller's concern.
 * Invariants:
 *   - Sessions are keyed by (conversationId, serverId); tokens by serverId
 *   - Saving `undefined` clears the entry
 *   - Token bundles are written only by the token lifecycle manager
 * Side-effects: none (interface only)
 * Links: adapters/server/persistence/in-memory.persistence.adapter.ts
 * @public
 */

import type { TokenBundle } from "@/core";

export interface PersistencePort {
  loadSession(conversationId: string, serverId: string): Promise<string | undefined>;
  saveSession(
    conversationId: string,
    serverId: string,
    sessionId: string | undefined
  ): Promise<void>;
  loadTokens(serverId: string): Promise<TokenBundle | undefined>;
  saveTokens(serverId: string, tokens: TokenBundle | undefined): Promise<void>;
}
