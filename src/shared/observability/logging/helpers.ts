// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/helpers`
 * Purpose: Standardized logging helpers for outbound exchanges (JSON-RPC calls, LLM calls, token requests).
 * Scope: Consistent end-of-exchange logging. Does not handle domain-specific events.
 * Invariants: Same keys everywhere (method, status, durationMs, errorKind). Never logs payloads.
 * Side-effects: IO (emits structured log entries via provided logger)
 * @public
 */

import type { Logger } from "pino";

/**
 * Log the end of an outbound exchange.
 * Level follows the outcome: error for failures, warn for 4xx, info otherwise.
 *
 * @param log - Component child logger (serverId etc. already bound)
 */
export function logExchangeEnd(
  log: Logger,
  meta: {
    method: string;
    durationMs: number;
    status?: number;
    errorKind?: string;
  }
): void {
  const level = meta.errorKind
    ? "error"
    : meta.status !== undefined && meta.status >= 400
      ? "warn"
      : "info";
  log[level](meta, "exchange complete");
}
