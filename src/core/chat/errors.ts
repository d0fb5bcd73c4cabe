// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/chat/errors`
 * Purpose: Domain error for conversation histories that cannot be materialized.
 * Scope: Pure error type. Does not log.
 * Invariants: Carries code "contract_violation" so the run stops with a run_error.
 * Side-effects: none
 * @public
 */

import { AgentExecutionError } from "@agent-relay/ai-core";

export class ConversationStateError extends AgentExecutionError {
  constructor(
    message: string,
    /** Offending message id, when one can be named */
    public readonly messageId?: string
  ) {
    super("contract_violation", message);
    this.name = "ConversationStateError";
  }
}

export function isConversationStateError(
  error: unknown
): error is ConversationStateError {
  return error instanceof ConversationStateError;
}
