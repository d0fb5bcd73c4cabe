// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@agent-relay/ai-core/execution/error-codes`
 * Purpose: Canonical run-level error codes, error class, and normalization for agent run failures.
 * Scope: Single source of truth for the codes carried by `run_error` events. Does NOT define business logic.
 * Invariants:
 *   - SINGLE_SOURCE_OF_TRUTH: All run error codes defined here
 *   - ERROR_NORMALIZATION_ONCE: normalizeErrorToAgentCode() is the canonical normalizer
 *   - Recognizes AbortError, any Error carrying a known `.code`, and LlmError (.kind, .status)
 * Side-effects: none
 * Links: llm-errors.ts, events/agent-events.ts
 * @public
 */

import { isLlmError } from "./llm-errors";

/**
 * Canonical codes for a failed agent run.
 * - invalid_request: backend rejected the request shape (4xx)
 * - timeout: backend or tool exceeded its time limit
 * - aborted: cancelled through an AbortSignal
 * - rate_limit: backend rate limit (HTTP 429)
 * - auth_required: credentials missing or rejected
 * - protocol: malformed or unexpected payload from a remote peer
 * - contract_violation: programming-contract breach (malformed conversation, double resolution)
 * - internal: anything else
 */
export const AGENT_ERROR_CODES = [
  "invalid_request",
  "timeout",
  "aborted",
  "rate_limit",
  "auth_required",
  "protocol",
  "contract_violation",
  "internal",
] as const;

export type AgentErrorCode = (typeof AGENT_ERROR_CODES)[number];

export function isAgentErrorCode(x: unknown): x is AgentErrorCode {
  return (
    typeof x === "string" &&
    AGENT_ERROR_CODES.some((code) => code === x)
  );
}

/**
 * Error that carries a structured AgentErrorCode through call chains.
 */
export class AgentExecutionError extends Error {
  readonly code: AgentErrorCode;

  constructor(code: AgentErrorCode, message?: string) {
    super(message ?? `Agent run failed: ${code}`);
    this.name = "AgentExecutionError";
    this.code = code;
  }
}

export function isAgentExecutionError(
  error: unknown
): error is AgentExecutionError {
  return error instanceof AgentExecutionError;
}

/**
 * Normalize any error to a stable AgentErrorCode.
 *
 * Priority:
 * 1. AbortError → "aborted"
 * 2. Error with a known `.code` → that code
 * 3. LlmError (.status, then .kind)
 * 4. Default → "internal"
 */
export function normalizeErrorToAgentCode(error: unknown): AgentErrorCode {
  if (error instanceof Error && error.name === "AbortError") {
    return "aborted";
  }

  if (error instanceof Error && "code" in error && isAgentErrorCode(error.code)) {
    return error.code;
  }

  if (isLlmError(error)) {
    if (error.status === 429) return "rate_limit";
    if (error.status === 408) return "timeout";

    switch (error.kind) {
      case "rate_limited":
        return "rate_limit";
      case "timeout":
        return "timeout";
      case "aborted":
        return "aborted";
      case "auth":
        return "auth_required";
      case "provider_4xx":
        return "invalid_request";
      case "malformed_response":
        return "protocol";
      default:
        return "internal";
    }
  }

  return "internal";
}
