// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@agent-relay/ai-core/execution/llm-errors`
 * Purpose: Error type thrown by chat-completions adapters at the HTTP/stream boundary.
 * Scope: Defines LlmError and its status classifier. Does not normalize (see error-codes.ts).
 * Invariants:
 *   - LlmError captures kind + optional HTTP status at throw site
 *   - classifyLlmErrorFromStatus is the only status → kind mapping
 * Side-effects: none
 * Links: error-codes.ts (normalizeErrorToAgentCode)
 * @public
 */

/**
 * Failure kinds for LLM backend calls.
 * `malformed_response` covers bodies that are not parseable chat-completions payloads.
 */
export type LlmErrorKind =
  | "timeout"
  | "rate_limited"
  | "auth"
  | "provider_4xx"
  | "provider_5xx"
  | "malformed_response"
  | "aborted"
  | "unknown";

export class LlmError extends Error {
  readonly kind: LlmErrorKind;
  readonly status: number | undefined;

  constructor(message: string, kind: LlmErrorKind, status?: number) {
    super(message);
    this.name = "LlmError";
    this.kind = kind;
    this.status = status;
  }
}

export function isLlmError(error: unknown): error is LlmError {
  return error instanceof LlmError;
}

export function classifyLlmErrorFromStatus(status: number): LlmErrorKind {
  if (status === 408) return "timeout";
  if (status === 429) return "rate_limited";
  if (status === 401 || status === 403) return "auth";
  if (status >= 400 && status < 500) return "provider_4xx";
  if (status >= 500 && status < 600) return "provider_5xx";
  return "unknown";
}
