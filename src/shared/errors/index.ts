// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/errors`
 * Purpose: Shared error taxonomy for tool-server exchanges, OAuth, and programming-contract breaches.
 * Scope: Exports error classes and type guards. Does not handle error reporting or logging.
 * Invariants:
 *   - Every ToolProtocolError carries a `kind` discriminant; callers switch on kind, not on message text
 *   - ToolCallTimeoutError is a TransportError with kind "timeout" (never conflated with ProtocolError)
 *   - ElicitationRequiredError is a control-flow signal, not a failure
 *   - ContractViolationError is fatal: it carries code "contract_violation" and stops the run
 * Side-effects: none
 * Links: @agent-relay/ai-core normalizeErrorToAgentCode
 * @public
 */

import {
  AgentExecutionError,
  type ElicitationRequest,
} from "@agent-relay/ai-core";

export type ToolProtocolErrorKind =
  | "transport"
  | "timeout"
  | "protocol"
  | "auth_required"
  | "session_lost"
  | "elicitation_required";

export abstract class ToolProtocolError extends Error {
  abstract readonly kind: ToolProtocolErrorKind;
  readonly serverId: string | undefined;

  constructor(message: string, serverId?: string, options?: ErrorOptions) {
    super(message, options);
    this.serverId = serverId;
  }
}

export function isToolProtocolError(error: unknown): error is ToolProtocolError {
  return error instanceof ToolProtocolError;
}

/** Network failure: connection refused, reset, non-JSON 5xx. Retried at most once per call. */
export class TransportError extends ToolProtocolError {
  readonly kind: ToolProtocolErrorKind = "transport";
  readonly status: number | undefined;

  constructor(
    message: string,
    opts: { serverId?: string; status?: number; cause?: unknown } = {}
  ) {
    super(message, opts.serverId, { cause: opts.cause });
    this.name = "TransportError";
    this.status = opts.status;
  }
}

export class ToolCallTimeoutError extends TransportError {
  override readonly kind: ToolProtocolErrorKind = "timeout";
  readonly timeoutMs: number;

  constructor(method: string, timeoutMs: number, serverId?: string) {
    super(`${method} timed out after ${timeoutMs}ms`, { serverId });
    this.name = "ToolCallTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Malformed or unexpected JSON-RPC payload, or a JSON-RPC error object. Never retried. */
export class ProtocolError extends ToolProtocolError {
  readonly kind: ToolProtocolErrorKind = "protocol";
  /** JSON-RPC error code when the server sent one */
  readonly rpcCode: number | undefined;
  readonly data: unknown;

  constructor(
    message: string,
    opts: { serverId?: string; rpcCode?: number; data?: unknown; cause?: unknown } = {}
  ) {
    super(message, opts.serverId, { cause: opts.cause });
    this.name = "ProtocolError";
    this.rpcCode = opts.rpcCode;
    this.data = opts.data;
  }
}

/**
 * 401-class response, or no usable token to send. Halts the server's calls
 * until re-authenticated. A server challenge carries its HTTP status and the
 * WWW-Authenticate hints so discovery can start from them; `status` is
 * undefined when the token provider gave up locally.
 */
export class AuthRequiredError extends ToolProtocolError {
  readonly kind: ToolProtocolErrorKind = "auth_required";
  readonly status: number | undefined;
  readonly resourceMetadataUrl: string | undefined;
  readonly scope: string | undefined;

  constructor(
    message: string,
    opts: { serverId?: string; status?: number; resourceMetadataUrl?: string; scope?: string } = {}
  ) {
    super(message, opts.serverId);
    this.name = "AuthRequiredError";
    this.status = opts.status;
    this.resourceMetadataUrl = opts.resourceMetadataUrl;
    this.scope = opts.scope;
  }

  get challengedByServer(): boolean {
    return this.status !== undefined;
  }
}

/** Session not found on the server. Handled inside the client by re-initializing. */
export class SessionLostError extends ToolProtocolError {
  readonly kind: ToolProtocolErrorKind = "session_lost";

  constructor(message: string, serverId?: string) {
    super(message, serverId);
    this.name = "SessionLostError";
  }
}

/** The call can only succeed after the user completes the listed elicitations. */
export class ElicitationRequiredError extends ToolProtocolError {
  readonly kind: ToolProtocolErrorKind = "elicitation_required";
  readonly elicitations: readonly ElicitationRequest[];

  constructor(
    message: string,
    elicitations: readonly ElicitationRequest[],
    serverId?: string
  ) {
    super(message, serverId);
    this.name = "ElicitationRequiredError";
    this.elicitations = elicitations;
  }
}

export type OAuthErrorReason =
  | "discovery_failed"
  | "pkce_not_supported"
  | "invalid_state"
  | "state_expired"
  | "token_request_failed"
  | "invalid_token_response"
  | "refresh_failed";

export class OAuthError extends Error {
  readonly reason: OAuthErrorReason;
  readonly status: number | undefined;

  constructor(
    reason: OAuthErrorReason,
    message: string,
    opts: { status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: opts.cause });
    this.name = "OAuthError";
    this.reason = reason;
    this.status = opts.status;
  }
}

export function isOAuthError(error: unknown): error is OAuthError {
  return error instanceof OAuthError;
}

/**
 * Programming-contract breach: double resolution of a pending request,
 * resolving an unknown request, malformed internal state.
 */
export class ContractViolationError extends AgentExecutionError {
  constructor(message: string) {
    super("contract_violation", message);
    this.name = "ContractViolationError";
  }
}

/** True for any contract breach, including conversation-state errors raised by core. */
export function isContractViolation(error: unknown): error is AgentExecutionError {
  return error instanceof AgentExecutionError && error.code === "contract_violation";
}
