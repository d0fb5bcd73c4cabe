// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/tool-server.port`
 * Purpose: Contract for one live connection to a remote tool server (one per conversation × server).
 * Scope: Tool listing/execution, inbound request handlers, notification and state subscriptions, access token supply. Does not define the wire format.
 * Invariants:
 *   - CLIENT_OWNED_BY_PAIR: a connection is used by exactly one conversation
 *   - INBOUND_EXACTLY_ONCE: each inbound request is answered exactly once, after its handler settles
 *   - NOTIFICATIONS_FIFO: listeners see notifications in the order the server sent them
 *   - listTools() is idempotent between tool-list-changed notifications
 * Side-effects: none (interface only)
 * Links: adapters/server/mcp/tool-protocol.client.ts
 * @public
 */

import type {
  ElicitationRequest,
  ElicitationResponse,
  SamplingRequest,
  SamplingResult,
} from "@agent-relay/ai-core";

import type { ToolCallResult, ToolDescriptor } from "@/core";

export type ToolServerConnectionState =
  | "disconnected"
  | "initializing"
  | "ready"
  | "degraded_needs_auth"
  | "reconnecting"
  | "closed";

export type JsonRpcId = string | number;

export interface ServerNotification {
  readonly serverId: string;
  readonly serverName: string;
  readonly method: string;
  readonly params?: Record<string, unknown>;
}

export interface InboundRequestContext {
  readonly serverId: string;
  readonly serverName: string;
  readonly requestId: JsonRpcId;
}

/** Negative outcomes travel back to the server as JSON-RPC errors. */
export type InboundOutcome<T> =
  | { readonly ok: true; readonly result: T }
  | { readonly ok: false; readonly code: number; readonly message: string };

export type SamplingRequestHandler = (
  request: SamplingRequest,
  ctx: InboundRequestContext
) => Promise<InboundOutcome<SamplingResult>>;

export type ElicitationRequestHandler = (
  request: ElicitationRequest,
  ctx: InboundRequestContext
) => Promise<ElicitationResponse>;

export interface ToolCallOptions {
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
}

export interface ToolServerConnection {
  readonly serverId: string;
  readonly serverName: string;
  readonly state: ToolServerConnectionState;
  readonly sessionId: string | undefined;

  /** Initialize handshake + tool listing. Also the way out of degraded_needs_auth. */
  connect(): Promise<void>;
  /** Cached descriptors; fetched on first use, on reconnect and on tools/list_changed. */
  listTools(): Promise<readonly ToolDescriptor[]>;
  callTool(
    name: string,
    args: Record<string, unknown>,
    options?: ToolCallOptions
  ): Promise<ToolCallResult>;

  setSamplingHandler(handler: SamplingRequestHandler | undefined): void;
  setElicitationHandler(handler: ElicitationRequestHandler | undefined): void;
  onNotification(listener: (notification: ServerNotification) => void): () => void;
  onStateChange(
    listener: (state: ToolServerConnectionState, previous: ToolServerConnectionState) => void
  ): () => void;

  close(): Promise<void>;
}

/** Hints taken from a 401 response's WWW-Authenticate header. */
export interface UnauthorizedHint {
  readonly resourceMetadataUrl?: string;
  readonly scope?: string;
}

/**
 * Supplies bearer tokens to tool server connections.
 * Implemented by the token lifecycle manager.
 */
export interface AccessTokenProvider {
  /**
   * Valid access token (refreshed if needed), or undefined when the server has none.
   * An aborted signal stops the wait with the signal's reason.
   */
  getAccessToken(
    serverId: string,
    options?: { readonly signal?: AbortSignal }
  ): Promise<string | undefined>;
  reportUnauthorized(serverId: string, hint: UnauthorizedHint): void;
}
