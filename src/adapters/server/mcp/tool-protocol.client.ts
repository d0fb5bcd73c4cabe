// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/mcp/tool-protocol.client`
 * Purpose: One JSON-RPC session with one remote tool server: handshake, tool listing and calls, inbound sampling/elicitation, notifications.
 * Scope: Implements ToolServerConnection over StreamableHttpTransport. Does not decide which server owns a tool or run the LLM.
 * Invariants:
 *   - STATE_MACHINE: disconnected → initializing → ready → (degraded_needs_auth | reconnecting | ready); closed is final
 *   - AUTH_FAILS_FAST: in degraded_needs_auth every call throws AuthRequiredError until connect() succeeds
 *   - SESSION_RECOVERY_ONCE: a lost session triggers exactly one fresh handshake + tool refresh, then one retry
 *   - TIMEOUT_DISTINCT: deadline expiry surfaces as ToolCallTimeoutError and is never retried
 *   - TRANSPORT_RETRY_ONCE: network failures are retried once per call, then surfaced
 *   - INBOUND_EXACTLY_ONCE: each inbound request id is answered once per reply stream; its handler time does not count against the call timeout
 *   - TOKEN_UNDER_DEADLINE: the access-token lookup runs under the exchange's timeout and abort signal
 *   - NOTIFICATIONS_FIFO: listeners see notifications in arrival order
 * Side-effects: IO (HTTP via transport), invokes caller-registered handlers
 * Links: streamable-http.transport.ts, json-rpc.ts, client-lock.ts, ports/tool-server.port.ts
 * @public
 */

import type { ToolCallResult, ToolDescriptor } from "@/core";
import type {
  AccessTokenProvider,
  ElicitationRequestHandler,
  InboundRequestContext,
  JsonRpcId,
  SamplingRequestHandler,
  ServerNotification,
  ToolCallOptions,
  ToolServerConnection,
  ToolServerConnectionState,
} from "@/ports";
import {
  AuthRequiredError,
  ElicitationRequiredError,
  ProtocolError,
  SessionLostError,
  ToolCallTimeoutError,
  TransportError,
} from "@/shared/errors";
import { type Logger, logExchangeEnd, makeLogger } from "@/shared/observability";

import { Deadline, SerialLock } from "./client-lock";
import {
  CallToolResultSchema,
  classifyMessage,
  elicitationResultPayload,
  errorResponse,
  type IncomingMessage,
  InitializeResultSchema,
  JSONRPC_INTERNAL_ERROR,
  JSONRPC_METHOD_NOT_FOUND,
  type JsonRpcErrorObject,
  type JsonRpcOutgoing,
  type JsonRpcResponse,
  ListToolsResultSchema,
  NOTIFICATION_METHODS,
  notification,
  parseElicitationRequest,
  parseSamplingRequest,
  parseUrlElicitations,
  PROTOCOL_VERSION,
  request,
  resultResponse,
  samplingResultPayload,
  toToolCallResult,
  toToolDescriptor,
  URL_ELICITATION_REQUIRED,
} from "./json-rpc";
import { StreamableHttpTransport } from "./streamable-http.transport";

const JSONRPC_INVALID_PARAMS = -32602;
const HANDSHAKE_TIMEOUT_MS = 30_000;
const LIST_TIMEOUT_MS = 30_000;
const MAX_TOOL_PAGES = 50;
const SESSION_ERROR_PATTERN = /session/i;
const SESSION_LOST_PATTERN = /not found|invalid|no valid|expired|missing/i;

export interface ToolProtocolClientOptions {
  readonly server: {
    readonly id: string;
    readonly name: string;
    readonly url: string;
    readonly headers?: Readonly<Record<string, string>>;
  };
  readonly clientInfo?: { readonly name: string; readonly version: string };
  readonly tokenProvider?: AccessTokenProvider;
  /** Session id from a previous run, sent on the first handshake as a resumption hint */
  readonly resumeSessionId?: string;
  /** Called whenever the server issues a different session id */
  readonly onSessionChange?: (sessionId: string | undefined) => Promise<void>;
  readonly defaultTimeoutMs?: number;
  readonly fetch?: typeof fetch;
  readonly logger?: Logger;
}

interface ExchangeOptions {
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
}

export class ToolProtocolClient implements ToolServerConnection {
  readonly serverId: string;
  readonly serverName: string;

  private readonly transport: StreamableHttpTransport;
  private readonly lock = new SerialLock();
  private readonly log: Logger;
  private readonly defaultTimeoutMs: number;

  private _state: ToolServerConnectionState = "disconnected";
  private tools: readonly ToolDescriptor[] | undefined;
  private nextId = 1;
  private resumeHint: string | undefined;
  private lastReportedSession: string | undefined;
  private samplingHandler: SamplingRequestHandler | undefined;
  private elicitationHandler: ElicitationRequestHandler | undefined;
  private readonly notificationListeners = new Set<(n: ServerNotification) => void>();
  private readonly stateListeners = new Set<
    (state: ToolServerConnectionState, previous: ToolServerConnectionState) => void
  >();

  constructor(private readonly options: ToolProtocolClientOptions) {
    this.serverId = options.server.id;
    this.serverName = options.server.name;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 60_000;
    this.resumeHint = options.resumeSessionId;
    this.lastReportedSession = options.resumeSessionId;
    this.log = (options.logger ?? makeLogger({ component: "ToolProtocolClient" })).child({
      serverId: this.serverId,
    });
    this.transport = new StreamableHttpTransport({
      serverId: this.serverId,
      url: options.server.url,
      logger: this.log,
      ...(options.server.headers ? { headers: options.server.headers } : {}),
      ...(options.fetch ? { fetch: options.fetch } : {}),
    });
  }

  get state(): ToolServerConnectionState {
    return this._state;
  }

  get sessionId(): string | undefined {
    return this.transport.sessionId;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Subscriptions and handlers
  // ───────────────────────────────────────────────────────────────────────────

  setSamplingHandler(handler: SamplingRequestHandler | undefined): void {
    this.samplingHandler = handler;
  }

  setElicitationHandler(handler: ElicitationRequestHandler | undefined): void {
    this.elicitationHandler = handler;
  }

  onNotification(listener: (notification: ServerNotification) => void): () => void {
    this.notificationListeners.add(listener);
    return () => this.notificationListeners.delete(listener);
  }

  onStateChange(
    listener: (state: ToolServerConnectionState, previous: ToolServerConnectionState) => void
  ): () => void {
    this.stateListeners.add(listener);
    return () => this.stateListeners.delete(listener);
  }

  private setState(next: ToolServerConnectionState): void {
    const previous = this._state;
    if (previous === next) return;
    this._state = next;
    this.log.debug({ from: previous, to: next }, "mcp.client.state_changed");
    for (const listener of this.stateListeners) listener(next, previous);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────────

  async connect(): Promise<void> {
    if (this._state === "closed") {
      throw new ProtocolError("Client is closed", { serverId: this.serverId });
    }
    await this.lock.run(async () => {
      this.setState("initializing");
      try {
        await this.establish();
        this.setState("ready");
      } catch (error) {
        this.failLifecycle(error);
        throw error;
      }
    });
  }

  async close(): Promise<void> {
    if (this._state === "closed") return;
    this.setState("closed");
    this.tools = undefined;
    await this.transport.terminateSession();
  }

  /**
   * Handshake (resuming the hinted session if any) and tool listing.
   * A resumed session the server no longer knows is replaced by a fresh one.
   */
  private async establish(): Promise<void> {
    const hint = this.resumeHint;
    this.resumeHint = undefined;
    this.transport.sessionId = hint;
    try {
      await this.handshake();
      this.tools = await this.fetchTools();
    } catch (error) {
      if (!(error instanceof SessionLostError) || hint === undefined) throw error;
      this.log.info("mcp.client.resume_rejected");
      this.transport.sessionId = undefined;
      await this.handshake();
      this.tools = await this.fetchTools();
    }
  }

  private async handshake(): Promise<void> {
    this.transport.protocolVersion = undefined;
    const started = Date.now();
    const raw = await this.exchange(
      this.allocateId(),
      "initialize",
      {
        protocolVersion: PROTOCOL_VERSION,
        capabilities: { tools: {}, sampling: {}, elicitation: {} },
        clientInfo: this.options.clientInfo ?? { name: "agent-relay", version: "0.1.0" },
      },
      { timeoutMs: HANDSHAKE_TIMEOUT_MS }
    );
    const parsed = InitializeResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProtocolError("Malformed initialize result", {
        serverId: this.serverId,
        cause: parsed.error,
      });
    }
    this.transport.protocolVersion = parsed.data.protocolVersion;

    await this.post(notification(NOTIFICATION_METHODS.initialized), {
      timeoutMs: HANDSHAKE_TIMEOUT_MS,
    });

    logExchangeEnd(this.log, { method: "initialize", durationMs: Date.now() - started });
    this.log.info(
      {
        protocolVersion: parsed.data.protocolVersion,
        serverName: parsed.data.serverInfo?.name,
        hasSession: this.transport.sessionId !== undefined,
      },
      "mcp.client.initialized"
    );
    await this.reportSession();
  }

  private async reportSession(): Promise<void> {
    const current = this.transport.sessionId;
    if (current === this.lastReportedSession) return;
    this.lastReportedSession = current;
    await this.options.onSessionChange?.(current);
  }

  private failLifecycle(error: unknown): void {
    if (error instanceof AuthRequiredError) {
      this.degradeForAuth(error);
    } else {
      this.setState("disconnected");
    }
  }

  private degradeForAuth(error: AuthRequiredError): void {
    this.setState("degraded_needs_auth");
    this.log.warn(
      {
        challengedByServer: error.challengedByServer,
        hasResourceMetadata: error.resourceMetadataUrl !== undefined,
      },
      "mcp.client.auth_required"
    );
    // the token provider already recorded its own failure
    if (!error.challengedByServer) return;
    this.options.tokenProvider?.reportUnauthorized(this.serverId, {
      ...(error.resourceMetadataUrl !== undefined && {
        resourceMetadataUrl: error.resourceMetadataUrl,
      }),
      ...(error.scope !== undefined && { scope: error.scope }),
    });
  }

  /** Fresh handshake after the server lost our session. Failure becomes ProtocolError. */
  private async recoverSession(): Promise<void> {
    this.setState("reconnecting");
    this.transport.sessionId = undefined;
    this.tools = undefined;
    try {
      await this.handshake();
      this.tools = await this.fetchTools();
      this.setState("ready");
      this.log.info("mcp.client.session_reestablished");
    } catch (error) {
      this.failLifecycle(error);
      if (error instanceof AuthRequiredError) throw error;
      throw new ProtocolError("Re-initialize after session loss failed", {
        serverId: this.serverId,
        cause: error,
      });
    }
  }

  private assertUsable(): void {
    if (this._state === "closed") {
      throw new ProtocolError("Client is closed", { serverId: this.serverId });
    }
    if (this._state === "degraded_needs_auth") {
      throw new AuthRequiredError("Tool server requires authorization", {
        serverId: this.serverId,
      });
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Tools
  // ───────────────────────────────────────────────────────────────────────────

  async listTools(): Promise<readonly ToolDescriptor[]> {
    if (this._state === "disconnected") await this.connect();
    return this.lock.run(async () => {
      this.assertUsable();
      if (this.tools) return this.tools;
      const tools = await this.withSessionRecovery(() => this.fetchTools());
      this.tools = tools;
      return tools;
    });
  }

  async callTool(
    name: string,
    args: Record<string, unknown>,
    options: ToolCallOptions = {}
  ): Promise<ToolCallResult> {
    if (this._state === "disconnected") await this.connect();
    return this.lock.run(async () => {
      this.assertUsable();
      const started = Date.now();
      const raw = await this.withSessionRecovery(() =>
        this.withTransportRetry(() => {
          const id = this.allocateId();
          return this.exchange(
            id,
            "tools/call",
            { name, arguments: args, _meta: { progressToken: id } },
            {
              timeoutMs: options.timeoutMs ?? this.defaultTimeoutMs,
              ...(options.signal ? { signal: options.signal } : {}),
            }
          );
        })
      );
      const parsed = CallToolResultSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ProtocolError(`Malformed tools/call result for "${name}"`, {
          serverId: this.serverId,
          cause: parsed.error,
        });
      }
      const result = toToolCallResult(parsed.data);
      logExchangeEnd(this.log, { method: "tools/call", durationMs: Date.now() - started });
      return result;
    });
  }

  private async fetchTools(): Promise<readonly ToolDescriptor[]> {
    const tools: ToolDescriptor[] = [];
    let cursor: string | undefined;
    for (let page = 0; page < MAX_TOOL_PAGES; page++) {
      const raw = await this.exchange(
        this.allocateId(),
        "tools/list",
        cursor !== undefined ? { cursor } : undefined,
        { timeoutMs: LIST_TIMEOUT_MS }
      );
      const parsed = ListToolsResultSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ProtocolError("Malformed tools/list result", {
          serverId: this.serverId,
          cause: parsed.error,
        });
      }
      tools.push(...parsed.data.tools.map(toToolDescriptor));
      cursor = parsed.data.nextCursor;
      if (cursor === undefined) break;
    }
    this.log.debug({ toolCount: tools.length }, "mcp.client.tools_listed");
    return tools;
  }

  private async withSessionRecovery<T>(op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (error) {
      if (error instanceof AuthRequiredError) {
        this.degradeForAuth(error);
        throw error;
      }
      if (!(error instanceof SessionLostError)) throw error;
    }

    this.log.warn("mcp.client.session_lost");
    await this.recoverSession();
    try {
      return await op();
    } catch (error) {
      if (error instanceof AuthRequiredError) {
        this.degradeForAuth(error);
        throw error;
      }
      if (error instanceof SessionLostError) {
        throw new ProtocolError("Session lost again after re-initialize", {
          serverId: this.serverId,
          cause: error,
        });
      }
      throw error;
    }
  }

  private async withTransportRetry<T>(op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (error) {
      if (!(error instanceof TransportError) || error.kind !== "transport") throw error;
      this.log.warn({ status: error.status }, "mcp.client.transport_retry");
      return op();
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Exchange plumbing
  // ───────────────────────────────────────────────────────────────────────────

  private allocateId(): number {
    return this.nextId++;
  }

  private async accessToken(signal: AbortSignal): Promise<string | undefined> {
    return this.options.tokenProvider?.getAccessToken(this.serverId, { signal });
  }

  /** POST a notification or response; any messages in the reply are processed too. */
  private async post(message: JsonRpcOutgoing, opts: ExchangeOptions): Promise<void> {
    const deadline = new Deadline(opts.timeoutMs);
    try {
      const accessToken = await this.accessToken(deadline.signal);
      const reply = await this.transport.send(message, {
        signal: deadline.signal,
        ...(accessToken !== undefined ? { accessToken } : {}),
      });
      if (reply.kind === "messages") {
        for await (const raw of reply.messages) {
          const msg = classifyMessage(raw);
          if (msg?.kind === "notification") this.deliverNotification(msg);
        }
      }
    } catch (error) {
      throw this.translateFailure(error, deadline, messageMethod(message), opts);
    } finally {
      deadline.clear();
    }
  }

  /**
   * Send one request and wait for its response, answering inbound requests
   * and delivering notifications that arrive on the same reply stream.
   */
  private async exchange(
    id: JsonRpcId,
    method: string,
    params: Record<string, unknown> | undefined,
    opts: ExchangeOptions
  ): Promise<unknown> {
    const deadline = new Deadline(opts.timeoutMs);
    const signal = opts.signal
      ? AbortSignal.any([deadline.signal, opts.signal])
      : deadline.signal;
    // server request ids are only unique within one reply stream
    const answered = new Set<JsonRpcId>();

    try {
      const accessToken = await this.accessToken(signal);
      const reply = await this.transport.send(request(id, method, params), {
        signal,
        ...(accessToken !== undefined ? { accessToken } : {}),
      });
      if (reply.kind === "accepted") {
        throw new ProtocolError(`No response body for ${method}`, { serverId: this.serverId });
      }

      for await (const raw of reply.messages) {
        const msg = classifyMessage(raw);
        if (!msg) {
          this.log.warn({ method }, "mcp.client.unrecognized_message");
          continue;
        }
        switch (msg.kind) {
          case "notification":
            this.deliverNotification(msg);
            break;
          case "request":
            deadline.pause();
            try {
              await this.answerInbound(msg, answered);
            } finally {
              deadline.resume();
            }
            break;
          case "result":
            if (msg.id === id) return msg.result;
            this.log.warn({ method }, "mcp.client.uncorrelated_response");
            break;
          case "error":
            if (msg.id === id || msg.id === undefined) {
              throw this.rpcError(method, msg.error);
            }
            this.log.warn({ method }, "mcp.client.uncorrelated_response");
            break;
        }
      }
      throw new ProtocolError(`Reply stream for ${method} ended without a response`, {
        serverId: this.serverId,
      });
    } catch (error) {
      throw this.translateFailure(error, deadline, method, opts);
    } finally {
      deadline.clear();
    }
  }

  private translateFailure(
    error: unknown,
    deadline: Deadline,
    method: string,
    opts: ExchangeOptions
  ): unknown {
    if (deadline.expired) {
      return new ToolCallTimeoutError(method, opts.timeoutMs, this.serverId);
    }
    if (opts.signal?.aborted) return opts.signal.reason;
    if (error instanceof SyntaxError) {
      return new ProtocolError(`Unparseable reply for ${method}`, {
        serverId: this.serverId,
        cause: error,
      });
    }
    return error;
  }

  private rpcError(method: string, error: JsonRpcErrorObject): Error {
    if (error.code === URL_ELICITATION_REQUIRED) {
      return new ElicitationRequiredError(
        error.message,
        parseUrlElicitations(error.data),
        this.serverId
      );
    }
    if (SESSION_ERROR_PATTERN.test(error.message) && SESSION_LOST_PATTERN.test(error.message)) {
      return new SessionLostError(error.message, this.serverId);
    }
    return new ProtocolError(`${method} failed: ${error.message}`, {
      serverId: this.serverId,
      rpcCode: error.code,
      data: error.data,
    });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Inbound traffic
  // ───────────────────────────────────────────────────────────────────────────

  private deliverNotification(
    msg: Extract<IncomingMessage, { kind: "notification" }>
  ): void {
    if (msg.method === NOTIFICATION_METHODS.toolsListChanged) {
      this.tools = undefined;
    }
    const event: ServerNotification = {
      serverId: this.serverId,
      serverName: this.serverName,
      method: msg.method,
      ...(msg.params !== undefined && { params: msg.params }),
    };
    for (const listener of this.notificationListeners) listener(event);
  }

  private async answerInbound(
    msg: Extract<IncomingMessage, { kind: "request" }>,
    answered: Set<JsonRpcId>
  ): Promise<void> {
    if (answered.has(msg.id)) {
      this.log.warn({ method: msg.method }, "mcp.client.duplicate_inbound_request");
      return;
    }
    answered.add(msg.id);

    const response = await this.buildInboundResponse(msg);
    await this.post(response, { timeoutMs: HANDSHAKE_TIMEOUT_MS });
  }

  private async buildInboundResponse(
    msg: Extract<IncomingMessage, { kind: "request" }>
  ): Promise<JsonRpcResponse> {
    const ctx: InboundRequestContext = {
      serverId: this.serverId,
      serverName: this.serverName,
      requestId: msg.id,
    };

    try {
      switch (msg.method) {
        case "ping":
          return resultResponse(msg.id, {});

        case "sampling/createMessage": {
          const handler = this.samplingHandler;
          if (!handler) {
            return errorResponse(msg.id, JSONRPC_METHOD_NOT_FOUND, "Sampling not supported");
          }
          const samplingRequest = parseSamplingRequest(msg.params);
          if (!samplingRequest) {
            return errorResponse(msg.id, JSONRPC_INVALID_PARAMS, "Invalid sampling request");
          }
          const outcome = await handler(samplingRequest, ctx);
          return outcome.ok
            ? resultResponse(msg.id, samplingResultPayload(outcome.result))
            : errorResponse(msg.id, outcome.code, outcome.message);
        }

        case "elicitation/create": {
          const handler = this.elicitationHandler;
          if (!handler) {
            return errorResponse(msg.id, JSONRPC_METHOD_NOT_FOUND, "Elicitation not supported");
          }
          const elicitation = parseElicitationRequest(msg.params);
          if (!elicitation) {
            return errorResponse(msg.id, JSONRPC_INVALID_PARAMS, "Invalid elicitation request");
          }
          return resultResponse(msg.id, elicitationResultPayload(await handler(elicitation, ctx)));
        }

        default:
          return errorResponse(msg.id, JSONRPC_METHOD_NOT_FOUND, `Method not found: ${msg.method}`);
      }
    } catch (error) {
      this.log.error({ err: error, method: msg.method }, "mcp.client.inbound_handler_failed");
      return errorResponse(
        msg.id,
        JSONRPC_INTERNAL_ERROR,
        error instanceof Error ? error.message : "Internal error"
      );
    }
  }
}

function messageMethod(message: JsonRpcOutgoing): string {
  return "method" in message ? message.method : "response";
}
