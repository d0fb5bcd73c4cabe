// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/mcp/streamable-http.transport`
 * Purpose: HTTP POST transport for one tool server endpoint; decodes JSON and SSE replies into JSON-RPC messages.
 * Scope: One request/reply exchange per send(); session and protocol-version headers. Does not correlate ids or retry.
 * Invariants:
 *   - 401/403 → AuthRequiredError (with WWW-Authenticate hints); never retried here
 *   - 404 with a session, or 400 naming the session → SessionLostError
 *   - 5xx and network failures → TransportError; other 4xx → ProtocolError
 *   - Aborts propagate as the signal's reason so callers can tell timeout from cancel
 *   - Mcp-Session-Id from any reply replaces the held session id
 * Side-effects: IO (HTTP to the tool server)
 * Notes: SSE via eventsource-parser; non-JSON SSE data lines are skipped with a warning.
 * Links: json-rpc.ts, tool-protocol.client.ts
 * @internal
 */

import {
  createParser,
  type EventSourceMessage,
  type EventSourceParser,
} from "eventsource-parser";

import {
  AuthRequiredError,
  ProtocolError,
  SessionLostError,
  TransportError,
} from "@/shared/errors";
import type { Logger } from "@/shared/observability";

import { unauthorizedHintFrom } from "../oauth/www-authenticate";
import type { JsonRpcOutgoing } from "./json-rpc";

export const SESSION_HEADER = "Mcp-Session-Id";
export const PROTOCOL_VERSION_HEADER = "MCP-Protocol-Version";

export interface StreamableHttpTransportOptions {
  readonly serverId: string;
  readonly url: string;
  readonly headers?: Readonly<Record<string, string>>;
  readonly fetch?: typeof fetch;
  readonly logger: Logger;
}

export type TransportReply =
  | { readonly kind: "accepted" }
  | { readonly kind: "messages"; readonly messages: AsyncIterable<unknown> };

export interface SendOptions {
  readonly accessToken?: string;
  readonly signal?: AbortSignal;
}

async function* jsonMessages(response: Response): AsyncGenerator<unknown> {
  const text = await response.text();
  if (text.trim().length === 0) return;
  const body: unknown = JSON.parse(text);
  if (Array.isArray(body)) {
    for (const item of body) yield item;
  } else {
    yield body;
  }
}

async function* sseMessages(
  body: ReadableStream<Uint8Array>,
  log: Logger
): AsyncGenerator<unknown> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  const eventQueue: EventSourceMessage[] = [];
  const parser: EventSourceParser = createParser({
    onEvent(event: EventSourceMessage) {
      eventQueue.push(event);
    },
  });

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      parser.feed(decoder.decode(value, { stream: true }));

      while (eventQueue.length > 0) {
        const event = eventQueue.shift();
        if (!event) break;
        if (event.data.trim().length === 0) continue;
        try {
          yield JSON.parse(event.data);
        } catch (error) {
          if (!(error instanceof SyntaxError)) throw error;
          log.warn({ dataLength: event.data.length }, "mcp.transport.malformed_sse_data");
        }
      }
    }
  } finally {
    reader.releaseLock();
  }
}

export class StreamableHttpTransport {
  private readonly fetchImpl: typeof fetch;
  private _sessionId: string | undefined;
  private _protocolVersion: string | undefined;

  constructor(private readonly options: StreamableHttpTransportOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  get sessionId(): string | undefined {
    return this._sessionId;
  }

  set sessionId(value: string | undefined) {
    this._sessionId = value;
  }

  get protocolVersion(): string | undefined {
    return this._protocolVersion;
  }

  set protocolVersion(value: string | undefined) {
    this._protocolVersion = value;
  }

  private buildHeaders(accessToken: string | undefined): Record<string, string> {
    return {
      ...this.options.headers,
      "Content-Type": "application/json",
      Accept: "application/json, text/event-stream",
      ...(this._sessionId !== undefined ? { [SESSION_HEADER]: this._sessionId } : {}),
      ...(this._protocolVersion !== undefined
        ? { [PROTOCOL_VERSION_HEADER]: this._protocolVersion }
        : {}),
      ...(accessToken !== undefined ? { Authorization: `Bearer ${accessToken}` } : {}),
    };
  }

  async send(message: JsonRpcOutgoing, opts: SendOptions = {}): Promise<TransportReply> {
    const { serverId } = this.options;
    const hadSession = this._sessionId !== undefined;

    let response: Response;
    try {
      response = await this.fetchImpl(this.options.url, {
        method: "POST",
        headers: this.buildHeaders(opts.accessToken),
        body: JSON.stringify(message),
        ...(opts.signal ? { signal: opts.signal } : {}),
      });
    } catch (error) {
      if (opts.signal?.aborted) throw opts.signal.reason;
      throw new TransportError(
        `Request to tool server failed: ${error instanceof Error ? error.message : String(error)}`,
        { serverId, cause: error }
      );
    }

    const issuedSession = response.headers.get(SESSION_HEADER);
    if (issuedSession) this._sessionId = issuedSession;

    if (response.status === 401 || response.status === 403) {
      const hint = unauthorizedHintFrom(response.headers.get("WWW-Authenticate"));
      throw new AuthRequiredError(`Tool server answered ${response.status}`, {
        serverId,
        status: response.status,
        ...hint,
      });
    }

    if (!response.ok) {
      const detail = await response.text().catch((error: unknown) =>
        error instanceof Error ? error.message : ""
      );
      if (
        (response.status === 404 && hadSession) ||
        (response.status === 400 && /session/i.test(detail))
      ) {
        throw new SessionLostError(
          `Session not found (HTTP ${response.status})`,
          serverId
        );
      }
      if (response.status >= 500) {
        throw new TransportError(`Tool server answered ${response.status}`, {
          serverId,
          status: response.status,
        });
      }
      throw new ProtocolError(
        `Tool server answered ${response.status}: ${detail.slice(0, 200)}`,
        { serverId }
      );
    }

    if (response.status === 202 || response.status === 204) {
      return { kind: "accepted" };
    }

    const contentType = response.headers.get("Content-Type") ?? "";
    if (contentType.includes("text/event-stream")) {
      if (!response.body) return { kind: "accepted" };
      return {
        kind: "messages",
        messages: sseMessages(response.body, this.options.logger),
      };
    }

    return { kind: "messages", messages: jsonMessages(response) };
  }

  /** Best-effort session termination (HTTP DELETE). */
  async terminateSession(): Promise<void> {
    const sessionId = this._sessionId;
    if (sessionId === undefined) return;
    this._sessionId = undefined;
    try {
      await this.fetchImpl(this.options.url, {
        method: "DELETE",
        headers: {
          ...this.options.headers,
          [SESSION_HEADER]: sessionId,
          ...(this._protocolVersion !== undefined
            ? { [PROTOCOL_VERSION_HEADER]: this._protocolVersion }
            : {}),
        },
      });
    } catch (error) {
      this.options.logger.debug(
        { reason: error instanceof Error ? error.message : String(error) },
        "mcp.transport.session_delete_failed"
      );
    }
  }
}
