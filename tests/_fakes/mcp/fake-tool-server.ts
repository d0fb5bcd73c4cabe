// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/mcp/fake-tool-server`
 * Purpose: In-process JSON-RPC tool server exposed as a `fetch` function, for client, registry and loop tests.
 * Scope: initialize, tools/list (paged), tools/call over SSE with server→client requests and notifications, session ids, bearer auth. Does NOT open sockets.
 * Invariants:
 *   - Sessions are issued on initialize as "<prefix>-<n>"; any other request must carry a live session
 *   - A tools/call reply streams notifications and inbound requests in the order the handler sends them
 *   - Every POST is recorded in `requests`, including client responses and notifications
 * Side-effects: none
 * Links: adapters/server/mcp/streamable-http.transport.ts
 * @public
 */

const encoder = new TextEncoder();

export interface RecordedRequest {
  readonly method: string;
  readonly httpMethod: string;
  readonly headers: Headers;
  readonly body: Record<string, unknown> | undefined;
}

export interface FakeToolContext {
  /** Send a notification on the call's reply stream */
  notify(method: string, params?: Record<string, unknown>): void;
  /** Send a request to the client and wait for its response POST */
  request(method: string, params: Record<string, unknown>): Promise<Record<string, unknown>>;
  readonly signal: AbortSignal;
  readonly args: Record<string, unknown>;
}

export type FakeToolReply =
  | { readonly content: readonly Record<string, unknown>[]; readonly isError?: boolean }
  | { readonly rpcError: { readonly code: number; readonly message: string; readonly data?: unknown } };

export interface FakeTool {
  readonly name: string;
  readonly description?: string;
  readonly inputSchema?: Record<string, unknown>;
  readonly handler: (ctx: FakeToolContext) => Promise<FakeToolReply> | FakeToolReply;
}

export interface FakeToolServerOptions {
  readonly tools?: readonly FakeTool[];
  /** When set, every POST must carry `Authorization: Bearer <token>` */
  readonly requiredToken?: string;
  readonly wwwAuthenticate?: string;
  readonly sessionPrefix?: string;
  /** Tools per tools/list page; unpaged when absent */
  readonly pageSize?: number;
  readonly serverName?: string;
  /** Number server→client requests from 0 on every tools/call, as a stateless server does */
  readonly perCallRequestIds?: boolean;
}

export function textReply(text: string, isError = false): FakeToolReply {
  return { content: [{ type: "text", text }], ...(isError && { isError: true }) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function jsonResponse(body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

function sseFrame(message: unknown): Uint8Array {
  return encoder.encode(`event: message\ndata: ${JSON.stringify(message)}\n\n`);
}

export class FakeToolServer {
  readonly requests: RecordedRequest[] = [];
  private readonly tools = new Map<string, FakeTool>();
  private readonly liveSessions = new Set<string>();
  private sessionCounter = 0;
  private outboundCounter = 0;
  private readonly awaitingClient = new Map<
    string,
    { resolve: (value: Record<string, unknown>) => void; reject: (error: Error) => void }
  >();
  private token: string | undefined;
  /** Status to answer the next N requests with, before normal handling */
  private readonly forcedStatuses: number[] = [];

  constructor(private readonly options: FakeToolServerOptions = {}) {
    for (const tool of options.tools ?? []) this.tools.set(tool.name, tool);
    this.token = options.requiredToken;
  }

  readonly fetch: typeof fetch = async (input, init) => this.handle(input, init);

  setTools(tools: readonly FakeTool[]): void {
    this.tools.clear();
    for (const tool of tools) this.tools.set(tool.name, tool);
  }

  setRequiredToken(token: string | undefined): void {
    this.token = token;
  }

  /** Forget every issued session, as a restarted server would. */
  dropSessions(): void {
    this.liveSessions.clear();
  }

  /** Answer the next requests with these HTTP statuses, one per request. */
  failNext(...statuses: number[]): void {
    this.forcedStatuses.push(...statuses);
  }

  get sessionsIssued(): number {
    return this.sessionCounter;
  }

  methods(): string[] {
    return this.requests.map((request) => request.method);
  }

  private async handle(input: string | URL | Request, init?: RequestInit): Promise<Response> {
    const headers = new Headers(init?.headers);
    const httpMethod = init?.method ?? "GET";
    const rawBody = typeof init?.body === "string" ? init.body : undefined;
    const parsed: unknown = rawBody !== undefined ? JSON.parse(rawBody) : undefined;
    const body = isRecord(parsed) ? parsed : undefined;
    const method =
      httpMethod === "DELETE"
        ? "DELETE"
        : typeof body?.method === "string"
          ? body.method
          : "response";
    this.requests.push({ method, httpMethod, headers, body });

    if (init?.signal?.aborted) throw init.signal.reason;

    const forced = this.forcedStatuses.shift();
    if (forced !== undefined) {
      return new Response(`forced ${forced}`, { status: forced });
    }

    if (this.token !== undefined && headers.get("Authorization") !== `Bearer ${this.token}`) {
      return new Response("unauthorized", {
        status: 401,
        headers: this.options.wwwAuthenticate
          ? { "WWW-Authenticate": this.options.wwwAuthenticate }
          : {},
      });
    }

    if (httpMethod === "DELETE") {
      const session = headers.get("Mcp-Session-Id");
      if (session) this.liveSessions.delete(session);
      return new Response(null, { status: 204 });
    }
    if (!body) return new Response("bad request", { status: 400 });

    if (method === "response") return this.acceptClientResponse(body);
    if (body.id === undefined) return new Response(null, { status: 202 });

    const id = body.id;
    if (method === "initialize") return this.initialize(id);

    const session = headers.get("Mcp-Session-Id");
    if (!session || !this.liveSessions.has(session)) {
      return new Response("session not found", { status: 404 });
    }

    const params = isRecord(body.params) ? body.params : {};
    switch (method) {
      case "ping":
        return jsonResponse({ jsonrpc: "2.0", id, result: {} });
      case "tools/list":
        return jsonResponse({ jsonrpc: "2.0", id, result: this.listPage(params) });
      case "tools/call":
        return this.callTool(id, params, init?.signal ?? undefined);
      default:
        return jsonResponse({
          jsonrpc: "2.0",
          id,
          error: { code: -32601, message: `Method not found: ${method}` },
        });
    }
  }

  private initialize(id: unknown): Response {
    this.sessionCounter += 1;
    const session = `${this.options.sessionPrefix ?? "session"}-${this.sessionCounter}`;
    this.liveSessions.add(session);
    return jsonResponse(
      {
        jsonrpc: "2.0",
        id,
        result: {
          protocolVersion: "2025-06-18",
          capabilities: { tools: { listChanged: true } },
          serverInfo: { name: this.options.serverName ?? "fake-tools", version: "1.0.0" },
        },
      },
      { "Mcp-Session-Id": session }
    );
  }

  private listPage(params: Record<string, unknown>): Record<string, unknown> {
    const all = [...this.tools.values()].map((tool) => ({
      name: tool.name,
      ...(tool.description !== undefined && { description: tool.description }),
      inputSchema: tool.inputSchema ?? { type: "object", properties: {} },
    }));
    const pageSize = this.options.pageSize;
    if (pageSize === undefined) return { tools: all };

    const start = typeof params.cursor === "string" ? Number(params.cursor) : 0;
    const end = start + pageSize;
    return end < all.length
      ? { tools: all.slice(start, end), nextCursor: String(end) }
      : { tools: all.slice(start) };
  }

  private acceptClientResponse(body: Record<string, unknown>): Response {
    const key = String(body.id);
    const waiter = this.awaitingClient.get(key);
    if (waiter) {
      this.awaitingClient.delete(key);
      if (isRecord(body.error)) {
        waiter.reject(new Error(`client error ${String(body.error.code)}: ${String(body.error.message)}`));
      } else {
        waiter.resolve(isRecord(body.result) ? body.result : {});
      }
    }
    return new Response(null, { status: 202 });
  }

  private callTool(
    id: unknown,
    params: Record<string, unknown>,
    signal: AbortSignal | undefined
  ): Response {
    const name = typeof params.name === "string" ? params.name : "";
    const tool = this.tools.get(name);
    if (!tool) {
      return jsonResponse({
        jsonrpc: "2.0",
        id,
        error: { code: -32602, message: `Unknown tool: ${name}` },
      });
    }

    const callSignal = signal ?? new AbortController().signal;
    let callOutbound = 0;
    const args = isRecord(params.arguments) ? params.arguments : {};
    const stream = new ReadableStream<Uint8Array>({
      start: (controller) => {
        const onAbort = (): void => controller.error(callSignal.reason);
        callSignal.addEventListener("abort", onAbort, { once: true });

        const ctx: FakeToolContext = {
          signal: callSignal,
          args,
          notify: (method, notificationParams) =>
            controller.enqueue(
              sseFrame({
                jsonrpc: "2.0",
                method,
                ...(notificationParams !== undefined && { params: notificationParams }),
              })
            ),
          request: (method, requestParams) => {
            let outboundId: string | number;
            if (this.options.perCallRequestIds) {
              outboundId = callOutbound;
              callOutbound += 1;
            } else {
              this.outboundCounter += 1;
              outboundId = `srv-${this.outboundCounter}`;
            }
            const answered = new Promise<Record<string, unknown>>((resolve, reject) => {
              this.awaitingClient.set(String(outboundId), { resolve, reject });
            });
            controller.enqueue(
              sseFrame({ jsonrpc: "2.0", id: outboundId, method, params: requestParams })
            );
            return answered;
          },
        };

        const run = async (): Promise<void> => {
          const reply = await tool.handler(ctx);
          if (callSignal.aborted) return;
          controller.enqueue(
            sseFrame(
              "rpcError" in reply
                ? { jsonrpc: "2.0", id, error: reply.rpcError }
                : { jsonrpc: "2.0", id, result: reply }
            )
          );
          callSignal.removeEventListener("abort", onAbort);
          controller.close();
        };
        run().catch((error: unknown) => {
          if (callSignal.aborted) return;
          controller.enqueue(
            sseFrame({
              jsonrpc: "2.0",
              id,
              error: {
                code: -32603,
                message: error instanceof Error ? error.message : String(error),
              },
            })
          );
          controller.close();
        });
      },
    });

    return new Response(stream, {
      status: 200,
      headers: { "Content-Type": "text/event-stream" },
    });
  }
}

/** Tool handler that never answers until its call is aborted. */
export function hangingTool(name: string): FakeTool {
  return {
    name,
    handler: ({ signal }) =>
      new Promise<FakeToolReply>((resolve) => {
        signal.addEventListener("abort", () => resolve(textReply("aborted")), { once: true });
      }),
  };
}
