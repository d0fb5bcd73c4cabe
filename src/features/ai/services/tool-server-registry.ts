// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/services/tool-server-registry`
 * Purpose: The set of tool server connections behind one conversation: connect, aggregate tools, route calls, fan in server traffic.
 * Scope: Connection lifecycle and tool ownership. Connections come from an injected factory; does not know the wire protocol.
 * Invariants:
 *   - SERVER_ORDER: enabled servers are connected and consulted in the conversation's serverIds order
 *   - FIRST_SERVER_WINS: on a tool-name collision the earlier server owns the name
 *   - A failed connect leaves that server out of tools() but keeps it for reconnect()
 *   - Session ids are loaded before connect and saved whenever the server issues a new one
 *   - Auth-required notices raised while no run is bound are delivered when the next run binds
 * Side-effects: IO (via connections and persistence)
 * Links: tool-dispatcher.ts, agentic-loop.ts, ports/tool-server.port.ts
 * @public
 */

import type { Logger } from "pino";

import {
  aggregateTools,
  type Conversation,
  type OwnedTool,
  type ToolDescriptor,
  type ToolServer,
} from "@/core";
import type {
  ElicitationRequestHandler,
  PersistencePort,
  SamplingRequestHandler,
  ServerNotification,
  ToolServerConnection,
} from "@/ports";
import { ContractViolationError, isContractViolation } from "@/shared/errors";

import type { ToolResolver } from "./tool-dispatcher";

/** JSON-RPC internal error, sent when sampling arrives outside a run */
const NO_ACTIVE_RUN_CODE = -32603;

export interface ConnectionFactoryParams {
  readonly server: ToolServer;
  readonly resumeSessionId?: string;
  readonly onSessionChange: (sessionId: string | undefined) => Promise<void>;
}

export type ToolServerConnectionFactory = (
  params: ConnectionFactoryParams
) => ToolServerConnection;

/** Run-scoped receivers for traffic the servers initiate. */
export interface RegistryHandlers {
  readonly onSampling: SamplingRequestHandler;
  readonly onElicitation: ElicitationRequestHandler;
  readonly onNotification: (notification: ServerNotification) => void;
  readonly onAuthRequired: (serverId: string, reason: string | undefined) => void;
}

export interface ToolServerRegistryDeps {
  readonly persistence: PersistencePort;
  readonly createConnection: ToolServerConnectionFactory;
  readonly log: Logger;
}

export interface OpenReport {
  readonly connected: readonly string[];
  readonly failed: readonly { readonly serverId: string; readonly error: unknown }[];
}

export class ToolServerRegistry implements ToolResolver {
  private readonly connections: ToolServerConnection[] = [];
  private owners = new Map<string, ToolServerConnection>();
  private handlers: RegistryHandlers | undefined;
  private readonly queuedAuthNotices: { serverId: string; reason: string | undefined }[] = [];
  private readonly log: Logger;

  constructor(
    private readonly deps: ToolServerRegistryDeps,
    private readonly conversation: Pick<Conversation, "id" | "serverIds">
  ) {
    this.log = deps.log.child({ conversationId: conversation.id });
  }

  /** Connect every enabled server the conversation names, in its order. */
  async open(servers: readonly ToolServer[]): Promise<OpenReport> {
    const byId = new Map(servers.map((server) => [server.id, server]));
    const ordered = this.conversation.serverIds.flatMap((id) => {
      const server = byId.get(id);
      return server?.enabled ? [server] : [];
    });

    const results = await Promise.all(ordered.map((server) => this.attach(server)));
    const connected: string[] = [];
    const failed: { serverId: string; error: unknown }[] = [];
    for (const result of results) {
      if (result.error === undefined) connected.push(result.serverId);
      else failed.push({ serverId: result.serverId, error: result.error });
    }
    this.log.info(
      { connected: connected.length, failed: failed.length },
      "agent.registry.opened"
    );
    return { connected, failed };
  }

  private async attach(
    server: ToolServer
  ): Promise<{ serverId: string; error: unknown }> {
    const resumeSessionId = await this.deps.persistence.loadSession(
      this.conversation.id,
      server.id
    );
    const connection = this.deps.createConnection({
      server,
      ...(resumeSessionId !== undefined && { resumeSessionId }),
      onSessionChange: (sessionId) =>
        this.deps.persistence.saveSession(this.conversation.id, server.id, sessionId),
    });
    this.wire(connection);
    this.connections.push(connection);

    try {
      await connection.connect();
      return { serverId: server.id, error: undefined };
    } catch (error) {
      if (isContractViolation(error)) throw error;
      this.log.warn(
        { serverId: server.id, state: connection.state },
        "agent.registry.connect_failed"
      );
      return { serverId: server.id, error };
    }
  }

  private wire(connection: ToolServerConnection): void {
    connection.setSamplingHandler(async (request, ctx) => {
      const handlers = this.handlers;
      if (!handlers) {
        return { ok: false, code: NO_ACTIVE_RUN_CODE, message: "No active run to handle sampling" };
      }
      return handlers.onSampling(request, ctx);
    });
    connection.setElicitationHandler(async (request, ctx) => {
      const handlers = this.handlers;
      if (!handlers) return { action: "cancel" };
      return handlers.onElicitation(request, ctx);
    });
    connection.onNotification((notification) => {
      if (this.handlers) this.handlers.onNotification(notification);
      else this.log.debug({ method: notification.method }, "agent.registry.notification_unbound");
    });
    connection.onStateChange((state) => {
      if (state === "degraded_needs_auth") {
        this.noticeAuthRequired(
          connection.serverId,
          `${connection.serverName} requires authorization`
        );
      }
    });
  }

  private noticeAuthRequired(serverId: string, reason: string | undefined): void {
    if (this.handlers) this.handlers.onAuthRequired(serverId, reason);
    else this.queuedAuthNotices.push({ serverId, reason });
  }

  /** Bind run-scoped handlers; returns the unbind function. */
  bind(handlers: RegistryHandlers): () => void {
    this.handlers = handlers;
    for (const notice of this.queuedAuthNotices.splice(0)) {
      handlers.onAuthRequired(notice.serverId, notice.reason);
    }
    return () => {
      if (this.handlers === handlers) this.handlers = undefined;
    };
  }

  connection(serverId: string): ToolServerConnection | undefined {
    return this.connections.find((connection) => connection.serverId === serverId);
  }

  /** Retry a server after re-authorization. */
  async reconnect(serverId: string): Promise<void> {
    const connection = this.connection(serverId);
    if (!connection) {
      throw new ContractViolationError(`Tool server ${serverId} is not part of this conversation`);
    }
    await connection.connect();
  }

  /**
   * Aggregated descriptors of every ready server. Also refreshes the
   * name → server table resolve() reads.
   */
  async tools(): Promise<OwnedTool[]> {
    const perServer: { serverId: string; tools: readonly ToolDescriptor[] }[] = [];
    for (const serverId of this.conversation.serverIds) {
      const connection = this.connection(serverId);
      if (!connection || connection.state !== "ready") continue;
      try {
        perServer.push({ serverId: connection.serverId, tools: await connection.listTools() });
      } catch (error) {
        if (isContractViolation(error)) throw error;
        this.log.warn(
          { serverId: connection.serverId, state: connection.state },
          "agent.registry.list_tools_failed"
        );
      }
    }

    const { tools, shadowed } = aggregateTools(perServer);
    if (shadowed.length > 0) {
      this.log.warn(
        { shadowed: shadowed.map((entry) => `${entry.serverId}:${entry.tool.name}`) },
        "agent.registry.tool_names_shadowed"
      );
    }

    const owners = new Map<string, ToolServerConnection>();
    for (const owned of tools) {
      const connection = this.connection(owned.serverId);
      if (connection) owners.set(owned.tool.name, connection);
    }
    this.owners = owners;
    return tools;
  }

  resolve(toolName: string): ToolServerConnection | undefined {
    return this.owners.get(toolName);
  }

  async close(): Promise<void> {
    await Promise.all(this.connections.map((connection) => connection.close()));
    this.connections.length = 0;
    this.owners = new Map();
  }
}
