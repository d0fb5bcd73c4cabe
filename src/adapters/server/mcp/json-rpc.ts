// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/mcp/json-rpc`
 * Purpose: JSON-RPC 2.0 envelopes and tool protocol payload schemas (initialize, tools, sampling, elicitation, progress).
 * Scope: zod validation at the wire boundary and conversion into domain shapes. Does not perform I/O.
 * Invariants:
 *   - Every inbound payload is validated before use; failures become ProtocolError at the caller
 *   - classifyMessage() never throws; unknown shapes return undefined
 * Side-effects: none
 * Links: streamable-http.transport.ts, tool-protocol.client.ts
 * @internal
 */

import type {
  ElicitationRequest,
  ElicitationResponse,
  SamplingRequest,
  SamplingResult,
} from "@agent-relay/ai-core";
import { z } from "zod";

import type { ToolCallResult, ToolContentBlock, ToolDescriptor } from "@/core";
import type { JsonRpcId } from "@/ports";

export const PROTOCOL_VERSION = "2025-06-18";

export const JSONRPC_METHOD_NOT_FOUND = -32601;
export const JSONRPC_INTERNAL_ERROR = -32603;
/** Server needs URL-mode elicitations completed before the call can succeed */
export const URL_ELICITATION_REQUIRED = -32042;

export interface JsonRpcRequest {
  readonly jsonrpc: "2.0";
  readonly id: JsonRpcId;
  readonly method: string;
  readonly params?: Record<string, unknown>;
}

export interface JsonRpcNotification {
  readonly jsonrpc: "2.0";
  readonly method: string;
  readonly params?: Record<string, unknown>;
}

export interface JsonRpcErrorObject {
  readonly code: number;
  readonly message: string;
  readonly data?: unknown;
}

export type JsonRpcResponse =
  | { readonly jsonrpc: "2.0"; readonly id: JsonRpcId; readonly result: unknown }
  | {
      readonly jsonrpc: "2.0";
      readonly id: JsonRpcId | null;
      readonly error: JsonRpcErrorObject;
    };

export type JsonRpcOutgoing = JsonRpcRequest | JsonRpcNotification | JsonRpcResponse;

const JsonRpcIdSchema = z.union([z.string(), z.number()]);
const ParamsSchema = z.record(z.unknown());

const ErrorObjectSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
});

const IncomingSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: JsonRpcIdSchema.nullish(),
  method: z.string().optional(),
  params: ParamsSchema.optional(),
  result: z.unknown().optional(),
  error: ErrorObjectSchema.optional(),
});

export type IncomingMessage =
  | { readonly kind: "result"; readonly id: JsonRpcId; readonly result: unknown }
  | {
      readonly kind: "error";
      readonly id: JsonRpcId | undefined;
      readonly error: JsonRpcErrorObject;
    }
  | {
      readonly kind: "request";
      readonly id: JsonRpcId;
      readonly method: string;
      readonly params: Record<string, unknown>;
    }
  | {
      readonly kind: "notification";
      readonly method: string;
      readonly params: Record<string, unknown> | undefined;
    };

export function classifyMessage(raw: unknown): IncomingMessage | undefined {
  const parsed = IncomingSchema.safeParse(raw);
  if (!parsed.success) return undefined;
  const msg = parsed.data;
  const id = msg.id ?? undefined;

  if (msg.method !== undefined) {
    if (id === undefined) {
      return { kind: "notification", method: msg.method, params: msg.params };
    }
    return { kind: "request", id, method: msg.method, params: msg.params ?? {} };
  }
  if (msg.error !== undefined) {
    return { kind: "error", id, error: msg.error };
  }
  if (id !== undefined && "result" in msg) {
    return { kind: "result", id, result: msg.result };
  }
  return undefined;
}

export function request(
  id: JsonRpcId,
  method: string,
  params?: Record<string, unknown>
): JsonRpcRequest {
  return params ? { jsonrpc: "2.0", id, method, params } : { jsonrpc: "2.0", id, method };
}

export function notification(
  method: string,
  params?: Record<string, unknown>
): JsonRpcNotification {
  return params ? { jsonrpc: "2.0", method, params } : { jsonrpc: "2.0", method };
}

export function resultResponse(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return { jsonrpc: "2.0", id, result };
}

export function errorResponse(
  id: JsonRpcId,
  code: number,
  message: string
): JsonRpcResponse {
  return { jsonrpc: "2.0", id, error: { code, message } };
}

// ─────────────────────────────────────────────────────────────────────────────
// Results of client → server requests
// ─────────────────────────────────────────────────────────────────────────────

export const InitializeResultSchema = z.object({
  protocolVersion: z.string(),
  capabilities: z.record(z.unknown()).default({}),
  serverInfo: z
    .object({ name: z.string(), version: z.string().optional() })
    .optional(),
  instructions: z.string().optional(),
});

export type InitializeResult = z.infer<typeof InitializeResultSchema>;

const ToolDescriptorSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  inputSchema: z.record(z.unknown()).default({ type: "object" }),
});

export const ListToolsResultSchema = z.object({
  tools: z.array(ToolDescriptorSchema),
  nextCursor: z.string().optional(),
});

export function toToolDescriptor(
  raw: z.infer<typeof ToolDescriptorSchema>
): ToolDescriptor {
  return raw.description === undefined
    ? { name: raw.name, inputSchema: raw.inputSchema }
    : { name: raw.name, description: raw.description, inputSchema: raw.inputSchema };
}

const TextBlockSchema = z.object({ type: z.literal("text"), text: z.string() });
const MediaBlockSchema = z.object({
  type: z.enum(["image", "audio"]),
  data: z.string(),
  mimeType: z.string(),
});
const ResourceBlockSchema = z.object({
  type: z.literal("resource"),
  resource: z.object({
    uri: z.string(),
    text: z.string().optional(),
    mimeType: z.string().optional(),
  }),
});

export const CallToolResultSchema = z.object({
  content: z.array(z.unknown()).default([]),
  isError: z.boolean().optional(),
});

function toContentBlock(raw: unknown): ToolContentBlock {
  const text = TextBlockSchema.safeParse(raw);
  if (text.success) return text.data;
  const media = MediaBlockSchema.safeParse(raw);
  if (media.success) return media.data;
  const resource = ResourceBlockSchema.safeParse(raw);
  if (resource.success) return resource.data;
  return { type: "unknown", raw };
}

export function toToolCallResult(
  raw: z.infer<typeof CallToolResultSchema>
): ToolCallResult {
  return {
    content: raw.content.map(toContentBlock),
    isError: raw.isError ?? false,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Server → client requests
// ─────────────────────────────────────────────────────────────────────────────

const SamplingLeafContentSchema = z.union([TextBlockSchema, MediaBlockSchema]);

const SamplingContentSchema = z.union([
  TextBlockSchema,
  MediaBlockSchema,
  z.object({
    type: z.literal("tool_use"),
    id: z.string(),
    name: z.string(),
    input: z.record(z.unknown()).default({}),
  }),
  z.object({
    type: z.literal("tool_result"),
    toolUseId: z.string(),
    content: z.array(SamplingLeafContentSchema).default([]),
    isError: z.boolean().optional(),
  }),
]);

export const SamplingRequestSchema = z.object({
  messages: z.array(
    z.object({
      role: z.enum(["user", "assistant"]),
      content: z.union([
        z.string(),
        SamplingContentSchema,
        z.array(SamplingContentSchema),
      ]),
    })
  ),
  systemPrompt: z.string().optional(),
  maxTokens: z.number().int().positive().optional(),
  temperature: z.number().optional(),
  stopSequences: z.array(z.string()).optional(),
  modelPreferences: z
    .object({
      hints: z.array(z.object({ name: z.string().optional() })).optional(),
      costPriority: z.number().optional(),
      speedPriority: z.number().optional(),
      intelligencePriority: z.number().optional(),
    })
    .optional(),
  tools: z
    .array(
      z.object({
        name: z.string(),
        description: z.string().optional(),
        inputSchema: z.record(z.unknown()).optional(),
      })
    )
    .optional(),
  toolChoice: z
    .object({
      type: z.string().optional(),
      mode: z.string().optional(),
      name: z.string().optional(),
    })
    .optional(),
});

export function parseSamplingRequest(
  params: Record<string, unknown>
): SamplingRequest | undefined {
  const parsed = SamplingRequestSchema.safeParse(params);
  return parsed.success ? parsed.data : undefined;
}

export const ElicitationParamsSchema = z.object({
  mode: z.string().optional(),
  message: z.string(),
  elicitationId: z.string().optional(),
  url: z.string().optional(),
  requestedSchema: z.record(z.unknown()).optional(),
});

/** Unknown modes fall back to form. */
export function toElicitationRequest(
  raw: z.infer<typeof ElicitationParamsSchema>
): ElicitationRequest {
  return {
    mode: raw.mode === "url" ? "url" : "form",
    message: raw.message,
    ...(raw.elicitationId !== undefined && { elicitationId: raw.elicitationId }),
    ...(raw.url !== undefined && { url: raw.url }),
    ...(raw.requestedSchema !== undefined && {
      requestedSchema: raw.requestedSchema,
    }),
  };
}

export function parseElicitationRequest(
  params: Record<string, unknown>
): ElicitationRequest | undefined {
  const parsed = ElicitationParamsSchema.safeParse(params);
  return parsed.success ? toElicitationRequest(parsed.data) : undefined;
}

const UrlElicitationErrorDataSchema = z.object({
  elicitations: z.array(ElicitationParamsSchema).default([]),
});

export function parseUrlElicitations(data: unknown): ElicitationRequest[] {
  const parsed = UrlElicitationErrorDataSchema.safeParse(data ?? {});
  return parsed.success ? parsed.data.elicitations.map(toElicitationRequest) : [];
}

export function samplingResultPayload(result: SamplingResult): Record<string, unknown> {
  return {
    role: result.role,
    content: result.content,
    model: result.model,
    stopReason: result.stopReason,
  };
}

export function elicitationResultPayload(
  response: ElicitationResponse
): Record<string, unknown> {
  return response.action === "accept" &&
    response.content !== undefined &&
    Object.keys(response.content).length > 0
    ? { action: response.action, content: response.content }
    : { action: response.action };
}

// ─────────────────────────────────────────────────────────────────────────────
// Notifications
// ─────────────────────────────────────────────────────────────────────────────

export const NOTIFICATION_METHODS = {
  initialized: "notifications/initialized",
  progress: "notifications/progress",
  toolsListChanged: "notifications/tools/list_changed",
  resourcesListChanged: "notifications/resources/list_changed",
  cancelled: "notifications/cancelled",
} as const;
