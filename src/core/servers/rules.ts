// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/servers/rules`
 * Purpose: Tool result rendering and cross-server tool aggregation.
 * Scope: Pure functions. Does not call servers.
 * Invariants: FIRST_REGISTERED_WINS - on a name collision the earlier server keeps the tool.
 * Side-effects: none
 * @public
 */

import type { ToolCallResult, ToolDescriptor } from "./model";

/** Text handed back to the model: text blocks joined by newlines, resource text inlined. */
export function toolResultText(result: ToolCallResult): string {
  const parts: string[] = [];
  for (const block of result.content) {
    if (block.type === "text") parts.push(block.text);
    else if (block.type === "resource" && block.resource.text !== undefined) {
      parts.push(block.resource.text);
    }
  }
  return parts.join("\n");
}

export interface OwnedTool {
  readonly serverId: string;
  readonly tool: ToolDescriptor;
}

/**
 * Flatten per-server tool lists in server order. Later duplicates are
 * reported in `shadowed` rather than dropped silently.
 */
export function aggregateTools(
  perServer: readonly { readonly serverId: string; readonly tools: readonly ToolDescriptor[] }[]
): { tools: OwnedTool[]; shadowed: OwnedTool[] } {
  const seen = new Set<string>();
  const tools: OwnedTool[] = [];
  const shadowed: OwnedTool[] = [];

  for (const { serverId, tools: list } of perServer) {
    for (const tool of list) {
      if (seen.has(tool.name)) {
        shadowed.push({ serverId, tool });
        continue;
      }
      seen.add(tool.name);
      tools.push({ serverId, tool });
    }
  }

  return { tools, shadowed };
}
