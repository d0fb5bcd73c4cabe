// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/servers/public`
 * Purpose: Public API for tool server entities and aggregation rules.
 * Side-effects: none
 * @public
 */

export type {
  ToolCallResult,
  ToolContentBlock,
  ToolDescriptor,
  ToolServer,
} from "./model";
export { aggregateTools, type OwnedTool, toolResultText } from "./rules";
