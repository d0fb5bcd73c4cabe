// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/servers/model`
 * Purpose: Tool server configuration and tool descriptor entities.
 * Scope: Pure types. Does not connect.
 * Invariants: Tool names are unique within one server only; aggregation across servers is first-registered-wins.
 * Side-effects: none
 * @public
 */

import type { OAuthStatus, TokenBundle } from "../auth/model";

export interface ToolServer {
  readonly id: string;
  readonly name: string;
  /** Single JSON-RPC endpoint */
  readonly url: string;
  readonly headers?: Readonly<Record<string, string>>;
  readonly enabled: boolean;
  readonly oauthStatus: OAuthStatus;
  readonly tokens?: TokenBundle;
  /** Pre-registered OAuth client; falls back to the configured default */
  readonly oauthClientId?: string;
  readonly oauthClientSecret?: string;
}

export interface ToolDescriptor {
  readonly name: string;
  readonly description?: string;
  readonly inputSchema: Record<string, unknown>;
}

export type ToolContentBlock =
  | { readonly type: "text"; readonly text: string }
  | { readonly type: "image" | "audio"; readonly data: string; readonly mimeType: string }
  | {
      readonly type: "resource";
      readonly resource: { readonly uri: string; readonly text?: string; readonly mimeType?: string };
    }
  | { readonly type: "unknown"; readonly raw: unknown };

export interface ToolCallResult {
  readonly content: readonly ToolContentBlock[];
  readonly isError: boolean;
}
