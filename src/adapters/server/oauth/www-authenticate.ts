// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/oauth/www-authenticate`
 * Purpose: Parse Bearer challenges from WWW-Authenticate headers (RFC 6750, RFC 9728 resource_metadata).
 * Scope: Pure string parsing. Does not fetch metadata.
 * Invariants: Parameter names are lower-cased; quoted and token values are both accepted.
 * Side-effects: none
 * @internal
 */

import type { UnauthorizedHint } from "@/ports";

export interface AuthChallenge {
  readonly scheme: string | undefined;
  readonly params: Readonly<Record<string, string>>;
}

const PARAM_PATTERN = /([\w-]+)\s*=\s*(?:"((?:[^"\\]|\\.)*)"|([^\s,]+))/g;

export function parseWwwAuthenticate(header: string | null | undefined): AuthChallenge {
  if (!header) return { scheme: undefined, params: {} };
  const trimmed = header.trim();
  const schemeMatch = /^([A-Za-z][\w-]*)(?:\s+|$)/.exec(trimmed);
  const scheme =
    schemeMatch?.[1] !== undefined && !trimmed.slice(schemeMatch[0].length).startsWith("=")
      ? schemeMatch[1]
      : undefined;
  const rest = scheme !== undefined && schemeMatch ? trimmed.slice(schemeMatch[0].length) : trimmed;

  const params: Record<string, string> = {};
  for (const match of rest.matchAll(PARAM_PATTERN)) {
    const name = match[1];
    if (name === undefined) continue;
    const value = match[2] !== undefined ? match[2].replace(/\\(.)/g, "$1") : (match[3] ?? "");
    params[name.toLowerCase()] = value;
  }
  return { scheme, params };
}

export function unauthorizedHintFrom(header: string | null | undefined): UnauthorizedHint {
  const { params } = parseWwwAuthenticate(header);
  return {
    ...(params.resource_metadata !== undefined && {
      resourceMetadataUrl: params.resource_metadata,
    }),
    ...(params.scope !== undefined && { scope: params.scope }),
  };
}
