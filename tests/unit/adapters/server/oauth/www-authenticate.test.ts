// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/oauth/www-authenticate`
 * Purpose: Verifies Bearer challenge parsing and hint extraction.
 * Scope: Pure string parsing.
 * Side-effects: none
 * Links: src/adapters/server/oauth/www-authenticate.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  parseWwwAuthenticate,
  unauthorizedHintFrom,
} from "@/adapters/server/oauth/www-authenticate";

describe("parseWwwAuthenticate", () => {
  it("reads the scheme and quoted or bare parameters", () => {
    expect(
      parseWwwAuthenticate('Bearer realm="tools", error=invalid_token, Scope="read write"')
    ).toEqual({
      scheme: "Bearer",
      params: { realm: "tools", error: "invalid_token", scope: "read write" },
    });
  });

  it("unescapes quoted values", () => {
    expect(parseWwwAuthenticate('Bearer error_description="say \\"hi\\""').params).toEqual({
      error_description: 'say "hi"',
    });
  });

  it("handles a missing header and a header with only parameters", () => {
    expect(parseWwwAuthenticate(null)).toEqual({ scheme: undefined, params: {} });
    expect(parseWwwAuthenticate('realm="x"')).toEqual({ scheme: undefined, params: { realm: "x" } });
  });
});

describe("unauthorizedHintFrom", () => {
  it("extracts resource metadata and scope", () => {
    expect(
      unauthorizedHintFrom(
        'Bearer resource_metadata="https://tools.test/.well-known/oauth-protected-resource", scope="tools:read"'
      )
    ).toEqual({
      resourceMetadataUrl: "https://tools.test/.well-known/oauth-protected-resource",
      scope: "tools:read",
    });
    expect(unauthorizedHintFrom("Bearer")).toEqual({});
  });
});
