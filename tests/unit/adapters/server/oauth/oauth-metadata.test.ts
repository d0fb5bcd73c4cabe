// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/oauth/oauth-metadata`
 * Purpose: Verifies well-known candidate order, resource canonicalization and resolver fallback/caching.
 * Scope: OAuthMetadataResolver over a route table fetch.
 * Side-effects: none
 * Links: src/adapters/server/oauth/oauth-metadata.ts
 * @public
 */

import { createRouteFetch, json } from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import {
  authorizationServerMetadataCandidates,
  canonicalResourceUri,
  OAuthMetadataResolver,
  protectedResourceMetadataCandidates,
} from "@/adapters/server/oauth/oauth-metadata";
import { OAuthError } from "@/shared/errors";
import { makeNoopLogger } from "@/shared/observability";

const SERVER_METADATA = {
  issuer: "https://auth.test",
  authorization_endpoint: "https://auth.test/authorize",
  token_endpoint: "https://auth.test/token",
  code_challenge_methods_supported: ["S256"],
};

describe("canonicalResourceUri", () => {
  it("drops query, fragment and trailing slash and lowercases the host", () => {
    expect(canonicalResourceUri("https://Tools.Test/mcp/?session=1#top")).toBe(
      "https://tools.test/mcp"
    );
    expect(canonicalResourceUri("https://tools.test:8443/mcp")).toBe("https://tools.test:8443/mcp");
    expect(canonicalResourceUri("https://tools.test")).toBe("https://tools.test/");
  });
});

describe("protectedResourceMetadataCandidates", () => {
  it("tries the path-specific document before the root one", () => {
    expect(protectedResourceMetadataCandidates("https://tools.test/mcp/")).toEqual([
      "https://tools.test/.well-known/oauth-protected-resource/mcp",
      "https://tools.test/.well-known/oauth-protected-resource",
    ]);
  });

  it("puts the challenge's metadata URL first without duplicating it", () => {
    expect(
      protectedResourceMetadataCandidates(
        "https://tools.test/mcp",
        "https://tools.test/.well-known/oauth-protected-resource"
      )
    ).toEqual([
      "https://tools.test/.well-known/oauth-protected-resource",
      "https://tools.test/.well-known/oauth-protected-resource/mcp",
    ]);
  });
});

describe("authorizationServerMetadataCandidates", () => {
  it("covers OAuth and OIDC documents for a bare issuer", () => {
    expect(authorizationServerMetadataCandidates("https://auth.test")).toEqual([
      "https://auth.test/.well-known/oauth-authorization-server",
      "https://auth.test/.well-known/openid-configuration",
    ]);
  });

  it("inserts and appends the issuer path", () => {
    expect(authorizationServerMetadataCandidates("https://auth.test/tenant/")).toEqual([
      "https://auth.test/.well-known/oauth-authorization-server/tenant",
      "https://auth.test/.well-known/openid-configuration/tenant",
      "https://auth.test/tenant/.well-known/openid-configuration",
    ]);
  });
});

describe("OAuthMetadataResolver", () => {
  it("falls back to the root document and caches the result", async () => {
    const routes = createRouteFetch({
      "GET https://tools.test/.well-known/oauth-protected-resource": () =>
        json({ authorization_servers: ["https://auth.test"], scopes_supported: ["tools:read"] }),
    });
    const resolver = new OAuthMetadataResolver({ fetch: routes.fetch, logger: makeNoopLogger() });

    const first = await resolver.protectedResource("https://tools.test/mcp");
    const second = await resolver.protectedResource("https://tools.test/mcp");

    expect(first).toEqual({
      authorization_servers: ["https://auth.test"],
      scopes_supported: ["tools:read"],
    });
    expect(second).toBe(first);
    expect(routes.calls.map((call) => call.url)).toEqual([
      "https://tools.test/.well-known/oauth-protected-resource/mcp",
      "https://tools.test/.well-known/oauth-protected-resource",
    ]);
  });

  it("skips candidates that throw or fail validation", async () => {
    const routes = createRouteFetch({
      "GET https://auth.test/.well-known/oauth-authorization-server": () => {
        throw new TypeError("fetch failed");
      },
      "GET https://auth.test/.well-known/openid-configuration": () =>
        json(SERVER_METADATA),
    });
    const resolver = new OAuthMetadataResolver({ fetch: routes.fetch, logger: makeNoopLogger() });

    await expect(resolver.authorizationServer("https://auth.test")).resolves.toEqual(
      SERVER_METADATA
    );
  });

  it("ignores a document missing required endpoints", async () => {
    const routes = createRouteFetch({
      "GET https://auth.test/.well-known/oauth-authorization-server": () =>
        json({ issuer: "https://auth.test" }),
      "GET https://auth.test/.well-known/openid-configuration": () => json(SERVER_METADATA),
    });
    const resolver = new OAuthMetadataResolver({ fetch: routes.fetch, logger: makeNoopLogger() });

    const metadata = await resolver.authorizationServer("https://auth.test");

    expect(metadata.token_endpoint).toBe("https://auth.test/token");
    expect(routes.calls).toHaveLength(2);
  });

  it("refuses authorization servers without S256", async () => {
    const routes = createRouteFetch({
      "GET https://auth.test/.well-known/oauth-authorization-server": () =>
        json({ ...SERVER_METADATA, code_challenge_methods_supported: ["plain"] }),
    });
    const resolver = new OAuthMetadataResolver({ fetch: routes.fetch, logger: makeNoopLogger() });

    const failure = resolver.authorizationServer("https://auth.test");

    await expect(failure).rejects.toBeInstanceOf(OAuthError);
    await expect(failure).rejects.toMatchObject({ reason: "pkce_not_supported" });
  });

  it("reports discovery_failed when every candidate misses", async () => {
    const resolver = new OAuthMetadataResolver({
      fetch: createRouteFetch().fetch,
      logger: makeNoopLogger(),
    });

    await expect(resolver.protectedResource("https://tools.test/mcp")).rejects.toMatchObject({
      reason: "discovery_failed",
      message: "Could not discover protected resource metadata for https://tools.test/mcp",
    });
  });
});
