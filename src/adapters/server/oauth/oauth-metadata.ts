// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/oauth/oauth-metadata`
 * Purpose: Protected-resource (RFC 9728) and authorization-server (RFC 8414 / OIDC) metadata discovery.
 * Scope: Candidate URL construction, fetch with fallback, zod validation, per-URL caching. Does not run the authorization flow.
 * Invariants:
 *   - Candidates are tried in order; 4xx, network, timeout and parse failures fall through to the next
 *   - Authorization servers without S256 are refused (pkce_not_supported), never skipped
 *   - Successful metadata is cached per requested URL for the resolver's lifetime
 * Side-effects: IO (HTTP GET)
 * Links: token-lifecycle.manager.ts
 * @internal
 */

import { z } from "zod";

import { OAuthError } from "@/shared/errors";
import type { Logger } from "@/shared/observability";

const ProtectedResourceMetadataSchema = z.object({
  resource: z.string().optional(),
  authorization_servers: z.array(z.string()).default([]),
  scopes_supported: z.array(z.string()).optional(),
});

export type ProtectedResourceMetadata = z.infer<typeof ProtectedResourceMetadataSchema>;

const AuthorizationServerMetadataSchema = z.object({
  issuer: z.string().optional(),
  authorization_endpoint: z.string(),
  token_endpoint: z.string(),
  registration_endpoint: z.string().optional(),
  scopes_supported: z.array(z.string()).optional(),
  code_challenge_methods_supported: z.array(z.string()).optional(),
});

export type AuthorizationServerMetadata = z.infer<typeof AuthorizationServerMetadataSchema>;

function originOf(url: URL): string {
  return `${url.protocol}//${url.host}`;
}

function trimmedPath(url: URL): string {
  return url.pathname.replace(/\/+$/, "");
}

/** RFC 8707 resource indicator: scheme, authority and path, without query, fragment or trailing slash. */
export function canonicalResourceUri(serverUrl: string): string {
  const url = new URL(serverUrl);
  const path = url.pathname.length > 1 ? url.pathname.replace(/\/+$/, "") : url.pathname;
  return `${originOf(url)}${path}`;
}

export function protectedResourceMetadataCandidates(
  serverUrl: string,
  metadataUrl?: string
): string[] {
  const url = new URL(serverUrl);
  const path = trimmedPath(url);
  const candidates = [
    ...(metadataUrl !== undefined ? [metadataUrl] : []),
    ...(path.length > 0 ? [`${originOf(url)}/.well-known/oauth-protected-resource${path}`] : []),
    `${originOf(url)}/.well-known/oauth-protected-resource`,
  ];
  return [...new Set(candidates)];
}

export function authorizationServerMetadataCandidates(issuer: string): string[] {
  const url = new URL(issuer);
  const path = trimmedPath(url);
  const origin = originOf(url);
  if (path.length === 0) {
    return [
      `${origin}/.well-known/oauth-authorization-server`,
      `${origin}/.well-known/openid-configuration`,
    ];
  }
  return [
    `${origin}/.well-known/oauth-authorization-server${path}`,
    `${origin}/.well-known/openid-configuration${path}`,
    `${origin}${path}/.well-known/openid-configuration`,
  ];
}

export function supportsPkceS256(metadata: AuthorizationServerMetadata): boolean {
  return metadata.code_challenge_methods_supported?.includes("S256") ?? false;
}

export interface OAuthMetadataResolverOptions {
  readonly fetch?: typeof fetch;
  /** Per-document timeout */
  readonly requestTimeoutMs?: number;
  readonly logger: Logger;
}

const DEFAULT_METADATA_TIMEOUT_MS = 10_000;

export class OAuthMetadataResolver {
  private readonly fetchImpl: typeof fetch;
  private readonly resourceCache = new Map<string, ProtectedResourceMetadata>();
  private readonly serverCache = new Map<string, AuthorizationServerMetadata>();

  constructor(private readonly options: OAuthMetadataResolverOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async protectedResource(
    serverUrl: string,
    metadataUrl?: string
  ): Promise<ProtectedResourceMetadata> {
    const cached = this.resourceCache.get(serverUrl);
    if (cached) return cached;

    for (const candidate of protectedResourceMetadataCandidates(serverUrl, metadataUrl)) {
      const body = await this.tryFetchJson(candidate);
      if (body === undefined) continue;
      const parsed = ProtectedResourceMetadataSchema.safeParse(body);
      if (!parsed.success) {
        this.options.logger.debug({ url: candidate }, "oauth.metadata.resource_invalid");
        continue;
      }
      this.resourceCache.set(serverUrl, parsed.data);
      return parsed.data;
    }
    throw new OAuthError(
      "discovery_failed",
      `Could not discover protected resource metadata for ${serverUrl}`
    );
  }

  async authorizationServer(issuer: string): Promise<AuthorizationServerMetadata> {
    const cached = this.serverCache.get(issuer);
    if (cached) return cached;

    for (const candidate of authorizationServerMetadataCandidates(issuer)) {
      const body = await this.tryFetchJson(candidate);
      if (body === undefined) continue;
      const parsed = AuthorizationServerMetadataSchema.safeParse(body);
      if (!parsed.success) {
        this.options.logger.debug({ url: candidate }, "oauth.metadata.server_invalid");
        continue;
      }
      if (!supportsPkceS256(parsed.data)) {
        throw new OAuthError(
          "pkce_not_supported",
          `Authorization server ${issuer} does not support PKCE (S256)`
        );
      }
      this.serverCache.set(issuer, parsed.data);
      return parsed.data;
    }
    throw new OAuthError(
      "discovery_failed",
      `Could not discover authorization server metadata for ${issuer}`
    );
  }

  /** GET a JSON document; undefined when the candidate is unusable. */
  private async tryFetchJson(url: string): Promise<unknown> {
    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.options.requestTimeoutMs ?? DEFAULT_METADATA_TIMEOUT_MS),
      });
      if (response.status !== 200) {
        this.options.logger.debug({ url, status: response.status }, "oauth.metadata.miss");
        return undefined;
      }
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      this.options.logger.debug(
        { url, reason: error instanceof Error ? error.message : String(error) },
        "oauth.metadata.fetch_failed"
      );
      return undefined;
    }
  }
}
