// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/oauth/token-lifecycle.manager`
 * Purpose: OAuth 2.1 + PKCE lifecycle for protected tool servers: discovery, authorization URL, code exchange, refresh, status.
 * Scope: Owns pending authorizations, per-server OAuth status and token refresh. Does not open browsers or receive redirects.
 * Invariants:
 *   - SINGLE_FLIGHT_REFRESH: concurrent getAccessToken() calls for one server share a single refresh request
 *   - STATE_SINGLE_USE: a pending state is consumed on first exchange attempt, valid or not
 *   - REFRESH_NO_RETRY: a failed refresh sets status failed and surfaces AuthRequiredError
 *   - REQUEST_TIMEOUT: every HTTP request carries requestTimeoutMs; a caller's signal ends its own wait, not the shared refresh
 *   - STATUS_TRANSITIONS: every status change passes canTransitionOAuthStatus
 *   - Tokens are written only here, through the persistence port
 * Side-effects: IO (HTTP to tool server and authorization server), persistence writes
 * Links: oauth-metadata.ts, pkce.ts, core/auth/rules.ts, ports/tool-server.port.ts (AccessTokenProvider)
 * @public
 */

import { z } from "zod";

import {
  canTransitionOAuthStatus,
  isPendingAuthorizationExpired,
  isTokenExpired,
  type OAuthStatus,
  type PendingAuthorization,
  type TokenBundle,
  tokenBundleFromResponse,
} from "@/core";
import type {
  AccessTokenProvider,
  Clock,
  PersistencePort,
  UnauthorizedHint,
} from "@/ports";
import { AuthRequiredError, ContractViolationError, OAuthError } from "@/shared/errors";
import { type Logger, logExchangeEnd, makeLogger } from "@/shared/observability";

import {
  type AuthorizationServerMetadata,
  canonicalResourceUri,
  OAuthMetadataResolver,
  type ProtectedResourceMetadata,
} from "./oauth-metadata";
import { codeChallengeS256, generateCodeVerifier, generateState } from "./pkce";
import { parseWwwAuthenticate } from "./www-authenticate";

export interface DiscoveredAuthorization {
  readonly serverUrl: string;
  readonly resourceUrl: string;
  readonly resource: ProtectedResourceMetadata;
  readonly authorizationServerUrl: string;
  readonly authorizationServer: AuthorizationServerMetadata;
  /** scope from the 401 challenge */
  readonly challengeScope?: string;
}

export type DiscoveryResult =
  | { readonly required: false }
  | { readonly required: true; readonly metadata: DiscoveredAuthorization };

export interface BeginAuthorizationParams {
  readonly serverId: string;
  readonly clientId?: string;
  readonly clientSecret?: string;
  readonly scope?: string;
}

export interface AuthorizationStart {
  readonly authorizationUrl: string;
  readonly pendingState: string;
}

export interface ServerRegistration {
  readonly url: string;
  readonly clientId?: string;
  readonly clientSecret?: string;
}

export type OAuthStatusListener = (
  serverId: string,
  status: OAuthStatus,
  previous: OAuthStatus
) => void;

export interface TokenLifecycleManagerOptions {
  readonly persistence: PersistencePort;
  readonly clock: Clock;
  readonly clientId: string;
  readonly redirectUri: string;
  readonly clientSecret?: string;
  /** Per-request timeout for the probe, metadata documents and the token endpoint */
  readonly requestTimeoutMs?: number;
  readonly fetch?: typeof fetch;
  readonly logger?: Logger;
}

export interface AccessTokenOptions {
  readonly signal?: AbortSignal;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/** Where refreshes for one server go; learned at code exchange or by discovery. */
interface RefreshContext {
  readonly tokenEndpoint: string;
  readonly clientId: string;
  readonly clientSecret?: string;
  readonly resourceUrl: string;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.coerce.number().positive().optional(),
  token_type: z.string().optional(),
  scope: z.string().optional(),
});

const TokenErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

/** Settles with `work`, or rejects with the signal's reason once it aborts. */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return work;
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && error.name === "TimeoutError";
}

/** Token endpoints answer JSON, but some answer form-encoded bodies. */
export function decodeTokenEndpointBody(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    if (!(error instanceof SyntaxError)) throw error;
    return Object.fromEntries(new URLSearchParams(text));
  }
}

export class TokenLifecycleManager implements AccessTokenProvider {
  private readonly fetchImpl: typeof fetch;
  private readonly requestTimeoutMs: number;
  private readonly log: Logger;
  private readonly metadata: OAuthMetadataResolver;

  private readonly servers = new Map<string, ServerRegistration>();
  private readonly statuses = new Map<string, OAuthStatus>();
  private readonly pending = new Map<string, PendingAuthorization>();
  private readonly refreshContexts = new Map<string, RefreshContext>();
  private readonly inflightRefresh = new Map<string, Promise<TokenBundle>>();
  private readonly challenges = new Map<string, UnauthorizedHint>();
  private readonly listeners = new Set<OAuthStatusListener>();

  constructor(private readonly options: TokenLifecycleManagerOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.log = options.logger ?? makeLogger({ component: "TokenLifecycleManager" });
    this.metadata = new OAuthMetadataResolver({
      logger: this.log,
      requestTimeoutMs: this.requestTimeoutMs,
      ...(options.fetch ? { fetch: options.fetch } : {}),
    });
  }

  /** Makes a server known so that refresh can rediscover its token endpoint after a restart. */
  registerServer(serverId: string, registration: ServerRegistration): void {
    this.servers.set(serverId, registration);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Status
  // ───────────────────────────────────────────────────────────────────────────

  getStatus(serverId: string): OAuthStatus {
    return this.statuses.get(serverId) ?? "none";
  }

  onStatusChange(listener: OAuthStatusListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  markRequired(serverId: string): void {
    this.setStatus(serverId, "required");
  }

  private setStatus(serverId: string, next: OAuthStatus): void {
    const previous = this.getStatus(serverId);
    if (previous === next) return;
    if (!canTransitionOAuthStatus(previous, next)) {
      throw new ContractViolationError(
        `OAuth status cannot move from ${previous} to ${next} (server ${serverId})`
      );
    }
    this.statuses.set(serverId, next);
    this.log.info({ serverId, from: previous, to: next }, "oauth.status_changed");
    for (const listener of this.listeners) listener(serverId, next, previous);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Discovery and authorization
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Probe the server without credentials. A 401 starts metadata discovery from
   * the WWW-Authenticate hints; anything else means no authorization is needed.
   */
  async discover(serverUrl: string): Promise<DiscoveryResult> {
    const probe = await this.fetchImpl(serverUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json", Accept: "application/json, text/event-stream" },
      body: JSON.stringify({ jsonrpc: "2.0", id: 1, method: "ping" }),
      signal: AbortSignal.timeout(this.requestTimeoutMs),
    }).catch((error: unknown) => {
      throw new OAuthError(
        "discovery_failed",
        isTimeout(error) ? `Probe of ${serverUrl} timed out` : `Probe of ${serverUrl} failed`,
        { cause: error }
      );
    });
    await probe.body?.cancel();

    if (probe.status !== 401) return { required: false };

    const { params } = parseWwwAuthenticate(probe.headers.get("WWW-Authenticate"));
    const metadata = await this.resolve(serverUrl, {
      ...(params.resource_metadata !== undefined && {
        resourceMetadataUrl: params.resource_metadata,
      }),
      ...(params.scope !== undefined && { scope: params.scope }),
    });
    return { required: true, metadata };
  }

  private async resolve(
    serverUrl: string,
    hint: UnauthorizedHint
  ): Promise<DiscoveredAuthorization> {
    const resource = await this.metadata.protectedResource(serverUrl, hint.resourceMetadataUrl);
    const authorizationServerUrl = resource.authorization_servers[0];
    if (authorizationServerUrl === undefined) {
      throw new OAuthError(
        "discovery_failed",
        `No authorization servers listed for ${serverUrl}`
      );
    }
    const authorizationServer = await this.metadata.authorizationServer(authorizationServerUrl);
    return {
      serverUrl,
      resourceUrl: canonicalResourceUri(serverUrl),
      resource,
      authorizationServerUrl,
      authorizationServer,
      ...(hint.scope !== undefined && { challengeScope: hint.scope }),
    };
  }

  async beginAuthorization(
    metadata: DiscoveredAuthorization,
    params: BeginAuthorizationParams
  ): Promise<AuthorizationStart> {
    const registration = this.servers.get(params.serverId);
    const clientId = params.clientId ?? registration?.clientId ?? this.options.clientId;
    const clientSecret =
      params.clientSecret ?? registration?.clientSecret ?? this.options.clientSecret;
    const scope = selectScope(
      params.scope,
      metadata.challengeScope ?? this.challenges.get(params.serverId)?.scope,
      metadata.resource.scopes_supported,
      metadata.authorizationServer.scopes_supported
    );

    const codeVerifier = generateCodeVerifier();
    const state = generateState();
    this.pending.set(state, {
      state,
      codeVerifier,
      serverId: params.serverId,
      resourceUrl: metadata.resourceUrl,
      authorizationServerUrl: metadata.authorizationServerUrl,
      tokenEndpoint: metadata.authorizationServer.token_endpoint,
      clientId,
      ...(clientSecret !== undefined && { clientSecret }),
      redirectUri: this.options.redirectUri,
      ...(scope !== undefined && { scope }),
      createdAt: this.options.clock.nowMs(),
    });

    const url = new URL(metadata.authorizationServer.authorization_endpoint);
    url.searchParams.set("response_type", "code");
    url.searchParams.set("client_id", clientId);
    url.searchParams.set("redirect_uri", this.options.redirectUri);
    url.searchParams.set("state", state);
    url.searchParams.set("code_challenge", codeChallengeS256(codeVerifier));
    url.searchParams.set("code_challenge_method", "S256");
    url.searchParams.set("resource", metadata.resourceUrl);
    if (scope !== undefined) url.searchParams.set("scope", scope);

    this.setStatus(params.serverId, "pending");
    this.log.info(
      { serverId: params.serverId, hasScope: scope !== undefined },
      "oauth.authorization_started"
    );
    return { authorizationUrl: url.toString(), pendingState: state };
  }

  async exchangeCode(stateParam: string, code: string): Promise<TokenBundle> {
    const pending = this.pending.get(stateParam);
    if (!pending) {
      throw new OAuthError("invalid_state", "Unknown or already used OAuth state");
    }
    this.pending.delete(stateParam);
    if (pending.state !== stateParam) {
      throw new OAuthError("invalid_state", "OAuth state mismatch");
    }
    if (isPendingAuthorizationExpired(pending, this.options.clock.nowMs())) {
      this.setStatus(pending.serverId, "failed");
      throw new OAuthError("state_expired", "OAuth authorization expired; start again");
    }

    const form = new URLSearchParams({
      grant_type: "authorization_code",
      code,
      redirect_uri: pending.redirectUri,
      client_id: pending.clientId,
      code_verifier: pending.codeVerifier,
      resource: pending.resourceUrl,
    });
    if (pending.clientSecret !== undefined) form.set("client_secret", pending.clientSecret);

    let bundle: TokenBundle;
    try {
      bundle = await this.tokenRequest(pending.tokenEndpoint, form, "token_request_failed");
    } catch (error) {
      this.setStatus(pending.serverId, "failed");
      throw error;
    }

    this.refreshContexts.set(pending.serverId, {
      tokenEndpoint: pending.tokenEndpoint,
      clientId: pending.clientId,
      ...(pending.clientSecret !== undefined && { clientSecret: pending.clientSecret }),
      resourceUrl: pending.resourceUrl,
    });
    await this.options.persistence.saveTokens(pending.serverId, bundle);
    this.challenges.delete(pending.serverId);
    this.setStatus(pending.serverId, "authenticated");
    return bundle;
  }

  async refresh(serverId: string, bundle: TokenBundle): Promise<TokenBundle> {
    if (bundle.refreshToken === undefined) {
      throw new OAuthError("refresh_failed", "No refresh token available");
    }
    const context = await this.refreshContext(serverId);
    const form = new URLSearchParams({
      grant_type: "refresh_token",
      refresh_token: bundle.refreshToken,
      client_id: context.clientId,
      resource: context.resourceUrl,
    });
    if (context.clientSecret !== undefined) form.set("client_secret", context.clientSecret);

    return this.tokenRequest(context.tokenEndpoint, form, "refresh_failed", bundle.refreshToken);
  }

  private async refreshContext(serverId: string): Promise<RefreshContext> {
    const known = this.refreshContexts.get(serverId);
    if (known) return known;

    const registration = this.servers.get(serverId);
    if (!registration) {
      throw new OAuthError("refresh_failed", `Server ${serverId} is not registered`);
    }
    const discovered = await this.resolve(registration.url, this.challenges.get(serverId) ?? {});
    const clientSecret = registration.clientSecret ?? this.options.clientSecret;
    const context: RefreshContext = {
      tokenEndpoint: discovered.authorizationServer.token_endpoint,
      clientId: registration.clientId ?? this.options.clientId,
      ...(clientSecret !== undefined && { clientSecret }),
      resourceUrl: discovered.resourceUrl,
    };
    this.refreshContexts.set(serverId, context);
    return context;
  }

  private async tokenRequest(
    endpoint: string,
    form: URLSearchParams,
    failureReason: "token_request_failed" | "refresh_failed",
    previousRefreshToken?: string
  ): Promise<TokenBundle> {
    const started = this.options.clock.nowMs();
    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          Accept: "application/json",
        },
        body: form.toString(),
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
      text = await response.text();
    } catch (error) {
      throw new OAuthError(
        failureReason,
        isTimeout(error)
          ? `Token endpoint did not answer within ${this.requestTimeoutMs}ms`
          : "Token endpoint unreachable",
        { cause: error }
      );
    }

    const body = decodeTokenEndpointBody(text);
    logExchangeEnd(this.log, {
      method: form.get("grant_type") ?? "token",
      durationMs: this.options.clock.nowMs() - started,
      status: response.status,
    });

    if (!response.ok) {
      const detail = TokenErrorSchema.safeParse(body);
      throw new OAuthError(
        failureReason,
        detail.success
          ? `Token endpoint rejected request: ${detail.data.error}`
          : `Token endpoint answered ${response.status}`,
        { status: response.status }
      );
    }

    const parsed = TokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new OAuthError("invalid_token_response", "Token response is missing access_token", {
        cause: parsed.error,
      });
    }
    return tokenBundleFromResponse(parsed.data, this.options.clock.nowMs(), previousRefreshToken);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // AccessTokenProvider
  // ───────────────────────────────────────────────────────────────────────────

  async getAccessToken(
    serverId: string,
    options: AccessTokenOptions = {}
  ): Promise<string | undefined> {
    const stored = await untilAborted(this.options.persistence.loadTokens(serverId), options.signal);
    if (!stored) return undefined;
    if (this.getStatus(serverId) === "none") this.setStatus(serverId, "authenticated");

    if (!isTokenExpired(stored, this.options.clock.nowMs())) return stored.accessToken;

    if (stored.refreshToken === undefined) {
      this.setStatus(serverId, "expired");
      throw new AuthRequiredError("Access token expired and no refresh token is stored", {
        serverId,
      });
    }

    const refreshed = await untilAborted(this.refreshOnce(serverId, stored), options.signal);
    return refreshed.accessToken;
  }

  reportUnauthorized(serverId: string, hint: UnauthorizedHint): void {
    this.challenges.set(serverId, hint);
    this.markRequired(serverId);
  }

  private refreshOnce(serverId: string, stored: TokenBundle): Promise<TokenBundle> {
    const inflight = this.inflightRefresh.get(serverId);
    if (inflight) return inflight;

    const attempt = this.runRefresh(serverId, stored).finally(() => {
      this.inflightRefresh.delete(serverId);
    });
    this.inflightRefresh.set(serverId, attempt);
    return attempt;
  }

  private async runRefresh(serverId: string, stored: TokenBundle): Promise<TokenBundle> {
    try {
      const refreshed = await this.refresh(serverId, stored);
      await this.options.persistence.saveTokens(serverId, refreshed);
      this.setStatus(serverId, "authenticated");
      this.log.info({ serverId }, "oauth.token_refreshed");
      return refreshed;
    } catch (error) {
      this.log.warn(
        { serverId, reason: error instanceof OAuthError ? error.reason : "unknown" },
        "oauth.refresh_failed"
      );
      this.setStatus(serverId, "failed");
      throw new AuthRequiredError("Token refresh failed; re-authorization required", {
        serverId,
      });
    }
  }

  /** Drops pending authorizations older than their TTL. Returns how many were removed. */
  cleanupExpiredStates(): number {
    const nowMs = this.options.clock.nowMs();
    let removed = 0;
    for (const [state, pending] of this.pending) {
      if (isPendingAuthorizationExpired(pending, nowMs)) {
        this.pending.delete(state);
        removed += 1;
      }
    }
    return removed;
  }
}

/** explicit → challenge → resource scopes_supported → authorization server scopes_supported */
export function selectScope(
  explicit: string | undefined,
  challenge: string | undefined,
  resourceScopes: readonly string[] | undefined,
  serverScopes: readonly string[] | undefined
): string | undefined {
  const candidates = [
    explicit,
    challenge,
    resourceScopes?.join(" "),
    serverScopes?.join(" "),
  ];
  return candidates.find((scope) => scope !== undefined && scope.length > 0);
}
