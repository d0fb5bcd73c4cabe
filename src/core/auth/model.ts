// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/auth/model`
 * Purpose: OAuth entities for protected tool servers: status, token bundle, pending authorization.
 * Scope: Pure types. Does not perform HTTP or crypto.
 * Invariants: Times are epoch milliseconds; token bundles are immutable values replaced wholesale on refresh.
 * Side-effects: none
 * Links: rules.ts, adapters/server/oauth
 * @public
 */

export type OAuthStatus =
  | "none"
  | "required"
  | "pending"
  | "authenticated"
  | "expired"
  | "failed";

export interface TokenBundle {
  readonly accessToken: string;
  readonly refreshToken?: string;
  /** Absolute expiry, epoch ms. Absent means the server gave no lifetime. */
  readonly expiresAt?: number;
  readonly tokenType?: string;
  readonly scope?: string;
}

/** Fields of a token endpoint response after JSON or form decoding. */
export interface TokenResponseFields {
  readonly access_token: string;
  readonly refresh_token?: string;
  readonly expires_in?: number;
  readonly token_type?: string;
  readonly scope?: string;
}

/** PKCE state held between beginAuthorization and exchangeCode. */
export interface PendingAuthorization {
  readonly state: string;
  readonly codeVerifier: string;
  readonly serverId: string;
  readonly resourceUrl: string;
  readonly authorizationServerUrl: string;
  readonly tokenEndpoint: string;
  readonly clientId: string;
  readonly clientSecret?: string;
  readonly redirectUri: string;
  readonly scope?: string;
  /** epoch ms */
  readonly createdAt: number;
}
