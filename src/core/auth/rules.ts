// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/auth/rules`
 * Purpose: Token expiry, pending-state expiry and OAuth status transition rules.
 * Scope: Pure functions over epoch-ms timestamps. Does not read the clock.
 * Invariants:
 *   - EXPIRY_SKEW: a token is expired when now >= expiresAt - 30s
 *   - PENDING_TTL: pending authorizations live 10 minutes
 *   - REFRESH_KEEPS_OLD_REFRESH_TOKEN: a refresh response without refresh_token keeps the previous one
 * Side-effects: none
 * Links: model.ts
 * @public
 */

import type {
  OAuthStatus,
  PendingAuthorization,
  TokenBundle,
  TokenResponseFields,
} from "./model";

export const TOKEN_EXPIRY_SKEW_MS = 30_000;

export const PENDING_AUTHORIZATION_TTL_MS = 10 * 60 * 1000;

export function isTokenExpired(bundle: TokenBundle, nowMs: number): boolean {
  if (bundle.expiresAt === undefined) return false;
  return nowMs >= bundle.expiresAt - TOKEN_EXPIRY_SKEW_MS;
}

export function isPendingAuthorizationExpired(
  pending: PendingAuthorization,
  nowMs: number
): boolean {
  return nowMs - pending.createdAt > PENDING_AUTHORIZATION_TTL_MS;
}

export function tokenBundleFromResponse(
  fields: TokenResponseFields,
  nowMs: number,
  previousRefreshToken?: string
): TokenBundle {
  const refreshToken = fields.refresh_token ?? previousRefreshToken;
  return {
    accessToken: fields.access_token,
    ...(refreshToken !== undefined && { refreshToken }),
    ...(fields.expires_in !== undefined && {
      expiresAt: nowMs + fields.expires_in * 1000,
    }),
    ...(fields.token_type !== undefined && { tokenType: fields.token_type }),
    ...(fields.scope !== undefined && { scope: fields.scope }),
  };
}

const ALLOWED_TRANSITIONS: Readonly<Record<OAuthStatus, readonly OAuthStatus[]>> = {
  none: ["required", "pending", "authenticated"],
  required: ["pending", "authenticated", "failed", "expired"],
  pending: ["authenticated", "failed", "required", "expired"],
  authenticated: ["pending", "expired", "required", "failed", "none"],
  expired: ["authenticated", "failed", "pending", "required"],
  failed: ["pending", "required", "authenticated", "expired", "none"],
};

/**
 * Validates an OAuth status change. Self-transitions are not transitions.
 */
export function canTransitionOAuthStatus(
  from: OAuthStatus,
  to: OAuthStatus
): boolean {
  if (from === to) return false;
  return ALLOWED_TRANSITIONS[from].includes(to);
}
