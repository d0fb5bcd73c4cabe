// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/auth/public`
 * Purpose: Public API for the OAuth domain.
 * Scope: Re-exports auth entities and rules.
 * Side-effects: none
 * @public
 */

export type {
  OAuthStatus,
  PendingAuthorization,
  TokenBundle,
  TokenResponseFields,
} from "./model";
export {
  canTransitionOAuthStatus,
  isPendingAuthorizationExpired,
  isTokenExpired,
  PENDING_AUTHORIZATION_TTL_MS,
  TOKEN_EXPIRY_SKEW_MS,
  tokenBundleFromResponse,
} from "./rules";
