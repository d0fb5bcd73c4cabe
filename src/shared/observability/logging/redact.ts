// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys (not generic "url").
 * Side-effects: none
 * Links: Imported by logger module.
 * @public
 */

export const REDACT_PATHS = [
  // OAuth & secrets
  "token",
  "accessToken",
  "refreshToken",
  "access_token",
  "refresh_token",
  "code",
  "codeVerifier",
  "code_verifier",
  "clientSecret",
  "client_secret",
  "apiKey",
  "api_key",
  "LLM_API_KEY",
  // HTTP headers
  "headers.authorization",
  "headers.Authorization",
  "headers.cookie",
];
