// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/oauth/pkce`
 * Purpose: PKCE verifier/challenge and OAuth state generation (RFC 7636, S256 only).
 * Scope: Randomness and hashing from node:crypto. Does not store state.
 * Invariants:
 *   - Verifier is 128 chars over the unreserved alphabet [A-Za-z0-9-._~]
 *   - Challenge is base64url(sha256(verifier)) without padding
 *   - State is 32 random bytes, base64url
 * Side-effects: none (reads system randomness)
 * @internal
 */

import { createHash, randomBytes, randomInt } from "node:crypto";

const UNRESERVED =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-._~";

export const CODE_VERIFIER_LENGTH = 128;

export function generateCodeVerifier(): string {
  let verifier = "";
  for (let i = 0; i < CODE_VERIFIER_LENGTH; i++) {
    verifier += UNRESERVED.charAt(randomInt(UNRESERVED.length));
  }
  return verifier;
}

export function codeChallengeS256(verifier: string): string {
  return createHash("sha256").update(verifier).digest("base64url");
}

export function generateState(): string {
  return randomBytes(32).toString("base64url");
}
