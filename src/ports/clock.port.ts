// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/clock.port`
 * Purpose: Time abstraction for deterministic testing of expiry and timestamps.
 * Scope: Current time as ISO string (message timestamps) and epoch ms (token and pending-state expiry).
 * Invariants: now() and nowMs() describe the same instant
 * Side-effects: none (interface only)
 * Links: adapters/server/time/system.adapter.ts, tests/_fakes/fake-clock.ts
 * @public
 */

export interface Clock {
  /** Current timestamp in ISO 8601 format */
  now(): string;
  /** Current timestamp in epoch milliseconds */
  nowMs(): number;
}
