// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Observability surface (structured logging).
 * Scope: Re-exports logging. Does not configure transports.
 * Side-effects: none
 * @public
 */

export * from "./logging";
