// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@agent-relay/ai-core/protocol/elicitation`
 * Purpose: Types for server-initiated `elicitation/create` requests (form and URL modes) and their responses.
 * Scope: Shapes only. Parsing and form validation live in features/ai/services/elicitation.
 * Invariants:
 *   - An ElicitationResponse carries `content` only for `accept`
 * Side-effects: none
 * @public
 */

export type ElicitationMode = "form" | "url";

export type ElicitationAction = "accept" | "decline" | "cancel";

export interface ElicitationRequest {
  readonly mode: ElicitationMode;
  readonly message: string;
  /** URL mode: server-side correlation id */
  readonly elicitationId?: string;
  /** URL mode: page the user must visit */
  readonly url?: string;
  /** Form mode: flat JSON schema of primitive properties */
  readonly requestedSchema?: Record<string, unknown>;
}

export type ElicitationContentValue = string | number | boolean | string[];

export interface ElicitationResponse {
  readonly action: ElicitationAction;
  readonly content?: Readonly<Record<string, ElicitationContentValue>>;
}
