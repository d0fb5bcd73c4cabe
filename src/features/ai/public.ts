// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/public`
 * Purpose: Public API surface for the agent feature - barrel export for stable feature boundaries.
 * Scope: Re-exports the runtime assembly, loop, processors and form helpers. Does not implement logic.
 * Invariants: Feature consumers import from this file, never from internal modules.
 * Side-effects: none
 * Links: Part of hexagonal architecture boundary enforcement
 * @public
 */

export {
  type AgentDeps,
  type ConversationRuntime,
  openConversation,
} from "./conversation";
export {
  type AgenticLoopDeps,
  AgenticLoop,
  type RunHandle,
  type RunOptions,
  type RunOutcome,
  type RunStatus,
} from "./services/agentic-loop";
export {
  type ElicitationForm,
  type ElicitationFormField,
  type ElicitationSubmission,
  elicitationResponse,
  type FormFieldOption,
  type FormFieldType,
  parseElicitationForm,
  parseFormField,
  submitElicitationForm,
  validateElicitationForm,
  validateFormField,
} from "./services/elicitation";
export { type AgentEventListener, AgentEventStream } from "./services/event-stream";
export { PendingRequestTable, pendingKey } from "./services/pending-requests";
export {
  SAMPLING_REJECTED_MESSAGE,
  type SamplingContext,
  SamplingProcessor,
  type SamplingProcessorDeps,
  selectSamplingModel,
} from "./services/sampling-processor";
export {
  type DispatchOptions,
  type ElicitFn,
  MAX_ELICITATION_ROUNDS,
  ToolDispatcher,
  type ToolDispatcherDeps,
  type ToolResolver,
} from "./services/tool-dispatcher";
export {
  type ConnectionFactoryParams,
  type OpenReport,
  type RegistryHandlers,
  type ToolServerConnectionFactory,
  ToolServerRegistry,
  type ToolServerRegistryDeps,
} from "./services/tool-server-registry";
