// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-tools`
 * Purpose: Built-in tool contracts, implementations and catalog for the agent engine.
 * Scope: Re-exports tools, catalog and adapters. Does NOT run agents.
 * Invariants:
 *   - Depends on @stepwise/agent-core interfaces only; core never imports this package
 * Side-effects: none
 * Links: catalog.ts, runtime-adapter.ts
 * @public
 */

export {
  type ClockCapability,
  createFixedClock,
  systemClock,
} from "./capabilities/clock";
export {
  createDefaultToolCatalog,
  createToolCatalog,
  type DefaultToolCatalogDeps,
  getToolById,
  getToolIds,
  hasToolId,
  selectTools,
  TOOL_CATALOG,
  type ToolCatalog,
} from "./catalog";
export { formatZodIssues, toBoundToolRuntime } from "./runtime-adapter";
export { toToolSpec } from "./schema";
export {
  createGetCurrentTimeImplementation,
  formatClockTime,
  GET_CURRENT_TIME_NAME,
  getCurrentTimeBoundTool,
  getCurrentTimeContract,
  type GetCurrentTimeDeps,
  type GetCurrentTimeInput,
  GetCurrentTimeInputSchema,
} from "./tools/get-current-time";
export {
  formatReflection,
  REFLECTION_NAME,
  reflectionBoundTool,
  reflectionContract,
  type ReflectionInput,
  ReflectionInputSchema,
} from "./tools/reflection";
export {
  SEND_TELEGRAM_MESSAGE_NAME,
  sendTelegramMessageBoundTool,
  sendTelegramMessageContract,
  type SendTelegramMessageInput,
  SendTelegramMessageInputSchema,
} from "./tools/send-telegram-message";
export {
  SPEAK_IN_PERSON_NAME,
  speakInPersonBoundTool,
  speakInPersonContract,
  type SpeakInPersonInput,
  SpeakInPersonInputSchema,
} from "./tools/speak-in-person";
export {
  MISSING_DECISION_MESSAGE,
  MISSING_STRATEGY_MESSAGE,
  STRATEGY_DECISIONS,
  STRATEGY_NAME,
  strategyBoundTool,
  strategyContract,
  type StrategyDecision,
  type StrategyInput,
  StrategyInputSchema,
} from "./tools/strategy";
export {
  TERMINATE_NAME,
  TERMINATE_STATUSES,
  terminateBoundTool,
  terminateContract,
  type TerminateInput,
  TerminateInputSchema,
} from "./tools/terminate";
export type {
  BoundTool,
  ToolContract,
  ToolImplementation,
  ToolOutput,
} from "./types";
