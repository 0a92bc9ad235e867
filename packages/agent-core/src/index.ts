// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core`
 * Purpose: Barrel export for the agent step-loop engine.
 * Scope: Re-exports public types and factories from submodules. Does NOT implement logic.
 * Invariants: SINGLE_SOURCE_OF_TRUTH - these are the canonical definitions.
 * Side-effects: none
 * Links: agent/agent.ts, agent/run-agent.ts
 * @public
 */

// Agent engine
export { type Actor, type ActorOptions, createActor } from "./agent/actor";
export { type Agent, type CreateAgentOptions, createAgent } from "./agent/agent";
export {
  type AgentContext,
  defaultMessageFormatter,
  type FormatContext,
  type MessageFormatter,
} from "./agent/context";
export {
  type AgentRunResult,
  isStuck,
  type RunAgentOptions,
  runAgent,
  STUCK_PROMPT,
  type StopReason,
} from "./agent/run-agent";
export { AGENT_STATES, type AgentState, AgentRunState } from "./agent/state";
export {
  createStepLoop,
  type StepLoop,
  type StepLoopOptions,
  type StepOutcome,
} from "./agent/step-loop";
export {
  createThinker,
  type ThinkOutcome,
  type ThinkReason,
  type Thinker,
} from "./agent/thinker";
// Configurable types
export {
  type AgentRunConfig,
  type AgentRunConfigInput,
  AgentRunConfigSchema,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_DUPLICATE_THRESHOLD,
  DEFAULT_MAX_STEPS,
  TOOL_CHOICES,
  type ToolChoice,
  ToolChoiceSchema,
} from "./configurable/agent-run-config";
// Event types
export {
  type AgentEvent,
  type AgentEventType,
  type EmitAgentEvent,
  type ErrorEvent,
  type FinalEvent,
  readShouldAct,
  type StepEvent,
  type TokenEvent,
  type ToolOutputEvent,
  type ToolStatusEvent,
} from "./events/agent-events";
// Execution errors
export {
  AGENT_EXECUTION_ERROR_CODES,
  AgentExecutionError,
  type AgentExecutionErrorCode,
  describeError,
  errorMessageOf,
  isAgentExecutionError,
  isAgentExecutionErrorCode,
  normalizeErrorToExecutionCode,
} from "./execution/error-codes";
export {
  AgentStateError,
  isAgentStateError,
  isProtocolViolationError,
  ProtocolViolationError,
  TOOL_CALLS_REQUIRED_MESSAGE,
} from "./execution/errors";
// LLM error types (thrown by adapters, classified by normalizer)
export {
  classifyLlmErrorFromStatus,
  isLlmError,
  LlmError,
  type LlmErrorKind,
} from "./execution/llm-errors";
// Model port
export type {
  AskToolParams,
  ModelClient,
  ModelDecision,
  ModelDelta,
  TextDelta,
  ToolCallDelta,
} from "./model/model-client.port";
// Observability
export {
  excerpt,
  type LoggerLike,
  makeSilentLogger,
} from "./observability/logger";
// Presentation
export { chunkText } from "./presentation/chunker";
export {
  createPacer,
  normalizeLineBreaks,
  type Pacer,
  type PacingConfig,
  type PacingConfigInput,
  PacingConfigSchema,
  type PacingRuntime,
} from "./presentation/pacing";
export {
  type CharacterPresenterOptions,
  type ChunkedPresenterOptions,
  createCharacterPresenter,
  createChunkedPresenter,
  type PresentationContext,
  type ResultPresenter,
  silentPresenter,
} from "./presentation/presenters";
// Runtime
export { AsyncQueue, withQueueRelease } from "./runtime/async-queue";
// Tooling
export type { ToolSourcePort } from "./tooling/ports/tool-source.port";
export {
  createStaticToolSource,
  StaticToolSource,
} from "./tooling/sources/static.source";
export {
  createToolExecutor,
  type ToolExecution,
  type ToolExecutor,
  type ToolExecutorConfig,
} from "./tooling/tool-executor";
export {
  type BoundToolRuntime,
  type CombineOptions,
  combineToolResults,
  errorResult,
  hasStructuredData,
  isMeaningfulResult,
  type ToolExecutionResult,
  type ToolInvocationContext,
  type ToolSpec,
  toolResult,
  toolResultFromOutput,
  toolResultText,
} from "./tooling/types";
// Transcript
export {
  type BuiltinToolName,
  CATEGORY_INDICATORS,
  categoryForInputMode,
  categoryForTool,
  displayTypeForTool,
  INPUT_MODES,
  type InputMode,
  isInputMode,
  MESSAGE_DISPLAY_TYPES,
  MessageCategory,
  type MessageDisplayType,
  TOOL_CATEGORY_MAP,
  TOOL_NAMES,
} from "./transcript/categories";
export {
  assistantMessage,
  assistantToolCallMessage,
  type Message,
  type MessageOptions,
  type MessageRole,
  systemMessage,
  type ToolInvocationRequest,
  toolMessage,
  userMessage,
} from "./transcript/message";
export {
  createInMemoryTranscript,
  type Transcript,
} from "./transcript/transcript";
