// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/events/agent-events`
 * Purpose: Streaming event types emitted by the agent step loop.
 * Scope: Defines the AgentEvent union consumed by transports (SSE, WebSocket, in-process). Does NOT implement functions.
 * Invariants:
 *   - SINGLE_SOURCE_OF_TRUTH: This is the canonical event definition
 *   - EVENTS_ORDERED_PER_INVOCATION: Events for one tool invocation are emitted in production order
 *   - MESSAGE_ID_STABLE: messageId carries the tool invocation id across status → output → token events
 *   - STEP_AND_FINAL_FROM_DRIVER: step/final events come only from runAgent()
 * Side-effects: none (types only)
 * Links: step-loop.ts, run-agent.ts
 * @public
 */

/**
 * Fields shared by every event.
 */
interface AgentEventBase {
  /** 1-based step index at emission time */
  readonly step: number;
  /** Step budget of the run */
  readonly totalSteps: number;
  /** Presentation hint: a tool name or a MessageDisplayType */
  readonly messageType?: string;
  /** Correlating tool invocation id */
  readonly messageId?: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

/**
 * Partial text. Emitted for model deltas and for chunked or paced tool output.
 */
export interface TokenEvent extends AgentEventBase {
  readonly type: "token";
  readonly content: string;
}

/**
 * Progress of the think/act phases.
 * The terminal status of a think phase carries `metadata.shouldAct`.
 */
export interface ToolStatusEvent extends AgentEventBase {
  readonly type: "tool_status";
  readonly content: string;
}

/**
 * Structured tool data (never text).
 * metadata: { structuredData, resultType }
 */
export interface ToolOutputEvent extends AgentEventBase {
  readonly type: "tool_output";
  readonly content: null;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/**
 * Recoverable or terminal failure surfaced to the consumer.
 */
export interface ErrorEvent extends AgentEventBase {
  readonly type: "error";
  readonly content: string;
}

/**
 * Start of a step. Emitted by the run driver before each step.
 */
export interface StepEvent extends AgentEventBase {
  readonly type: "step";
  readonly content: string;
}

/**
 * End of the run. Always the last event of a run.
 */
export interface FinalEvent extends AgentEventBase {
  readonly type: "final";
  readonly content: string | null;
}

export type AgentEvent =
  | TokenEvent
  | ToolStatusEvent
  | ToolOutputEvent
  | ErrorEvent
  | StepEvent
  | FinalEvent;

export type AgentEventType = AgentEvent["type"];

/**
 * Callback for pushing events into a run's channel.
 */
export type EmitAgentEvent = (event: AgentEvent) => void;

/**
 * Read `metadata.shouldAct` from a terminal think status.
 * Returns undefined for events that do not carry the flag.
 */
export function readShouldAct(event: AgentEvent): boolean | undefined {
  if (event.type !== "tool_status") return undefined;
  const flag = event.metadata?.shouldAct;
  return typeof flag === "boolean" ? flag : undefined;
}
