// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/model/model-client.port`
 * Purpose: Port for the language-model client that turns a message list into a decision.
 * Scope: Request/decision/delta types only. Does NOT implement transport (see src/adapters/server/ai).
 * Invariants:
 *   - DELTAS_BEFORE_DECISION: onDelta is only invoked before askTool() settles
 *   - DECISION_IS_FINAL: the returned decision is authoritative; deltas are presentation only
 *   - Throws LlmError (or any Error) on failure; the Thinker recovers
 * Side-effects: none (types only)
 * Links: agent/thinker.ts, src/adapters/server/ai/openai-compat.adapter.ts
 * @public
 */

import type { ToolChoice } from "../configurable/agent-run-config";
import type { Message, ToolInvocationRequest } from "../transcript/message";
import type { ToolSpec } from "../tooling/types";

export interface TextDelta {
  readonly type: "text";
  readonly text: string;
}

/**
 * Fragment of a tool call as it streams. `name` arrives once, usually in the first fragment.
 */
export interface ToolCallDelta {
  readonly type: "tool_call_delta";
  readonly index: number;
  readonly id?: string;
  readonly name?: string;
  readonly argumentsDelta?: string;
}

export type ModelDelta = TextDelta | ToolCallDelta;

export interface AskToolParams {
  readonly messages: readonly Message[];
  readonly systemMessages: readonly Message[];
  readonly tools: readonly ToolSpec[];
  readonly toolChoice: ToolChoice;
  /** Streaming is requested by providing this callback */
  readonly onDelta?: (delta: ModelDelta) => void;
  readonly signal?: AbortSignal;
}

export interface ModelDecision {
  readonly content: string | null;
  readonly toolCalls: readonly ToolInvocationRequest[];
}

export interface ModelClient {
  askTool(params: AskToolParams): Promise<ModelDecision>;
}
