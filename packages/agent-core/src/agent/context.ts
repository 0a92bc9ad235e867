// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/agent/context`
 * Purpose: Shared dependency bag for the Thinker, Actor and Step Loop, plus the default message formatter.
 * Scope: Wiring types only; no control flow.
 * Invariants:
 *   - TRANSCRIPT_OWNED: Only the Thinker and Actor append to `transcript`
 *   - FORMATTER_IS_PURE: A MessageFormatter never mutates the transcript
 * Side-effects: none
 * Links: thinker.ts, actor.ts, step-loop.ts
 * @internal
 */

import type { AgentRunConfig } from "../configurable/agent-run-config";
import type { LoggerLike } from "../observability/logger";
import type { Message, MessageOptions } from "../transcript/message";
import { userMessage } from "../transcript/message";
import type { Transcript } from "../transcript/transcript";
import type { ModelClient } from "../model/model-client.port";
import type { ToolSourcePort } from "../tooling/ports/tool-source.port";
import type { AgentRunState } from "./state";

export interface FormatContext {
  readonly agentName: string;
  readonly nextStepPrompt: string | undefined;
}

/**
 * Builds the message list sent to the model from the transcript.
 */
export type MessageFormatter = (
  transcript: readonly Message[],
  ctx: FormatContext
) => readonly Message[];

/**
 * Transcript as-is, followed by the next-step prompt as a user message when one is set.
 */
export const defaultMessageFormatter: MessageFormatter = (transcript, ctx) =>
  ctx.nextStepPrompt
    ? [...transcript, userMessage(ctx.nextStepPrompt)]
    : transcript;

export interface AgentContext {
  readonly config: AgentRunConfig;
  readonly run: AgentRunState;
  readonly model: ModelClient;
  readonly tools: ToolSourcePort;
  readonly transcript: Transcript;
  readonly formatMessages: MessageFormatter;
  readonly systemMessages: () => readonly Message[];
  readonly now: () => Date;
  readonly logger: LoggerLike;
}

/**
 * Options stamped on every message the agent commits.
 */
export function messageOptionsFor(ctx: AgentContext): MessageOptions {
  return {
    createdAt: ctx.now(),
    speaker: ctx.config.name,
    visibleFor: ctx.config.visibleFor,
  };
}

/**
 * Event fields every engine event carries.
 */
export function eventBase(ctx: AgentContext): {
  step: number;
  totalSteps: number;
} {
  return { step: ctx.run.step, totalSteps: ctx.run.maxSteps };
}
