// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/presentation/presenters`
 * Purpose: Result presenters: turn one tool result into events plus exactly one tool-result message.
 * Scope: Chunked (default), character (paced channels), and silent variants. Does not execute tools.
 * Invariants:
 *   - ONE_TOOL_MESSAGE_PER_RESULT: Every presenter appends exactly one tool message carrying the full text
 *   - MESSAGE_AFTER_EVENTS: The tool message is appended after the result's events
 *   - STRUCTURED_DATA_ONCE: Non-empty result data yields one tool_output event with null content
 *   - SILENT_EMITS_NOTHING: silentPresenter mutates state identically and yields zero events
 * Side-effects: transcript append, results map
 * Links: actor.ts, chunker.ts, pacing.ts
 * @public
 */

import type { AgentEvent } from "../events/agent-events";
import type { AgentRunState } from "../agent/state";
import {
  categoryForTool,
  displayTypeForTool,
  MessageCategory,
  TOOL_CATEGORY_MAP,
} from "../transcript/categories";
import {
  type MessageOptions,
  type ToolInvocationRequest,
  toolMessage,
} from "../transcript/message";
import type { Transcript } from "../transcript/transcript";
import { DEFAULT_CHUNK_SIZE } from "../configurable/agent-run-config";
import {
  hasStructuredData,
  type ToolExecutionResult,
  toolResultText,
} from "../tooling/types";
import { chunkText } from "./chunker";
import type { Pacer } from "./pacing";

export interface PresentationContext {
  readonly request: ToolInvocationRequest;
  readonly result: ToolExecutionResult;
  readonly run: AgentRunState;
  readonly transcript: Transcript;
  /** speaker, visibility and timestamp for the tool message */
  readonly messageOptions: MessageOptions;
}

/**
 * Strategy that presents one tool result.
 */
export type ResultPresenter = (
  ctx: PresentationContext
) => AsyncGenerator<AgentEvent, void>;

export interface ChunkedPresenterOptions {
  readonly chunkSize?: number;
}

export interface CharacterPresenterOptions extends ChunkedPresenterOptions {
  readonly pacer: Pacer;
}

function base(ctx: PresentationContext) {
  return { step: ctx.run.step, totalSteps: ctx.run.maxSteps };
}

function commit(ctx: PresentationContext, text: string, category: MessageCategory): void {
  ctx.transcript.append(
    toolMessage(text, ctx.request, { ...ctx.messageOptions, category })
  );
}

function structuredOutput(
  ctx: PresentationContext,
  resultType: string
): AgentEvent {
  return {
    type: "tool_output",
    content: null,
    messageType: ctx.request.name,
    messageId: ctx.request.id,
    ...base(ctx),
    metadata: { structuredData: ctx.result.data, resultType },
  };
}

function* chunkEvents(
  ctx: PresentationContext,
  text: string,
  size: number,
  messageType: string
): Generator<AgentEvent> {
  for (const chunk of chunkText(text, size)) {
    yield {
      type: "token",
      content: chunk,
      messageType,
      messageId: ctx.request.id,
      ...base(ctx),
    };
  }
}

/**
 * Default presenter: internal output split into fixed-size token chunks.
 */
export function createChunkedPresenter(
  options?: ChunkedPresenterOptions
): ResultPresenter {
  const size = options?.chunkSize ?? DEFAULT_CHUNK_SIZE;

  return async function* presentChunked(ctx) {
    ctx.run.recordResult(ctx.request.id, ctx.result);
    const text = toolResultText(ctx.result);

    if (hasStructuredData(ctx.result)) {
      yield structuredOutput(ctx, "tool_result");
    }

    yield* chunkEvents(ctx, text, size, ctx.request.name);
    commit(ctx, text, MessageCategory.TOOL);
  };
}

/**
 * Character presenter: communication-channel tools are paced by category
 * (typewriter for in-person speech, line-by-line for telegram); other tools
 * are chunked and reflection/strategy display as inner thought.
 */
export function createCharacterPresenter(
  options: CharacterPresenterOptions
): ResultPresenter {
  const size = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const { pacer } = options;

  return async function* presentCharacter(ctx) {
    ctx.run.recordResult(ctx.request.id, ctx.result);
    const text = toolResultText(ctx.result);
    const toolName = ctx.request.name;

    if (hasStructuredData(ctx.result)) {
      yield structuredOutput(ctx, toolName);
    }

    const category = categoryForTool(toolName);
    if (TOOL_CATEGORY_MAP.has(toolName)) {
      for await (const piece of pacer.byCategory(text, category)) {
        yield {
          type: "token",
          content: piece,
          messageType: toolName,
          messageId: ctx.request.id,
          ...base(ctx),
        };
      }
    } else {
      yield* chunkEvents(ctx, text, size, displayTypeForTool(toolName));
    }

    commit(ctx, text, category);
  };
}

/**
 * Background agents: same transcript and results mutations, no events.
 */
export const silentPresenter: ResultPresenter = async function* presentSilently(
  ctx
) {
  ctx.run.recordResult(ctx.request.id, ctx.result);
  commit(ctx, toolResultText(ctx.result), categoryForTool(ctx.request.name));
};
