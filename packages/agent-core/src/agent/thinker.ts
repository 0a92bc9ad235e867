// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/agent/thinker`
 * Purpose: Think phase: ask the model for the next decision, commit the assistant message, store pending tool calls.
 * Scope: Non-streaming and streaming variants share one decision table. Does NOT execute tools.
 * Invariants:
 *   - ONE_ASSISTANT_MESSAGE: At most one assistant message is committed per think
 *   - IDLE_FINISHES: Empty content with no tool calls (outside "required") finishes the agent without a message
 *   - NONE_IGNORES_CALLS: Under toolChoice "none" returned tool calls are dropped and never executed
 *   - REQUIRED_STILL_ACTS: Under "required" a reply without calls commits the message and reports shouldAct=true
 *   - MODEL_FAILURE_COMMITTED: A failed model call commits "Error encountered while processing: ..." and never throws
 *   - TERMINAL_STATUS_LAST: thinkStream always ends with one tool_status carrying metadata.shouldAct
 * Side-effects: IO (model call), transcript append, run state mutation
 * Links: actor.ts, step-loop.ts, model/model-client.port.ts
 * @public
 */

import type { AgentEvent } from "../events/agent-events";
import {
  describeError,
  errorMessageOf,
  normalizeErrorToExecutionCode,
} from "../execution/error-codes";
import { TOOL_CALLS_REQUIRED_MESSAGE } from "../execution/errors";
import type {
  AskToolParams,
  ModelDecision,
  ModelDelta,
} from "../model/model-client.port";
import { AsyncQueue, withQueueRelease } from "../runtime/async-queue";
import {
  assistantMessage,
  assistantToolCallMessage,
} from "../transcript/message";
import {
  type AgentContext,
  eventBase,
  messageOptionsFor,
} from "./context";

export type ThinkReason =
  | "tool_calls"
  | "reply"
  | "idle"
  | "tool_calls_missing"
  | "model_failed";

export interface ThinkOutcome {
  readonly shouldAct: boolean;
  readonly reason: ThinkReason;
}

const STATUS_BY_REASON: Readonly<Record<ThinkReason, string>> = {
  tool_calls: "Thinking complete",
  reply: "Thinking complete",
  idle: "Nothing to do",
  tool_calls_missing: TOOL_CALLS_REQUIRED_MESSAGE,
  model_failed: "Thinking failed",
};

type Settled =
  | { readonly ok: true; readonly decision: ModelDecision }
  | { readonly ok: false; readonly error: unknown };

// ─────────────────────────────────────────────────────────────────────────────
// Decision table
// ─────────────────────────────────────────────────────────────────────────────

function applyDecision(ctx: AgentContext, decision: ModelDecision): ThinkOutcome {
  const { config, run, transcript, logger } = ctx;
  const content = decision.content ?? "";

  if (config.toolChoice === "none" && decision.toolCalls.length > 0) {
    logger.warn(
      {
        agent: config.name,
        ignored: decision.toolCalls.map((call) => call.name),
      },
      "agent.think.tool_calls_ignored"
    );
  }
  const calls = config.toolChoice === "none" ? [] : decision.toolCalls;
  run.setPendingToolCalls(calls);

  if (!content && calls.length === 0 && config.toolChoice !== "required") {
    logger.info({ agent: config.name, step: run.step }, "agent.think.idle");
    run.finish();
    return { shouldAct: false, reason: "idle" };
  }

  const options = messageOptionsFor(ctx);
  transcript.append(
    calls.length > 0
      ? assistantToolCallMessage(content, calls, options)
      : assistantMessage(content, options)
  );

  logger.info(
    {
      agent: config.name,
      step: run.step,
      contentLength: content.length,
      toolNames: calls.map((call) => call.name),
    },
    "agent.think.decided"
  );

  if (calls.length > 0) return { shouldAct: true, reason: "tool_calls" };
  if (config.toolChoice === "required") {
    return { shouldAct: true, reason: "tool_calls_missing" };
  }
  return { shouldAct: false, reason: "reply" };
}

function recordFailure(ctx: AgentContext, error: unknown): ThinkOutcome {
  ctx.logger.error(
    {
      agent: ctx.config.name,
      step: ctx.run.step,
      code: normalizeErrorToExecutionCode(error),
      err: describeError(error),
    },
    "agent.think.failed"
  );
  ctx.run.setPendingToolCalls([]);
  ctx.transcript.append(
    assistantMessage(
      `Error encountered while processing: ${errorMessageOf(error)}`,
      messageOptionsFor(ctx)
    )
  );
  return { shouldAct: false, reason: "model_failed" };
}

function askParams(
  ctx: AgentContext,
  signal?: AbortSignal
): Omit<AskToolParams, "onDelta"> {
  return {
    messages: ctx.formatMessages(ctx.transcript.list(), {
      agentName: ctx.config.name,
      nextStepPrompt: ctx.run.nextStepPrompt,
    }),
    systemMessages: ctx.systemMessages(),
    tools: ctx.tools.listToolSpecs(),
    toolChoice: ctx.config.toolChoice,
    ...(signal && { signal }),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Thinker
// ─────────────────────────────────────────────────────────────────────────────

export function createThinker(ctx: AgentContext) {
  /**
   * Non-streaming think.
   */
  async function think(signal?: AbortSignal): Promise<ThinkOutcome> {
    let decision: ModelDecision;
    try {
      decision = await ctx.model.askTool(askParams(ctx, signal));
    } catch (error) {
      return recordFailure(ctx, error);
    }
    return applyDecision(ctx, decision);
  }

  /**
   * Streaming think. Yields text deltas as token events and tool-name
   * discoveries as status events; returns the same outcome as think().
   */
  async function* thinkStream(
    signal?: AbortSignal
  ): AsyncGenerator<AgentEvent, ThinkOutcome> {
    const queue = new AsyncQueue<ModelDelta>();
    const settled: Promise<Settled> = withQueueRelease(queue, (q) =>
      ctx.model.askTool({
        ...askParams(ctx, signal),
        onDelta: (delta) => q.push(delta),
      })
    ).then(
      (decision): Settled => ({ ok: true, decision }),
      (error: unknown): Settled => ({ ok: false, error })
    );

    const streamed: string[] = [];
    for await (const delta of queue) {
      if (delta.type === "text") {
        if (!delta.text) continue;
        streamed.push(delta.text);
        yield { type: "token", content: delta.text, ...eventBase(ctx) };
      } else if (delta.name) {
        yield {
          type: "tool_status",
          content: `Preparing tool: ${delta.name}`,
          ...eventBase(ctx),
          metadata: { toolName: delta.name, index: delta.index },
        };
      }
    }

    const result = await settled;
    if (!result.ok) {
      const outcome = recordFailure(ctx, result.error);
      yield {
        type: "error",
        content: `Error encountered while processing: ${errorMessageOf(result.error)}`,
        ...eventBase(ctx),
        metadata: { code: normalizeErrorToExecutionCode(result.error) },
      };
      yield terminalStatus(outcome);
      return outcome;
    }

    const { decision } = result;
    const content =
      !decision.content && decision.toolCalls.length === 0
        ? streamed.join("").trim()
        : decision.content;

    if (decision.toolCalls.length > 0 && ctx.config.toolChoice !== "none") {
      const toolNames = decision.toolCalls.map((call) => call.name);
      yield {
        type: "tool_status",
        content: `Selected tools: ${toolNames.join(", ")}`,
        ...eventBase(ctx),
        metadata: { toolNames },
      };
    }

    const outcome = applyDecision(ctx, {
      content,
      toolCalls: decision.toolCalls,
    });
    yield terminalStatus(outcome);
    return outcome;
  }

  function terminalStatus(outcome: ThinkOutcome): AgentEvent {
    return {
      type: "tool_status",
      content: STATUS_BY_REASON[outcome.reason],
      ...eventBase(ctx),
      metadata: { shouldAct: outcome.shouldAct, reason: outcome.reason },
    };
  }

  return { think, thinkStream };
}

export type Thinker = ReturnType<typeof createThinker>;
