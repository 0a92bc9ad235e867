// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/agent/actor`
 * Purpose: Act phase: execute pending tool calls strictly in request order and hand each result to a presenter.
 * Scope: Sequencing, status events, special-tool finish. Does NOT call the model.
 * Invariants:
 *   - SEQUENTIAL_CALLS: Call N's tool message is committed before call N+1 starts
 *   - ONE_RESULT_PER_CALL: N pending calls produce N tool messages, even after a special tool finished the agent
 *   - TOOL_FAILURES_ARE_DATA: Only ProtocolViolationError escapes act()
 *   - SILENT_MODE: silent actors emit zero events and keep the same transcript and finish behavior
 * Side-effects: IO (tool handlers), transcript append, run state mutation
 * Links: thinker.ts, tooling/tool-executor.ts, presentation/presenters.ts
 * @public
 */

import type { AgentEvent } from "../events/agent-events";
import {
  describeError,
  errorMessageOf,
  normalizeErrorToExecutionCode,
} from "../execution/error-codes";
import {
  ProtocolViolationError,
  TOOL_CALLS_REQUIRED_MESSAGE,
} from "../execution/errors";
import {
  type ResultPresenter,
  silentPresenter,
} from "../presentation/presenters";
import type { ToolExecution, ToolExecutor } from "../tooling/tool-executor";
import { errorResult } from "../tooling/types";
import type { ToolInvocationRequest } from "../transcript/message";
import {
  type AgentContext,
  eventBase,
  messageOptionsFor,
} from "./context";

export interface ActorOptions {
  readonly executor: ToolExecutor;
  readonly presenter: ResultPresenter;
  /** Background agents: same state changes, no events */
  readonly silent?: boolean;
}

export function createActor(ctx: AgentContext, options: ActorOptions) {
  const { executor } = options;
  const silent = options.silent ?? false;
  const presenter = silent ? silentPresenter : options.presenter;

  async function executeSafely(
    request: ToolInvocationRequest
  ): Promise<{ execution: ToolExecution; thrown?: unknown }> {
    try {
      return { execution: await executor.execute(request) };
    } catch (error) {
      ctx.logger.error(
        {
          agent: ctx.config.name,
          tool: request.name,
          toolCallId: request.id,
          err: describeError(error),
        },
        "agent.act.execute_threw"
      );
      return {
        execution: {
          result: errorResult(`Error: ${errorMessageOf(error)}`),
          finishesAgent: false,
        },
        thrown: error,
      };
    }
  }

  /**
   * Run every pending tool call.
   *
   * @throws ProtocolViolationError when policy is "required" and there are no calls
   */
  async function* act(): AsyncGenerator<AgentEvent, void> {
    const calls = ctx.run.takePendingToolCalls();

    if (calls.length === 0) {
      if (ctx.config.toolChoice === "required") {
        ctx.logger.warn(
          { agent: ctx.config.name, step: ctx.run.step },
          "agent.act.protocol_violation"
        );
        if (!silent) {
          yield {
            type: "error",
            content: TOOL_CALLS_REQUIRED_MESSAGE,
            ...eventBase(ctx),
            metadata: { code: "protocol_violation" },
          };
        }
        throw new ProtocolViolationError();
      }
      return;
    }

    for (const [index, request] of calls.entries()) {
      const position = `${index + 1}/${calls.length}`;

      if (!silent) {
        yield {
          type: "tool_status",
          content: `Executing ${request.name} (${position})`,
          messageType: request.name,
          messageId: request.id,
          ...eventBase(ctx),
          metadata: { phase: "started" },
        };
      }

      const { execution, thrown } = await executeSafely(request);

      if (!silent) {
        yield thrown === undefined
          ? {
              type: "tool_status",
              content: `${request.name} completed`,
              messageType: request.name,
              messageId: request.id,
              ...eventBase(ctx),
              metadata: { phase: "completed" },
            }
          : {
              type: "error",
              content: `Error executing ${request.name}: ${errorMessageOf(thrown)}`,
              messageType: request.name,
              messageId: request.id,
              ...eventBase(ctx),
              metadata: { code: normalizeErrorToExecutionCode(thrown) },
            };
      }

      if (execution.finishesAgent) {
        ctx.run.finish();
      }

      yield* presenter({
        request,
        result: execution.result,
        run: ctx.run,
        transcript: ctx.transcript,
        messageOptions: messageOptionsFor(ctx),
      });
    }
  }

  return { act };
}

export type Actor = ReturnType<typeof createActor>;
