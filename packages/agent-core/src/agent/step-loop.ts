// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/agent/step-loop`
 * Purpose: Drive exactly one step: think, then act when the Thinker says so.
 * Scope: One step. Does NOT repeat steps, enforce the step budget, or retry.
 * Invariants:
 *   - THINK_BEFORE_ACT: The assistant message is committed before any of its tool calls run
 *   - NO_ACT_WITHOUT_SIGNAL: shouldAct=false ends the step without calling the Actor
 *   - STEP_NEEDS_LIVE_RUN: An IDLE agent is started; a FINISHED or ERROR agent throws AgentStateError
 *   - THINKING_STATUS_FIRST: Non-silent steps open with a "Thinking..." tool_status
 * Side-effects: via Thinker and Actor
 * Links: thinker.ts, actor.ts, run-agent.ts
 * @public
 */

import type { AgentEvent } from "../events/agent-events";
import { AgentStateError } from "../execution/errors";
import type { Actor } from "./actor";
import { type AgentContext, eventBase } from "./context";
import type { AgentState } from "./state";
import type { ThinkOutcome, Thinker } from "./thinker";

export interface StepOutcome {
  readonly think: ThinkOutcome;
  readonly acted: boolean;
  readonly state: AgentState;
}

export interface StepLoopOptions {
  readonly thinker: Thinker;
  readonly actor: Actor;
  /** Forward model deltas as token events */
  readonly streaming?: boolean;
  /** Emit nothing; state changes are unaffected */
  readonly silent?: boolean;
}

export function createStepLoop(ctx: AgentContext, options: StepLoopOptions) {
  const { thinker, actor } = options;
  const silent = options.silent ?? false;
  const streaming = (options.streaming ?? true) && !silent;

  /**
   * @throws ProtocolViolationError from the Actor under policy "required"
   * @throws AgentStateError when the agent is FINISHED or ERROR
   */
  async function* runStep(
    signal?: AbortSignal
  ): AsyncGenerator<AgentEvent, StepOutcome> {
    ctx.run.start();
    if (ctx.run.state !== "RUNNING") {
      throw new AgentStateError(ctx.run.state);
    }

    if (!silent) {
      yield { type: "tool_status", content: "Thinking...", ...eventBase(ctx) };
    }

    let think: ThinkOutcome;
    if (streaming) {
      think = yield* thinker.thinkStream(signal);
    } else {
      think = await thinker.think(signal);
    }

    if (!think.shouldAct) {
      return { think, acted: false, state: ctx.run.state };
    }

    yield* actor.act();
    return { think, acted: true, state: ctx.run.state };
  }

  return { runStep };
}

export type StepLoop = ReturnType<typeof createStepLoop>;
