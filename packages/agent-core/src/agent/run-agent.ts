// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/agent/run-agent`
 * Purpose: Outer driver: repeat steps until the agent finishes, replies, or runs out of steps.
 * Scope: Creates the run queue, emits step and final events, detects stuck loops. Does NOT retry steps.
 * Invariants:
 *   - SINGLE_QUEUE_PER_RUN: All events of a run flow through one AsyncQueue
 *   - FINAL_EVENT_LAST: Exactly one final event is emitted and it is the last event
 *   - PROTOCOL_VIOLATION_CONTINUES: A ProtocolViolationError is logged and the run continues
 *   - OTHER_ERRORS_STOP: Any other thrown error sets state ERROR and ends the run
 *   - ERROR_NORMALIZATION_ONCE: Catch block uses normalizeErrorToExecutionCode()
 *   - RUNS_START_FROM_IDLE: Any other state throws AgentStateError; reset() is the caller's
 *   - UNKNOWN_INPUT_MODE_IS_PHONE: An unrecognized inputMode files the input as TELEGRAM and logs a warning
 *   - ABORT_BETWEEN_STEPS: The signal is checked before each step and passed to the model call
 * Side-effects: IO (via steps), transcript append
 * Links: step-loop.ts, runtime/async-queue.ts
 * @public
 */

import type { AgentEvent } from "../events/agent-events";
import {
  AgentExecutionError,
  type AgentExecutionErrorCode,
  describeError,
  errorMessageOf,
  normalizeErrorToExecutionCode,
} from "../execution/error-codes";
import { AgentStateError, isProtocolViolationError } from "../execution/errors";
import { AsyncQueue } from "../runtime/async-queue";
import type { ToolExecutionResult } from "../tooling/types";
import {
  categoryForInputMode,
  MessageCategory,
} from "../transcript/categories";
import { userMessage } from "../transcript/message";
import type { Agent } from "./agent";
import type { AgentState } from "./state";
import type { StepOutcome } from "./step-loop";

export const STUCK_PROMPT =
  "Observed duplicate responses. Consider new strategies and avoid repeating ineffective paths already attempted.";

export type StopReason =
  | "finished"
  | "replied"
  | "max_steps"
  | "error"
  | "aborted";

export interface RunAgentOptions {
  /** Appended as a user message before the first step */
  readonly input?: string;
  /** Channel the input arrived on; sets the input message category */
  readonly inputMode?: string;
  readonly signal?: AbortSignal;
}

export interface AgentRunResult {
  readonly ok: boolean;
  readonly state: AgentState;
  readonly stopReason: StopReason;
  readonly steps: number;
  /** Content of the last assistant message, if any */
  readonly content: string | null;
  /** Results by invocation id; set on successful runs */
  readonly toolResults?: ReadonlyMap<string, ToolExecutionResult>;
  readonly error?: AgentExecutionErrorCode;
  /** For logs; not sent to clients */
  readonly errorMessage?: string;
}

/**
 * True when the last message repeats the content of at least `threshold`
 * earlier assistant messages.
 */
export function isStuck(agent: Agent): boolean {
  const messages = agent.transcript.list();
  const last = messages.at(-1);
  if (!last?.content) return false;

  let duplicates = 0;
  for (const message of messages.slice(0, -1)) {
    if (message.role === "assistant" && message.content === last.content) {
      duplicates += 1;
    }
  }
  return duplicates >= agent.config.duplicateThreshold;
}

function lastAssistantContent(agent: Agent): string | null {
  const messages = agent.transcript.list();
  for (let i = messages.length - 1; i >= 0; i -= 1) {
    const message = messages[i];
    if (message?.role === "assistant") return message.content;
  }
  return null;
}

/**
 * Run an agent to completion.
 *
 * @throws AgentStateError synchronously unless the agent is IDLE
 * @returns { stream, final } - events as they happen, and the run summary
 */
export function runAgent(
  agent: Agent,
  options: RunAgentOptions = {}
): {
  stream: AsyncIterable<AgentEvent>;
  final: Promise<AgentRunResult>;
} {
  const { run, logger, config } = agent;
  const { signal } = options;

  if (run.state !== "IDLE") {
    throw new AgentStateError(run.state);
  }

  const queue = new AsyncQueue<AgentEvent>();
  const emit = (event: AgentEvent): void => queue.push(event);
  const base = () => ({ step: run.step, totalSteps: run.maxSteps });

  const final = (async (): Promise<AgentRunResult> => {
    try {
      if (options.input) {
        let category = categoryForInputMode(options.inputMode);
        if (category === undefined) {
          logger.warn(
            { agent: config.name, inputMode: options.inputMode },
            "agent.run.invalid_input_mode"
          );
          category = MessageCategory.TELEGRAM;
        }
        agent.transcript.append(userMessage(options.input, { category }));
      }
      run.start();
      logger.info(
        { agent: config.name, maxSteps: run.maxSteps },
        "agent.run.started"
      );

      let replied = false;
      while (run.state === "RUNNING" && run.step < run.maxSteps) {
        if (signal?.aborted) {
          throw new AgentExecutionError("aborted", "Run aborted");
        }

        const step = run.advance();
        emit({ type: "step", content: `Step ${step}/${run.maxSteps}`, ...base() });

        let outcome: StepOutcome | undefined;
        try {
          const steps = agent.runStep(signal);
          let next = await steps.next();
          while (!next.done) {
            emit(next.value);
            next = await steps.next();
          }
          outcome = next.value;
        } catch (error) {
          if (!isProtocolViolationError(error)) throw error;
          // the Actor already emitted the error event
          logger.warn(
            { agent: config.name, step, err: error.message },
            "agent.run.protocol_violation"
          );
        }

        if (isStuck(agent)) {
          logger.warn({ agent: config.name, step }, "agent.run.stuck");
          run.prependToPrompt(STUCK_PROMPT);
        }

        if (
          config.finishOnReply &&
          outcome?.think.reason === "reply" &&
          run.state === "RUNNING"
        ) {
          run.finish();
          replied = true;
        }
      }

      let stopReason: StopReason = replied ? "replied" : "finished";
      if (run.state === "RUNNING") {
        logger.warn(
          { agent: config.name, steps: run.step },
          "agent.run.max_steps_reached"
        );
        run.finish();
        stopReason = "max_steps";
      }

      const content = lastAssistantContent(agent);
      logger.info(
        { agent: config.name, steps: run.step, stopReason },
        "agent.run.completed"
      );
      emit({
        type: "final",
        content,
        ...base(),
        metadata: { state: run.state, stopReason },
      });

      return {
        ok: true,
        state: run.state,
        stopReason,
        steps: run.step,
        content,
        toolResults: new Map(run.toolResults),
      };
    } catch (error) {
      const code = normalizeErrorToExecutionCode(error);
      const stopReason: StopReason = code === "aborted" ? "aborted" : "error";
      run.fail();
      logger.error(
        { agent: config.name, step: run.step, code, err: describeError(error) },
        "agent.run.failed"
      );

      emit({
        type: "error",
        content: errorMessageOf(error),
        ...base(),
        metadata: { code },
      });
      emit({
        type: "final",
        content: null,
        ...base(),
        metadata: { state: run.state, stopReason },
      });

      return {
        ok: false,
        state: run.state,
        stopReason,
        steps: run.step,
        content: null,
        error: code,
        errorMessage: describeError(error),
      };
    } finally {
      queue.close();
    }
  })();

  return { stream: queue, final };
}
