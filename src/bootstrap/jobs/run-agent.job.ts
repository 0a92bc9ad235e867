// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/jobs/run-agent.job`
 * Purpose: Run one preset agent over one input and write its visible output.
 * Scope: Resolves deps from the container, builds the preset agent, drains the event stream. Does not parse argv.
 * Invariants:
 *   - Only token and error events reach the writer; status events go to the log
 *   - Resolves with the run result; never throws for a failed run (ok=false instead)
 * Side-effects: IO (model calls via container, writer)
 * Links: scripts/run-agent.ts, agents.ts
 * @public
 */

import {
  type AgentEvent,
  type AgentRunResult,
  type InputMode,
  runAgent,
} from "@stepwise/agent-core";

import { type AgentPreset, createPresetAgent } from "@/bootstrap/agents";
import { type Container, getContainer } from "@/bootstrap/container";

export interface RunAgentJobInput {
  readonly preset: AgentPreset;
  readonly input: string;
  readonly inputMode?: InputMode;
  readonly systemPrompt?: string;
  readonly maxSteps?: number;
}

export interface RunAgentJobDeps {
  readonly container?: Container;
  /** Receives visible output; defaults to stdout */
  readonly write?: (text: string) => void;
}

function render(event: AgentEvent): string | null {
  switch (event.type) {
    case "token":
      return event.content;
    case "error":
      return `\n[error] ${event.content}\n`;
    default:
      return null;
  }
}

export async function runAgentJob(
  job: RunAgentJobInput,
  deps: RunAgentJobDeps = {}
): Promise<AgentRunResult> {
  const container = deps.container ?? getContainer();
  const write = deps.write ?? ((text: string) => process.stdout.write(text));
  const log = container.log.child({ job: "run-agent", preset: job.preset });

  const agent = createPresetAgent(job.preset, {
    model: container.modelClient,
    clock: container.clock,
    maxSteps: job.maxSteps ?? container.config.maxSteps,
    chunkSize: container.config.chunkSize,
    pacing: { enabled: container.config.pacingEnabled },
    logger: log,
    ...(job.systemPrompt !== undefined && { systemPrompt: job.systemPrompt }),
  });

  log.info({ inputLength: job.input.length }, "job.run_agent.started");

  const { stream, final } = runAgent(agent, {
    input: job.input,
    ...(job.inputMode !== undefined && { inputMode: job.inputMode }),
  });

  for await (const event of stream) {
    const text = render(event);
    if (text) write(text);
    else log.debug({ type: event.type, content: event.content }, "job.run_agent.event");
  }

  const result = await final;
  log.info(
    { ok: result.ok, stopReason: result.stopReason, steps: result.steps },
    "job.run_agent.completed"
  );
  return result;
}
