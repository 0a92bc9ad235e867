// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@scripts/run-agent`
 * Purpose: CLI entry point for running a preset agent. Delegates to the job module.
 * Scope: Argument parsing and process lifecycle (exit codes) only.
 * Invariants: CLI = zero wiring, zero logic. Exit code 0 only when the run ended ok.
 * Side-effects: IO
 * Links: src/bootstrap/jobs/run-agent.job.ts
 * @public
 */

import { INPUT_MODES, type InputMode, isInputMode } from "@stepwise/agent-core";
import { Command, InvalidArgumentError } from "commander";

import { AGENT_PRESETS, type AgentPreset, isAgentPreset } from "@/bootstrap/agents";
import { runAgentJob } from "@/bootstrap/jobs/run-agent.job";

function parsePreset(value: string): AgentPreset {
  if (!isAgentPreset(value)) {
    throw new InvalidArgumentError(`Expected one of: ${AGENT_PRESETS.join(", ")}`);
  }
  return value;
}

function parseInputMode(value: string): InputMode {
  if (!isInputMode(value)) {
    throw new InvalidArgumentError(`Expected one of: ${INPUT_MODES.join(", ")}`);
  }
  return value;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer");
  }
  return parsed;
}

const program = new Command();

program
  .name("stepwise-agent")
  .description("Run a preset agent over one message")
  .argument("<preset>", `Agent preset (${AGENT_PRESETS.join(" | ")})`, parsePreset)
  .argument("<input...>", "User message")
  .option("--mode <mode>", `Input channel (${INPUT_MODES.join(" | ")})`, parseInputMode)
  .option("--system <prompt>", "System prompt")
  .option("--max-steps <n>", "Step budget", parsePositiveInt)
  .action(
    async (
      preset: AgentPreset,
      input: string[],
      opts: { mode?: InputMode; system?: string; maxSteps?: number }
    ) => {
      const result = await runAgentJob({
        preset,
        input: input.join(" "),
        ...(opts.mode !== undefined && { inputMode: opts.mode }),
        ...(opts.system !== undefined && { systemPrompt: opts.system }),
        ...(opts.maxSteps !== undefined && { maxSteps: opts.maxSteps }),
      });
      process.stdout.write("\n");
      process.exitCode = result.ok ? 0 : 1;
    }
  );

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(
    `${error instanceof Error ? error.message : String(error)}\n`
  );
  process.exit(1);
});
