// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-tools/tools/terminate`
 * Purpose: Tool the model calls to end the interaction with a status.
 * Scope: Reports the status. Finishing the agent is the executor's job (special tool list).
 * Invariants:
 *   - TOOL_NAME_STABLE: `terminate`
 * Side-effects: none
 * Links: @stepwise/agent-core tooling/tool-executor.ts
 * @public
 */

import { TOOL_NAMES } from "@stepwise/agent-core";
import { z } from "zod";

import type { BoundTool, ToolContract, ToolImplementation } from "../types";

export const TERMINATE_STATUSES = ["success", "failure"] as const;

export const TerminateInputSchema = z.object({
  status: z
    .enum(TERMINATE_STATUSES)
    .describe("The finish status of the interaction."),
});
export type TerminateInput = z.infer<typeof TerminateInputSchema>;

export const TERMINATE_NAME = TOOL_NAMES.terminate;

export const terminateContract: ToolContract<
  typeof TERMINATE_NAME,
  TerminateInput
> = {
  name: TERMINATE_NAME,
  description:
    "Terminate the interaction when the request is met OR if the assistant " +
    "cannot proceed further with the task. When you have finished all the " +
    "tasks, call this tool to end the work.",
  inputSchema: TerminateInputSchema,
};

export const terminateImplementation: ToolImplementation<TerminateInput> = {
  execute: async ({ status }) =>
    `The interaction has been completed with status: ${status}`,
};

export const terminateBoundTool: BoundTool<
  typeof TERMINATE_NAME,
  TerminateInput
> = {
  contract: terminateContract,
  implementation: terminateImplementation,
};
