// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-tools/tools/reflection`
 * Purpose: Let the model record a reflection and an optional next plan.
 * Scope: Formats the two fields into one text block.
 * Invariants:
 *   - Output always starts with "Reflection: "
 *   - Blank reflection renders as "(empty)"
 * Side-effects: none
 * Links: @stepwise/agent-core presentation/presenters.ts (shown as inner_thought)
 * @public
 */

import { TOOL_NAMES } from "@stepwise/agent-core";
import { z } from "zod";

import type { BoundTool, ToolContract, ToolImplementation } from "../types";

export const ReflectionInputSchema = z.object({
  reflection: z
    .string()
    .optional()
    .describe("What happened so far and what you learned from it."),
  next_plan: z.string().optional().describe("What you intend to do next."),
});
export type ReflectionInput = z.infer<typeof ReflectionInputSchema>;

export const REFLECTION_NAME = TOOL_NAMES.reflection;

export const reflectionContract: ToolContract<
  typeof REFLECTION_NAME,
  ReflectionInput
> = {
  name: REFLECTION_NAME,
  description:
    "Reflect on the conversation so far and plan the next step. Not shown to the user.",
  inputSchema: ReflectionInputSchema,
};

export function formatReflection(input: ReflectionInput): string {
  const reflection = (input.reflection ?? "").trim() || "(empty)";
  const nextPlan = (input.next_plan ?? "").trim();
  return nextPlan
    ? `Reflection: ${reflection}\nNext plan: ${nextPlan}`
    : `Reflection: ${reflection}`;
}

export const reflectionImplementation: ToolImplementation<ReflectionInput> = {
  execute: async (input) => formatReflection(input),
};

export const reflectionBoundTool: BoundTool<
  typeof REFLECTION_NAME,
  ReflectionInput
> = {
  contract: reflectionContract,
  implementation: reflectionImplementation,
};
