// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-tools/tools/strategy`
 * Purpose: Tool for choosing the reply channel and recording the reasoning behind it.
 * Scope: Returns the monologue as content and the decision as structured data.
 * Invariants:
 *   - Blank decision or monologue is reported in content, not thrown
 *   - data is `{ decision, strategy }` only on success
 * Side-effects: none
 * Links: @stepwise/agent-core presentation/presenters.ts
 * @public
 */

import { TOOL_NAMES, toolResult } from "@stepwise/agent-core";
import { z } from "zod";

import type { BoundTool, ToolContract, ToolImplementation } from "../types";

export const STRATEGY_DECISIONS = ["speakinperson", "telegram"] as const;
export type StrategyDecision = (typeof STRATEGY_DECISIONS)[number];

export const MISSING_DECISION_MESSAGE = "error: must provide decision parameter";
export const MISSING_STRATEGY_MESSAGE = "error: must provide strategy parameter";

export const StrategyInputSchema = z.object({
  decision: z
    .union([z.enum(STRATEGY_DECISIONS), z.literal("")])
    .optional()
    .describe(
      "How to reach the user: 'speakinperson' when they are present, 'telegram' otherwise."
    ),
  inner_monologue: z
    .string()
    .optional()
    .describe("Your private reasoning for the decision."),
});
export type StrategyInput = z.infer<typeof StrategyInputSchema>;

export const STRATEGY_NAME = TOOL_NAMES.strategy;

export const strategyContract: ToolContract<
  typeof STRATEGY_NAME,
  StrategyInput
> = {
  name: STRATEGY_NAME,
  description:
    "Decide how to respond to the user and explain the plan in an inner monologue.",
  inputSchema: StrategyInputSchema,
};

export const strategyImplementation: ToolImplementation<StrategyInput> = {
  execute: async (input) => {
    const decision = input.decision ?? "";
    const strategy = (input.inner_monologue ?? "").trim();
    if (!decision) return MISSING_DECISION_MESSAGE;
    if (!strategy) return MISSING_STRATEGY_MESSAGE;
    return toolResult({ content: strategy, data: { decision, strategy } });
  },
};

export const strategyBoundTool: BoundTool<typeof STRATEGY_NAME, StrategyInput> =
  {
    contract: strategyContract,
    implementation: strategyImplementation,
  };
