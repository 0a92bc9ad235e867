// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-tools/tools/get-current-time`
 * Purpose: Tool that returns the current date and time.
 * Scope: Reads the clock capability. Does not take any input.
 * Invariants:
 *   - Output format is `YYYY-MM-DD HH:MM:SS` in UTC
 *   - Strict input: extra properties are rejected
 * Side-effects: time (via ClockCapability)
 * Links: capabilities/clock.ts
 * @public
 */

import { TOOL_NAMES } from "@stepwise/agent-core";
import { z } from "zod";

import { type ClockCapability, systemClock } from "../capabilities/clock";
import type { BoundTool, ToolContract, ToolImplementation } from "../types";

export const GetCurrentTimeInputSchema = z.object({}).strict();
export type GetCurrentTimeInput = z.infer<typeof GetCurrentTimeInputSchema>;

export const GET_CURRENT_TIME_NAME = TOOL_NAMES.getCurrentTime;

export const getCurrentTimeContract: ToolContract<
  typeof GET_CURRENT_TIME_NAME,
  GetCurrentTimeInput
> = {
  name: GET_CURRENT_TIME_NAME,
  description: "Get the current date and time (UTC).",
  inputSchema: GetCurrentTimeInputSchema,
};

const pad = (value: number): string => String(value).padStart(2, "0");

export function formatClockTime(epochMs: number): string {
  const d = new Date(epochMs);
  const date = `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
  const time = `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
  return `${date} ${time}`;
}

export interface GetCurrentTimeDeps {
  readonly clock: ClockCapability;
}

export function createGetCurrentTimeImplementation(
  deps: GetCurrentTimeDeps
): ToolImplementation<GetCurrentTimeInput> {
  return {
    execute: async () => formatClockTime(deps.clock.now()),
  };
}

export const getCurrentTimeImplementation = createGetCurrentTimeImplementation({
  clock: systemClock,
});

export const getCurrentTimeBoundTool: BoundTool<
  typeof GET_CURRENT_TIME_NAME,
  GetCurrentTimeInput
> = {
  contract: getCurrentTimeContract,
  implementation: getCurrentTimeImplementation,
};
