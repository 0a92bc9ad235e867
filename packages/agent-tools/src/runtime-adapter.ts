// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-tools/runtime-adapter`
 * Purpose: Convert BoundTool (agent-tools) to BoundToolRuntime (agent-core interface).
 * Scope: Adapter creation only. Does not execute tools.
 * Invariants:
 *   - TOOL_SOURCE_RETURNS_BOUND_TOOL: Returns executable BoundToolRuntime
 *   - Zod validation stays in this layer; agent-core sees only the interface
 *   - VALIDATION_MESSAGE_STABLE: Issues are rendered as "path: message" joined by "; "
 * Side-effects: none
 * Links: types.ts, schema.ts
 * @public
 */

import {
  type BoundToolRuntime,
  type ToolExecutionResult,
  toolResultFromOutput,
} from "@stepwise/agent-core";
import type { ZodError } from "zod";

import { toToolSpec } from "./schema";
import type { BoundTool, ToolOutput } from "./types";

/**
 * Flatten Zod issues into one line for the executor's error result.
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message
    )
    .join("; ");
}

function normalizeOutput(output: ToolOutput): ToolExecutionResult {
  return typeof output === "string" ? toolResultFromOutput(output) : output;
}

/**
 * Convert a BoundTool to the BoundToolRuntime interface.
 *
 * exec() parses its argument again so the implementation receives a typed
 * value without widening the contract.
 */
export function toBoundToolRuntime<TName extends string, TInput>(
  boundTool: BoundTool<TName, TInput>
): BoundToolRuntime {
  const { contract, implementation } = boundTool;
  const spec = toToolSpec(contract);

  function parse(raw: unknown): TInput {
    const parsed = contract.inputSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(formatZodIssues(parsed.error));
    }
    return parsed.data;
  }

  return {
    id: contract.name,
    spec,
    validateInput: parse,
    async exec(validatedArgs, ctx) {
      return normalizeOutput(
        await implementation.execute(parse(validatedArgs), ctx)
      );
    },
  };
}
