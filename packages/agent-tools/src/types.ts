// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-tools/types`
 * Purpose: Core type definitions for tool contracts and implementations.
 * Scope: Defines ToolContract, ToolImplementation, BoundTool. Does NOT execute anything.
 * Invariants:
 *   - Pure types only, no runtime logic
 *   - inputSchema is the source of truth; validateInput and the model-facing JSON schema derive from it
 * Side-effects: none (types only)
 * Links: runtime-adapter.ts, schema.ts
 * @public
 */

import type {
  ToolExecutionResult,
  ToolInvocationContext,
} from "@stepwise/agent-core";
import type { z } from "zod";

/**
 * What an implementation may return. Plain strings become the result content.
 */
export type ToolOutput = ToolExecutionResult | string;

/**
 * Tool contract: schema and description, no implementation.
 */
export interface ToolContract<TName extends string, TInput> {
  /** Stable tool name (snake_case) */
  readonly name: TName;
  /** Human-readable description for the model */
  readonly description: string;
  /**
   * Zod schema for input validation.
   * Compiled to JSONSchema7 for the model; parsed again before execute().
   */
  readonly inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
}

/**
 * Receives validated input.
 */
export interface ToolImplementation<TInput> {
  readonly execute: (
    input: TInput,
    ctx: ToolInvocationContext
  ) => Promise<ToolOutput>;
}

/**
 * Bound tool: contract + implementation together.
 */
export interface BoundTool<TName extends string, TInput> {
  readonly contract: ToolContract<TName, TInput>;
  readonly implementation: ToolImplementation<TInput>;
}
