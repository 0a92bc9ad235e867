// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/tooling/types`
 * Purpose: Canonical semantic types for tool definitions, invocation and results.
 * Scope: Framework-agnostic tool types plus ToolExecutionResult helpers. Does NOT import Zod; uses JSONSchema7 for wire formats.
 * Invariants:
 *   - TOOL_SEMANTICS_CANONICAL: These are the canonical types; wire formats are adapters
 *   - RESULT_IS_DATA: Tool failures are ToolExecutionResult values with `error` set, never thrown past the executor
 *   - ERROR_TEXT_PREFIXED: toolResultText() of an error result starts with "Error:"
 *   - No Zod dependency: specs are compiled in @stepwise/agent-tools
 * Side-effects: none
 * Links: tool-executor.ts, @stepwise/agent-tools
 * @public
 */

import type { JSONSchema7 } from "json-schema";

/**
 * Tool specification sent to the model.
 * Compiled form of a Zod ToolContract (Zod → JSONSchema7).
 */
export interface ToolSpec {
  /** Stable tool name (snake_case) */
  readonly name: string;
  /** Human-readable description for the model */
  readonly description: string;
  readonly inputSchema: JSONSchema7;
}

/**
 * Context handed to a tool invocation. References only, no secrets.
 */
export interface ToolInvocationContext {
  readonly toolCallId: string;
  /** Name of the agent running the tool */
  readonly agentName: string;
}

/**
 * Normalized outcome of one tool invocation.
 */
export interface ToolExecutionResult {
  /** Display text */
  readonly content: string;
  /** Structured, non-textual fields (e.g. a decision plus rationale) */
  readonly data: Readonly<Record<string, unknown>>;
  readonly error?: string;
  /** System-level annotation */
  readonly system?: string;
}

/**
 * Executable tool as seen by the registry.
 *
 * Implementations live in @stepwise/agent-tools (which has Zod);
 * agent-core only sees this interface.
 */
export interface BoundToolRuntime {
  readonly id: string;
  readonly spec: ToolSpec;
  /**
   * Validate decoded args.
   * @throws on validation failure; the executor turns the throw into an error result
   */
  validateInput(rawArgs: unknown): unknown;
  exec(
    validatedArgs: unknown,
    ctx: ToolInvocationContext
  ): Promise<ToolExecutionResult>;
}

const EMPTY_DATA: Readonly<Record<string, unknown>> = Object.freeze({});

const ERROR_PREFIX = "Error: ";

export function toolResult(
  fields: Partial<ToolExecutionResult> = {}
): ToolExecutionResult {
  return {
    content: fields.content ?? "",
    data: fields.data ?? EMPTY_DATA,
    ...(fields.error !== undefined && { error: fields.error }),
    ...(fields.system !== undefined && { system: fields.system }),
  };
}

export function errorResult(error: string): ToolExecutionResult {
  return toolResult({ error });
}

/**
 * Coerce an arbitrary tool return value into a result.
 * Strings become content; null/undefined become empty; other values are stringified.
 */
export function toolResultFromOutput(
  output: unknown,
  extra: Omit<Partial<ToolExecutionResult>, "content"> = {}
): ToolExecutionResult {
  if (output === null || output === undefined) return toolResult(extra);
  if (typeof output === "string") return toolResult({ ...extra, content: output });
  if (typeof output === "object") {
    return toolResult({ ...extra, content: JSON.stringify(output) });
  }
  return toolResult({ ...extra, content: String(output) });
}

/**
 * A result is meaningful when any of its fields is non-empty.
 */
export function isMeaningfulResult(result: ToolExecutionResult): boolean {
  return (
    result.content.length > 0 ||
    Object.keys(result.data).length > 0 ||
    Boolean(result.error) ||
    Boolean(result.system)
  );
}

export function hasStructuredData(result: ToolExecutionResult): boolean {
  return Object.keys(result.data).length > 0;
}

/**
 * Display text for a result, as written to the transcript.
 */
export function toolResultText(result: ToolExecutionResult): string {
  if (result.error) {
    return result.error.startsWith(ERROR_PREFIX)
      ? result.error
      : `${ERROR_PREFIX}${result.error}`;
  }
  return result.content;
}

export interface CombineOptions {
  /**
   * When false, a text field set on both sides is a collision.
   * Default: true (concatenate).
   */
  readonly concatenate?: boolean;
}

function combineField(
  left: string | undefined,
  right: string | undefined,
  concatenate: boolean
): string | undefined {
  if (left && right) {
    if (concatenate) return left + right;
    throw new Error("Cannot combine tool results");
  }
  return left || right || undefined;
}

/**
 * Field-wise combination for aggregating several results into one.
 * Text fields concatenate, data maps merge with the right side winning.
 */
export function combineToolResults(
  left: ToolExecutionResult,
  right: ToolExecutionResult,
  options?: CombineOptions
): ToolExecutionResult {
  const concatenate = options?.concatenate ?? true;
  const content = combineField(left.content, right.content, concatenate);
  const error = combineField(left.error, right.error, concatenate);
  const system = combineField(left.system, right.system, concatenate);
  return toolResult({
    content: content ?? "",
    data: { ...left.data, ...right.data },
    ...(error !== undefined && { error }),
    ...(system !== undefined && { system }),
  });
}
