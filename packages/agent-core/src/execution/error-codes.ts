// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/execution/error-codes`
 * Purpose: Canonical error codes, error class, and normalization for agent run failures.
 * Scope: Single source of truth for run-level error codes. Does NOT define tool-level errors (those are result data).
 * Invariants:
 *   - ERROR_NORMALIZATION_ONCE: normalizeErrorToExecutionCode() is the canonical normalizer
 *   - Recognizes AgentExecutionError (.code), ProtocolViolationError and LlmError (.kind, .status)
 * Side-effects: none
 * Links: llm-errors.ts, errors.ts, agent/run-agent.ts
 * @public
 */

import { isProtocolViolationError } from "./errors";
import { isLlmError } from "./llm-errors";

/**
 * - invalid_request: input missing or malformed
 * - not_found: requested resource does not exist
 * - timeout: exceeded a time limit
 * - aborted: cancelled through an AbortSignal
 * - rate_limit: provider rate limit (HTTP 429)
 * - internal: unexpected failure
 * - protocol_violation: the model ignored the tool-choice contract
 */
export const AGENT_EXECUTION_ERROR_CODES = [
  "invalid_request",
  "not_found",
  "timeout",
  "aborted",
  "rate_limit",
  "internal",
  "protocol_violation",
] as const;

export type AgentExecutionErrorCode =
  (typeof AGENT_EXECUTION_ERROR_CODES)[number];

export function isAgentExecutionErrorCode(
  x: unknown
): x is AgentExecutionErrorCode {
  return (
    typeof x === "string" &&
    AGENT_EXECUTION_ERROR_CODES.some((code) => code === x)
  );
}

/**
 * Error that carries a structured code through call chains.
 */
export class AgentExecutionError extends Error {
  readonly code: AgentExecutionErrorCode;

  constructor(code: AgentExecutionErrorCode, message?: string) {
    super(message ?? `Agent execution failed: ${code}`);
    this.name = "AgentExecutionError";
    this.code = code;
  }
}

export function isAgentExecutionError(
  error: unknown
): error is AgentExecutionError {
  return error instanceof AgentExecutionError;
}

/**
 * Normalize any error to a stable AgentExecutionErrorCode.
 *
 * Priority:
 * 1. AbortError → "aborted"
 * 2. ProtocolViolationError → "protocol_violation"
 * 3. AgentExecutionError → its code
 * 4. LlmError → status first, then kind
 * 5. Default → "internal"
 */
export function normalizeErrorToExecutionCode(
  error: unknown
): AgentExecutionErrorCode {
  if (error instanceof Error && error.name === "AbortError") {
    return "aborted";
  }

  if (isProtocolViolationError(error)) {
    return "protocol_violation";
  }

  if (isAgentExecutionError(error)) {
    return error.code;
  }

  if (isLlmError(error)) {
    if (error.status === 429) return "rate_limit";
    if (error.status === 408) return "timeout";

    switch (error.kind) {
      case "rate_limited":
        return "rate_limit";
      case "timeout":
        return "timeout";
      case "aborted":
        return "aborted";
      default:
        return "internal";
    }
  }

  return "internal";
}

/**
 * "Name: message" for logs; never sent to clients.
 */
export function describeError(error: unknown): string {
  return error instanceof Error
    ? `${error.name}: ${error.message}`
    : String(error);
}

/**
 * Bare message for transcript and event text.
 */
export function errorMessageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
