// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/execution/errors`
 * Purpose: Domain error classes raised by the step loop.
 * Scope: ProtocolViolationError (the one Actor failure that propagates) and AgentStateError. Does NOT normalize errors.
 * Invariants:
 *   - PROTOCOL_VIOLATION_DISTINCT: ProtocolViolationError is never produced by tool failures
 *   - Each class carries a literal `code` for narrowing
 * Side-effects: none
 * Links: agent/actor.ts, agent/run-agent.ts
 * @public
 */

export const TOOL_CALLS_REQUIRED_MESSAGE =
  "Tool calls required but none provided";

/**
 * The model ignored an explicit contract, e.g. policy `required` with zero tool calls.
 */
export class ProtocolViolationError extends Error {
  public readonly code = "PROTOCOL_VIOLATION" as const;
  public readonly reason: "tool_calls_required";

  constructor(
    reason: "tool_calls_required" = "tool_calls_required",
    message: string = TOOL_CALLS_REQUIRED_MESSAGE
  ) {
    super(message);
    this.name = "ProtocolViolationError";
    this.reason = reason;
  }
}

/**
 * The agent was asked to run from a state that does not allow it.
 */
export class AgentStateError extends Error {
  public readonly code = "INVALID_AGENT_STATE" as const;

  constructor(public readonly state: string) {
    super(`Cannot run agent from state: ${state}`);
    this.name = "AgentStateError";
  }
}

export function isProtocolViolationError(
  error: unknown
): error is ProtocolViolationError {
  return error instanceof ProtocolViolationError;
}

export function isAgentStateError(error: unknown): error is AgentStateError {
  return error instanceof AgentStateError;
}
