// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/execution/llm-errors`
 * Purpose: Typed error for model client failures.
 * Scope: Defines LlmError and status classification. Does not implement normalization (see error-codes.ts).
 * Invariants:
 *   - LlmError captures kind + optional HTTP status at the model-client boundary
 *   - classifyLlmErrorFromStatus maps HTTP codes to LlmErrorKind
 * Side-effects: none
 * Links: error-codes.ts (normalizeErrorToExecutionCode), agent/thinker.ts
 * @public
 */

export type LlmErrorKind =
  | "timeout"
  | "rate_limited"
  | "provider_4xx"
  | "provider_5xx"
  | "aborted"
  | "invalid_response"
  | "unknown";

/**
 * Thrown by model clients on HTTP, stream and decoding errors.
 */
export class LlmError extends Error {
  readonly kind: LlmErrorKind;
  readonly status: number | undefined;

  constructor(message: string, kind: LlmErrorKind, status?: number) {
    super(message);
    this.name = "LlmError";
    this.kind = kind;
    this.status = status;
  }
}

export function isLlmError(error: unknown): error is LlmError {
  return error instanceof LlmError;
}

export function classifyLlmErrorFromStatus(status: number): LlmErrorKind {
  if (status === 408) return "timeout";
  if (status === 429) return "rate_limited";
  if (status >= 400 && status < 500) return "provider_4xx";
  if (status >= 500 && status < 600) return "provider_5xx";
  return "unknown";
}
