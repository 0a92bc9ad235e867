// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/observability/logger`
 * Purpose: Minimal pino-compatible logger interface for the engine, plus a silent default.
 * Scope: Core packages accept LoggerLike; the app layer injects its pino logger. Does NOT configure transports.
 * Invariants:
 *   - STRUCTURED_ONLY: log(obj, eventName); eventName is a stable dotted identifier
 *   - Never log full prompts or full tool payloads; use excerpt()
 * Side-effects: none
 * Links: src/shared/observability/logging/logger.ts
 * @public
 */

import pino from "pino";

export interface LoggerLike {
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  debug(obj: Record<string, unknown>, msg?: string): void;
}

/**
 * pino with enabled:false. Default for engine components constructed without a logger.
 */
export function makeSilentLogger(): LoggerLike {
  return pino({ enabled: false });
}

const EXCERPT_LIMIT = 200;

/**
 * Truncate a payload for logging.
 */
export function excerpt(value: string, limit: number = EXCERPT_LIMIT): string {
  return value.length > limit ? `${value.slice(0, limit)}…` : value;
}
