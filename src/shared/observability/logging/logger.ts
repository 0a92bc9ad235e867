// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/logger`
 * Purpose: Pino logger factory - JSON-only stdout emission.
 * Scope: Create configured pino loggers. Does not handle run-scoped bindings (callers pass them).
 * Invariants: Always emits JSON to stdout; no worker transports. Safe to call at module scope (no env validation).
 * Side-effects: none
 * Notes: Reads logging-specific env vars directly (NODE_ENV, PINO_LOG_LEVEL, SERVICE_NAME) without serverEnv() to avoid triggering full env validation at module load time.
 * Links: redact.ts; loggers are passed into @stepwise/agent-core as LoggerLike.
 * @public
 */

import type { Logger, LoggerOptions } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact";

export type { Logger } from "pino";

/**
 * Options shared by makeLogger and tests that inspect the configuration.
 */
export function loggerOptions(
  env: Record<string, string | undefined>,
  bindings?: Record<string, unknown>
): LoggerOptions {
  const nodeEnv = env.NODE_ENV ?? "development";
  // Silence logs in test tooling (VITEST or NODE_ENV=test)
  const isTestTooling = env.VITEST === "true" || nodeEnv === "test";

  return {
    level: env.PINO_LOG_LEVEL ?? "info",
    enabled: !isTestTooling,
    // Stable base: bindings first, then reserved keys (prevents overwrite)
    base: {
      ...bindings,
      app: "stepwise-agent",
      service: env.SERVICE_NAME ?? "stepwise-agent",
    },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  };
}

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const env = process.env;

  // Sync outside production for immediate crash visibility
  return pino(
    loggerOptions(env, bindings),
    pino.destination({
      dest: 1,
      sync: env.NODE_ENV !== "production",
      minLength: 4096,
    })
  );
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
