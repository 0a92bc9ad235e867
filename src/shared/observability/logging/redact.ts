// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys (not generic "url").
 * Side-effects: none
 * Notes: Used by pino redact configuration during logger initialization.
 * Links: logger.ts
 * @public
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "apiKey",
  "api_key",
  "LLM_API_KEY",
  "token",
  "secret",
  // HTTP headers
  "authorization",
  "headers.authorization",
  "headers.Authorization",
  "req.headers.authorization",
];
