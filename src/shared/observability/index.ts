// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Cross-cutting observability entry point.
 * Scope: Re-exports logging. Does not implement logic.
 * Invariants: No imports from bootstrap or adapters.
 * Side-effects: none
 * @public
 */

export type { Logger } from "./logging";
export {
  loggerOptions,
  makeLogger,
  makeNoopLogger,
  REDACT_PATHS,
} from "./logging";
