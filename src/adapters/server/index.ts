// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server`
 * Purpose: Entry file for server adapters - canonical import surface.
 * Scope: Re-exports public server adapter implementations with named exports. Does not export test doubles.
 * Invariants: Named exports only, no export *
 * Side-effects: none (at import time - adapters have runtime effects when instantiated)
 * Links: Used by bootstrap layer for container assembly
 * @public
 */

export {
  type FetchLike,
  type OpenAiCompatibleConfig,
  OpenAiCompatibleModelClient,
  toWireMessage,
} from "./ai/openai-compat.adapter";
