// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/setup`
 * Purpose: Global test environment setup for root tests.
 * Scope: Sets env vars and blocks real network access. Does NOT mock specific services or ports.
 * Invariants: Unit tests never reach the network; adapters under test receive an injected fetch.
 * Side-effects: process.env, global (fetch)
 * Links: vitest.config.mts
 * @public
 */

import { afterEach, beforeAll, vi } from "vitest";

beforeAll(() => {
  // Minimal env for validation; APP_ENV=test wires the fake model client
  Object.assign(process.env, {
    NODE_ENV: "test",
    APP_ENV: "test",
    LLM_API_KEY: "test-key",
  });

  vi.stubGlobal("fetch", async () => {
    throw new Error("Network access is disabled in unit tests");
  });
});

afterEach(() => {
  vi.restoreAllMocks();
});
