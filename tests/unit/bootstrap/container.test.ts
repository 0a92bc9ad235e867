// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/bootstrap/container`
 * Purpose: Verifies environment-based adapter wiring and agent defaults in the container.
 * Scope: createContainer() with explicit env. Does not touch the singleton.
 * Invariants: APP_ENV=test wires FakeModelAdapter; overrides win.
 * Side-effects: none
 * Links: src/bootstrap/container.ts
 * @internal
 */

import { createFixedClock, systemClock } from "@stepwise/agent-tools";
import { describe, expect, it } from "vitest";

import { OpenAiCompatibleModelClient } from "@/adapters/server";
import { FakeModelAdapter } from "@/adapters/test";
import { createContainer } from "@/bootstrap/container";
import { parseServerEnv } from "@/shared/env";
import { makeNoopLogger } from "@/shared/observability";
import { createScriptedModel } from "@tests/_fakes/agent/scripted-model";

describe("createContainer", () => {
  const log = makeNoopLogger();

  it("wires the fake model client when APP_ENV=test", () => {
    const container = createContainer(parseServerEnv({ APP_ENV: "test" }), { log });

    expect(container.modelClient).toBeInstanceOf(FakeModelAdapter);
    expect(container.clock).toBe(systemClock);
    expect(container.config).toEqual({
      maxSteps: 10,
      chunkSize: 120,
      pacingEnabled: true,
    });
  });

  it("wires the OpenAI-compatible client in production", () => {
    const container = createContainer(
      parseServerEnv({
        APP_ENV: "production",
        LLM_API_KEY: "test-key",
        AGENT_MAX_STEPS: "4",
        PACING_ENABLED: "false",
      }),
      { log }
    );

    expect(container.modelClient).toBeInstanceOf(OpenAiCompatibleModelClient);
    expect(container.config).toEqual({
      maxSteps: 4,
      chunkSize: 120,
      pacingEnabled: false,
    });
  });

  it("prefers overrides", () => {
    const modelClient = createScriptedModel([]);
    const clock = createFixedClock(0);

    const container = createContainer(parseServerEnv({}), { log, modelClient, clock });

    expect(container.modelClient).toBe(modelClient);
    expect(container.clock).toBe(clock);
    expect(container.log).toBe(log);
  });
});
