// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Verifies server env defaults, coercion, and the missing/invalid split of EnvValidationError.
 * Scope: parseServerEnv() with explicit records; serverEnv() caching with module reset. Does NOT test adapter wiring.
 * Invariants: Module cache reset for serverEnv tests; process.env restored after each test.
 * Side-effects: process.env
 * Links: src/shared/env/server.ts
 * @public
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  EnvValidationError,
  isEnvValidationError,
  parseServerEnv,
} from "@/shared/env/server";

const ORIGINAL_ENV = process.env;

describe("parseServerEnv", () => {
  it("fills defaults for an empty env", () => {
    const env = parseServerEnv({});

    expect(env).toMatchObject({
      NODE_ENV: "development",
      APP_ENV: "production",
      SERVICE_NAME: "stepwise-agent",
      PINO_LOG_LEVEL: "info",
      LLM_BASE_URL: "https://api.openai.com/v1",
      LLM_MODEL: "gpt-4o-mini",
      LLM_TIMEOUT_MS: 60000,
      AGENT_MAX_STEPS: 10,
      AGENT_CHUNK_SIZE: 120,
      PACING_ENABLED: true,
      isDev: true,
      isTest: false,
      isProd: false,
      isTestMode: false,
    });
    expect(env.LLM_API_KEY).toBeUndefined();
  });

  it("coerces numbers and boolean flags", () => {
    const env = parseServerEnv({
      NODE_ENV: "production",
      APP_ENV: "test",
      AGENT_MAX_STEPS: "25",
      AGENT_CHUNK_SIZE: "40",
      LLM_TIMEOUT_MS: "1500",
      PACING_ENABLED: "0",
      LLM_API_KEY: "test-key",
    });

    expect(env.AGENT_MAX_STEPS).toBe(25);
    expect(env.AGENT_CHUNK_SIZE).toBe(40);
    expect(env.LLM_TIMEOUT_MS).toBe(1500);
    expect(env.PACING_ENABLED).toBe(false);
    expect(env.LLM_API_KEY).toBe("test-key");
    expect(env.isProd).toBe(true);
    expect(env.isTestMode).toBe(true);
  });

  it("reports malformed values as invalid", () => {
    let caught: unknown;
    try {
      parseServerEnv({ LLM_BASE_URL: "not-a-url", AGENT_MAX_STEPS: "0" });
    } catch (error) {
      caught = error;
    }

    expect(isEnvValidationError(caught)).toBe(true);
    expect(caught).toBeInstanceOf(EnvValidationError);
    expect(caught).toMatchObject({
      name: "EnvValidationError",
      meta: {
        code: "INVALID_ENV",
        missing: [],
        invalid: ["LLM_BASE_URL", "AGENT_MAX_STEPS"],
      },
    });
  });

  it("reports values of the wrong type as missing", () => {
    expect(() => parseServerEnv({ AGENT_CHUNK_SIZE: "lots" })).toThrow(
      expect.objectContaining({
        meta: { code: "INVALID_ENV", missing: ["AGENT_CHUNK_SIZE"], invalid: [] },
      })
    );
  });

  it("rejects unknown APP_ENV values", () => {
    expect(() => parseServerEnv({ APP_ENV: "staging" })).toThrow(
      EnvValidationError
    );
  });
});

describe("serverEnv", () => {
  beforeEach(() => {
    vi.resetModules();
    process.env = { ...ORIGINAL_ENV };
  });

  afterEach(() => {
    process.env = ORIGINAL_ENV;
  });

  it("reads process.env once and caches the result", async () => {
    process.env.AGENT_MAX_STEPS = "7";
    const { serverEnv } = await import("@/shared/env/server");

    const first = serverEnv();
    process.env.AGENT_MAX_STEPS = "8";

    expect(first.AGENT_MAX_STEPS).toBe(7);
    expect(serverEnv()).toBe(first);
  });
});
