// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/logger`
 * Purpose: Verifies logger options (level, test silencing, reserved base keys) and secret redaction.
 * Scope: loggerOptions() with explicit env records; pino writing into an in-memory stream. Does not write to stdout.
 * Invariants: Reserved base keys win over bindings; redacted paths never reach the output.
 * Side-effects: none
 * Links: src/shared/observability/logging/logger.ts, src/shared/observability/logging/redact.ts
 * @public
 */

import pino from "pino";
import { describe, expect, it } from "vitest";

import { loggerOptions } from "@/shared/observability";

function capture(env: Record<string, string | undefined>, bindings?: Record<string, unknown>) {
  const lines: string[] = [];
  const logger = pino(loggerOptions(env, bindings), {
    write(line: string) {
      lines.push(line);
    },
  });
  const records = (): Record<string, unknown>[] =>
    lines.map((line): Record<string, unknown> => JSON.parse(line));
  return { logger, records };
}

describe("loggerOptions", () => {
  it("defaults to info and stays enabled outside test tooling", () => {
    const options = loggerOptions({ NODE_ENV: "production" });

    expect(options.level).toBe("info");
    expect(options.enabled).toBe(true);
    expect(options.messageKey).toBe("msg");
    expect(options.base).toEqual({
      app: "stepwise-agent",
      service: "stepwise-agent",
    });
  });

  it("is disabled under vitest or NODE_ENV=test", () => {
    expect(loggerOptions({ VITEST: "true" }).enabled).toBe(false);
    expect(loggerOptions({ NODE_ENV: "test" }).enabled).toBe(false);
  });

  it("keeps reserved base keys over bindings", () => {
    const options = loggerOptions(
      { NODE_ENV: "production", SERVICE_NAME: "agent-worker", PINO_LOG_LEVEL: "debug" },
      { component: "container", app: "other" }
    );

    expect(options.level).toBe("debug");
    expect(options.base).toEqual({
      component: "container",
      app: "stepwise-agent",
      service: "agent-worker",
    });
  });
});

describe("logger output", () => {
  it("writes JSON with bindings and an event message", () => {
    const { logger, records } = capture({ NODE_ENV: "production" }, { component: "job" });

    logger.info({ steps: 3 }, "job.run_agent.completed");

    expect(records()).toHaveLength(1);
    expect(records()[0]).toMatchObject({
      level: 30,
      component: "job",
      app: "stepwise-agent",
      steps: 3,
      msg: "job.run_agent.completed",
    });
  });

  it("redacts keys and authorization headers", () => {
    const { logger, records } = capture({ NODE_ENV: "production" });

    logger.warn(
      {
        apiKey: "test-secret",
        headers: { authorization: "Bearer test-secret" },
        model: "test-model",
      },
      "adapter.llm.request"
    );

    expect(records()[0]).toMatchObject({
      apiKey: "[REDACTED]",
      headers: { authorization: "[REDACTED]" },
      model: "test-model",
    });
  });
});
