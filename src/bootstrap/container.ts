// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Dependency injection container for the application composition root with environment-based adapter selection.
 * Scope: Wire the model client, clock and logger. Does not build agents (see agents.ts).
 * Invariants: Single container instance per process via getContainer(); APP_ENV=test wires FakeModelAdapter.
 * Side-effects: IO (initializes logger and emits startup log on creation)
 * Links: agents.ts, jobs/run-agent.job.ts
 * @public
 */

import type { ModelClient } from "@stepwise/agent-core";
import { type ClockCapability, systemClock } from "@stepwise/agent-tools";
import type { Logger } from "pino";

import { OpenAiCompatibleModelClient } from "@/adapters/server";
import { FakeModelAdapter } from "@/adapters/test";
import { type ServerEnv, serverEnv } from "@/shared/env";
import { makeLogger } from "@/shared/observability";

export interface ContainerConfig {
  readonly maxSteps: number;
  readonly chunkSize: number;
  readonly pacingEnabled: boolean;
}

export interface Container {
  log: Logger;
  config: ContainerConfig;
  modelClient: ModelClient;
  clock: ClockCapability;
}

export interface ContainerOverrides {
  readonly log?: Logger;
  readonly modelClient?: ModelClient;
  readonly clock?: ClockCapability;
}

// Module-level singleton
let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - allows fresh container between test runs.
 */
export function resetContainer(): void {
  _container = null;
}

export function createContainer(
  env: ServerEnv = serverEnv(),
  overrides: ContainerOverrides = {}
): Container {
  const log = overrides.log ?? makeLogger({ component: "container" });

  // Startup log - config only, no URLs or secrets
  log.info(
    {
      env: env.APP_ENV,
      logLevel: env.PINO_LOG_LEVEL,
      model: env.LLM_MODEL,
      hasApiKey: Boolean(env.LLM_API_KEY),
    },
    "container initialized"
  );

  // Environment-based adapter wiring - single source of truth
  const modelClient =
    overrides.modelClient ??
    (env.isTestMode
      ? new FakeModelAdapter()
      : new OpenAiCompatibleModelClient({
          baseUrl: env.LLM_BASE_URL,
          model: env.LLM_MODEL,
          timeoutMs: env.LLM_TIMEOUT_MS,
          logger: log.child({ component: "OpenAiCompatibleModelClient" }),
          ...(env.LLM_API_KEY !== undefined && { apiKey: env.LLM_API_KEY }),
        }));

  return {
    log,
    config: {
      maxSteps: env.AGENT_MAX_STEPS,
      chunkSize: env.AGENT_CHUNK_SIZE,
      pacingEnabled: env.PACING_ENABLED,
    },
    modelClient,
    clock: overrides.clock ?? systemClock,
  };
}
