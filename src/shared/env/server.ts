// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for the agent runtime; provides lazy, cached access. Does not read config files.
 * Invariants: All env vars validated on first access; fails fast on invalid env with EnvValidationError listing missing and invalid keys.
 * Side-effects: process.env
 * Notes: APP_ENV=test wires the deterministic fake model client. parseServerEnv() is the pure core; serverEnv() caches it.
 * Links: bootstrap/container.ts
 * @public
 */

import { ZodError, z } from "zod";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

export function isEnvValidationError(
  error: unknown
): error is EnvValidationError {
  return error instanceof EnvValidationError;
}

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const serverSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Application environment (controls adapter wiring)
  APP_ENV: z.enum(["test", "production"]).default("production"),

  // Service identity for observability
  SERVICE_NAME: z.string().default("stepwise-agent"),
  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),

  // OpenAI-compatible chat completions endpoint
  LLM_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  LLM_API_KEY: z.string().min(1).optional(),
  LLM_MODEL: z.string().min(1).default("gpt-4o-mini"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

  // Agent defaults
  AGENT_MAX_STEPS: z.coerce.number().int().positive().default(10),
  AGENT_CHUNK_SIZE: z.coerce.number().int().positive().default(120),
  PACING_ENABLED: booleanFlag.default("true"),
});

type ServerEnv = z.infer<typeof serverSchema> & {
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
  isTestMode: boolean;
};

function toValidationError(error: ZodError): EnvValidationError {
  const missing = new Set<string>();
  const invalid = new Set<string>();

  for (const issue of error.issues) {
    const key = issue.path[0]?.toString();
    if (!key) continue;

    // Treat all invalid_type as missing (avoids any casting)
    if (issue.code === "invalid_type") {
      missing.add(key);
    } else {
      invalid.add(key);
    }
  }

  return new EnvValidationError({
    code: "INVALID_ENV",
    missing: [...missing],
    invalid: [...invalid],
  });
}

/**
 * Validate an env record. No caching.
 *
 * @throws EnvValidationError
 */
export function parseServerEnv(
  source: Record<string, string | undefined>
): ServerEnv {
  try {
    const parsed = serverSchema.parse(source);
    return {
      ...parsed,
      isDev: parsed.NODE_ENV === "development",
      isTest: parsed.NODE_ENV === "test",
      isProd: parsed.NODE_ENV === "production",
      isTestMode: parsed.APP_ENV === "test",
    };
  } catch (error) {
    if (error instanceof ZodError) {
      throw toValidationError(error);
    }
    throw error;
  }
}

let ENV: ServerEnv | null = null;

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    ENV = parseServerEnv(process.env);
  }
  return ENV;
}

export type { ServerEnv };
