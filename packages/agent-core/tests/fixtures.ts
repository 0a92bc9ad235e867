// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/tests/fixtures`
 * Purpose: Shared test fixtures: scripted model client, fake tools, fixed clock, event collection.
 * Scope: Test-only helpers. No network, no real timers.
 * Invariants:
 *   - FIXED_NOW is the only clock tests see
 *   - Scripted model replies are consumed in order; running out throws
 * Side-effects: none
 * Links: tests/**
 * @internal
 */

import { vi } from "vitest";

import type { AgentContext } from "../src/agent/context";
import { defaultMessageFormatter } from "../src/agent/context";
import { AgentRunState } from "../src/agent/state";
import {
  AgentRunConfigSchema,
  type AgentRunConfigInput,
} from "../src/configurable/agent-run-config";
import type { AgentEvent } from "../src/events/agent-events";
import type {
  AskToolParams,
  ModelClient,
  ModelDecision,
  ModelDelta,
} from "../src/model/model-client.port";
import { makeSilentLogger } from "../src/observability/logger";
import { createStaticToolSource } from "../src/tooling/sources/static.source";
import type { ToolSourcePort } from "../src/tooling/ports/tool-source.port";
import type {
  BoundToolRuntime,
  ToolExecutionResult,
  ToolInvocationContext,
} from "../src/tooling/types";
import { toolResult } from "../src/tooling/types";
import type { ToolInvocationRequest } from "../src/transcript/message";
import {
  createInMemoryTranscript,
  type Transcript,
} from "../src/transcript/transcript";

export const FIXED_NOW = new Date("2025-01-01T00:00:00.000Z");
export const FIXED_NOW_ISO = FIXED_NOW.toISOString();

// ─────────────────────────────────────────────────────────────────────────────
// Model
// ─────────────────────────────────────────────────────────────────────────────

export interface ScriptedReply {
  readonly deltas?: readonly ModelDelta[];
  readonly content?: string | null;
  readonly toolCalls?: readonly ToolInvocationRequest[];
  /** Thrown after the deltas are delivered */
  readonly error?: Error;
}

export interface ScriptedModel extends ModelClient {
  readonly calls: AskToolParams[];
}

/**
 * Model client that plays back replies in order.
 */
export function createScriptedModel(
  replies: readonly ScriptedReply[]
): ScriptedModel {
  const queue = [...replies];
  const calls: AskToolParams[] = [];

  return {
    calls,
    async askTool(params: AskToolParams): Promise<ModelDecision> {
      calls.push(params);
      const reply = queue.shift();
      if (!reply) {
        throw new Error("Scripted model has no more replies");
      }
      for (const delta of reply.deltas ?? []) {
        params.onDelta?.(delta);
      }
      if (reply.error) throw reply.error;
      return {
        content: reply.content ?? null,
        toolCalls: reply.toolCalls ?? [],
      };
    },
  };
}

export function toolCall(
  id: string,
  name: string,
  args: Record<string, unknown> | string = {}
): ToolInvocationRequest {
  return {
    id,
    name,
    arguments: typeof args === "string" ? args : JSON.stringify(args),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Tools
// ─────────────────────────────────────────────────────────────────────────────

type FakeHandler = (
  args: unknown,
  ctx: ToolInvocationContext
) => Promise<ToolExecutionResult>;

/**
 * Bound tool whose exec is a vi.fn; validateInput passes objects through and rejects everything else.
 */
export function createFakeTool(
  id: string,
  handler: FakeHandler = async () => toolResult({ content: `${id} done` })
) {
  const exec = vi.fn(handler);
  const tool: BoundToolRuntime = {
    id,
    spec: {
      name: id,
      description: `Fake ${id}`,
      inputSchema: { type: "object", properties: {} },
    },
    validateInput(raw: unknown): unknown {
      if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
        throw new Error("Expected an object");
      }
      return raw;
    },
    exec,
  };
  return { tool, exec };
}

// ─────────────────────────────────────────────────────────────────────────────
// Context
// ─────────────────────────────────────────────────────────────────────────────

export function createTestContext(options: {
  config?: Partial<AgentRunConfigInput>;
  model?: ModelClient;
  tools?: ToolSourcePort;
  transcript?: Transcript;
}): AgentContext {
  const config = AgentRunConfigSchema.parse({
    name: "tester",
    ...options.config,
  });
  const run = new AgentRunState(config.maxSteps, config.nextStepPrompt);
  run.start();
  run.advance();
  return {
    config,
    run,
    model: options.model ?? createScriptedModel([]),
    tools: options.tools ?? createStaticToolSource([]),
    transcript: options.transcript ?? createInMemoryTranscript(),
    formatMessages: defaultMessageFormatter,
    systemMessages: () => [],
    now: () => FIXED_NOW,
    logger: makeSilentLogger(),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────────────────

export async function collectEvents(
  stream: AsyncIterable<AgentEvent>
): Promise<AgentEvent[]> {
  const events: AgentEvent[] = [];
  for await (const event of stream) {
    events.push(event);
  }
  return events;
}

/**
 * Drain a generator, returning its events and its return value.
 */
export async function drain<R>(
  generator: AsyncGenerator<AgentEvent, R>
): Promise<{ events: AgentEvent[]; result: R }> {
  const events: AgentEvent[] = [];
  let next = await generator.next();
  while (!next.done) {
    events.push(next.value);
    next = await generator.next();
  }
  return { events, result: next.value };
}

/** Compact "type:content" view for ordering assertions */
export function summarize(events: readonly AgentEvent[]): string[] {
  return events.map((event) => `${event.type}:${event.content ?? "null"}`);
}
