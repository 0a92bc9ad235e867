// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/agent/agent`
 * Purpose: Compose one agent engine from pluggable strategies (formatter, presenter, tool-choice policy).
 * Scope: Wiring only. Variants are expressed by configuration, not subclasses.
 * Invariants:
 *   - CONFIG_PARSED_ONCE: The run config is validated by AgentRunConfigSchema here and nowhere else
 *   - ONE_TRANSCRIPT_PER_AGENT: Thinker, Actor and presenters share the same transcript
 * Side-effects: none at construction
 * Links: thinker.ts, actor.ts, step-loop.ts, run-agent.ts
 * @public
 */

import {
  AgentRunConfigSchema,
  type AgentRunConfigInput,
} from "../configurable/agent-run-config";
import type { ModelClient } from "../model/model-client.port";
import { type LoggerLike, makeSilentLogger } from "../observability/logger";
import {
  createChunkedPresenter,
  type ResultPresenter,
} from "../presentation/presenters";
import type { ToolSourcePort } from "../tooling/ports/tool-source.port";
import { createToolExecutor } from "../tooling/tool-executor";
import { type Message, systemMessage } from "../transcript/message";
import {
  createInMemoryTranscript,
  type Transcript,
} from "../transcript/transcript";
import { createActor } from "./actor";
import {
  type AgentContext,
  defaultMessageFormatter,
  type MessageFormatter,
} from "./context";
import { AgentRunState } from "./state";
import { createStepLoop } from "./step-loop";
import { createThinker } from "./thinker";

export interface CreateAgentOptions {
  readonly config: AgentRunConfigInput;
  readonly model: ModelClient;
  readonly tools: ToolSourcePort;
  readonly transcript?: Transcript;
  /** Defaults to the chunked presenter at config.chunkSize */
  readonly presenter?: ResultPresenter;
  readonly formatMessages?: MessageFormatter;
  /** Defaults to config.systemPrompt as a single system message */
  readonly systemMessages?: () => readonly Message[];
  /** Forward model deltas as token events (default true) */
  readonly streaming?: boolean;
  /** Background agent: no events from think or act */
  readonly silent?: boolean;
  readonly now?: () => Date;
  readonly logger?: LoggerLike;
}

export function createAgent(options: CreateAgentOptions) {
  const config = AgentRunConfigSchema.parse(options.config);
  const logger = options.logger ?? makeSilentLogger();
  const run = new AgentRunState(config.maxSteps, config.nextStepPrompt);
  const transcript = options.transcript ?? createInMemoryTranscript();
  const silent = options.silent ?? false;
  const { systemPrompt } = config;

  const ctx: AgentContext = {
    config,
    run,
    model: options.model,
    tools: options.tools,
    transcript,
    formatMessages: options.formatMessages ?? defaultMessageFormatter,
    systemMessages:
      options.systemMessages ??
      (() => (systemPrompt ? [systemMessage(systemPrompt)] : [])),
    now: options.now ?? (() => new Date()),
    logger,
  };

  const executor = createToolExecutor(options.tools, {
    specialToolNames: config.specialToolNames,
    agentName: config.name,
    logger,
  });
  const thinker = createThinker(ctx);
  const actor = createActor(ctx, {
    executor,
    presenter:
      options.presenter ?? createChunkedPresenter({ chunkSize: config.chunkSize }),
    silent,
  });
  const loop = createStepLoop(ctx, {
    thinker,
    actor,
    silent,
    ...(options.streaming !== undefined && { streaming: options.streaming }),
  });

  return {
    name: config.name,
    config,
    run,
    transcript,
    logger,
    executor,
    thinker,
    actor,
    runStep: loop.runStep,
  };
}

export type Agent = ReturnType<typeof createAgent>;
