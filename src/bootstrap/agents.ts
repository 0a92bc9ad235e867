// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/agents`
 * Purpose: Agent presets: which tools each agent gets, its tool policy, special tools and presentation mode.
 * Scope: Composition of @stepwise/agent-core and @stepwise/agent-tools. Does not run agents.
 * Invariants:
 *   - Every preset uses toolChoice "required"
 *   - Special tools are a subset of the preset's tools
 *   - character and strategy stream through the character presenter; writer is silent
 * Side-effects: none
 * Links: container.ts, jobs/run-agent.job.ts
 * @public
 */

import {
  type Agent,
  createAgent,
  createCharacterPresenter,
  createPacer,
  type LoggerLike,
  type ModelClient,
  type PacingConfigInput,
  type PacingRuntime,
  TOOL_NAMES,
  type ToolChoice,
  type Transcript,
} from "@stepwise/agent-core";
import {
  type ClockCapability,
  createDefaultToolCatalog,
  selectTools,
} from "@stepwise/agent-tools";

export const AGENT_PRESETS = ["character", "strategy", "writer"] as const;
export type AgentPreset = (typeof AGENT_PRESETS)[number];

export function isAgentPreset(value: string): value is AgentPreset {
  return AGENT_PRESETS.some((preset) => preset === value);
}

interface PresetDefinition {
  readonly tools: readonly string[];
  readonly specialToolNames: readonly string[];
  readonly toolChoice: ToolChoice;
  readonly mode: "character" | "silent";
}

export const PRESET_DEFINITIONS: Readonly<Record<AgentPreset, PresetDefinition>> =
  {
    character: {
      tools: [
        TOOL_NAMES.speakInPerson,
        TOOL_NAMES.sendTelegramMessage,
        TOOL_NAMES.reflection,
        TOOL_NAMES.getCurrentTime,
        TOOL_NAMES.terminate,
      ],
      specialToolNames: [
        TOOL_NAMES.terminate,
        TOOL_NAMES.speakInPerson,
        TOOL_NAMES.sendTelegramMessage,
      ],
      toolChoice: "required",
      mode: "character",
    },
    strategy: {
      tools: [TOOL_NAMES.strategy, TOOL_NAMES.terminate],
      specialToolNames: [TOOL_NAMES.strategy, TOOL_NAMES.terminate],
      toolChoice: "required",
      mode: "character",
    },
    writer: {
      tools: [
        TOOL_NAMES.reflection,
        TOOL_NAMES.getCurrentTime,
        TOOL_NAMES.terminate,
      ],
      specialToolNames: [TOOL_NAMES.terminate],
      toolChoice: "required",
      mode: "silent",
    },
  };

export interface PresetAgentOptions {
  readonly model: ModelClient;
  /** Defaults to the preset name */
  readonly name?: string;
  readonly systemPrompt?: string;
  readonly nextStepPrompt?: string;
  readonly maxSteps?: number;
  readonly chunkSize?: number;
  readonly visibleFor?: readonly string[];
  readonly pacing?: PacingConfigInput;
  readonly pacingRuntime?: PacingRuntime;
  readonly clock?: ClockCapability;
  readonly transcript?: Transcript;
  readonly now?: () => Date;
  readonly logger?: LoggerLike;
}

export function createPresetAgent(
  preset: AgentPreset,
  options: PresetAgentOptions
): Agent {
  const definition = PRESET_DEFINITIONS[preset];
  const catalog = createDefaultToolCatalog(
    options.clock ? { clock: options.clock } : {}
  );
  const silent = definition.mode === "silent";

  return createAgent({
    config: {
      name: options.name ?? preset,
      toolChoice: definition.toolChoice,
      specialToolNames: [...definition.specialToolNames],
      ...(options.systemPrompt !== undefined && {
        systemPrompt: options.systemPrompt,
      }),
      ...(options.nextStepPrompt !== undefined && {
        nextStepPrompt: options.nextStepPrompt,
      }),
      ...(options.maxSteps !== undefined && { maxSteps: options.maxSteps }),
      ...(options.chunkSize !== undefined && { chunkSize: options.chunkSize }),
      ...(options.visibleFor !== undefined && {
        visibleFor: [...options.visibleFor],
      }),
    },
    model: options.model,
    tools: selectTools(definition.tools, catalog),
    ...(!silent && {
      presenter: createCharacterPresenter({
        pacer: createPacer(options.pacing, options.pacingRuntime),
        ...(options.chunkSize !== undefined && { chunkSize: options.chunkSize }),
      }),
    }),
    streaming: !silent,
    silent,
    ...(options.transcript && { transcript: options.transcript }),
    ...(options.now && { now: options.now }),
    ...(options.logger && { logger: options.logger }),
  });
}
