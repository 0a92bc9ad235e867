// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/configurable/agent-run-config`
 * Purpose: JSON-serializable agent run configuration schema.
 * Scope: Defines step budget, tool-choice policy, chunking and termination knobs. Does NOT contain secrets or functions.
 * Invariants:
 *   - JSON-serializable (no functions, no object instances)
 *   - Defaults live here only; engine components read the parsed config
 * Side-effects: none
 * Links: agent/agent.ts
 * @public
 */

import { z } from "zod";

export const TOOL_CHOICES = ["none", "auto", "required"] as const;

export const ToolChoiceSchema = z.enum(TOOL_CHOICES);

/**
 * Whether the model must, may, or must not request tools on a step.
 */
export type ToolChoice = z.infer<typeof ToolChoiceSchema>;

export const DEFAULT_MAX_STEPS = 10;
export const DEFAULT_CHUNK_SIZE = 120;
export const DEFAULT_DUPLICATE_THRESHOLD = 2;

export const AgentRunConfigSchema = z.object({
  /** Agent name; used as speaker on committed messages */
  name: z.string().min(1),
  /** Step budget enforced by runAgent() */
  maxSteps: z.number().int().positive().default(DEFAULT_MAX_STEPS),
  toolChoice: ToolChoiceSchema.default("auto"),
  /** Chunk size for internal tool output */
  chunkSize: z.number().int().positive().default(DEFAULT_CHUNK_SIZE),
  /** Tools whose completion finishes the agent (case-insensitive) */
  specialToolNames: z.array(z.string().min(1)).default(["terminate"]),
  /** Earlier identical assistant replies needed to flag the agent as stuck */
  duplicateThreshold: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_DUPLICATE_THRESHOLD),
  /** Stop the run after a content-only reply */
  finishOnReply: z.boolean().default(true),
  /** Visibility scope stamped on committed messages */
  visibleFor: z.array(z.string()).default([]),
  systemPrompt: z.string().optional(),
  /** Appended after the transcript on every think */
  nextStepPrompt: z.string().optional(),
});

export type AgentRunConfig = z.infer<typeof AgentRunConfigSchema>;

export type AgentRunConfigInput = z.input<typeof AgentRunConfigSchema>;
