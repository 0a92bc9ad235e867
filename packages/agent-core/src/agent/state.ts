// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/agent/state`
 * Purpose: Mutable per-agent run state: lifecycle state, step counter, pending tool requests, results by invocation id.
 * Scope: State transitions only. Does NOT call the model or tools.
 * Invariants:
 *   - FINISHED_IS_TERMINAL: No transition leaves FINISHED except reset() between runs
 *   - RESULTS_APPEND_ONLY: A result recorded for an invocation id is never replaced
 *   - PENDING_CONSUMED_ONCE: takePendingToolCalls() empties the pending list
 * Side-effects: none
 * Links: thinker.ts, actor.ts, run-agent.ts
 * @public
 */

import type { ToolInvocationRequest } from "../transcript/message";
import type { ToolExecutionResult } from "../tooling/types";

export const AGENT_STATES = ["IDLE", "RUNNING", "FINISHED", "ERROR"] as const;

export type AgentState = (typeof AGENT_STATES)[number];

export class AgentRunState {
  private current: AgentState = "IDLE";
  private stepIndex = 0;
  private pending: readonly ToolInvocationRequest[] = [];
  private readonly results = new Map<string, ToolExecutionResult>();
  private prompt: string | undefined;

  constructor(
    readonly maxSteps: number,
    private readonly basePrompt?: string
  ) {
    this.prompt = basePrompt;
  }

  get state(): AgentState {
    return this.current;
  }

  get step(): number {
    return this.stepIndex;
  }

  get isFinished(): boolean {
    return this.current === "FINISHED";
  }

  /** Prompt appended after the transcript on the next think */
  get nextStepPrompt(): string | undefined {
    return this.prompt;
  }

  /** IDLE → RUNNING */
  start(): void {
    if (this.current === "IDLE") this.current = "RUNNING";
  }

  /** RUNNING → FINISHED */
  finish(): void {
    if (this.current === "RUNNING") this.current = "FINISHED";
  }

  /** RUNNING → ERROR */
  fail(): void {
    if (this.current === "RUNNING") this.current = "ERROR";
  }

  /**
   * Advance the step counter.
   * @returns the new 1-based step index
   */
  advance(): number {
    this.stepIndex += 1;
    return this.stepIndex;
  }

  setPendingToolCalls(calls: readonly ToolInvocationRequest[]): void {
    this.pending = calls;
  }

  get pendingToolCalls(): readonly ToolInvocationRequest[] {
    return this.pending;
  }

  takePendingToolCalls(): readonly ToolInvocationRequest[] {
    const calls = this.pending;
    this.pending = [];
    return calls;
  }

  recordResult(toolCallId: string, result: ToolExecutionResult): void {
    if (!this.results.has(toolCallId)) {
      this.results.set(toolCallId, result);
    }
  }

  get toolResults(): ReadonlyMap<string, ToolExecutionResult> {
    return this.results;
  }

  prependToPrompt(text: string): void {
    this.prompt = this.prompt ? `${text}\n${this.prompt}` : text;
  }

  /** Back to IDLE for a new run; results and step counter are cleared */
  reset(): void {
    this.current = "IDLE";
    this.stepIndex = 0;
    this.pending = [];
    this.results.clear();
    this.prompt = this.basePrompt;
  }
}
