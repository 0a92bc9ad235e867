// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/bootstrap/agents`
 * Purpose: Verifies preset wiring: tools offered to the model, special tools, presentation mode.
 * Scope: createPresetAgent() driven by a scripted model. Does not use the container.
 * Invariants: Pacing disabled so channel output arrives as one token.
 * Side-effects: none
 * Links: src/bootstrap/agents.ts
 * @internal
 */

import { type AgentEvent, runAgent } from "@stepwise/agent-core";
import { createFixedClock } from "@stepwise/agent-tools";
import { describe, expect, it } from "vitest";

import {
  AGENT_PRESETS,
  createPresetAgent,
  isAgentPreset,
  PRESET_DEFINITIONS,
} from "@/bootstrap/agents";
import { createScriptedModel, toolCall } from "@tests/_fakes/agent/scripted-model";

async function collect(stream: AsyncIterable<AgentEvent>): Promise<AgentEvent[]> {
  const events: AgentEvent[] = [];
  for await (const event of stream) events.push(event);
  return events;
}

describe("agent presets", () => {
  it("recognizes preset names", () => {
    expect(AGENT_PRESETS.filter(isAgentPreset)).toEqual([
      "character",
      "strategy",
      "writer",
    ]);
    expect(isAgentPreset("narrator")).toBe(false);
  });

  it("keeps special tools within each preset's tools", () => {
    for (const preset of AGENT_PRESETS) {
      const { tools, specialToolNames } = PRESET_DEFINITIONS[preset];
      expect(specialToolNames.every((name) => tools.includes(name))).toBe(true);
    }
  });

  it("offers the character tools to the model under a required policy", async () => {
    const model = createScriptedModel([
      { content: null, toolCalls: [toolCall("c1", "terminate", { status: "success" })] },
    ]);
    const agent = createPresetAgent("character", {
      model,
      pacing: { enabled: false },
    });

    await runAgent(agent, { input: "hello" }).final;

    expect(agent.name).toBe("character");
    expect(agent.config.specialToolNames).toEqual([
      "terminate",
      "speak_in_person",
      "send_telegram_message",
    ]);
    expect(model.calls[0]?.toolChoice).toBe("required");
    expect(model.calls[0]?.tools.map((tool) => tool.name)).toEqual([
      "speak_in_person",
      "send_telegram_message",
      "reflection",
      "get_current_time",
      "terminate",
    ]);
  });

  it("finishes a character run after speaking in person", async () => {
    const model = createScriptedModel([
      {
        content: null,
        toolCalls: [toolCall("c1", "speak_in_person", { content: "Hi there" })],
      },
    ]);
    const agent = createPresetAgent("character", {
      model,
      name: "ada",
      pacing: { enabled: false },
    });

    const { stream, final } = runAgent(agent, { input: "hello", inputMode: "in_person" });
    const events = await collect(stream);
    const result = await final;

    expect(events.filter((event) => event.type === "token")).toEqual([
      {
        type: "token",
        content: "Hi there",
        messageType: "speak_in_person",
        messageId: "c1",
        step: 1,
        totalSteps: 10,
      },
    ]);
    expect(result).toMatchObject({ ok: true, state: "FINISHED", stopReason: "finished", steps: 1 });
    expect(agent.transcript.list().at(-1)).toMatchObject({
      role: "tool",
      content: "Hi there",
      toolCallId: "c1",
    });
  });

  it("shows strategy output as inner thought with structured data", async () => {
    const model = createScriptedModel([
      {
        content: null,
        toolCalls: [
          toolCall("s1", "strategy", {
            decision: "telegram",
            inner_monologue: "  Message them later  ",
          }),
        ],
      },
    ]);
    const agent = createPresetAgent("strategy", {
      model,
      maxSteps: 3,
      pacing: { enabled: false },
    });

    const { stream, final } = runAgent(agent, { input: "plan" });
    const events = await collect(stream);

    expect(events.find((event) => event.type === "tool_output")).toMatchObject({
      messageType: "strategy",
      metadata: {
        structuredData: { decision: "telegram", strategy: "Message them later" },
        resultType: "strategy",
      },
    });
    expect(events.filter((event) => event.type === "token")).toMatchObject([
      { content: "Message them later", messageType: "inner_thought", totalSteps: 3 },
    ]);
    expect((await final).stopReason).toBe("finished");
  });

  it("runs the writer silently apart from step and final events", async () => {
    const model = createScriptedModel([
      {
        content: null,
        toolCalls: [
          toolCall("r1", "get_current_time"),
          toolCall("t1", "terminate", { status: "success" }),
        ],
      },
    ]);
    const agent = createPresetAgent("writer", {
      model,
      clock: createFixedClock(Date.UTC(2025, 0, 3, 15, 30, 7)),
    });

    const { stream, final } = runAgent(agent, { input: "write" });
    const events = await collect(stream);

    expect(events.map((event) => event.type)).toEqual(["step", "final"]);
    expect(model.calls[0]?.onDelta).toBeUndefined();
    expect((await final).stopReason).toBe("finished");
    expect(
      agent.transcript
        .list()
        .filter((message) => message.role === "tool")
        .map((message) => message.content)
    ).toEqual([
      "2025-01-03 15:30:07",
      "The interaction has been completed with status: success",
    ]);
  });
});
