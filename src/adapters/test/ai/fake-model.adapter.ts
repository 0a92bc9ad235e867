// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/test/ai/fake-model.adapter`
 * Purpose: Deterministic fake ModelClient for CI and test environments.
 * Scope: Implements ModelClient with predictable decisions. Does not make external calls.
 * Invariants:
 *   - Same tools and policy → same decision
 *   - Prefers a reply tool, then terminate; plain text only when no tool fits or tools are disabled
 *   - Deltas, when requested, add up to the returned decision
 * Side-effects: none
 * Notes: Used when APP_ENV=test.
 * Links: bootstrap/container.ts
 * @internal
 */

import {
  type AskToolParams,
  type ModelClient,
  type ModelDecision,
  TOOL_NAMES,
  type ToolInvocationRequest,
} from "@stepwise/agent-core";

export const FAKE_COMPLETION = "[FAKE_COMPLETION]";
export const FAKE_TOOL_CALL_ID = "fake-call-1";

const REPLY_TOOLS: readonly string[] = [
  TOOL_NAMES.speakInPerson,
  TOOL_NAMES.sendTelegramMessage,
];

function pickToolCall(params: AskToolParams): ToolInvocationRequest | null {
  if (params.toolChoice === "none") return null;
  const names = new Set(params.tools.map((tool) => tool.name));

  const reply = REPLY_TOOLS.find((name) => names.has(name));
  if (reply) {
    return {
      id: FAKE_TOOL_CALL_ID,
      name: reply,
      arguments: JSON.stringify({ content: FAKE_COMPLETION }),
    };
  }
  if (names.has(TOOL_NAMES.terminate)) {
    return {
      id: FAKE_TOOL_CALL_ID,
      name: TOOL_NAMES.terminate,
      arguments: JSON.stringify({ status: "success" }),
    };
  }
  return null;
}

export class FakeModelAdapter implements ModelClient {
  async askTool(params: AskToolParams): Promise<ModelDecision> {
    const call = pickToolCall(params);

    if (call) {
      params.onDelta?.({
        type: "tool_call_delta",
        index: 0,
        id: call.id,
        name: call.name,
      });
      params.onDelta?.({
        type: "tool_call_delta",
        index: 0,
        argumentsDelta: call.arguments,
      });
      return { content: null, toolCalls: [call] };
    }

    // Split into 2-char chunks for a realistic-looking stream
    for (let i = 0; i < FAKE_COMPLETION.length; i += 2) {
      params.onDelta?.({ type: "text", text: FAKE_COMPLETION.slice(i, i + 2) });
    }
    return { content: FAKE_COMPLETION, toolCalls: [] };
  }
}
