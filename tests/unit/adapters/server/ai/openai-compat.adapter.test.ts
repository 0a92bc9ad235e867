// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/adapters/server/ai/openai-compat.adapter`
 * Purpose: Unit tests for the OpenAI-compatible ModelClient: request mapping, SSE parsing, tool-call accumulation, errors.
 * Scope: Injected fetch stub. Does not make network calls.
 * Invariants:
 *   - Tool-call fragments accumulate by index
 *   - Missing '[DONE]' counts as completion
 *   - HTTP and stream errors surface as LlmError
 * Side-effects: none
 * Links: src/adapters/server/ai/openai-compat.adapter.ts
 * @internal
 */

import {
  type AskToolParams,
  assistantToolCallMessage,
  LlmError,
  type ModelDelta,
  systemMessage,
  toolMessage,
  userMessage,
} from "@stepwise/agent-core";
import { describe, expect, it, vi } from "vitest";

import {
  type FetchLike,
  OpenAiCompatibleModelClient,
} from "@/adapters/server/ai/openai-compat.adapter";
import { jsonResponse, sseResponse } from "@tests/_fakes/agent/scripted-model";

const terminateSpec = {
  name: "terminate",
  description: "End the interaction",
  inputSchema: { type: "object" as const, properties: {} },
};

function params(overrides: Partial<AskToolParams> = {}): AskToolParams {
  return {
    messages: [userMessage("hi")],
    systemMessages: [],
    tools: [terminateSpec],
    toolChoice: "auto",
    ...overrides,
  };
}

function setup(respond: FetchLike) {
  const fetch = vi.fn(respond);
  const client = new OpenAiCompatibleModelClient({
    baseUrl: "https://llm.test/v1/",
    apiKey: "test-key",
    model: "test-model",
    fetch,
  });
  return { client, fetch };
}

function sentRequest(fetch: ReturnType<typeof setup>["fetch"]) {
  const [url, init] = fetch.mock.calls[0] ?? [];
  const body: unknown =
    typeof init?.body === "string" ? JSON.parse(init.body) : null;
  return { url, init, body };
}

describe("OpenAiCompatibleModelClient (non-streaming)", () => {
  it("maps the transcript and tools to the chat completions request", async () => {
    const { client, fetch } = setup(async () =>
      jsonResponse({ choices: [{ message: { content: "ok" } }] })
    );

    await client.askTool(
      params({
        systemMessages: [systemMessage("be brief")],
        messages: [
          userMessage("hi"),
          assistantToolCallMessage("", [
            { id: "c0", name: "terminate", arguments: "{}" },
          ]),
          toolMessage("done", { id: "c0", name: "terminate" }),
        ],
        toolChoice: "required",
      })
    );

    const { url, init, body } = sentRequest(fetch);
    expect(url).toBe("https://llm.test/v1/chat/completions");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-key",
    });
    expect(body).toEqual({
      model: "test-model",
      messages: [
        { role: "system", content: "be brief" },
        { role: "user", content: "hi" },
        {
          role: "assistant",
          content: null,
          tool_calls: [
            {
              id: "c0",
              type: "function",
              function: { name: "terminate", arguments: "{}" },
            },
          ],
        },
        { role: "tool", content: "done", tool_call_id: "c0" },
      ],
      tools: [
        {
          type: "function",
          function: {
            name: "terminate",
            description: "End the interaction",
            parameters: { type: "object", properties: {} },
          },
        },
      ],
      tool_choice: "required",
    });
  });

  it("leaves out tools and tool_choice when no tools are offered", async () => {
    const { client, fetch } = setup(async () =>
      jsonResponse({ choices: [{ message: { content: "ok" } }] })
    );

    await client.askTool(params({ tools: [] }));

    expect(sentRequest(fetch).body).toEqual({
      model: "test-model",
      messages: [{ role: "user", content: "hi" }],
    });
  });

  it("returns content and tool calls from the response", async () => {
    const { client } = setup(async () =>
      jsonResponse({
        choices: [
          {
            message: {
              content: null,
              tool_calls: [
                {
                  id: "call-1",
                  type: "function",
                  function: {
                    name: "terminate",
                    arguments: '{"status":"success"}',
                  },
                },
              ],
            },
          },
        ],
      })
    );

    expect(await client.askTool(params())).toEqual({
      content: null,
      toolCalls: [
        { id: "call-1", name: "terminate", arguments: '{"status":"success"}' },
      ],
    });
  });

  it("rejects an empty choice list as an invalid response", async () => {
    const { client } = setup(async () => jsonResponse({ choices: [] }));

    await expect(client.askTool(params())).rejects.toMatchObject({
      name: "LlmError",
      kind: "invalid_response",
    });
  });

  it("classifies HTTP errors from the status code", async () => {
    const { client } = setup(async () =>
      jsonResponse({ error: "slow down" }, 429, "Too Many Requests")
    );

    const error = await client.askTool(params()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LlmError);
    expect(error).toMatchObject({
      message: "Model API error: 429 Too Many Requests",
      kind: "rate_limited",
      status: 429,
    });
  });

  it("reports a caller abort as kind aborted", async () => {
    const { client } = setup(async (_url, init) => {
      if (init.signal?.aborted) {
        throw Object.assign(new Error("This operation was aborted"), {
          name: "AbortError",
        });
      }
      return jsonResponse({ choices: [{ message: { content: "late" } }] });
    });
    const controller = new AbortController();
    controller.abort();

    await expect(
      client.askTool(params({ signal: controller.signal }))
    ).rejects.toMatchObject({ kind: "aborted", message: "Model request aborted" });
  });

  it("wraps network failures", async () => {
    const { client } = setup(async () => {
      throw new Error("connection refused");
    });

    await expect(client.askTool(params())).rejects.toMatchObject({
      kind: "unknown",
      message: "Model network error: connection refused",
    });
  });
});

describe("OpenAiCompatibleModelClient (streaming)", () => {
  it("forwards deltas and accumulates tool-call fragments by index", async () => {
    const { client, fetch } = setup(async () =>
      sseResponse([
        JSON.stringify({ choices: [{ delta: { content: "Hel" } }] }),
        JSON.stringify({ choices: [{ delta: { content: "lo" } }] }),
        JSON.stringify({
          choices: [
            {
              delta: {
                tool_calls: [
                  { index: 0, id: "c1", function: { name: "speak_in_person" } },
                ],
              },
            },
          ],
        }),
        JSON.stringify({
          choices: [
            {
              delta: {
                tool_calls: [{ index: 0, function: { arguments: '{"content":' } }],
              },
            },
          ],
        }),
        JSON.stringify({
          choices: [
            { delta: { tool_calls: [{ index: 0, function: { arguments: '"hi"}' } }] } },
          ],
        }),
        "[DONE]",
      ])
    );
    const deltas: ModelDelta[] = [];

    const decision = await client.askTool(
      params({ onDelta: (delta) => deltas.push(delta) })
    );

    expect(deltas).toEqual([
      { type: "text", text: "Hel" },
      { type: "text", text: "lo" },
      { type: "tool_call_delta", index: 0, id: "c1", name: "speak_in_person" },
      { type: "tool_call_delta", index: 0, argumentsDelta: '{"content":' },
      { type: "tool_call_delta", index: 0, argumentsDelta: '"hi"}' },
    ]);
    expect(decision).toEqual({
      content: "Hello",
      toolCalls: [
        { id: "c1", name: "speak_in_person", arguments: '{"content":"hi"}' },
      ],
    });
    expect(sentRequest(fetch).body).toMatchObject({ stream: true });
  });

  it("orders parallel tool calls by index", async () => {
    const { client } = setup(async () =>
      sseResponse([
        JSON.stringify({
          choices: [
            {
              delta: {
                tool_calls: [
                  { index: 1, id: "b", function: { name: "terminate", arguments: "{}" } },
                  { index: 0, id: "a", function: { name: "reflection", arguments: "{}" } },
                ],
              },
            },
          ],
        }),
        "[DONE]",
      ])
    );

    const decision = await client.askTool(params({ onDelta: () => {} }));

    expect(decision.toolCalls.map((call) => call.id)).toEqual(["a", "b"]);
  });

  it("treats stream end without [DONE] as completion", async () => {
    const { client } = setup(async () =>
      sseResponse([JSON.stringify({ choices: [{ delta: { content: "partial" } }] })])
    );

    expect(await client.askTool(params({ onDelta: () => {} }))).toEqual({
      content: "partial",
      toolCalls: [],
    });
  });

  it("skips malformed events", async () => {
    const { client } = setup(async () =>
      sseResponse([
        "{not json",
        JSON.stringify({ choices: [{ delta: { content: "fine" } }] }),
        "[DONE]",
      ])
    );

    expect(await client.askTool(params({ onDelta: () => {} }))).toEqual({
      content: "fine",
      toolCalls: [],
    });
  });

  it("turns a provider error event into an LlmError", async () => {
    const { client } = setup(async () =>
      sseResponse([
        JSON.stringify({ choices: [{ delta: { content: "A" } }] }),
        JSON.stringify({ error: { message: "overloaded", code: 503 } }),
      ])
    );
    const deltas: ModelDelta[] = [];

    await expect(
      client.askTool(params({ onDelta: (delta) => deltas.push(delta) }))
    ).rejects.toMatchObject({
      message: "Model stream error: overloaded",
      kind: "provider_5xx",
      status: 503,
    });
    expect(deltas).toEqual([{ type: "text", text: "A" }]);
  });

  it("returns null content when only tool calls streamed", async () => {
    const { client } = setup(async () =>
      sseResponse([
        JSON.stringify({
          choices: [
            {
              delta: {
                tool_calls: [
                  { index: 0, function: { name: "terminate", arguments: "{}" } },
                ],
              },
            },
          ],
        }),
        "[DONE]",
      ])
    );

    expect(await client.askTool(params({ onDelta: () => {} }))).toEqual({
      content: null,
      toolCalls: [{ id: "call_0", name: "terminate", arguments: "{}" }],
    });
  });
});
