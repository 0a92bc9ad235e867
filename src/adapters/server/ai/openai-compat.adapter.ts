// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ai/openai-compat`
 * Purpose: ModelClient over any OpenAI-compatible chat completions endpoint, with tool calling and SSE streaming.
 * Scope: Request mapping, HTTP, SSE parsing, tool-call delta accumulation, error classification. Does not retry.
 * Invariants:
 *   - Never logs prompts, keys or content; bounded metadata only
 *   - Streams only when onDelta is given; deltas are forwarded before askTool() settles
 *   - Tool-call fragments accumulate by index; final calls are ordered by index
 *   - Stream end without '[DONE]' counts as completion
 *   - Caller abort rejects with LlmError(kind='aborted'); HTTP errors reject with LlmError classified from status
 * Side-effects: IO (HTTP calls to the model provider)
 * Notes: SSE via eventsource-parser. Response bodies are validated with Zod at the boundary.
 * Links: @stepwise/agent-core model/model-client.port.ts
 * @internal
 */

import {
  type AskToolParams,
  classifyLlmErrorFromStatus,
  LlmError,
  type LoggerLike,
  type Message,
  type ModelClient,
  type ModelDecision,
  makeSilentLogger,
  type ToolInvocationRequest,
  type ToolSpec,
} from "@stepwise/agent-core";
import {
  createParser,
  type EventSourceMessage,
  type EventSourceParser,
} from "eventsource-parser";
import { z } from "zod";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface OpenAiCompatibleConfig {
  /** e.g. https://api.openai.com/v1 (no trailing /chat/completions) */
  readonly baseUrl: string;
  readonly apiKey?: string;
  readonly model: string;
  /** Whole-request timeout for non-streaming calls; connect timeout for streams */
  readonly timeoutMs?: number;
  readonly temperature?: number;
  readonly fetch?: FetchLike;
  readonly logger?: LoggerLike;
}

const DEFAULT_TIMEOUT_MS = 60_000;

// ─────────────────────────────────────────────────────────────────────────────
// Wire schemas
// ─────────────────────────────────────────────────────────────────────────────

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({
                  name: z.string(),
                  arguments: z.string().default(""),
                }),
              })
            )
            .optional(),
        }),
      })
    )
    .min(1),
});

const StreamChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z
          .object({
            content: z.string().nullable().optional(),
            tool_calls: z
              .array(
                z.object({
                  index: z.number().int().nonnegative(),
                  id: z.string().optional(),
                  function: z
                    .object({
                      name: z.string().optional(),
                      arguments: z.string().optional(),
                    })
                    .optional(),
                })
              )
              .optional(),
          })
          .optional(),
      })
    )
    .default([]),
  error: z
    .union([
      z.string(),
      z.object({
        message: z.string().optional(),
        code: z.union([z.number(), z.string()]).optional(),
      }),
    ])
    .optional(),
});

type StreamChunk = z.infer<typeof StreamChunkSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Request mapping
// ─────────────────────────────────────────────────────────────────────────────

type WireMessage =
  | { role: "system" | "user"; content: string }
  | {
      role: "assistant";
      content: string | null;
      tool_calls?: {
        id: string;
        type: "function";
        function: { name: string; arguments: string };
      }[];
    }
  | { role: "tool"; content: string; tool_call_id: string };

export function toWireMessage(message: Message): WireMessage {
  switch (message.role) {
    case "system":
    case "user":
      return { role: message.role, content: message.content ?? "" };
    case "tool":
      return {
        role: "tool",
        content: message.content ?? "",
        tool_call_id: message.toolCallId ?? "",
      };
    case "assistant": {
      const calls = message.toolCalls ?? [];
      if (calls.length === 0) {
        return { role: "assistant", content: message.content ?? "" };
      }
      return {
        role: "assistant",
        content: message.content || null,
        tool_calls: calls.map((call) => ({
          id: call.id,
          type: "function",
          function: { name: call.name, arguments: call.arguments },
        })),
      };
    }
  }
}

function toWireTool(spec: ToolSpec) {
  return {
    type: "function" as const,
    function: {
      name: spec.name,
      description: spec.description,
      parameters: spec.inputSchema,
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

function toLlmError(
  error: unknown,
  callerSignal: AbortSignal | undefined,
  timeoutSignal?: AbortSignal
): LlmError {
  if (error instanceof LlmError) return error;
  if (callerSignal?.aborted) {
    return new LlmError("Model request aborted", "aborted");
  }
  if (timeoutSignal?.aborted) {
    return new LlmError("Model request timed out", "timeout", 408);
  }
  if (error instanceof Error) {
    if (error.name === "TimeoutError") {
      return new LlmError("Model request timed out", "timeout", 408);
    }
    if (error.name === "AbortError") {
      return new LlmError("Model request aborted", "aborted");
    }
    return new LlmError(`Model network error: ${error.message}`, "unknown");
  }
  return new LlmError("Model request failed: Unknown error", "unknown");
}

function streamErrorToLlmError(error: NonNullable<StreamChunk["error"]>): LlmError {
  const message =
    typeof error === "string" ? error : error.message || "Provider error";
  const status =
    typeof error === "object" && typeof error.code === "number"
      ? error.code
      : undefined;
  return new LlmError(
    `Model stream error: ${message}`,
    status !== undefined ? classifyLlmErrorFromStatus(status) : "unknown",
    status
  );
}

// ─────────────────────────────────────────────────────────────────────────────
// Tool-call accumulation
// ─────────────────────────────────────────────────────────────────────────────

interface PartialToolCall {
  id: string;
  name: string;
  arguments: string;
}

function finalizeToolCalls(
  partials: ReadonlyMap<number, PartialToolCall>
): ToolInvocationRequest[] {
  return [...partials.entries()]
    .sort(([a], [b]) => a - b)
    .filter(([, call]) => call.name.length > 0)
    .map(([index, call]) => ({
      id: call.id || `call_${index}`,
      name: call.name,
      arguments: call.arguments,
    }));
}

// ─────────────────────────────────────────────────────────────────────────────
// Client
// ─────────────────────────────────────────────────────────────────────────────

export class OpenAiCompatibleModelClient implements ModelClient {
  private readonly fetchImpl: FetchLike;
  private readonly log: LoggerLike;
  private readonly timeoutMs: number;

  constructor(private readonly config: OpenAiCompatibleConfig) {
    this.fetchImpl = config.fetch ?? ((url, init) => fetch(url, init));
    this.log = config.logger ?? makeSilentLogger();
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async askTool(params: AskToolParams): Promise<ModelDecision> {
    const stream = params.onDelta !== undefined;
    const response = await this.post(params, stream);

    const decision = stream
      ? await this.readStream(response, params)
      : await this.readCompletion(response);

    this.log.info(
      {
        model: this.config.model,
        stream,
        toolCalls: decision.toolCalls.length,
        contentLength: decision.content?.length ?? 0,
      },
      "adapter.llm.completion_result"
    );
    return decision;
  }

  private buildBody(params: AskToolParams, stream: boolean) {
    const messages = [...params.systemMessages, ...params.messages].map(
      toWireMessage
    );
    const hasTools = params.tools.length > 0;
    return {
      model: this.config.model,
      messages,
      ...(hasTools && {
        tools: params.tools.map(toWireTool),
        tool_choice: params.toolChoice,
      }),
      ...(this.config.temperature !== undefined && {
        temperature: this.config.temperature,
      }),
      ...(stream && { stream: true }),
    };
  }

  private async post(params: AskToolParams, stream: boolean): Promise<Response> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }

    // Streams get a connect timeout only; the body may legitimately take longer
    const timeoutCtl = new AbortController();
    const timer = setTimeout(() => timeoutCtl.abort(), this.timeoutMs);
    const signals = [timeoutCtl.signal];
    if (params.signal) signals.push(params.signal);
    const signal = AbortSignal.any(signals);

    try {
      const response = await this.fetchImpl(
        `${this.config.baseUrl.replace(/\/+$/, "")}/chat/completions`,
        {
          method: "POST",
          headers,
          body: JSON.stringify(this.buildBody(params, stream)),
          signal,
        }
      );

      if (!response.ok) {
        throw new LlmError(
          `Model API error: ${response.status} ${response.statusText}`,
          classifyLlmErrorFromStatus(response.status),
          response.status
        );
      }

      // Non-streaming: the timeout covers reading the body too
      return stream ? response : await this.buffer(response);
    } catch (error) {
      throw toLlmError(error, params.signal, timeoutCtl.signal);
    } finally {
      clearTimeout(timer);
    }
  }

  private async buffer(response: Response): Promise<Response> {
    const text = await response.text();
    return new Response(text, {
      status: response.status,
      statusText: response.statusText,
    });
  }

  private async readCompletion(response: Response): Promise<ModelDecision> {
    let json: unknown;
    try {
      json = await response.json();
    } catch {
      throw new LlmError("Invalid response from model provider", "invalid_response");
    }

    const parsed = CompletionSchema.safeParse(json);
    if (!parsed.success) {
      throw new LlmError("Invalid response from model provider", "invalid_response");
    }

    const [choice] = parsed.data.choices;
    const message = choice?.message;
    return {
      content: message?.content ?? null,
      toolCalls: (message?.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments,
      })),
    };
  }

  private async readStream(
    response: Response,
    params: AskToolParams
  ): Promise<ModelDecision> {
    const body = response.body;
    if (!body) {
      throw new LlmError("Model response body is empty", "invalid_response");
    }

    const reader = body.getReader();
    const decoder = new TextDecoder();
    const eventQueue: EventSourceMessage[] = [];
    const parser: EventSourceParser = createParser({
      onEvent(event: EventSourceMessage) {
        eventQueue.push(event);
      },
    });

    let text = "";
    const partials = new Map<number, PartialToolCall>();
    let done = false;
    let ended = false;

    const applyChunk = (chunk: StreamChunk): void => {
      if (chunk.error !== undefined) throw streamErrorToLlmError(chunk.error);

      const delta = chunk.choices[0]?.delta;
      if (!delta) return;

      if (delta.content) {
        text += delta.content;
        params.onDelta?.({ type: "text", text: delta.content });
      }

      for (const fragment of delta.tool_calls ?? []) {
        const partial = partials.get(fragment.index) ?? {
          id: "",
          name: "",
          arguments: "",
        };
        const name = fragment.function?.name;
        const argumentsDelta = fragment.function?.arguments;
        if (fragment.id) partial.id = fragment.id;
        if (name) partial.name += name;
        if (argumentsDelta) partial.arguments += argumentsDelta;
        partials.set(fragment.index, partial);

        params.onDelta?.({
          type: "tool_call_delta",
          index: fragment.index,
          ...(fragment.id !== undefined && { id: fragment.id }),
          ...(name !== undefined && { name }),
          ...(argumentsDelta !== undefined && { argumentsDelta }),
        });
      }
    };

    try {
      while (!done) {
        const next = await reader.read();
        if (next.done) {
          ended = true;
          break;
        }
        const value = next.value;
        parser.feed(decoder.decode(value, { stream: true }));

        while (eventQueue.length > 0 && !done) {
          const event = eventQueue.shift();
          if (!event) break;
          if (event.data === "[DONE]") {
            done = true;
            break;
          }

          let json: unknown;
          try {
            json = JSON.parse(event.data);
          } catch {
            // Transient SSE noise; keep reading
            this.log.warn(
              { dataLength: event.data.length },
              "adapter.llm.malformed_sse"
            );
            continue;
          }

          const chunk = StreamChunkSchema.safeParse(json);
          if (!chunk.success) {
            this.log.warn(
              { dataLength: event.data.length },
              "adapter.llm.unexpected_chunk"
            );
            continue;
          }
          applyChunk(chunk.data);
        }
      }
    } catch (error) {
      throw toLlmError(error, params.signal);
    } finally {
      if (!ended) {
        await reader.cancel().catch((error: unknown) => {
          this.log.debug(
            { err: error instanceof Error ? error.message : String(error) },
            "adapter.llm.cancel_failed"
          );
        });
      }
      reader.releaseLock();
    }

    return {
      content: text.length > 0 ? text : null,
      toolCalls: finalizeToolCalls(partials),
    };
  }
}
