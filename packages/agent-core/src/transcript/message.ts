// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/transcript/message`
 * Purpose: Immutable transcript message model and factories.
 * Scope: Message, ToolInvocationRequest and their constructors. Does NOT store or format messages.
 * Invariants:
 *   - MESSAGES_FROZEN: Factories return frozen objects; nothing mutates a message after creation
 *   - TOOL_CALLS_ONLY_ON_ASSISTANT: toolCalls present only on assistant messages
 *   - TOOL_CALL_ID_ONLY_ON_TOOL: toolCallId present only on tool-result messages
 * Side-effects: none
 * Links: transcript/transcript.ts
 * @public
 */

import { MessageCategory } from "./categories";

export type MessageRole = "system" | "user" | "assistant" | "tool";

/**
 * A model's request to run a named tool.
 * `arguments` is the raw JSON payload as produced by the model.
 */
export interface ToolInvocationRequest {
  readonly id: string;
  readonly name: string;
  readonly arguments: string;
}

export interface Message {
  readonly role: MessageRole;
  readonly content: string | null;
  readonly toolCalls?: readonly ToolInvocationRequest[];
  readonly toolCallId?: string;
  readonly toolName?: string;
  /** ISO-8601 */
  readonly createdAt: string;
  readonly category: MessageCategory;
  readonly speaker?: string;
  /** Character ids allowed to see this message; empty means everyone */
  readonly visibleFor: readonly string[];
}

/**
 * Options shared by all factories.
 */
export interface MessageOptions {
  readonly createdAt?: Date | string;
  readonly category?: MessageCategory;
  readonly speaker?: string;
  readonly visibleFor?: readonly string[];
}

function stamp(createdAt: Date | string | undefined): string {
  if (createdAt === undefined) return new Date().toISOString();
  return typeof createdAt === "string" ? createdAt : createdAt.toISOString();
}

function build(
  role: MessageRole,
  content: string | null,
  opts: MessageOptions | undefined,
  extra?: Pick<Message, "toolCalls" | "toolCallId" | "toolName">
): Message {
  const message: Message = {
    role,
    content,
    createdAt: stamp(opts?.createdAt),
    category: opts?.category ?? MessageCategory.NORMAL,
    visibleFor: Object.freeze([...(opts?.visibleFor ?? [])]),
    ...(opts?.speaker !== undefined && { speaker: opts.speaker }),
    ...extra,
  };
  return Object.freeze(message);
}

export function systemMessage(content: string, opts?: MessageOptions): Message {
  return build("system", content, opts);
}

export function userMessage(content: string, opts?: MessageOptions): Message {
  return build("user", content, opts);
}

export function assistantMessage(
  content: string | null,
  opts?: MessageOptions
): Message {
  return build("assistant", content, opts);
}

/**
 * Assistant message that carries tool invocation requests.
 */
export function assistantToolCallMessage(
  content: string | null,
  toolCalls: readonly ToolInvocationRequest[],
  opts?: MessageOptions
): Message {
  const frozenCalls = Object.freeze(
    toolCalls.map((call) => Object.freeze({ ...call }))
  );
  return build("assistant", content, opts, { toolCalls: frozenCalls });
}

export function toolMessage(
  content: string,
  toolCall: { readonly id: string; readonly name: string },
  opts?: MessageOptions
): Message {
  return build("tool", content, opts, {
    toolCallId: toolCall.id,
    toolName: toolCall.name,
  });
}
