// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/transcript/categories`
 * Purpose: Semantic message categories, display types, and the mappings between tools, input modes and categories.
 * Scope: Two independent taxonomies: MessageCategory (what a message is) and MessageDisplayType (how a UI shows it). Does NOT format messages.
 * Invariants:
 *   - CATEGORY_NOT_DISPLAY: Category and display type evolve independently; neither mirrors the other
 *   - UNMAPPED_TOOL_IS_TOOL: Tools absent from TOOL_CATEGORY_MAP classify as TOOL
 * Side-effects: none
 * Links: presentation/presenters.ts, presentation/pacing.ts
 * @public
 */

/**
 * Semantic classification stored on transcript messages.
 * Numeric values are persisted by memory layers; do not renumber.
 */
export enum MessageCategory {
  NORMAL = 0,
  TELEGRAM = 1,
  SPEAK_IN_PERSON = 2,
  THOUGHT = 3,
  TOOL = 4,
  SYSTEM_INSTRUCTION = 5,
}

/**
 * Built-in tool names known to the engine's mappings.
 */
export const TOOL_NAMES = {
  terminate: "terminate",
  strategy: "strategy",
  speakInPerson: "speak_in_person",
  sendTelegramMessage: "send_telegram_message",
  reflection: "reflection",
  getCurrentTime: "get_current_time",
} as const;

export type BuiltinToolName = (typeof TOOL_NAMES)[keyof typeof TOOL_NAMES];

/**
 * Presentation hints carried on events as `messageType`.
 */
export const MESSAGE_DISPLAY_TYPES = [
  "terminate",
  "strategy",
  "speak_in_person",
  "send_telegram_message",
  "get_current_time",
  "inner_thought",
  "system_instruction",
] as const;

export type MessageDisplayType = (typeof MESSAGE_DISPLAY_TYPES)[number];

export const INPUT_MODES = [
  "phone",
  "in_person",
  "inner_voice",
  "command",
] as const;

export type InputMode = (typeof INPUT_MODES)[number];

/** Communication-channel tools and the category their output carries */
export const TOOL_CATEGORY_MAP: ReadonlyMap<string, MessageCategory> = new Map([
  [TOOL_NAMES.sendTelegramMessage, MessageCategory.TELEGRAM],
  [TOOL_NAMES.speakInPerson, MessageCategory.SPEAK_IN_PERSON],
]);

const INPUT_MODE_CATEGORY_MAP: Readonly<Record<InputMode, MessageCategory>> = {
  phone: MessageCategory.TELEGRAM,
  in_person: MessageCategory.SPEAK_IN_PERSON,
  inner_voice: MessageCategory.THOUGHT,
  command: MessageCategory.SYSTEM_INSTRUCTION,
};

export const CATEGORY_INDICATORS: Readonly<Record<MessageCategory, string>> = {
  [MessageCategory.NORMAL]: "normal",
  [MessageCategory.TELEGRAM]: "telegram",
  [MessageCategory.SPEAK_IN_PERSON]: "speakinperson",
  [MessageCategory.THOUGHT]: "thought",
  [MessageCategory.TOOL]: "tool",
  [MessageCategory.SYSTEM_INSTRUCTION]: "system_instruction",
};

/** Tools whose output is private reasoning rather than speech. */
const INNER_THOUGHT_TOOLS: ReadonlySet<string> = new Set([
  TOOL_NAMES.reflection,
  TOOL_NAMES.strategy,
]);

export function isInputMode(value: unknown): value is InputMode {
  return (
    typeof value === "string" &&
    INPUT_MODES.some((mode) => mode === value)
  );
}

export function categoryForTool(toolName: string): MessageCategory {
  return TOOL_CATEGORY_MAP.get(toolName) ?? MessageCategory.TOOL;
}

/**
 * Map a user input mode to a category.
 * Returns undefined for unknown modes; callers decide the fallback.
 */
export function categoryForInputMode(
  mode: string | undefined
): MessageCategory | undefined {
  if (mode === undefined) return INPUT_MODE_CATEGORY_MAP.phone;
  return isInputMode(mode) ? INPUT_MODE_CATEGORY_MAP[mode] : undefined;
}

/**
 * Display type for a tool result. Reflection and strategy render as inner thought.
 */
export function displayTypeForTool(toolName: string): string {
  return INNER_THOUGHT_TOOLS.has(toolName) ? "inner_thought" : toolName;
}
