// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-tools/tools/send-telegram-message`
 * Purpose: Send a text message to a user who is away.
 * Scope: Echoes the message. Delivery belongs to whoever consumes the event stream.
 * Side-effects: none
 * @public
 */

import { TOOL_NAMES } from "@stepwise/agent-core";
import { z } from "zod";

import type { BoundTool, ToolContract, ToolImplementation } from "../types";

export const SendTelegramMessageInputSchema = z.object({
  content: z
    .string()
    .describe("Message text. Separate messages with line breaks."),
});
export type SendTelegramMessageInput = z.infer<
  typeof SendTelegramMessageInputSchema
>;

export const SEND_TELEGRAM_MESSAGE_NAME = TOOL_NAMES.sendTelegramMessage;

export const sendTelegramMessageContract: ToolContract<
  typeof SEND_TELEGRAM_MESSAGE_NAME,
  SendTelegramMessageInput
> = {
  name: SEND_TELEGRAM_MESSAGE_NAME,
  description: "Send the user a Telegram message when they are not present.",
  inputSchema: SendTelegramMessageInputSchema,
};

export const sendTelegramMessageImplementation: ToolImplementation<SendTelegramMessageInput> =
  {
    execute: async ({ content }) => content,
  };

export const sendTelegramMessageBoundTool: BoundTool<
  typeof SEND_TELEGRAM_MESSAGE_NAME,
  SendTelegramMessageInput
> = {
  contract: sendTelegramMessageContract,
  implementation: sendTelegramMessageImplementation,
};
