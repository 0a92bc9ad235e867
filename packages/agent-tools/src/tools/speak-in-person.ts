// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-tools/tools/speak-in-person`
 * Purpose: Say something to a user who is physically present.
 * Scope: Echoes the utterance; the presenter types it out and files it under SPEAK_IN_PERSON.
 * Invariants: content is returned unchanged
 * Side-effects: none
 * Links: tools/send-telegram-message.ts
 * @public
 */

import { TOOL_NAMES } from "@stepwise/agent-core";
import { z } from "zod";

import type { BoundTool, ToolContract, ToolImplementation } from "../types";

export const SpeakInPersonInputSchema = z.object({
  content: z.string().describe("What to say out loud."),
});
export type SpeakInPersonInput = z.infer<typeof SpeakInPersonInputSchema>;

export const SPEAK_IN_PERSON_NAME = TOOL_NAMES.speakInPerson;

export const speakInPersonContract: ToolContract<
  typeof SPEAK_IN_PERSON_NAME,
  SpeakInPersonInput
> = {
  name: SPEAK_IN_PERSON_NAME,
  description: "Speak to the user in person, as in a face-to-face conversation.",
  inputSchema: SpeakInPersonInputSchema,
};

export const speakInPersonImplementation: ToolImplementation<SpeakInPersonInput> =
  {
    execute: async ({ content }) => content,
  };

export const speakInPersonBoundTool: BoundTool<
  typeof SPEAK_IN_PERSON_NAME,
  SpeakInPersonInput
> = {
  contract: speakInPersonContract,
  implementation: speakInPersonImplementation,
};
