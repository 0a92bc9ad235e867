// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/transcript/transcript`
 * Purpose: Append-only transcript port and an in-memory implementation.
 * Scope: The only write path the engine uses for conversation state. Does NOT persist, compact or query by time.
 * Invariants:
 *   - APPEND_ONLY: No edits, no deletes through this port
 *   - LIST_IS_SNAPSHOT: list() returns a read-only view; later appends do not change a returned array
 * Side-effects: none (in-memory implementation)
 * Links: agent/thinker.ts, presentation/presenters.ts
 * @public
 */

import type { Message } from "./message";

/**
 * Transcript port. Memory layers implement this to mirror appends into storage.
 */
export interface Transcript {
  append(message: Message): void;
  list(): readonly Message[];
}

class InMemoryTranscript implements Transcript {
  private readonly messages: Message[] = [];

  append(message: Message): void {
    this.messages.push(message);
  }

  list(): readonly Message[] {
    return this.messages.slice();
  }
}

export function createInMemoryTranscript(
  initial: readonly Message[] = []
): Transcript {
  const transcript = new InMemoryTranscript();
  for (const message of initial) transcript.append(message);
  return transcript;
}
