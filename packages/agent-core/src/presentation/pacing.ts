// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/presentation/pacing`
 * Purpose: Presentation-only pacing transforms for communication-channel tool output (typewriter, line-by-line).
 * Scope: Splits text and sleeps between pieces. Does not emit events or touch the transcript.
 * Invariants:
 *   - PACING_LOSSLESS: Concatenated pieces equal the normalized input text
 *   - NO_TRAILING_DELAY: No sleep after the last piece
 *   - LINE_DELAY_CLAMPED: Line delays stay within [lineMinDelayMs, lineMaxDelayMs]
 *   - DISABLED_IS_PASSTHROUGH: enabled=false yields the whole text once
 * Side-effects: time (sleep), randomness (line jitter); both injectable
 * Links: presenters.ts
 * @public
 */

import { setTimeout as sleepMs } from "node:timers/promises";
import { z } from "zod";

import { MessageCategory } from "../transcript/categories";

export const PacingConfigSchema = z.object({
  enabled: z.boolean().default(true),
  typewriterCharDelayMs: z.number().nonnegative().default(30),
  lineBaseDelayMs: z.number().nonnegative().default(500),
  lineCharDelayMs: z.number().nonnegative().default(100),
  lineMinDelayMs: z.number().nonnegative().default(500),
  lineMaxDelayMs: z.number().nonnegative().default(6000),
  lineRandomMinMs: z.number().nonnegative().default(100),
  lineRandomMaxMs: z.number().nonnegative().default(2000),
});

export type PacingConfig = z.infer<typeof PacingConfigSchema>;

export type PacingConfigInput = z.input<typeof PacingConfigSchema>;

export interface PacingRuntime {
  sleep(ms: number): Promise<void>;
  /** Uniform in [0, 1) */
  random(): number;
}

const defaultRuntime: PacingRuntime = {
  sleep: async (ms) => {
    await sleepMs(ms);
  },
  random: Math.random,
};

/**
 * Turn escaped and platform line breaks into "\n".
 */
export function normalizeLineBreaks(text: string): string {
  return text
    .replace(/\r\n/g, "\n")
    .replace(/\r/g, "\n")
    .replace(/\\n/g, "\n");
}

export function createPacer(
  config?: PacingConfigInput,
  runtime: PacingRuntime = defaultRuntime
) {
  const cfg = PacingConfigSchema.parse(config ?? {});

  function lineDelay(line: string): number {
    const jitter =
      cfg.lineRandomMinMs +
      runtime.random() * (cfg.lineRandomMaxMs - cfg.lineRandomMinMs);
    const raw =
      cfg.lineBaseDelayMs + line.length * cfg.lineCharDelayMs + jitter;
    return Math.max(cfg.lineMinDelayMs, Math.min(raw, cfg.lineMaxDelayMs));
  }

  /**
   * One character at a time.
   */
  async function* typewriter(text: string): AsyncGenerator<string> {
    if (!text) return;
    if (!cfg.enabled) {
      yield text;
      return;
    }
    const chars = Array.from(text);
    for (const [i, char] of chars.entries()) {
      yield char;
      if (i < chars.length - 1 && cfg.typewriterCharDelayMs > 0) {
        await runtime.sleep(cfg.typewriterCharDelayMs);
      }
    }
  }

  /**
   * One line at a time, each carrying its newline; delay grows with line length.
   */
  async function* lineByLine(text: string): AsyncGenerator<string> {
    const normalized = normalizeLineBreaks(text ?? "");
    if (!normalized) return;
    if (!cfg.enabled) {
      yield normalized;
      return;
    }

    const endsWithNewline = normalized.endsWith("\n");
    const lines = normalized.split("\n");
    if (endsWithNewline) lines.pop();

    for (const [i, line] of lines.entries()) {
      const isLast = i === lines.length - 1;
      yield isLast && !endsWithNewline ? line : `${line}\n`;
      if (!isLast) {
        const delay = lineDelay(line);
        if (delay > 0) await runtime.sleep(delay);
      }
    }
  }

  /**
   * Pick the transform for a category: typewriter for in-person speech,
   * line-by-line for telegram, the whole text otherwise.
   */
  async function* byCategory(
    text: string,
    category: MessageCategory
  ): AsyncGenerator<string> {
    if (category === MessageCategory.SPEAK_IN_PERSON) {
      yield* typewriter(text);
    } else if (category === MessageCategory.TELEGRAM) {
      yield* lineByLine(text);
    } else if (text) {
      yield text;
    }
  }

  return { typewriter, lineByLine, byCategory, lineDelay, config: cfg };
}

export type Pacer = ReturnType<typeof createPacer>;
