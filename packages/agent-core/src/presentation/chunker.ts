// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/presentation/chunker`
 * Purpose: Fixed-size text chunking for streaming internal tool output.
 * Scope: Pure function. Does not emit events.
 * Invariants:
 *   - NO_EMPTY_CHUNKS: null or "" yields zero chunks; every chunk is non-empty
 *   - LOSSLESS: chunks joined equal the input
 * Side-effects: none
 * Links: presenters.ts
 * @public
 */

/**
 * Split text into consecutive slices of `size` UTF-16 code units; the last may be shorter.
 *
 * @throws RangeError when size is not a positive integer
 */
export function chunkText(
  text: string | null | undefined,
  size: number
): string[] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }
  if (!text) return [];

  const chunks: string[] = [];
  for (let start = 0; start < text.length; start += size) {
    chunks.push(text.slice(start, start + size));
  }
  return chunks;
}
