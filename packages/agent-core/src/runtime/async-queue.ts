// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/runtime/async-queue`
 * Purpose: Single-consumer async queue used as the hand-off channel between producer tasks and streaming consumers.
 * Scope: Carries model deltas to the Thinker and run events to runAgent() callers. Does not buffer across runs.
 * Invariants:
 *   - push() is synchronous (NO_AWAIT_IN_TOKEN_PATH)
 *   - close() is the end-of-stream sentinel; it is delivered once, and pushes after it are dropped
 *   - Items are delivered in push order
 * Side-effects: none
 * Links: agent/thinker.ts, agent/run-agent.ts
 * @public
 */

/**
 * Async queue for streaming.
 *
 * Usage:
 * ```typescript
 * const queue = new AsyncQueue<ModelDelta>();
 *
 * // Producer
 * queue.push({ type: "text", text: "hello" });
 * queue.close();
 *
 * // Consumer
 * for await (const delta of queue) {
 *   render(delta);
 * }
 * ```
 */
export class AsyncQueue<T> implements AsyncIterable<T>, AsyncIterator<T> {
  private items: T[] = [];
  private closed = false;
  private resolveWaiter: ((value: IteratorResult<T>) => void) | null = null;

  /**
   * Push an item. Ignored after close().
   */
  push(item: T): void {
    if (this.closed) {
      return;
    }

    if (this.resolveWaiter) {
      const resolve = this.resolveWaiter;
      this.resolveWaiter = null;
      resolve({ value: item, done: false });
    } else {
      this.items.push(item);
    }
  }

  /**
   * Close the queue, signaling end of stream. Later calls are no-ops.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    if (this.resolveWaiter) {
      const resolve = this.resolveWaiter;
      this.resolveWaiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Items pushed but not yet consumed */
  get size(): number {
    return this.items.length;
  }

  async next(): Promise<IteratorResult<T>> {
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1);
      return { value, done: false };
    }

    if (this.closed) {
      return { value: undefined, done: true };
    }

    return new Promise((resolve) => {
      this.resolveWaiter = resolve;
    });
  }

  /**
   * Consumer stopped early (break / throw inside for-await).
   */
  async return(): Promise<IteratorResult<T>> {
    this.items = [];
    this.close();
    return { value: undefined, done: true };
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this;
  }
}

/**
 * Run `producer` with a queue and close the queue when the producer settles,
 * whether it resolves or throws. The producer's outcome is returned unchanged.
 */
export async function withQueueRelease<T, R>(
  queue: AsyncQueue<T>,
  producer: (queue: AsyncQueue<T>) => Promise<R>
): Promise<R> {
  try {
    return await producer(queue);
  } finally {
    queue.close();
  }
}
