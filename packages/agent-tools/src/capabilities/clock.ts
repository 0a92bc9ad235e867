// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-tools/capabilities/clock`
 * Purpose: Clock capability for time-dependent tools.
 * Scope: Interface plus system and fixed implementations.
 * Invariants:
 *   - Tools read time only through ClockCapability
 * Side-effects: time (systemClock)
 * Links: tools/get-current-time.ts
 * @public
 */

export interface ClockCapability {
  /** Current timestamp in milliseconds */
  now(): number;
  /** Current date/time as ISO string */
  nowIso(): string;
}

export const systemClock: ClockCapability = {
  now: () => Date.now(),
  nowIso: () => new Date().toISOString(),
};

/**
 * Clock frozen at one instant; for tests and replays.
 */
export function createFixedClock(fixedTime: number): ClockCapability {
  const date = new Date(fixedTime);
  return {
    now: () => fixedTime,
    nowIso: () => date.toISOString(),
  };
}
