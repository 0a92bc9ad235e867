// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-tools/catalog`
 * Purpose: Canonical registry of the built-in tools, plus subset selection for agent presets.
 * Scope: Exports TOOL_CATALOG, createToolCatalog, createDefaultToolCatalog, selectTools.
 * Invariants:
 *   - TOOL_CATALOG_IS_CANONICAL: Single source of truth for built-in tools
 *   - TOOL_ID_STABILITY: Duplicate IDs throw at construction time
 *   - SELECTION_ORDER_STABLE: selectTools() keeps the order of the requested names
 * Side-effects: none
 * Links: runtime-adapter.ts, @stepwise/agent-core tooling/sources/static.source.ts
 * @public
 */

import {
  type BoundToolRuntime,
  createStaticToolSource,
  type StaticToolSource,
} from "@stepwise/agent-core";

import { type ClockCapability, systemClock } from "./capabilities/clock";
import { toBoundToolRuntime } from "./runtime-adapter";
import {
  createGetCurrentTimeImplementation,
  getCurrentTimeContract,
} from "./tools/get-current-time";
import { reflectionBoundTool } from "./tools/reflection";
import { sendTelegramMessageBoundTool } from "./tools/send-telegram-message";
import { speakInPersonBoundTool } from "./tools/speak-in-person";
import { strategyBoundTool } from "./tools/strategy";
import { terminateBoundTool } from "./tools/terminate";

/**
 * Tool catalog type.
 * Maps tool ID → executable runtime.
 */
export type ToolCatalog = Readonly<Record<string, BoundToolRuntime>>;

/**
 * @throws Error if duplicate tool IDs are detected
 *
 * @example
 * ```typescript
 * const catalog = createToolCatalog([
 *   toBoundToolRuntime(terminateBoundTool),
 *   toBoundToolRuntime(reflectionBoundTool),
 * ]);
 * ```
 */
export function createToolCatalog(
  tools: readonly BoundToolRuntime[]
): ToolCatalog {
  const catalog: Record<string, BoundToolRuntime> = {};

  for (const tool of tools) {
    // TOOL_ID_STABILITY: Throw on duplicate, never silently overwrite
    if (Object.hasOwn(catalog, tool.id)) {
      throw new Error(
        `TOOL_ID_STABILITY violation: Duplicate tool ID "${tool.id}" in catalog. ` +
          "Tool IDs must be unique. Check for duplicate registrations."
      );
    }
    catalog[tool.id] = tool;
  }

  return Object.freeze(catalog);
}

export interface DefaultToolCatalogDeps {
  readonly clock?: ClockCapability;
}

/**
 * Catalog of every built-in tool. Pass a clock to pin get_current_time.
 */
export function createDefaultToolCatalog(
  deps: DefaultToolCatalogDeps = {}
): ToolCatalog {
  return createToolCatalog([
    toBoundToolRuntime(terminateBoundTool),
    toBoundToolRuntime(strategyBoundTool),
    toBoundToolRuntime(speakInPersonBoundTool),
    toBoundToolRuntime(sendTelegramMessageBoundTool),
    toBoundToolRuntime(reflectionBoundTool),
    toBoundToolRuntime({
      contract: getCurrentTimeContract,
      implementation: createGetCurrentTimeImplementation({
        clock: deps.clock ?? systemClock,
      }),
    }),
  ]);
}

export const TOOL_CATALOG: ToolCatalog = createDefaultToolCatalog();

export function getToolIds(): readonly string[] {
  return Object.keys(TOOL_CATALOG);
}

export function getToolById(toolId: string): BoundToolRuntime | undefined {
  return Object.hasOwn(TOOL_CATALOG, toolId) ? TOOL_CATALOG[toolId] : undefined;
}

export function hasToolId(toolId: string): boolean {
  return Object.hasOwn(TOOL_CATALOG, toolId);
}

/**
 * Build a tool source holding the named tools, in the given order.
 *
 * @throws Error on a name the catalog does not hold
 */
export function selectTools(
  toolIds: readonly string[],
  catalog: ToolCatalog = TOOL_CATALOG
): StaticToolSource {
  const tools = toolIds.map((toolId) => {
    const tool = Object.hasOwn(catalog, toolId) ? catalog[toolId] : undefined;
    if (!tool) {
      throw new Error(`Unknown tool "${toolId}": not in catalog.`);
    }
    return tool;
  });
  return createStaticToolSource(tools);
}
