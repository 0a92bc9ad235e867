// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/tooling/sources/static.source`
 * Purpose: Static tool registry wrapping a pre-built tool map.
 * Scope: Implements ToolSourcePort for a fixed tool set. Does NOT import Zod or modify tools.
 * Invariants:
 *   - TOOL_ID_STABILITY: Duplicate names throw at construction; no mutations afterwards
 *   - SPEC_ORDER_STABLE: listToolSpecs() follows registration order
 * Side-effects: none
 * Links: ports/tool-source.port.ts
 * @public
 */

import type { ToolSourcePort } from "../ports/tool-source.port";
import type { BoundToolRuntime, ToolSpec } from "../types";

export class StaticToolSource implements ToolSourcePort {
  private readonly toolMap: ReadonlyMap<string, BoundToolRuntime>;
  private readonly specs: readonly ToolSpec[];

  constructor(tools: ReadonlyMap<string, BoundToolRuntime>) {
    this.toolMap = tools;
    this.specs = Array.from(tools.values()).map((t) => t.spec);
  }

  getBoundTool(toolId: string): BoundToolRuntime | undefined {
    return this.toolMap.get(toolId);
  }

  listToolSpecs(): readonly ToolSpec[] {
    return this.specs;
  }

  hasToolId(toolId: string): boolean {
    return this.toolMap.has(toolId);
  }

  get size(): number {
    return this.toolMap.size;
  }

  getToolIds(): readonly string[] {
    return Array.from(this.toolMap.keys());
  }
}

/**
 * @throws if duplicate tool names are detected (per TOOL_ID_STABILITY)
 */
export function createStaticToolSource(
  tools: readonly BoundToolRuntime[]
): StaticToolSource {
  const map = new Map<string, BoundToolRuntime>();
  for (const tool of tools) {
    if (map.has(tool.id)) {
      throw new Error(
        `TOOL_ID_STABILITY violation: Duplicate tool ID "${tool.id}". ` +
          "Tool IDs must be unique within a source."
      );
    }
    map.set(tool.id, tool);
  }
  return new StaticToolSource(map);
}
