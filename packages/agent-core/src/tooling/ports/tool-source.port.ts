// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/tooling/ports/tool-source.port`
 * Purpose: Port interface for the tool registry.
 * Scope: Lookup by name and schema listing. Does NOT import Zod or execute tools.
 * Invariants:
 *   - TOOL_SOURCE_RETURNS_BOUND_TOOL: getBoundTool returns an executable BoundToolRuntime
 *   - SINGLE_EXECUTION_PATH: All tool execution flows through the tool executor
 * Side-effects: none (types only)
 * Links: sources/static.source.ts, tool-executor.ts
 * @public
 */

import type { BoundToolRuntime, ToolSpec } from "../types";

/**
 * Tool registry port.
 *
 * Per TOOL_SOURCE_RETURNS_BOUND_TOOL: the returned BoundToolRuntime owns
 * validation and execution. The executor orchestrates but never imports Zod.
 */
export interface ToolSourcePort {
  /**
   * @returns the tool, or undefined when the name is not registered
   */
  getBoundTool(toolId: string): BoundToolRuntime | undefined;

  /**
   * Specs sent to the model, in registration order.
   */
  listToolSpecs(): readonly ToolSpec[];

  hasToolId(toolId: string): boolean;
}
