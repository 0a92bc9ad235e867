// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/tooling/tool-executor`
 * Purpose: Run one tool invocation request and normalize its outcome into a ToolExecutionResult.
 * Scope: Argument decoding, registry lookup, validation, execution, special-tool detection. Does not emit events or touch the transcript.
 * Invariants:
 *   - EXECUTOR_NEVER_THROWS: Every failure becomes a result with `error` set
 *   - EXECUTOR_PIPELINE_ORDER: name check → lookup → decode args → validate → execute → special-tool check
 *   - ERROR_TEMPLATES_STABLE: Same malformed input → identical error text
 *   - SPECIAL_TOOL_UNCONDITIONAL: Any non-throwing run of a special tool finishes the agent, whatever the result says
 *   - SPECIAL_TOOL_CASE_INSENSITIVE: Special names match without regard to case
 * Side-effects: IO (tool handlers), logging
 * Links: ports/tool-source.port.ts, agent/actor.ts
 * @public
 */

import { errorMessageOf } from "../execution/error-codes";
import type { LoggerLike } from "../observability/logger";
import { excerpt, makeSilentLogger } from "../observability/logger";
import type { ToolInvocationRequest } from "../transcript/message";
import type { ToolSourcePort } from "./ports/tool-source.port";
import {
  errorResult,
  isMeaningfulResult,
  type ToolExecutionResult,
  toolResultText,
} from "./types";

export interface ToolExecutorConfig {
  /** Tools whose completion finishes the agent */
  readonly specialToolNames?: readonly string[];
  /** Passed to tools via ToolInvocationContext and used in logs */
  readonly agentName?: string;
  readonly logger?: LoggerLike;
}

export interface ToolExecution {
  readonly result: ToolExecutionResult;
  /** True when a special tool ran to completion */
  readonly finishesAgent: boolean;
}

function failed(result: ToolExecutionResult): ToolExecution {
  return { result, finishesAgent: false };
}

/**
 * Create a tool executor bound to a registry.
 *
 * @param source - Tool registry
 * @param config - Special tools, agent name, logger
 */
export function createToolExecutor(
  source: ToolSourcePort,
  config?: ToolExecutorConfig
) {
  const agentName = config?.agentName ?? "agent";
  const log = config?.logger ?? makeSilentLogger();
  const specialNames = new Set(
    (config?.specialToolNames ?? []).map((name) => name.toLowerCase())
  );

  function isSpecialTool(name: string): boolean {
    return specialNames.has(name.toLowerCase());
  }

  /**
   * Execute a single request. Never throws.
   */
  async function execute(request: ToolInvocationRequest): Promise<ToolExecution> {
    const name = request.name.trim();

    // 1. Well-formed request
    if (!name) {
      log.error(
        { agent: agentName, toolCallId: request.id },
        "agent.tool.invalid_command"
      );
      return failed(errorResult("Error: Invalid command format"));
    }

    // 2. Registry lookup
    const tool = source.getBoundTool(name);
    if (!tool) {
      log.error(
        { agent: agentName, tool: name, toolCallId: request.id },
        "agent.tool.unknown"
      );
      return failed(errorResult(`Error: Unknown tool '${name}'`));
    }

    // 3. Decode argument payload (blank payload means no arguments)
    const payload = request.arguments.trim() || "{}";
    let decoded: unknown;
    try {
      decoded = JSON.parse(payload);
    } catch {
      log.error(
        {
          agent: agentName,
          tool: name,
          toolCallId: request.id,
          args: excerpt(request.arguments),
        },
        "agent.tool.invalid_json"
      );
      return failed(
        errorResult(`Error parsing arguments for ${name}: Invalid JSON format`)
      );
    }

    // 4. Validate against the tool's schema
    let validated: unknown;
    try {
      validated = tool.validateInput(decoded);
    } catch (err) {
      const message = errorMessageOf(err);
      log.error(
        {
          agent: agentName,
          tool: name,
          toolCallId: request.id,
          args: excerpt(payload),
          err: message,
        },
        "agent.tool.invalid_args"
      );
      return failed(errorResult(`Invalid arguments for ${name}: ${message}`));
    }

    // 5. Execute
    let result: ToolExecutionResult;
    try {
      log.info(
        { agent: agentName, tool: name, toolCallId: request.id },
        "agent.tool.activating"
      );
      result = await tool.exec(validated, {
        toolCallId: request.id,
        agentName,
      });
    } catch (err) {
      const message = errorMessageOf(err);
      log.error(
        {
          agent: agentName,
          tool: name,
          toolCallId: request.id,
          args: excerpt(payload),
          err: message,
        },
        "agent.tool.failed"
      );
      return failed(
        errorResult(`Tool '${name}' encountered a problem: ${message}`)
      );
    }

    log.info(
      {
        agent: agentName,
        tool: name,
        toolCallId: request.id,
        hasOutput: isMeaningfulResult(result),
        output: excerpt(toolResultText(result)),
      },
      "agent.tool.observed"
    );

    // 6. Special tools finish the agent
    const finishesAgent = isSpecialTool(name);
    if (finishesAgent) {
      log.info({ agent: agentName, tool: name }, "agent.tool.special_completed");
    }

    return { result, finishesAgent };
  }

  return { execute, isSpecialTool };
}

export type ToolExecutor = ReturnType<typeof createToolExecutor>;
