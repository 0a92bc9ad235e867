// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-tools/schema`
 * Purpose: Compile ToolContract (Zod) to ToolSpec (JSONSchema7) for the model.
 * Scope: Schema compilation only. Does not execute tools or touch IO.
 * Invariants:
 *   - NO_MANUAL_SCHEMA_DUPLICATION: JSONSchema derived from Zod, never hand-written
 *   - Synchronous compilation (no async imports)
 * Side-effects: none
 * Links: types.ts, runtime-adapter.ts
 * @public
 */

import type { ToolSpec } from "@stepwise/agent-core";
import type { JSONSchema7 } from "json-schema";
import { zodToJsonSchema } from "zod-to-json-schema";

import type { ToolContract } from "./types";

/**
 * Compile a ToolContract to a ToolSpec.
 *
 * @param contract - Tool contract with a Zod input schema
 */
export function toToolSpec<TInput>(
  contract: ToolContract<string, TInput>
): ToolSpec {
  const rawSchema = zodToJsonSchema(contract.inputSchema, {
    $refStrategy: "none",
  });

  const inputSchema: JSONSchema7 =
    typeof rawSchema === "object" && rawSchema !== null
      ? (rawSchema as JSONSchema7)
      : { type: "object" };

  return {
    name: contract.name,
    description: contract.description,
    inputSchema,
  };
}
