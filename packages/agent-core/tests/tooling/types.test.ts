// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@stepwise/agent-core/tests/tooling/types.test`
 * Purpose: Unit tests for tool result helpers.
 * Scope: Construction, display text, combination. Does not execute tools.
 * Invariants:
 *   - Display text of an error always starts with "Error: " exactly once
 * Side-effects: none
 * Links: src/tooling/types.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import {
  combineToolResults,
  errorResult,
  hasStructuredData,
  isMeaningfulResult,
  toolResult,
  toolResultFromOutput,
  toolResultText,
} from "../../src/tooling/types";

describe("toolResultText", () => {
  it("returns content when there is no error", () => {
    expect(toolResultText(toolResult({ content: "fine" }))).toBe("fine");
  });

  it("prefixes errors once", () => {
    expect(toolResultText(errorResult("boom"))).toBe("Error: boom");
    expect(toolResultText(errorResult("Error: boom"))).toBe("Error: boom");
  });
});

describe("toolResultFromOutput", () => {
  it("maps null and undefined to an empty result", () => {
    expect(toolResultFromOutput(null)).toEqual({ content: "", data: {} });
    expect(toolResultFromOutput(undefined)).toEqual({ content: "", data: {} });
  });

  it("keeps strings and stringifies everything else", () => {
    expect(toolResultFromOutput("hi").content).toBe("hi");
    expect(toolResultFromOutput({ a: 1 }).content).toBe('{"a":1}');
    expect(toolResultFromOutput(42).content).toBe("42");
  });

  it("carries extra fields", () => {
    expect(toolResultFromOutput("x", { data: { k: "v" } })).toEqual({
      content: "x",
      data: { k: "v" },
    });
  });
});

describe("isMeaningfulResult / hasStructuredData", () => {
  it("treats an empty result as not meaningful", () => {
    expect(isMeaningfulResult(toolResult())).toBe(false);
    expect(isMeaningfulResult(toolResult({ system: "note" }))).toBe(true);
    expect(isMeaningfulResult(errorResult("x"))).toBe(true);
  });

  it("detects structured data", () => {
    expect(hasStructuredData(toolResult())).toBe(false);
    expect(hasStructuredData(toolResult({ data: { decision: "go" } }))).toBe(
      true
    );
  });
});

describe("combineToolResults", () => {
  it("concatenates text fields and merges data", () => {
    const combined = combineToolResults(
      toolResult({ content: "a", data: { x: 1, y: 1 } }),
      toolResult({ content: "b", data: { y: 2 }, system: "s" })
    );
    expect(combined).toEqual({
      content: "ab",
      data: { x: 1, y: 2 },
      system: "s",
    });
  });

  it("rejects colliding fields when concatenation is off", () => {
    expect(() =>
      combineToolResults(toolResult({ content: "a" }), toolResult({ content: "b" }), {
        concatenate: false,
      })
    ).toThrow("Cannot combine tool results");
  });

  it("allows disjoint fields when concatenation is off", () => {
    const combined = combineToolResults(
      toolResult({ content: "a" }),
      errorResult("e"),
      { concatenate: false }
    );
    expect(combined).toEqual({ content: "a", data: {}, error: "e" });
  });
});
