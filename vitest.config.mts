// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest configuration for the root app tests (adapters, env, logging, bootstrap).
 * Scope: tests/** only; package tests run under their own configs via vitest.workspace.ts.
 * Invariants: No network (global fetch stubbed in setup); coverage disabled by default.
 * Side-effects: file system (coverage reports written to ./coverage/ when enabled)
 * Notes: Uses vite-tsconfig-paths for @/ and @stepwise/* resolution.
 * Links: vitest.workspace.ts, tests/setup.ts
 * @public
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import tsconfigPaths from "vite-tsconfig-paths";
import { defineConfig } from "vitest/config";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    name: "app",
    globals: true,
    environment: "node",
    setupFiles: ["./tests/setup.ts"],
    include: ["tests/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist", "tests/_fakes/**"],
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["lcov", "json-summary", "text"],
      reportsDirectory: "coverage",
      exclude: [
        "node_modules/",
        "tests/",
        "dist/",
        "**/*.d.ts",
        "**/*.config.*",
        "**/index.ts",
      ],
    },
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
  plugins: [tsconfigPaths()],
  resolve: {
    alias: {
      "@tests": path.resolve(__dirname, "./tests"),
    },
  },
});
