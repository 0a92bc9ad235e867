// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `tsup.scripts.config`
 * Purpose: Build configuration for the agent CLI.
 * Scope: Compiles src/scripts/* to dist/scripts/* with path alias resolution.
 * Notes: Workspace packages export TypeScript sources, so they are bundled; npm dependencies stay external.
 * @internal
 */

import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/scripts/run-agent.ts"],
  outDir: "dist/scripts",
  format: ["esm"],
  target: "node20",
  platform: "node",
  sourcemap: true,
  clean: true,
  bundle: true,
  // Bundle @stepwise/* and @/ aliases; externalize everything else
  noExternal: [/^@stepwise\//],
  external: [/^(?!@\/)(?!@stepwise\/)(?!\.)[a-z@]/i],
  esbuildOptions(options) {
    options.alias = {
      "@": "./src",
    };
  },
});
