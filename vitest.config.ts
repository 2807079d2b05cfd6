/**
 * @file Vitest testing framework configuration
 *
 * Globals are enabled so specs use describe/it/expect without imports, and
 * the node environment gives them the real file system.
 */

import { defineConfig } from "vitest/config";
export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.spec.ts", "spec/**/*.spec.ts"],
  },
});
