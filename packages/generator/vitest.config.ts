/**
 * Vitest Configuration — @ormgen/generator
 *
 * Naming, deduplication, building and rendering run in-process against
 * fixture models. Console output is spied on where a test needs it.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "generator",
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
