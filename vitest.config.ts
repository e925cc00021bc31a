import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    // Each test spins up its own in-process Postgres (PGlite); keep files sequential
    fileParallelism: false,
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
