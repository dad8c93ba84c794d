import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    testTimeout: 20000,
    // tree-sitter is a native addon; keep it out of worker threads.
    pool: "forks",
  },
});
