import { defineConfig } from "vitest/config";

/**
 * Vitest configuration for termecho.
 * Runs each test file in a forked child process, in a node environment.
 */
export default defineConfig({
  test: {
    pool: "forks",
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
