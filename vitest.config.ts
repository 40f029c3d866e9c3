import { defineConfig } from "vitest/config";

/**
 * Vitest configuration for rawpad.
 * Runs test files in child processes so tests that touch process.env or the
 * module registry stay isolated.
 */
export default defineConfig({
  test: {
    pool: "forks",
    environment: "node",
    include: ["tests/**/*.test.ts"],
    // Keep session logging off unless a test turns it on.
    env: { DEBUG: "" },
  },
});
