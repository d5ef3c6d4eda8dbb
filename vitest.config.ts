import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],

    // Tests create temp directories and run in isolated processes
    pool: "forks",

    testTimeout: 30000,
  },
});
