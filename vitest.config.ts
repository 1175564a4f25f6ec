import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node",
    // Follower and pipeline tests poll real files
    testTimeout: 10_000,
  },
});
