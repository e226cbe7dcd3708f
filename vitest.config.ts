import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    // Integration tests shell out to git in throwaway repositories
    testTimeout: 30000,
    env: {
      REVLIFT_LOG_LEVEL: "silent",
    },
  },
});
