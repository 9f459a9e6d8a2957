import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000,
    env: {
      CORE_LOG_LEVEL: "silent"
    }
  }
});
