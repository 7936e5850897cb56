import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    testTimeout: 20_000,
    env: {
      PROVENANT_LOG_LEVEL: "silent",
    },
  },
});
