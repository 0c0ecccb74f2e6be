import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "agents/**/*.test.ts",
      "command/**/*.test.ts",
      "core/**/*.test.ts",
      "orchestrator/**/*.test.ts",
    ],
    environment: "node",
    testTimeout: 10_000,
    env: { AUTOPR_LOG_LEVEL: "silent" },
  },
});
