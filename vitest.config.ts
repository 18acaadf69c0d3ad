import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    env: {
      TNFUSION_LOG_LEVEL: "silent",
    },
    testTimeout: 20_000,
  },
});
